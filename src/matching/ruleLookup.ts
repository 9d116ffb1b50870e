/**
 * Rule lookup — first languageMatch rule that accepts a pair of tags
 */

import type { LanguageIdentifier, MatchingContext, MatchRule, VariableTable } from "@/types";
import { DISTANCE_SCALE, PARADIGM_DISCOUNT } from "@/constants";
import { formatLanguageIdentifier, languageIdentifierKey } from "@/languageId";
import { DistanceInvariantError } from "./errors";
import { matchesTag } from "./tagPattern";

/**
 * Whether a rule accepts (desired, supported), trying the swapped
 * direction for rules that are not one-way.
 */
export function ruleMatches(
  rule: MatchRule,
  desired: LanguageIdentifier,
  supported: LanguageIdentifier,
  variables: VariableTable,
): boolean {
  if (
    matchesTag(rule.desired, desired, variables) &&
    matchesTag(rule.supported, supported, variables)
  ) {
    return true;
  }
  return (
    !rule.oneWay &&
    matchesTag(rule.supported, desired, variables) &&
    matchesTag(rule.desired, supported, variables)
  );
}

/**
 * Index of the first rule accepting the pair, or -1.
 * Table order is the only tie-break.
 */
export function findMatchingRule(
  desired: LanguageIdentifier,
  supported: LanguageIdentifier,
  rules: readonly MatchRule[],
  variables: VariableTable,
): number {
  return rules.findIndex((rule) => ruleMatches(rule, desired, supported, variables));
}

export function isParadigm(id: LanguageIdentifier, context: MatchingContext): boolean {
  return context.paradigms.has(languageIdentifierKey(id));
}

/**
 * Scaled distance of the first matching rule, discounted by one when
 * exactly one side is a paradigm locale. Never below zero.
 *
 * @throws {DistanceInvariantError} If no rule matches
 */
export function lookupDistance(
  desired: LanguageIdentifier,
  supported: LanguageIdentifier,
  context: MatchingContext,
): number {
  const index = findMatchingRule(desired, supported, context.rules, context.variables);
  if (index < 0) {
    throw new DistanceInvariantError(
      `no rule matches "${formatLanguageIdentifier(desired)}" -> "${formatLanguageIdentifier(supported)}"`,
    );
  }

  const distance = context.rules[index].baseDistance * DISTANCE_SCALE;
  return isParadigm(desired, context) !== isParadigm(supported, context)
    ? Math.max(0, distance - PARADIGM_DISCOUNT)
    : distance;
}
