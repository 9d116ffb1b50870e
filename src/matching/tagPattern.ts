/**
 * Tag patterns — "language[_script[_region]]" over a language identifier
 */

import type { LanguageIdentifier, TagPattern, VariableTable } from "@/types";
import { PATTERN_SLOT_SEPARATOR } from "@/constants";
import { matchesSubtag, parseSubtagPattern, referencedVariable } from "./subtagPattern";

/**
 * Parse a pattern string such as "zh_Hant_$cnsar" or "*_*".
 *
 * Slot count and emptiness are checked by data validation; this only
 * maps slots positionally.
 */
export function parseTagPattern(source: string): TagPattern {
  const [language, script, region] = source.split(PATTERN_SLOT_SEPARATOR);
  const pattern: TagPattern = { language: parseSubtagPattern(language) };
  if (script !== undefined) {
    pattern.script = parseSubtagPattern(script);
  }
  if (region !== undefined) {
    pattern.region = parseSubtagPattern(region);
  }
  return pattern;
}

export function matchesTag(
  pattern: TagPattern,
  id: LanguageIdentifier,
  variables: VariableTable,
): boolean {
  return (
    matchesSubtag(pattern.language, id.language, variables) &&
    matchesSubtag(pattern.script, id.script, variables) &&
    matchesSubtag(pattern.region, id.region, variables)
  );
}

/**
 * True when every slot is present and is a wildcard ("*_*_*"), i.e. the
 * pattern matches any identifier at any stage of the distance passes.
 */
export function isUniversalPattern(pattern: TagPattern): boolean {
  return (
    pattern.language.kind === "any" &&
    pattern.script?.kind === "any" &&
    pattern.region?.kind === "any"
  );
}

export function patternVariables(pattern: TagPattern): string[] {
  return [pattern.language, pattern.script, pattern.region]
    .map(referencedVariable)
    .filter((name): name is string => name !== undefined);
}
