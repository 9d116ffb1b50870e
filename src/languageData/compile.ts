/**
 * Language data compilation
 *
 * Turns validated raw data into the immutable structures the distance
 * engine reads. Rule order is kept exactly as loaded.
 */

import type {
  CompiledLanguageData,
  LanguageDataRaw,
  LanguageMaximizer,
  Logger,
  MatchRule,
  VariableTable,
} from "@/types";
import {
  PARADIGM_LOCALE_SEPARATOR,
  VARIABLE_SIGIL,
  VARIABLE_VALUE_SEPARATOR,
} from "@/constants";
import { defaultLogger } from "@/logger";
import { languageIdentifierKey, parseLanguageIdentifier } from "@/languageId";
import { isUniversalPattern, parseTagPattern, patternVariables } from "@/matching/tagPattern";

export class LanguageDataCompilationError extends Error {
  constructor(message: string) {
    super(`Language data compilation failed: ${message}`);
    this.name = "LanguageDataCompilationError";
  }
}

/**
 * Split each variable's value list into a set, keyed by name without "$".
 *
 * @param raw - Validated data
 * @returns Variable name to member subtags
 */
function compileVariables(raw: LanguageDataRaw): VariableTable {
  const variables = new Map<string, ReadonlySet<string>>();
  for (const variable of raw.matchVariables) {
    // TODO: support "-" (set difference) in values once the data uses it
    variables.set(
      variable.id.slice(VARIABLE_SIGIL.length),
      new Set(variable.value.split(VARIABLE_VALUE_SEPARATOR)),
    );
  }
  return variables;
}

/**
 * Parse every rule's patterns, preserving table order.
 *
 * @param raw - Validated data
 * @param variables - Compiled variable table, used to check references
 * @returns Rules in the order they were loaded
 * @throws {LanguageDataCompilationError} If a rule references an undefined variable
 */
function compileRules(raw: LanguageDataRaw, variables: VariableTable): MatchRule[] {
  return raw.languageMatches.map((entry, index) => {
    const rule: MatchRule = {
      desired: parseTagPattern(entry.desired),
      supported: parseTagPattern(entry.supported),
      baseDistance: entry.distance,
      oneWay: entry.oneway === true,
    };

    for (const name of [...patternVariables(rule.desired), ...patternVariables(rule.supported)]) {
      if (!variables.has(name)) {
        throw new LanguageDataCompilationError(
          `languageMatches[${index}] ("${entry.desired}" -> "${entry.supported}") references undefined variable "${VARIABLE_SIGIL}${name}"`,
        );
      }
    }

    return rule;
  });
}

/**
 * @throws {LanguageDataCompilationError} If no rule is "*_*_*" on both sides
 */
function ensureUniversalFallback(rules: MatchRule[]): void {
  const hasFallback = rules.some(
    (rule) => isUniversalPattern(rule.desired) && isUniversalPattern(rule.supported),
  );
  if (!hasFallback) {
    throw new LanguageDataCompilationError(
      'rule table has no universal fallback rule ("*_*_*" -> "*_*_*")',
    );
  }
}

/**
 * Maximize the space-separated paradigm locales into set keys.
 *
 * @param raw - Validated data
 * @param maximizer - Likely-subtags source
 * @returns Keys from languageIdentifierKey
 * @throws {LanguageDataCompilationError} If a locale cannot be parsed or maximized
 */
function compileParadigms(
  raw: LanguageDataRaw,
  maximizer: LanguageMaximizer,
): ReadonlySet<string> {
  const paradigms = new Set<string>();
  const tags = raw.paradigmLocales
    .split(PARADIGM_LOCALE_SEPARATOR)
    .filter((tag) => tag.length > 0);

  for (const tag of tags) {
    try {
      paradigms.add(languageIdentifierKey(maximizer.maximize(parseLanguageIdentifier(tag))));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new LanguageDataCompilationError(
        `paradigm locale "${tag}" cannot be maximized: ${reason}`,
      );
    }
  }
  return paradigms;
}

/**
 * Compile validated data into a frozen runtime table.
 *
 * Steps:
 * 1. Split variables into value sets (sigil dropped)
 * 2. Parse rule patterns, checking every variable reference
 * 3. Require a "*_*_*" / "*_*_*" fallback so lookup always succeeds
 * 4. Maximize paradigm locales
 *
 * @throws {LanguageDataCompilationError} If any step fails
 */
export function compileLanguageData(
  raw: LanguageDataRaw,
  maximizer: LanguageMaximizer,
  logger: Logger = defaultLogger,
): CompiledLanguageData {
  const variables = compileVariables(raw);
  logger.debug("Compiled match variables", { count: variables.size });

  const rules = compileRules(raw, variables);
  ensureUniversalFallback(rules);
  logger.debug("Compiled match rules", { count: rules.length });

  const paradigms = compileParadigms(raw, maximizer);

  logger.info("Language data compiled", {
    version: raw.version,
    rules: rules.length,
    variables: variables.size,
    paradigms: paradigms.size,
  });

  return Object.freeze({
    version: raw.version,
    rules: Object.freeze(rules),
    variables,
    paradigms,
  });
}
