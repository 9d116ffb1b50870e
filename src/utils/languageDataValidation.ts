/**
 * Language data validation
 *
 * Checks the JSON shape of the language matching table:
 * - Required fields present with the right types
 * - No empty strings, no empty pattern slots, at most three slots
 * - Distances are integers in 0..MAX_BASE_DISTANCE
 * - Variable ids carry the "$" sigil and are unique
 *
 * Fail-fast: throws on the first problem, naming the field path.
 * Cross-references (undefined variables, missing fallback rule) are
 * checked at compile time.
 */

import type { LanguageDataRaw, LanguageMatchRaw, MatchVariableRaw } from "@/types";
import {
  EXCLUDED_VARIABLE_SIGIL,
  MAX_BASE_DISTANCE,
  MAX_PATTERN_SLOTS,
  PATTERN_SLOT_SEPARATOR,
  VARIABLE_SIGIL,
  VARIABLE_VALUE_SEPARATOR,
} from "@/constants";

export class LanguageDataValidationError extends Error {
  constructor(message: string) {
    super(`Language data validation failed: ${message}`);
    this.name = "LanguageDataValidationError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Assert a non-blank string.
 *
 * @param value - Value to check
 * @param fieldPath - Path used in error messages, e.g. "version"
 * @throws {LanguageDataValidationError} If not a string or blank
 */
function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new LanguageDataValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  if (value.trim().length === 0) {
    throw new LanguageDataValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
}

/**
 * @param value - Value to check
 * @param fieldPath - Path used in error messages
 * @throws {LanguageDataValidationError} If not an array
 */
function validateArray(value: unknown, fieldPath: string): asserts value is unknown[] {
  if (!Array.isArray(value)) {
    throw new LanguageDataValidationError(
      `${fieldPath} must be an array, got ${typeof value}`,
    );
  }
}

/**
 * Pattern strings: 1-3 "_"-separated, non-empty slots; variable slots
 * need a name after the sigil.
 *
 * @param value - Raw pattern, e.g. "en_*_$!enUS"
 * @param fieldPath - Path used in error messages
 * @throws {LanguageDataValidationError} If the pattern is malformed
 */
function validatePattern(value: unknown, fieldPath: string): asserts value is string {
  validateNonEmptyString(value, fieldPath);

  const slots = value.split(PATTERN_SLOT_SEPARATOR);
  if (slots.length > MAX_PATTERN_SLOTS) {
    throw new LanguageDataValidationError(
      `${fieldPath} has ${slots.length} slots, at most ${MAX_PATTERN_SLOTS} allowed: "${value}"`,
    );
  }
  slots.forEach((slot, slotIndex) => {
    if (slot.length === 0) {
      throw new LanguageDataValidationError(
        `${fieldPath} slot ${slotIndex} is empty: "${value}"`,
      );
    }
    if (slot === VARIABLE_SIGIL || slot === EXCLUDED_VARIABLE_SIGIL) {
      throw new LanguageDataValidationError(
        `${fieldPath} slot ${slotIndex} has no variable name: "${value}"`,
      );
    }
  });
}

/**
 * Validate one matchVariables entry.
 *
 * @param variable - Raw entry
 * @param index - Position in matchVariables, for error paths
 * @returns The entry typed as MatchVariableRaw
 * @throws {LanguageDataValidationError} If id or value is invalid
 */
function validateMatchVariable(variable: unknown, index: number): MatchVariableRaw {
  const prefix = `matchVariables[${index}]`;
  if (!isRecord(variable)) {
    throw new LanguageDataValidationError(`${prefix} must be an object`);
  }

  validateNonEmptyString(variable.id, `${prefix}.id`);
  if (
    !variable.id.startsWith(VARIABLE_SIGIL) ||
    variable.id.startsWith(EXCLUDED_VARIABLE_SIGIL) ||
    variable.id.length === VARIABLE_SIGIL.length
  ) {
    throw new LanguageDataValidationError(
      `${prefix}.id must be "${VARIABLE_SIGIL}" followed by a name, got "${variable.id}"`,
    );
  }

  validateNonEmptyString(variable.value, `${prefix}.value`);
  const values = variable.value.split(VARIABLE_VALUE_SEPARATOR);
  if (values.some((v) => v.length === 0)) {
    throw new LanguageDataValidationError(
      `${prefix}.value contains an empty entry: "${variable.value}"`,
    );
  }

  return { id: variable.id, value: variable.value };
}

/**
 * Validate one languageMatches entry.
 *
 * @param rule - Raw entry
 * @param index - Position in languageMatches, for error paths
 * @returns The entry with `oneway` defaulted to false
 * @throws {LanguageDataValidationError} If a pattern, distance or oneway is invalid
 */
function validateLanguageMatch(rule: unknown, index: number): LanguageMatchRaw {
  const prefix = `languageMatches[${index}]`;
  if (!isRecord(rule)) {
    throw new LanguageDataValidationError(`${prefix} must be an object`);
  }

  validatePattern(rule.desired, `${prefix}.desired`);
  validatePattern(rule.supported, `${prefix}.supported`);

  const distance = rule.distance;
  if (typeof distance !== "number" || !Number.isInteger(distance)) {
    throw new LanguageDataValidationError(
      `${prefix}.distance must be an integer, got ${String(distance)}`,
    );
  }
  if (distance < 0 || distance > MAX_BASE_DISTANCE) {
    throw new LanguageDataValidationError(
      `${prefix}.distance must be within 0..${MAX_BASE_DISTANCE}, got ${distance}`,
    );
  }

  if (rule.oneway !== undefined && typeof rule.oneway !== "boolean") {
    throw new LanguageDataValidationError(
      `${prefix}.oneway must be a boolean when present, got ${typeof rule.oneway}`,
    );
  }

  return {
    desired: rule.desired,
    supported: rule.supported,
    distance,
    oneway: rule.oneway === true,
  };
}

/**
 * @throws {LanguageDataValidationError} If two variables share an id
 */
function checkDuplicateVariables(variables: MatchVariableRaw[]): void {
  const seen = new Set<string>();
  for (const variable of variables) {
    if (seen.has(variable.id)) {
      throw new LanguageDataValidationError(
        `Duplicate match variable: "${variable.id}"`,
      );
    }
    seen.add(variable.id);
  }
}

/**
 * Validate raw language matching data (usually JSON.parse output).
 *
 * @param raw - Parsed JSON of unknown shape
 * @returns The same data, typed and with `oneway` defaulted to false
 * @throws {LanguageDataValidationError} On the first invalid field
 *
 * @example
 * const data = validateLanguageDataRaw(JSON.parse(jsonString));
 */
export function validateLanguageDataRaw(raw: unknown): LanguageDataRaw {
  if (!isRecord(raw)) {
    throw new LanguageDataValidationError("Language data must be an object");
  }

  validateNonEmptyString(raw.version, "version");
  validateNonEmptyString(raw.paradigmLocales, "paradigmLocales");

  validateArray(raw.matchVariables, "matchVariables");
  validateArray(raw.languageMatches, "languageMatches");
  if (raw.languageMatches.length === 0) {
    throw new LanguageDataValidationError("languageMatches cannot be empty");
  }

  const matchVariables = raw.matchVariables.map(validateMatchVariable);
  const languageMatches = raw.languageMatches.map(validateLanguageMatch);

  checkDuplicateVariables(matchVariables);

  return {
    version: raw.version,
    paradigmLocales: raw.paradigmLocales,
    matchVariables,
    languageMatches,
  };
}
