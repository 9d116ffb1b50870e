/**
 * Language identifier helpers
 *
 * Parsing and formatting go through Intl.Locale so subtag casing is
 * canonical before any comparison.
 */

import type { LanguageIdentifier, LanguageInput } from "@/types";
import { PATTERN_SLOT_SEPARATOR, UNDETERMINED_LANGUAGE } from "@/constants";

/**
 * Error thrown when a tag string is not a well-formed language tag.
 */
export class InvalidLanguageTagError extends Error {
  public readonly tag: string;

  constructor(tag: string, reason: string) {
    super(`Invalid language tag "${tag}": ${reason}`);
    this.name = "InvalidLanguageTagError";
    this.tag = tag;
  }
}

/**
 * Parse a BCP 47 ("zh-Hant-HK") or CLDR ("zh_Hant_HK") tag.
 *
 * Variants, extensions and private-use subtags are dropped.
 *
 * @param tag - Tag string, either separator
 * @returns Identifier with only the subtags present in the tag
 * @throws {InvalidLanguageTagError} If the tag is empty, malformed or has an
 *   undetermined language ("und")
 */
export function parseLanguageIdentifier(tag: string): LanguageIdentifier {
  const trimmed = tag.trim();
  if (trimmed.length === 0) {
    throw new InvalidLanguageTagError(tag, "tag is empty");
  }

  let locale: Intl.Locale;
  try {
    locale = new Intl.Locale(trimmed.split(PATTERN_SLOT_SEPARATOR).join("-"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidLanguageTagError(tag, reason);
  }

  return fromLocale(locale);
}

/**
 * True for "und" and for a missing language subtag. Newer ICU releases
 * report "und" as an absent language rather than the literal subtag.
 */
export function isUndeterminedLanguage(language: string | undefined): boolean {
  return !language || language === UNDETERMINED_LANGUAGE;
}

/**
 * Convert an Intl.Locale into a plain identifier.
 *
 * @param locale - Parsed locale
 * @returns Identifier with the locale's language, script and region
 * @throws {InvalidLanguageTagError} If the locale has no determined language
 */
export function fromLocale(locale: Intl.Locale): LanguageIdentifier {
  const language = locale.language;
  if (isUndeterminedLanguage(language)) {
    throw new InvalidLanguageTagError(
      locale.toString(),
      "language is undetermined",
    );
  }
  const id: LanguageIdentifier = { language };
  if (locale.script) {
    id.script = locale.script;
  }
  if (locale.region) {
    id.region = locale.region;
  }
  return id;
}

/**
 * Resolve API input to a fresh identifier.
 *
 * Structured input is copied so later steps never alias caller data.
 */
export function toLanguageIdentifier(input: LanguageInput): LanguageIdentifier {
  if (typeof input === "string") {
    return parseLanguageIdentifier(input);
  }
  const id: LanguageIdentifier = { language: input.language };
  if (input.script !== undefined) {
    id.script = input.script;
  }
  if (input.region !== undefined) {
    id.region = input.region;
  }
  return id;
}

/**
 * Render as a BCP 47 tag: language[-Script][-REGION]
 */
export function formatLanguageIdentifier(id: LanguageIdentifier): string {
  return [id.language, id.script, id.region]
    .filter((part): part is string => part !== undefined && part !== "")
    .join("-");
}

/**
 * Stable set key. Equal keys iff all three fields are equal; absent
 * fields keep their slot so "en__US" never collides with "en_US".
 */
export function languageIdentifierKey(id: LanguageIdentifier): string {
  return `${id.language}_${id.script ?? ""}_${id.region ?? ""}`;
}

export function sameLanguageIdentifier(
  a: LanguageIdentifier,
  b: LanguageIdentifier,
): boolean {
  return (
    a.language === b.language && a.script === b.script && a.region === b.region
  );
}
