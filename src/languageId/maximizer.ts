/**
 * Likely-subtags maximizer backed by Intl.Locale#maximize
 *
 * The runtime's ICU data supplies the likely subtags; this adapter only
 * converts shapes and checks that script and region came back filled.
 */

import type {
  LanguageIdentifier,
  LanguageMaximizer,
  MaximizedLanguageIdentifier,
} from "@/types";
import {
  formatLanguageIdentifier,
  isUndeterminedLanguage,
} from "./languageIdentifier";

/**
 * Error thrown when an identifier cannot be completed to
 * language + script + region.
 */
export class MaximizationError extends Error {
  public readonly input: string;

  constructor(input: string, reason: string) {
    super(`Cannot maximize "${input}": ${reason}`);
    this.name = "MaximizationError";
    this.input = input;
  }
}

/**
 * Narrow an identifier to its maximized form.
 *
 * @throws {MaximizationError} If script or region is missing
 */
export function assertMaximized(
  id: LanguageIdentifier,
): MaximizedLanguageIdentifier {
  if (!id.script || !id.region) {
    throw new MaximizationError(
      formatLanguageIdentifier(id),
      `missing ${!id.script ? "script" : "region"} subtag`,
    );
  }
  return { language: id.language, script: id.script, region: id.region };
}

/**
 * Maximizer over the runtime's likely-subtags data.
 *
 * The undetermined language is refused before ICU sees it: depending on
 * the ICU release, "und" either stays "und" or maximizes to "en-Latn-*".
 */
export class IntlLanguageMaximizer implements LanguageMaximizer {
  /**
   * Fill script and region from likely subtags.
   *
   * @param id - Identifier to complete; never mutated
   * @returns A new identifier with language, script and region set
   * @throws {MaximizationError} If the language is undetermined, the tag is
   *   rejected by Intl.Locale, or no likely script/region is known
   */
  maximize(id: LanguageIdentifier): MaximizedLanguageIdentifier {
    const tag = formatLanguageIdentifier(id);

    if (isUndeterminedLanguage(id.language)) {
      throw new MaximizationError(tag, "undetermined language");
    }

    let maximized: Intl.Locale;
    try {
      maximized = new Intl.Locale(tag).maximize();
    } catch (err) {
      throw new MaximizationError(
        tag,
        err instanceof Error ? err.message : String(err),
      );
    }

    if (isUndeterminedLanguage(maximized.language)) {
      throw new MaximizationError(tag, "no likely subtags for language");
    }

    return assertMaximized({
      language: maximized.language,
      script: maximized.script,
      region: maximized.region,
    });
  }
}
