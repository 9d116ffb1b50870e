/**
 * Language matcher — distance and best-match selection over a compiled
 * CLDR language matching table.
 *
 * Immutable after construction; every query recomputes from the table.
 *
 * @example
 * const matcher = getDefaultLanguageMatcher();
 * matcher.distance("en-US", "en-CA"); // 39
 * matcher.bestMatch("zh-CN", ["en", "ja", "zh-Hans", "zh-Hant"]);
 * // { candidate: "zh-Hans", distance: 0, index: 2 }
 */

import type {
  BestMatch,
  CompiledLanguageData,
  LanguageIdentifier,
  LanguageInput,
  LanguageMaximizer,
  Logger,
  MaximizedLanguageIdentifier,
} from "@/types";
import { NO_MATCH_THRESHOLD } from "@/constants";
import { defaultLogger } from "@/logger";
import { IntlLanguageMaximizer, toLanguageIdentifier } from "@/languageId";
import { compileLanguageData, loadLanguageData } from "@/languageData";
import type { DistanceBreakdown } from "./distanceEngine";
import { computeDistance, computeDistanceBreakdown } from "./distanceEngine";
import { isParadigm } from "./ruleLookup";

export class LanguageMatcher {
  private readonly data: CompiledLanguageData;
  private readonly maximizer: LanguageMaximizer;

  constructor(data: CompiledLanguageData, maximizer: LanguageMaximizer) {
    this.data = data;
    this.maximizer = maximizer;
    Object.freeze(this);
  }

  get version(): string {
    return this.data.version;
  }

  /**
   * Maximized copy of the input; the caller's value is not touched.
   */
  maximize(input: LanguageInput): MaximizedLanguageIdentifier {
    return this.maximizer.maximize(toLanguageIdentifier(input));
  }

  isParadigm(id: LanguageIdentifier): boolean {
    return isParadigm(id, this.data);
  }

  /**
   * Distance between two languages (scaled by 10; 1 less when exactly one
   * side is a paradigm locale in the dimension scored).
   *
   * Some rules are one-way, so argument order matters.
   */
  distance(desired: LanguageInput, supported: LanguageInput): number {
    return computeDistance(this.maximize(desired), this.maximize(supported), this.data);
  }

  /** Per-dimension contributions behind distance() */
  explain(desired: LanguageInput, supported: LanguageInput): DistanceBreakdown {
    return computeDistanceBreakdown(this.maximize(desired), this.maximize(supported), this.data);
  }

  /**
   * Closest candidate to `desired`.
   *
   * Ties go to the earliest candidate. Returns undefined when there are no
   * candidates or the closest one is at or beyond NO_MATCH_THRESHOLD.
   */
  bestMatch<T extends LanguageInput>(
    desired: LanguageInput,
    candidates: Iterable<T>,
  ): BestMatch<T> | undefined {
    const maxDesired = this.maximize(desired);

    let best: BestMatch<T> | undefined;
    let index = 0;
    for (const candidate of candidates) {
      const distance = computeDistance(maxDesired, this.maximize(candidate), this.data);
      if (best === undefined || distance < best.distance) {
        best = { candidate, distance, index };
      }
      index++;
    }

    if (best === undefined || best.distance >= NO_MATCH_THRESHOLD) {
      return undefined;
    }
    return best;
  }
}

export type LanguageMatcherOptions = {
  /** Path to the JSON table; defaults to env or the bundled file */
  dataPath?: string;
  maximizer?: LanguageMaximizer;
  logger?: Logger;
};

/**
 * Load, validate and compile the table, then build a matcher.
 */
export function createLanguageMatcher(options: LanguageMatcherOptions = {}): LanguageMatcher {
  const maximizer = options.maximizer ?? new IntlLanguageMaximizer();
  const raw = loadLanguageData(options.dataPath);
  const data = compileLanguageData(raw, maximizer, options.logger ?? defaultLogger);
  return new LanguageMatcher(data, maximizer);
}

let defaultMatcher: LanguageMatcher | undefined;

/**
 * Process-wide matcher built from the default data path on first use.
 */
export function getDefaultLanguageMatcher(): LanguageMatcher {
  if (!defaultMatcher) {
    defaultMatcher = createLanguageMatcher();
  }
  return defaultMatcher;
}
