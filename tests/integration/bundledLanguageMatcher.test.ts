/**
 * Integration tests against the bundled CLDR table and the runtime's
 * likely-subtags data (Intl.Locale#maximize)
 */

import { describe, it, expect } from "vitest";
import { NO_MATCH_THRESHOLD } from "@/constants";
import {
  IntlLanguageMaximizer,
  InvalidLanguageTagError,
  MaximizationError,
} from "@/languageId";
import { createLanguageMatcher, getDefaultLanguageMatcher } from "@/matching";
import { createSilentLogger } from "../helpers/testLanguageData";

const matcher = createLanguageMatcher({ logger: createSilentLogger() });

describe("IntlLanguageMaximizer", () => {
  const maximizer = new IntlLanguageMaximizer();

  it("should fill script and region from likely subtags", () => {
    expect(maximizer.maximize({ language: "zh", region: "HK" })).toEqual({
      language: "zh",
      script: "Hant",
      region: "HK",
    });
    expect(maximizer.maximize({ language: "en" })).toEqual({
      language: "en",
      script: "Latn",
      region: "US",
    });
  });

  it("should keep explicit subtags", () => {
    expect(maximizer.maximize({ language: "en", region: "GB" })).toEqual({
      language: "en",
      script: "Latn",
      region: "GB",
    });
  });

  it("should reject the undetermined language before consulting likely subtags", () => {
    expect(() => maximizer.maximize({ language: "und" })).toThrow(
      'Cannot maximize "und": undetermined language',
    );
    expect(() => maximizer.maximize({ language: "und", region: "AQ" })).toThrow(
      'Cannot maximize "und-AQ": undetermined language',
    );
  });

  it("should reject a language without likely subtags", () => {
    expect(() => maximizer.maximize({ language: "xyz" })).toThrow(MaximizationError);
    expect(() => maximizer.maximize({ language: "xyz" })).toThrow(
      'Cannot maximize "xyz": missing script subtag',
    );
  });
});

describe("bundled table distances", () => {
  it("should refuse an undetermined desired language", () => {
    expect(() => matcher.distance("und", "en")).toThrow(InvalidLanguageTagError);
  });

  it("should treat a region implied by script as identical", () => {
    expect(matcher.distance("zh-CN", "zh-Hans")).toBe(0);
    expect(matcher.distance("zh-TW", "zh-Hant")).toBe(0);
  });

  it("should give a small distance within a region variable", () => {
    expect(matcher.distance("zh-HK", "zh-MO")).toBe(40);
  });

  it("should fall back to the language-wide region rule across variables", () => {
    expect(matcher.distance("zh-HK", "zh-Hant")).toBe(50);
  });

  it("should apply paradigm discounts", () => {
    expect(matcher.distance("en-US", "en-GB")).toBe(50);
    expect(matcher.distance("en-US", "en-CA")).toBe(39);
    expect(matcher.distance("es-MX", "es-419")).toBe(39);
  });

  it("should apply one-way rules only in their direction", () => {
    expect(matcher.distance("en-AU", "en-GB")).toBe(29);
    expect(matcher.distance("en-GB", "en-AU")).toBe(39);
    expect(matcher.distance("de", "gsw")).toBe(80);
    expect(matcher.distance("gsw", "de")).toBe(840);
  });

  it("should reach the largest distance for unrelated languages", () => {
    expect(matcher.explain("en", "ja")).toEqual({
      region: 39,
      script: 500,
      language: 800,
      total: 1339,
    });
    expect(matcher.distance("en", "ja")).toBeGreaterThanOrEqual(NO_MATCH_THRESHOLD);
  });
});

describe("bundled table best match", () => {
  const accepts = ["en", "ja", "zh-Hans", "zh-Hant"];

  it("should pick the script-compatible Chinese variant", () => {
    expect(matcher.bestMatch("zh-CN", accepts)).toEqual({
      candidate: "zh-Hans",
      distance: 0,
      index: 2,
    });
    expect(matcher.bestMatch("zh-TW", accepts)).toEqual({
      candidate: "zh-Hant",
      distance: 0,
      index: 3,
    });
  });

  it("should return no match for an unsupported language", () => {
    expect(matcher.bestMatch("ko", ["en", "ja"])).toBeUndefined();
  });
});

describe("getDefaultLanguageMatcher", () => {
  it("should return one shared instance", () => {
    expect(getDefaultLanguageMatcher()).toBe(getDefaultLanguageMatcher());
  });
});
