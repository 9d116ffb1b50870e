/**
 * Unit tests for language data compilation
 *
 * Variable splitting, rule order, reference checks, fallback check and
 * paradigm maximization
 */

import { describe, it, expect } from "vitest";
import type { LanguageDataRaw } from "@/types";
import { compileLanguageData, LanguageDataCompilationError } from "@/languageData";
import {
  createSilentLogger,
  createTestLanguageDataRaw,
  FakeMaximizer,
} from "../helpers/testLanguageData";

function compile(raw: LanguageDataRaw) {
  return compileLanguageData(raw, new FakeMaximizer(), createSilentLogger());
}

describe("compileLanguageData", () => {
  it("should split variables and drop the sigil", () => {
    const data = compile(createTestLanguageDataRaw());
    expect([...data.variables.keys()]).toEqual(["enUS", "cnsar"]);
    expect(data.variables.get("enUS")).toEqual(new Set(["CA", "PR", "US"]));
  });

  it("should keep rule order exactly as loaded", () => {
    const data = compile(createTestLanguageDataRaw());
    expect(data.rules).toHaveLength(12);
    expect(data.rules[0]).toEqual({
      desired: { language: { kind: "literal", value: "nb" } },
      supported: { language: { kind: "literal", value: "no" } },
      baseDistance: 1,
      oneWay: false,
    });
    expect(data.rules[11].baseDistance).toBe(4);
    expect(data.rules[7].oneWay).toBe(true);
  });

  it("should maximize paradigm locales into set keys", () => {
    const data = compile(createTestLanguageDataRaw());
    expect([...data.paradigms]).toEqual(["en_Latn_US", "en_Latn_GB"]);
  });

  it("should freeze the compiled table", () => {
    const data = compile(createTestLanguageDataRaw());
    expect(Object.isFrozen(data)).toBe(true);
    expect(Object.isFrozen(data.rules)).toBe(true);
  });

  it("should reject a rule referencing an undefined variable", () => {
    const raw = createTestLanguageDataRaw();
    raw.languageMatches.unshift({ desired: "ar_*_$maghreb", supported: "ar_*_$maghreb", distance: 4 });
    expect(() => compile(raw)).toThrow(LanguageDataCompilationError);
    expect(() => compile(raw)).toThrow(
      'Language data compilation failed: languageMatches[0] ("ar_*_$maghreb" -> "ar_*_$maghreb") references undefined variable "$maghreb"',
    );
  });

  it("should reject a table without the universal fallback", () => {
    const raw = createTestLanguageDataRaw();
    raw.languageMatches = raw.languageMatches.filter((rule) => rule.desired !== "*_*_*");
    expect(() => compile(raw)).toThrow(
      'Language data compilation failed: rule table has no universal fallback rule ("*_*_*" -> "*_*_*")',
    );
  });

  it("should not count a one-sided wildcard rule as the fallback", () => {
    const raw = createTestLanguageDataRaw();
    raw.languageMatches = raw.languageMatches.filter((rule) => rule.desired !== "*_*_*");
    raw.languageMatches.push({ desired: "*_*_*", supported: "en_*_*", distance: 4 });
    expect(() => compile(raw)).toThrow(LanguageDataCompilationError);
  });

  it("should reject paradigm locales that cannot be maximized", () => {
    const raw = { ...createTestLanguageDataRaw(), paradigmLocales: "en xx_YY" };
    expect(() => compile(raw)).toThrow(
      'Language data compilation failed: paradigm locale "xx_YY" cannot be maximized: Cannot maximize "xx-YY": unknown test language',
    );
  });

  it("should log a summary at info", () => {
    const logger = createSilentLogger();
    compileLanguageData(createTestLanguageDataRaw(), new FakeMaximizer(), logger);
    expect(logger.info).toHaveBeenCalledWith("Language data compiled", {
      version: "0.0.0-test",
      rules: 12,
      variables: 2,
      paradigms: 2,
    });
  });
});
