/**
 * Unit tests for CLI command handling
 */

import { describe, it, expect } from "vitest";
import { CliUsageError, runCommand, USAGE } from "@/cli";
import { createTestMatcher } from "../helpers/testLanguageData";

describe("runCommand", () => {
  const matcher = createTestMatcher();

  it("should print the distance", () => {
    expect(runCommand(matcher, ["distance", "en-US", "en-CA"])).toBe("39");
  });

  it("should print the best candidate and its distance", () => {
    expect(runCommand(matcher, ["match", "zh", "en", "zh-Hans-CN"])).toBe("zh-Hans-CN 0");
  });

  it("should print no match when nothing is close enough", () => {
    expect(runCommand(matcher, ["match", "en", "ja"])).toBe("no match");
  });

  it("should reject bad usage", () => {
    expect(() => runCommand(matcher, [])).toThrow(USAGE);
    expect(() => runCommand(matcher, ["distance", "en"])).toThrow(CliUsageError);
    expect(() => runCommand(matcher, ["match", "en"])).toThrow(CliUsageError);
    expect(() => runCommand(matcher, ["compare", "en", "fr"])).toThrow('Unknown command "compare"');
  });
});
