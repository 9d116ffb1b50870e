/**
 * Distance engine — region, script, then language
 *
 * Each pass scores one dimension when it differs, and the next pass sees
 * both identifiers with that dimension removed. Removal changes which
 * patterns can match (absent slots) and paradigm membership, so the
 * order is fixed.
 */

import type {
  LanguageIdentifier,
  MatchingContext,
  MaximizedLanguageIdentifier,
} from "@/types";
import { formatLanguageIdentifier } from "@/languageId";
import { DistanceInvariantError } from "./errors";
import { lookupDistance } from "./ruleLookup";

/**
 * Per-dimension contributions; `total` is their sum.
 */
export type DistanceBreakdown = {
  region: number;
  script: number;
  language: number;
  total: number;
};

function assertMaximizedInput(id: LanguageIdentifier, side: string): void {
  if (!id.script || !id.region) {
    throw new DistanceInvariantError(
      `${side} "${formatLanguageIdentifier(id)}" is not maximized`,
    );
  }
}

export function computeDistanceBreakdown(
  desired: MaximizedLanguageIdentifier,
  supported: MaximizedLanguageIdentifier,
  context: MatchingContext,
): DistanceBreakdown {
  assertMaximizedInput(desired, "desired");
  assertMaximizedInput(supported, "supported");

  const region =
    desired.region !== supported.region
      ? lookupDistance(desired, supported, context)
      : 0;

  const desiredNoRegion: LanguageIdentifier = {
    language: desired.language,
    script: desired.script,
  };
  const supportedNoRegion: LanguageIdentifier = {
    language: supported.language,
    script: supported.script,
  };
  const script =
    desired.script !== supported.script
      ? lookupDistance(desiredNoRegion, supportedNoRegion, context)
      : 0;

  const language =
    desired.language !== supported.language
      ? lookupDistance(
          { language: desired.language },
          { language: supported.language },
          context,
        )
      : 0;

  return { region, script, language, total: region + script + language };
}

/**
 * Distance between two maximized identifiers.
 *
 * @throws {DistanceInvariantError} If either side lacks script or region
 */
export function computeDistance(
  desired: MaximizedLanguageIdentifier,
  supported: MaximizedLanguageIdentifier,
  context: MatchingContext,
): number {
  return computeDistanceBreakdown(desired, supported, context).total;
}
