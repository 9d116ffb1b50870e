/**
 * Language matching type definitions
 *
 * Shapes for the CLDR enhanced language matching table and the values
 * flowing through the distance engine.
 *
 * Two forms exist for the rule table:
 * - LanguageDataRaw: JSON shape (deserialized from file)
 * - CompiledLanguageData: patterns parsed, variables split, paradigm
 *   locales maximized
 */

/**
 * Structured language identifier.
 *
 * Subtags are already case-normalized (language lowercase, script title
 * case, region uppercase or a three-digit area code).
 */
export type LanguageIdentifier = {
  language: string;
  script?: string;
  region?: string;
};

/**
 * Identifier with both script and region populated.
 *
 * Only maximized identifiers enter the distance engine.
 */
export type MaximizedLanguageIdentifier = {
  language: string;
  script: string;
  region: string;
};

/**
 * Identifier as accepted by the public matcher API: a structured
 * identifier or a tag string such as "zh-Hant-HK" or "en_GB".
 */
export type LanguageInput = LanguageIdentifier | string;

/**
 * Source of likely-subtag inference.
 *
 * Implementations return a new identifier and never mutate their input.
 */
export interface LanguageMaximizer {
  maximize(id: LanguageIdentifier): MaximizedLanguageIdentifier;
}

// ---------------------------------------------------------------------------
// Raw data (JSON)
// ---------------------------------------------------------------------------

/**
 * Named variable from the data file, e.g. { id: "$cnsar", value: "HK+MO" }.
 */
export type MatchVariableRaw = {
  /** Variable id including its "$" sigil */
  id: string;
  /** "+"-separated subtag values */
  value: string;
};

/**
 * Single languageMatch entry from the data file.
 */
export type LanguageMatchRaw = {
  /** Desired-side pattern, e.g. "en_*_$!enUS" */
  desired: string;
  /** Supported-side pattern, e.g. "en_*_GB" */
  supported: string;
  /** Base distance (0-100) */
  distance: number;
  /** Rule applies only in the written direction */
  oneway?: boolean;
};

/**
 * Raw language matching data as deserialized from JSON.
 */
export type LanguageDataRaw = {
  /** Data version label */
  version: string;
  /** Space-separated paradigm locale tags */
  paradigmLocales: string;
  matchVariables: MatchVariableRaw[];
  /** Ordered rule list; order is significant */
  languageMatches: LanguageMatchRaw[];
};

// ---------------------------------------------------------------------------
// Compiled form
// ---------------------------------------------------------------------------

/**
 * Matchable unit for a single subtag slot.
 *
 * Closed set of variants, dispatched on `kind`.
 */
export type SubtagPattern =
  | { kind: "literal"; value: string }
  | { kind: "variable"; name: string }
  | { kind: "excludedVariable"; name: string }
  | { kind: "any" };

/**
 * Pattern over a language identifier.
 *
 * An absent script/region pattern only matches an absent subtag.
 */
export type TagPattern = {
  language: SubtagPattern;
  script?: SubtagPattern;
  region?: SubtagPattern;
};

/**
 * Compiled languageMatch rule.
 */
export type MatchRule = {
  desired: TagPattern;
  supported: TagPattern;
  /** Base distance (0-100), scaled by DISTANCE_SCALE at lookup */
  baseDistance: number;
  oneWay: boolean;
};

/** Variable name (without sigil) to its subtag values */
export type VariableTable = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * Set of maximized paradigm locales, keyed by languageIdentifierKey().
 */
export type ParadigmSet = ReadonlySet<string>;

/**
 * Immutable inputs shared by rule lookup and the distance engine.
 */
export type MatchingContext = {
  rules: readonly MatchRule[];
  variables: VariableTable;
  paradigms: ParadigmSet;
};

/**
 * Language matching data compiled for runtime lookup.
 */
export type CompiledLanguageData = MatchingContext & {
  version: string;
};

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/**
 * Outcome of a successful best-match selection.
 */
export type BestMatch<T> = {
  /** The caller's original candidate (same reference) */
  candidate: T;
  /** Distance between maximized desired and maximized candidate */
  distance: number;
  /** Position of the candidate in the input sequence */
  index: number;
};
