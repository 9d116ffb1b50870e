/**
 * Language matching constants
 *
 * Data location, distance scaling and pattern syntax of the CLDR
 * language matching table.
 */

/**
 * Path to the bundled language matching JSON file, relative to the
 * project root.
 */
export const LANGUAGE_DATA_PATH = "data/languageMatching.json";

/**
 * Environment variable overriding LANGUAGE_DATA_PATH.
 */
export const LANGUAGE_DATA_PATH_ENV = "LANGUAGE_DATA_PATH";

/**
 * Base distances from the table are multiplied by this factor so the
 * paradigm discount can be expressed as an integer.
 */
export const DISTANCE_SCALE = 10;

/**
 * Subtracted from a scaled distance when exactly one side of the
 * comparison is a paradigm locale.
 */
export const PARADIGM_DISCOUNT = 1;

/**
 * Distances at or above this value mean "no acceptable association".
 */
export const NO_MATCH_THRESHOLD = 1000;

/** Upper bound (inclusive) of a rule's base distance */
export const MAX_BASE_DISTANCE = 100;

// Pattern syntax

export const WILDCARD = "*";
export const VARIABLE_SIGIL = "$";
export const EXCLUDED_VARIABLE_SIGIL = "$!";
export const PATTERN_SLOT_SEPARATOR = "_";
export const VARIABLE_VALUE_SEPARATOR = "+";
export const PARADIGM_LOCALE_SEPARATOR = " ";

/** BCP 47 "undetermined" language subtag */
export const UNDETERMINED_LANGUAGE = "und";

/** language, script, region */
export const MAX_PATTERN_SLOTS = 3;
