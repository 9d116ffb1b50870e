/**
 * Subtag patterns — one slot of a languageMatch pattern string
 *
 *   "*"       any
 *   "$name"   member of variable
 *   "$!name"  not a member of variable
 *   other     literal subtag
 */

import type { SubtagPattern, VariableTable } from "@/types";
import {
  EXCLUDED_VARIABLE_SIGIL,
  VARIABLE_SIGIL,
  WILDCARD,
} from "@/constants";
import { DistanceInvariantError } from "./errors";

export function parseSubtagPattern(slot: string): SubtagPattern {
  if (slot === WILDCARD) {
    return { kind: "any" };
  }
  // "$!" must be tested before "$"
  if (slot.startsWith(EXCLUDED_VARIABLE_SIGIL)) {
    return {
      kind: "excludedVariable",
      name: slot.slice(EXCLUDED_VARIABLE_SIGIL.length),
    };
  }
  if (slot.startsWith(VARIABLE_SIGIL)) {
    return { kind: "variable", name: slot.slice(VARIABLE_SIGIL.length) };
  }
  return { kind: "literal", value: slot };
}

function lookupVariable(name: string, variables: VariableTable): ReadonlySet<string> {
  const values = variables.get(name);
  if (!values) {
    throw new DistanceInvariantError(`undefined variable "$${name}"`);
  }
  return values;
}

/**
 * Match a pattern slot against a subtag.
 *
 * Absent pattern matches only an absent subtag; "any" matches presence
 * and absence alike.
 */
export function matchesSubtag(
  pattern: SubtagPattern | undefined,
  subtag: string | undefined,
  variables: VariableTable,
): boolean {
  if (pattern === undefined) {
    return subtag === undefined;
  }
  if (pattern.kind === "any") {
    return true;
  }
  if (subtag === undefined) {
    return false;
  }

  switch (pattern.kind) {
    case "literal":
      return pattern.value === subtag;
    case "variable":
      return lookupVariable(pattern.name, variables).has(subtag);
    case "excludedVariable":
      return !lookupVariable(pattern.name, variables).has(subtag);
  }
}

/**
 * Variable names referenced by a pattern slot, if any.
 */
export function referencedVariable(pattern: SubtagPattern | undefined): string | undefined {
  if (pattern?.kind === "variable" || pattern?.kind === "excludedVariable") {
    return pattern.name;
  }
  return undefined;
}
