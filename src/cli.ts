/**
 * Command handling for the language matcher CLI
 *
 *   distance <desired> <supported>
 *   match <desired> <candidate...>
 */

import type { LanguageMatcher } from "@/matching";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = [
  "Usage:",
  "  distance <desired> <supported>",
  "  match <desired> <candidate...>",
].join("\n");

/**
 * Run one command and return the line to print.
 *
 * @throws {CliUsageError} On an unknown command or missing arguments
 */
export function runCommand(matcher: LanguageMatcher, args: string[]): string {
  const [command, desired, ...rest] = args;

  switch (command) {
    case "distance": {
      if (desired === undefined || rest.length !== 1) {
        throw new CliUsageError(`distance takes exactly two tags\n${USAGE}`);
      }
      return String(matcher.distance(desired, rest[0]));
    }
    case "match": {
      if (desired === undefined || rest.length === 0) {
        throw new CliUsageError(`match takes a desired tag and at least one candidate\n${USAGE}`);
      }
      const result = matcher.bestMatch(desired, rest);
      return result ? `${result.candidate} ${result.distance}` : "no match";
    }
    default:
      throw new CliUsageError(
        command === undefined ? USAGE : `Unknown command "${command}"\n${USAGE}`,
      );
  }
}
