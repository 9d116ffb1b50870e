/**
 * Language data loading
 *
 * Reads the language matching JSON and validates it. Compilation is a
 * separate step (see compile.ts) because it needs a maximizer.
 */

import * as fs from "fs";
import * as path from "path";
import type { LanguageDataRaw } from "@/types";
import { LANGUAGE_DATA_PATH, LANGUAGE_DATA_PATH_ENV } from "@/constants";
import { validateLanguageDataRaw } from "@/utils/languageDataValidation";

/**
 * Resolve the data file location.
 *
 * Precedence: explicit argument, LANGUAGE_DATA_PATH env, bundled default.
 * Relative paths resolve against the current working directory.
 */
export function resolveLanguageDataPath(dataPath?: string): string {
  const configured = dataPath ?? process.env[LANGUAGE_DATA_PATH_ENV] ?? LANGUAGE_DATA_PATH;
  return path.resolve(process.cwd(), configured);
}

/**
 * Read, parse and validate the language matching table.
 *
 * @throws {Error} If the file cannot be read
 * @throws {SyntaxError} If the JSON is malformed
 * @throws {LanguageDataValidationError} If validation fails
 */
export function loadLanguageData(dataPath?: string): LanguageDataRaw {
  const jsonContent = fs.readFileSync(resolveLanguageDataPath(dataPath), "utf-8");
  const raw: unknown = JSON.parse(jsonContent);
  return validateLanguageDataRaw(raw);
}
