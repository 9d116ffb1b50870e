#!/usr/bin/env tsx
/**
 * Validate and compile a language matching table, then print a summary.
 *
 * Usage: tsx scripts/check-language-data.ts [path/to/languageMatching.json]
 */

import { compileLanguageData, loadLanguageData, resolveLanguageDataPath } from "@/languageData";
import { IntlLanguageMaximizer } from "@/languageId";

const dataPath = process.argv[2];

const raw = loadLanguageData(dataPath);
const data = compileLanguageData(raw, new IntlLanguageMaximizer());

const oneWay = data.rules.filter((rule) => rule.oneWay).length;

console.log(`Data file: ${resolveLanguageDataPath(dataPath)}`);
console.log(`Version:   ${data.version}`);
console.log(`Rules:     ${data.rules.length} (${oneWay} one-way)`);
console.log(`Variables: ${[...data.variables.keys()].join(", ")}`);
console.log(`Paradigms: ${data.paradigms.size}`);
