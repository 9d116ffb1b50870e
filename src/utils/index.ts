/**
 * Utils barrel exports
 */

export * from "./languageDataValidation";
