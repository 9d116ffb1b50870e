export * from "./logger";
export * from "./languageMatching";
