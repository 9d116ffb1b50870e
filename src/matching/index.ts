export * from "./errors";
export * from "./subtagPattern";
export * from "./tagPattern";
export * from "./ruleLookup";
export * from "./distanceEngine";
export * from "./languageMatcher";
