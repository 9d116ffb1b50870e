export * from "./languageIdentifier";
export * from "./maximizer";
