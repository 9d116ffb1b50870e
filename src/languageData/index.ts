export * from "./loader";
export * from "./compile";
