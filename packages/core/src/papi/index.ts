export * from "./client";
export * from "./response";
export * from "./rule";
export * from "./rule-format";
export * from "./search";
