export * from "./json-value";
