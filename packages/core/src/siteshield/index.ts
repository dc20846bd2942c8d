export * from "./map";
