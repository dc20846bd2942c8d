export * from "./api-error";
export * from "./errors";
