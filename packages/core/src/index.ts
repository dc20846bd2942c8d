// Constants
export * from "./constants";
// EdgeGrid credentials and request signing
export * from "./edgegrid";
// Error model
export * from "./errors";
// JSON value types
export * from "./json";
// Property API: rule trees, rule formats, search
export * from "./papi";
// Session: execution pipeline, retries, transport
export * from "./session";
// Site Shield maps
export * from "./siteshield";
// Utilities
export { decodeUtf8, encodeUtf8 } from "./utils/encoding";
// Request validation
export * from "./validation";
