export * from "./api-client";
export * from "./glob";
export * from "./http-date";
export * from "./log";
export * from "./rate-limit";
export * from "./request";
export * from "./response";
export * from "./retry";
export * from "./session";
export * from "./signer";
export * from "./sleep";
export * from "./transport";
