export * from "./config";
export * from "./signer";
