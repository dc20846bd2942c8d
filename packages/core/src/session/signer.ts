import type { OutgoingRequest } from "./request";

/**
 * Adds authentication to an outgoing request in place.
 * `host` is used to resolve relative request paths.
 */
export type Signer = {
  readonly host?: string;
  sign: (request: OutgoingRequest) => void | Promise<void>;
};
