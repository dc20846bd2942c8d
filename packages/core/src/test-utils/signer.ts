import type { Signer } from "../session/signer";

export const TEST_HOST = "test.example.test";

/**
 * Signer that stamps a counter into Authorization so tests can see
 * how many times, and in which order, requests were signed.
 */
export function createCountingSigner(host: string = TEST_HOST) {
  let count = 0;
  const signer: Signer = {
    host,
    sign(request) {
      count++;
      request.headers.set("Authorization", `test-signature-${count}`);
    },
  };
  return {
    signer,
    get count() {
      return count;
    },
  };
}
