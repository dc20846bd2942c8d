const decoder = new TextDecoder("utf-8", { fatal: false, ignoreBOM: false });
const encoder = new TextEncoder();

export function encodeUtf8(value: string) {
  return encoder.encode(value);
}

export function decodeUtf8(payload: ArrayBuffer | ArrayBufferView) {
  return decoder.decode(toUint8Array(payload));
}

export function toUint8Array(payload: ArrayBuffer | ArrayBufferView) {
  if (payload instanceof Uint8Array) {
    return payload;
  }
  if (ArrayBuffer.isView(payload)) {
    return new Uint8Array(
      payload.buffer,
      payload.byteOffset,
      payload.byteLength
    );
  }
  return new Uint8Array(payload);
}

/**
 * Returns the first `limit` bytes of a UTF-8 string.
 */
export function truncateUtf8(value: string, limit: number) {
  const bytes = encodeUtf8(value);
  return bytes.byteLength > limit ? bytes.subarray(0, limit) : bytes;
}
