const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encode(str: string): Uint8Array {
  return encoder.encode(str);
}

export function decode(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/** Bytes of `content`, copied so the caller keeps no alias to stored data. */
export function toBytes(content: string | Uint8Array): Uint8Array {
  return typeof content === 'string' ? encode(content) : new Uint8Array(content);
}

/**
 * Copy of `bytes` resized to exactly `length`: truncated when shorter,
 * zero-filled when longer.
 */
export function resizeBytes(bytes: Uint8Array, length: number): Uint8Array {
  const result = new Uint8Array(length);
  result.set(length < bytes.length ? bytes.subarray(0, length) : bytes, 0);
  return result;
}
