const BASE64_ALPHABET = /^[A-Za-z0-9+/]$/;

/**
 * Strict standard-alphabet base64 decoding. Padding is required and any
 * character outside the alphabet is rejected, unlike `Buffer.from(s, 'base64')`
 * which skips what it does not understand.
 */
export function decodeBase64(data: string): Uint8Array {
  if (data.length % 4 !== 0) {
    throw new Error(`Invalid base64 length ${data.length}`);
  }

  const padding = data.endsWith('==') ? 2 : data.endsWith('=') ? 1 : 0;
  const body = data.length - padding;
  for (let offset = 0; offset < body; offset++) {
    const symbol = data[offset];
    if (!BASE64_ALPHABET.test(symbol)) {
      throw new Error(`Invalid base64 symbol '${symbol}' at offset ${offset}`);
    }
  }

  return new Uint8Array(Buffer.from(data, 'base64'));
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}
