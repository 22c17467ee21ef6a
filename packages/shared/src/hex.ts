const HEX_DIGITS = '0123456789abcdef';
const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

export function isHexString(value: string): boolean {
  return HEX_PATTERN.test(value);
}

export function encodeHex(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) {
    out += HEX_DIGITS.charAt(byte >> 4) + HEX_DIGITS.charAt(byte & 0x0f);
  }
  return out;
}

/**
 * Decodes a hex string into bytes. Returns null when the input is not an
 * even-length string of hex digits.
 */
export function decodeHex(value: string): Uint8Array | null {
  if (!isHexString(value)) {
    return null;
  }
  const bytes = new Uint8Array(value.length / 2);
  for (let i = 0; i < bytes.length; i += 1) {
    bytes[i] = Number.parseInt(value.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
