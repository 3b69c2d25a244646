/** Lowercase hex string of a byte array. */
export function toHex(data: Uint8Array): string {
  return Array.from(data).map(b => b.toString(16).padStart(2, '0')).join('');
}

/** Parse a hex string (case-insensitive, no separators) into bytes. */
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new RangeError(`fromHex: odd number of digits (${hex.length})`);
  }
  if (!/^[0-9a-fA-F]*$/.test(hex)) {
    throw new TypeError(`fromHex: invalid hex string '${hex}'`);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/** Throws unless `octetLimit` is a non-negative integer. */
export function assertOctetLimit(octetLimit: number): void {
  if (!Number.isInteger(octetLimit) || octetLimit < 0) {
    throw new RangeError(`octet limit must be a non-negative integer, got ${octetLimit}`);
  }
}

/**
 * Split a string into its characters, pairing surrogates.
 * A lone surrogate comes out as a single code unit.
 * Each entry carries its UTF-16 index in the source string.
 */
export function characters(text: string): Array<{ char: string; index: number }> {
  const result: Array<{ char: string; index: number }> = [];
  let index = 0;
  for (const char of text) {
    result.push({ char, index });
    index += char.length;
  }
  return result;
}

/** True for U+D800..U+DFFF. */
export function isSurrogate(codeUnit: number): boolean {
  return codeUnit >= 0xd800 && codeUnit <= 0xdfff;
}

/** True for a high (leading) surrogate. */
export function isHighSurrogate(codeUnit: number): boolean {
  return codeUnit >= 0xd800 && codeUnit <= 0xdbff;
}

/** True for a low (trailing) surrogate. */
export function isLowSurrogate(codeUnit: number): boolean {
  return codeUnit >= 0xdc00 && codeUnit <= 0xdfff;
}

/** Serialize 16-bit code units, two octets each, in the given byte order. */
export function codeUnitsToBytes(units: ArrayLike<number>, littleEndian = false): Uint8Array {
  const out = new Uint8Array(units.length * 2);
  for (let i = 0; i < units.length; i++) {
    const hi = (units[i] >> 8) & 0xff;
    const lo = units[i] & 0xff;
    out[i * 2] = littleEndian ? lo : hi;
    out[i * 2 + 1] = littleEndian ? hi : lo;
  }
  return out;
}
