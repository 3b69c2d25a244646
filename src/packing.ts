/**
 * 7-into-8 septet packing (3GPP TS 23.038 §6.1.2.1.1).
 *
 * Septets are laid LSB-first into one continuous bit stream which is then
 * cut into octets, so 8 septets occupy 7 octets. `fillBits` zero bits are
 * placed before the first septet; a segment that follows a user data header
 * uses them to start its septets on a septet boundary.
 */

function assertFillBits(fillBits: number): void {
  if (!Number.isInteger(fillBits) || fillBits < 0 || fillBits > 7) {
    throw new RangeError(`fillBits must be 0..7, got ${fillBits}`);
  }
}

/** Octets needed to hold `septetCount` packed septets after `fillBits`. */
export function packedOctetCount(septetCount: number, fillBits = 0): number {
  assertFillBits(fillBits);
  if (septetCount === 0) return 0;
  return Math.ceil((fillBits + septetCount * 7) / 8);
}

/**
 * Spare bits left at the end of the last octet once `septetCount` septets
 * have been packed after `fillBits`.
 */
export function trailingSpareBits(septetCount: number, fillBits = 0): number {
  if (septetCount === 0) return 0;
  return packedOctetCount(septetCount, fillBits) * 8 - (fillBits + septetCount * 7);
}

/** Pack septet values (0..127) into octets. */
export function packSeptets(septets: ArrayLike<number>, fillBits = 0): Uint8Array {
  const out = new Uint8Array(packedOctetCount(septets.length, fillBits));
  for (let i = 0; i < septets.length; i++) {
    const septet = septets[i] & 0x7f;
    const bitPos = fillBits + i * 7;
    const byteIndex = bitPos >> 3;
    const shift = bitPos & 7;
    out[byteIndex] |= (septet << shift) & 0xff;
    // The septet runs into the next octet unless it starts at bit 0 or 1.
    if (shift > 1) {
      out[byteIndex + 1] |= septet >> (8 - shift);
    }
  }
  return out;
}

/**
 * Unpack octets into septet values, reading from bit `fillBits` of the
 * first octet. Every whole septet in the data is returned, including one
 * made only of trailing spare bits.
 */
export function unpackSeptets(data: Uint8Array, fillBits = 0): number[] {
  assertFillBits(fillBits);
  const totalBits = data.length * 8 - fillBits;
  if (totalBits <= 0) return [];

  const count = Math.floor(totalBits / 7);
  const septets = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    const bitPos = fillBits + i * 7;
    const byteIndex = bitPos >> 3;
    const shift = bitPos & 7;
    let value = data[byteIndex] >> shift;
    if (shift > 1) {
      value |= data[byteIndex + 1] << (8 - shift);
    }
    septets[i] = value & 0x7f;
  }
  return septets;
}
