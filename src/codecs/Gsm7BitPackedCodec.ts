import { Gsm7Alphabet, GSM7_DEFAULT_ALPHABET } from '../alphabet/Gsm7Alphabet';
import { DataCoding } from '../DataCoding';
import { SegmentLimitTooSmallError } from '../errors';
import { assertOctetLimit } from '../helpers';
import { packSeptets, packedOctetCount, trailingSpareBits, unpackSeptets } from '../packing';
import { chunkUnits } from '../segmentation';
import type { EncDec, Splitter } from './Codec';
import { septetBudget } from './Gsm7BitCodec';

/** Septet written into the seven spare bits at the end of a segment. */
export const SEGMENT_FILLER = 0x0d;

export interface Gsm7BitPackedOptions {
  /**
   * Zero bits placed before the first septet of every segment produced by
   * encodeSplit (0..7). Default 1, which aligns the septets after a
   * 6-octet concatenation header.
   */
  segmentFillBits?: number;
  alphabet?: Gsm7Alphabet;
}

/**
 * GSM 7-bit codec in packed form: 8 septets in 7 octets.
 *
 * Every segment from encodeSplit is packed on its own, starting at
 * `segmentFillBits`. If its last octet would end with seven spare bits a
 * CR filler septet occupies them; decodeSegment returns that CR as part
 * of the text.
 */
export class Gsm7BitPackedCodec implements EncDec, Splitter {
  readonly name = 'GSM7BITPACKED';
  readonly segmentFillBits: number;
  private readonly alphabet: Gsm7Alphabet;

  constructor(options: Gsm7BitPackedOptions = {}) {
    const fillBits = options.segmentFillBits ?? 1;
    if (!Number.isInteger(fillBits) || fillBits < 0 || fillBits > 7) {
      throw new RangeError(`segmentFillBits must be 0..7, got ${fillBits}`);
    }
    this.segmentFillBits = fillBits;
    this.alphabet = options.alphabet ?? GSM7_DEFAULT_ALPHABET;
  }

  dataCoding(): number {
    return DataCoding.GSM7BIT;
  }

  encode(text: string): Uint8Array {
    return packSeptets(this.alphabet.encodeSeptets(text, this.name));
  }

  /**
   * Decode a whole packed message.
   *
   * When the data holds an exact multiple of seven bits, the last septet
   * may be the seven spare bits of the final octet; it is dropped if it
   * is zero. A message that really ends in `@` on such a boundary cannot
   * be told apart from padding on the wire.
   */
  decode(data: Uint8Array): string {
    const septets = unpackSeptets(data);
    if ((data.length * 8) % 7 === 0 && septets[septets.length - 1] === 0) {
      septets.pop();
    }
    return this.alphabet.decodeSeptets(septets, this.name);
  }

  /**
   * Decode one segment produced by encodeSplit, filler included.
   * Segments never end in seven spare bits, so every septet is kept.
   */
  decodeSegment(segment: Uint8Array): string {
    return this.alphabet.decodeSeptets(unpackSeptets(segment, this.segmentFillBits), this.name);
  }

  shouldSplit(text: string, octetLimit: number): boolean {
    assertOctetLimit(octetLimit);
    return packedOctetCount(this.alphabet.septetCount(text)) > octetLimit;
  }

  encodeSplit(text: string, octetLimit: number): Uint8Array[] {
    assertOctetLimit(octetLimit);
    const fillBits = this.segmentFillBits;
    const units = this.alphabet.encodeUnits(text, this.name);
    const budget = Math.max(0, septetBudget(octetLimit, fillBits));
    const segments = chunkUnits(units, budget, unit =>
      new SegmentLimitTooSmallError(this.name, octetLimit, unit.length, 'septet'));

    return segments.map(septets => {
      if (septets.length === 0) return new Uint8Array(0);
      if (trailingSpareBits(septets.length, fillBits) === 7) {
        septets.push(SEGMENT_FILLER);
      }
      return packSeptets(septets, fillBits);
    });
  }
}
