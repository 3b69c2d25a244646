import { Gsm7Alphabet, GSM7_DEFAULT_ALPHABET } from '../alphabet/Gsm7Alphabet';
import { DataCoding } from '../DataCoding';
import { SegmentLimitTooSmallError } from '../errors';
import { assertOctetLimit } from '../helpers';
import { chunkUnits } from '../segmentation';
import type { EncDec, Splitter } from './Codec';

/** Septets that fit in `octetLimit` octets once packed 8-into-7. */
export function septetBudget(octetLimit: number, fillBits = 0): number {
  return Math.floor((octetLimit * 8 - fillBits) / 7);
}

/**
 * GSM 7-bit codec in unpacked form: one octet per septet, high bit clear.
 * Segment sizes are budgeted in packed septets, the size the text takes
 * on the air interface.
 */
export class Gsm7BitCodec implements EncDec, Splitter {
  readonly name = 'GSM7BIT';
  private readonly alphabet: Gsm7Alphabet;

  constructor(alphabet: Gsm7Alphabet = GSM7_DEFAULT_ALPHABET) {
    this.alphabet = alphabet;
  }

  dataCoding(): number {
    return DataCoding.GSM7BIT;
  }

  encode(text: string): Uint8Array {
    return Uint8Array.from(this.alphabet.encodeSeptets(text, this.name));
  }

  decode(data: Uint8Array): string {
    return this.alphabet.decodeSeptets(data, this.name);
  }

  shouldSplit(text: string, octetLimit: number): boolean {
    assertOctetLimit(octetLimit);
    return this.alphabet.septetCount(text) > septetBudget(octetLimit);
  }

  encodeSplit(text: string, octetLimit: number): Uint8Array[] {
    assertOctetLimit(octetLimit);
    const units = this.alphabet.encodeUnits(text, this.name);
    const segments = chunkUnits(units, septetBudget(octetLimit), unit =>
      new SegmentLimitTooSmallError(this.name, octetLimit, unit.length, 'septet'));
    return segments.map(septets => Uint8Array.from(septets));
  }
}
