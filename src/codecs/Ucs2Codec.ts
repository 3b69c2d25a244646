import { DataCoding } from '../DataCoding';
import { MalformedInputError, SegmentLimitTooSmallError, UnencodableCharacterError } from '../errors';
import {
  assertOctetLimit,
  codeUnitsToBytes,
  isHighSurrogate,
  isLowSurrogate,
  isSurrogate,
} from '../helpers';
import { chunkUnits } from '../segmentation';
import type { AtomicUnit } from '../segmentation';
import type { EncDec, Splitter } from './Codec';

/**
 * UCS2 codec: UTF-16 big-endian code units, two octets each, with
 * characters beyond U+FFFF as surrogate pairs.
 */
export class Ucs2Codec implements EncDec, Splitter {
  readonly name = 'UCS2';

  dataCoding(): number {
    return DataCoding.UCS2;
  }

  encode(text: string): Uint8Array {
    const units: number[] = [];
    for (const unit of this.units(text)) units.push(...unit);
    return codeUnitsToBytes(units);
  }

  decode(data: Uint8Array): string {
    if (data.length % 2 !== 0) {
      throw new MalformedInputError(this.name, `odd byte length ${data.length}`, data.length - 1);
    }
    let result = '';
    for (let i = 0; i < data.length; i += 2) {
      const unit = (data[i] << 8) | data[i + 1];
      if (!isSurrogate(unit)) {
        result += String.fromCharCode(unit);
        continue;
      }
      if (!isHighSurrogate(unit)) {
        throw new MalformedInputError(this.name, 'low surrogate without a high surrogate', i);
      }
      if (i + 3 >= data.length) {
        throw new MalformedInputError(this.name, 'high surrogate at end of input', i);
      }
      const low = (data[i + 2] << 8) | data[i + 3];
      if (!isLowSurrogate(low)) {
        throw new MalformedInputError(this.name, 'high surrogate not followed by a low surrogate', i);
      }
      result += String.fromCharCode(unit, low);
      i += 2;
    }
    return result;
  }

  shouldSplit(text: string, octetLimit: number): boolean {
    assertOctetLimit(octetLimit);
    return text.length * 2 > octetLimit;
  }

  encodeSplit(text: string, octetLimit: number): Uint8Array[] {
    assertOctetLimit(octetLimit);
    const segments = chunkUnits(this.units(text), Math.floor(octetLimit / 2), unit =>
      new SegmentLimitTooSmallError(this.name, octetLimit, unit.length * 2, 'octet'));
    return segments.map(units => codeUnitsToBytes(units));
  }

  /** One unit per character: a BMP code unit or a surrogate pair. */
  private units(text: string): AtomicUnit[] {
    const units: AtomicUnit[] = [];
    for (let i = 0; i < text.length; i++) {
      const unit = text.charCodeAt(i);
      if (!isSurrogate(unit)) {
        units.push([unit]);
        continue;
      }
      const low = text.charCodeAt(i + 1);
      if (!isHighSurrogate(unit) || !isLowSurrogate(low)) {
        throw new UnencodableCharacterError(this.name, text[i], i);
      }
      units.push([unit, low]);
      i++;
    }
    return units;
  }
}
