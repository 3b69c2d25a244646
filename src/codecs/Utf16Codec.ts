import { DataCoding } from '../DataCoding';
import { MalformedInputError } from '../errors';
import { codeUnitsToBytes } from '../helpers';
import type { EncDec } from './Codec';

export type ByteOrder = 'BE' | 'LE';

export interface Utf16Options {
  byteOrder: ByteOrder;
  /** Prefix the byte-order mark on encode. */
  withMarker?: boolean;
}

const BYTE_ORDER_MARK = 0xfeff;

/**
 * Plain UTF-16 transcoding in a fixed byte order, optionally with a
 * leading byte-order mark. Code units are copied as they are; surrogates
 * are not validated.
 */
export class Utf16Codec implements EncDec {
  readonly name: string;
  readonly byteOrder: ByteOrder;
  readonly withMarker: boolean;

  constructor(options: Utf16Options) {
    this.byteOrder = options.byteOrder;
    this.withMarker = options.withMarker ?? false;
    this.name = `UTF16${this.byteOrder}${this.withMarker ? 'M' : ''}`;
  }

  dataCoding(): number {
    return DataCoding.UCS2;
  }

  encode(text: string): Uint8Array {
    const units: number[] = this.withMarker ? [BYTE_ORDER_MARK] : [];
    for (let i = 0; i < text.length; i++) {
      units.push(text.charCodeAt(i));
    }
    return codeUnitsToBytes(units, this.byteOrder === 'LE');
  }

  /** Decode, dropping a leading mark in this codec's byte order. */
  decode(data: Uint8Array): string {
    if (data.length % 2 !== 0) {
      throw new MalformedInputError(this.name, `odd byte length ${data.length}`, data.length - 1);
    }
    const le = this.byteOrder === 'LE';
    let start = 0;
    if (data.length >= 2 && this.unitAt(data, 0, le) === BYTE_ORDER_MARK) {
      start = 2;
    }
    let result = '';
    for (let i = start; i < data.length; i += 2) {
      result += String.fromCharCode(this.unitAt(data, i, le));
    }
    return result;
  }

  private unitAt(data: Uint8Array, offset: number, littleEndian: boolean): number {
    return littleEndian
      ? data[offset] | (data[offset + 1] << 8)
      : (data[offset] << 8) | data[offset + 1];
  }
}
