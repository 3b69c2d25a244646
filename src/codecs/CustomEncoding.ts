import type { EncDec } from './Codec';

/** The encode/decode half of a codec, without a data coding. */
export type TextTransform = Pick<EncDec, 'encode' | 'decode'>;

/**
 * Wraps a caller-supplied transform so it reports a chosen data coding.
 * Only the EncDec capability is exposed, even when the wrapped object
 * could also split.
 */
export class CustomEncoding implements EncDec {
  private readonly coding: number;
  private readonly inner: TextTransform;

  constructor(coding: number, inner: TextTransform) {
    if (!Number.isInteger(coding) || coding < 0 || coding > 0xff) {
      throw new RangeError(`data coding must be 0..255, got ${coding}`);
    }
    this.coding = coding;
    this.inner = inner;
  }

  dataCoding(): number {
    return this.coding;
  }

  encode(text: string): Uint8Array {
    return this.inner.encode(text);
  }

  decode(data: Uint8Array): string {
    return this.inner.decode(data);
  }
}

export function newCustomEncoding(coding: number, inner: TextTransform): CustomEncoding {
  return new CustomEncoding(coding, inner);
}
