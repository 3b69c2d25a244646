/**
 * Base contract for every message-body codec.
 * `encode` and `decode` throw a CodingError on failure; no partial output.
 */
export interface EncDec {
  /** Encode text into the coding's wire bytes. */
  encode(text: string): Uint8Array;

  /** Decode wire bytes into text. */
  decode(data: Uint8Array): string;

  /** The SMPP `data_coding` value this codec answers to. */
  dataCoding(): number;
}

/**
 * Optional segmentation capability for codecs whose encoded size varies
 * with content. Detect it with {@link isSplitter}.
 */
export interface Splitter {
  /** True if `text` does not fit in `octetLimit` octets as one segment. */
  shouldSplit(text: string, octetLimit: number): boolean;

  /**
   * Encode `text` as ordered segments of at most `octetLimit` octets each,
   * never splitting an atomic unit across two segments.
   */
  encodeSplit(text: string, octetLimit: number): Uint8Array[];
}

/** A codec that can also segment. */
export type SplittingEncDec = EncDec & Splitter;

/** Type guard: checks if a codec exposes the Splitter capability. */
export function isSplitter<T extends EncDec>(codec: T): codec is T & Splitter {
  return (
    'shouldSplit' in codec && typeof codec.shouldSplit === 'function' &&
    'encodeSplit' in codec && typeof codec.encodeSplit === 'function'
  );
}
