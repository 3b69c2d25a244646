/**
 * Error hierarchy for encoding, decoding and segmentation failures.
 * Every codec failure is one of these; callers decide on retry or fallback.
 */

export type CodingErrorCode =
  | 'UNENCODABLE_CHARACTER'
  | 'MALFORMED_INPUT'
  | 'SEGMENT_LIMIT_TOO_SMALL';

/** Base class for all codec errors. */
export class CodingError extends Error {
  readonly code: CodingErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: CodingErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'CodingError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** The text holds a character the codec cannot represent. */
export class UnencodableCharacterError extends CodingError {
  readonly character: string;
  /** Index of the character in the input string, in UTF-16 code units. */
  readonly index: number;

  constructor(codec: string, character: string, index: number) {
    const codePoint = character.codePointAt(0) ?? 0;
    super(
      'UNENCODABLE_CHARACTER',
      `${codec}: character U+${codePoint.toString(16).toUpperCase().padStart(4, '0')} at index ${index} is not encodable`,
      { codec, character, index },
    );
    this.name = 'UnencodableCharacterError';
    this.character = character;
    this.index = index;
  }
}

/** The bytes do not form a valid payload for the coding. */
export class MalformedInputError extends CodingError {
  /** Byte offset of the offending data. */
  readonly offset: number;

  constructor(codec: string, reason: string, offset: number) {
    super('MALFORMED_INPUT', `${codec}: ${reason} at offset ${offset}`, { codec, offset });
    this.name = 'MalformedInputError';
    this.offset = offset;
  }
}

export type SegmentUnit = 'septet' | 'octet';

/** Not even one atomic unit fits in the requested segment size. */
export class SegmentLimitTooSmallError extends CodingError {
  readonly octetLimit: number;
  /** Size of the unit that did not fit, counted in `unit`s. */
  readonly unitLength: number;
  readonly unit: SegmentUnit;

  constructor(codec: string, octetLimit: number, unitLength: number, unit: SegmentUnit) {
    super(
      'SEGMENT_LIMIT_TOO_SMALL',
      `${codec}: octet limit ${octetLimit} cannot hold a unit of ${unitLength} ${unit}(s)`,
      { codec, octetLimit, unitLength, unit },
    );
    this.name = 'SegmentLimitTooSmallError';
    this.octetLimit = octetLimit;
    this.unitLength = unitLength;
    this.unit = unit;
  }
}

/** Type guard: checks if a value is a CodingError instance. */
export function isCodingError(value: unknown): value is CodingError {
  return value instanceof CodingError;
}
