export type { EncDec, Splitter, SplittingEncDec } from './codecs/Codec';
export { isSplitter } from './codecs/Codec';
export { DataCoding } from './DataCoding';
export type { DataCodingName, DataCodingValue } from './DataCoding';
export {
  CodingError,
  UnencodableCharacterError,
  MalformedInputError,
  SegmentLimitTooSmallError,
  isCodingError,
} from './errors';
export type { CodingErrorCode, SegmentUnit } from './errors';
export { Gsm7Alphabet, GSM7_DEFAULT_ALPHABET } from './alphabet/Gsm7Alphabet';
export type { Gsm7Table } from './alphabet/Gsm7Alphabet';
export { Gsm7BitCodec, septetBudget } from './codecs/Gsm7BitCodec';
export { Gsm7BitPackedCodec, SEGMENT_FILLER } from './codecs/Gsm7BitPackedCodec';
export type { Gsm7BitPackedOptions } from './codecs/Gsm7BitPackedCodec';
export { Ucs2Codec } from './codecs/Ucs2Codec';
export { SingleByteCodec } from './codecs/SingleByteCodec';
export { Utf16Codec } from './codecs/Utf16Codec';
export type { ByteOrder, Utf16Options } from './codecs/Utf16Codec';
export { CustomEncoding, newCustomEncoding } from './codecs/CustomEncoding';
export type { TextTransform } from './codecs/CustomEncoding';
export {
  GSM7BIT,
  GSM7BITPACKED,
  ASCII,
  LATIN1,
  CYRILLIC,
  HEBREW,
  UCS2,
  UTF16BE,
  UTF16LE,
  UTF16BEM,
  UTF16LEM,
  fromDataCoding,
  fromName,
  codingNames,
} from './codings';
export { packSeptets, unpackSeptets, packedOctetCount, trailingSpareBits } from './packing';
export { chunkUnits } from './segmentation';
export type { AtomicUnit } from './segmentation';
export { toHex, fromHex } from './helpers';
