import asciiTable from './tables/ascii.json';
import latin1Table from './tables/latin1.json';
import cyrillicTable from './tables/cyrillic.json';
import hebrewTable from './tables/hebrew.json';
import { DataCoding } from './DataCoding';
import type { EncDec } from './codecs/Codec';
import { Gsm7BitCodec } from './codecs/Gsm7BitCodec';
import { Gsm7BitPackedCodec } from './codecs/Gsm7BitPackedCodec';
import { Ucs2Codec } from './codecs/Ucs2Codec';
import { SingleByteCodec } from './codecs/SingleByteCodec';
import { Utf16Codec } from './codecs/Utf16Codec';

function frozen<T extends object>(codec: T): T {
  Object.freeze(codec);
  return codec;
}

/** GSM 7-bit, one septet per octet. */
export const GSM7BIT: Gsm7BitCodec = frozen(new Gsm7BitCodec());
/** GSM 7-bit, packed 8 septets into 7 octets. */
export const GSM7BITPACKED: Gsm7BitPackedCodec = frozen(new Gsm7BitPackedCodec());
export const ASCII: SingleByteCodec = frozen(new SingleByteCodec('ASCII', DataCoding.ASCII, asciiTable));
export const LATIN1: SingleByteCodec = frozen(new SingleByteCodec('LATIN1', DataCoding.LATIN1, latin1Table));
export const CYRILLIC: SingleByteCodec = frozen(new SingleByteCodec('CYRILLIC', DataCoding.CYRILLIC, cyrillicTable));
export const HEBREW: SingleByteCodec = frozen(new SingleByteCodec('HEBREW', DataCoding.HEBREW, hebrewTable));
export const UCS2: Ucs2Codec = frozen(new Ucs2Codec());
export const UTF16BE: Utf16Codec = frozen(new Utf16Codec({ byteOrder: 'BE' }));
export const UTF16LE: Utf16Codec = frozen(new Utf16Codec({ byteOrder: 'LE' }));
export const UTF16BEM: Utf16Codec = frozen(new Utf16Codec({ byteOrder: 'BE', withMarker: true }));
export const UTF16LEM: Utf16Codec = frozen(new Utf16Codec({ byteOrder: 'LE', withMarker: true }));

const BY_DATA_CODING: ReadonlyMap<number, EncDec> = new Map<number, EncDec>([
  [DataCoding.GSM7BIT, GSM7BIT],
  [DataCoding.ASCII, ASCII],
  [DataCoding.LATIN1, LATIN1],
  [DataCoding.CYRILLIC, CYRILLIC],
  [DataCoding.HEBREW, HEBREW],
  [DataCoding.UCS2, UCS2],
]);

const BY_NAME: ReadonlyMap<string, EncDec> = new Map<string, EncDec>([
  ['gsm7bit', GSM7BIT],
  ['gsm7bit-packed', GSM7BITPACKED],
  ['ascii', ASCII],
  ['latin1', LATIN1],
  ['cyrillic', CYRILLIC],
  ['hebrew', HEBREW],
  ['ucs2', UCS2],
  ['utf16be', UTF16BE],
  ['utf16le', UTF16LE],
  ['utf16bem', UTF16BEM],
  ['utf16lem', UTF16LEM],
]);

/**
 * Codec for an SMPP data_coding value, or undefined if it is not one of
 * the supported codings. Coding 0 resolves to the unpacked GSM 7-bit codec.
 */
export function fromDataCoding(coding: number): EncDec | undefined {
  return BY_DATA_CODING.get(coding);
}

/** Codec by its command-line name, case-insensitive. */
export function fromName(name: string): EncDec | undefined {
  return BY_NAME.get(name.toLowerCase());
}

/** Names accepted by {@link fromName}. */
export function codingNames(): string[] {
  return [...BY_NAME.keys()];
}
