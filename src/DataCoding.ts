/**
 * SMPP `data_coding` values (SMPP v3.4 §5.2.19) handled by this library.
 */
export const DataCoding = {
  /** SMSC default alphabet, GSM 03.38 7-bit. */
  GSM7BIT: 0x00,
  /** IA5 (CCITT T.50) / ASCII. */
  ASCII: 0x01,
  /** ISO-8859-1. */
  LATIN1: 0x03,
  /** ISO-8859-5. */
  CYRILLIC: 0x06,
  /** ISO-8859-8. */
  HEBREW: 0x07,
  /** UCS2 (ISO/IEC-10646). */
  UCS2: 0x08,
} as const;

export type DataCodingName = keyof typeof DataCoding;
export type DataCodingValue = (typeof DataCoding)[DataCodingName];
