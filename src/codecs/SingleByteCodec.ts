import { MalformedInputError, UnencodableCharacterError } from '../errors';
import { characters } from '../helpers';
import type { EncDec } from './Codec';

/**
 * Table-driven one-octet-per-character codec.
 * The table has 256 entries indexed by byte value; `null` marks a byte
 * with no character, which decode rejects.
 */
export class SingleByteCodec implements EncDec {
  readonly name: string;
  private readonly coding: number;
  private readonly byteToChar: ReadonlyArray<string | null>;
  private readonly charToByte: ReadonlyMap<string, number>;

  constructor(name: string, coding: number, table: ReadonlyArray<string | null>) {
    if (table.length !== 256) {
      throw new Error(`${name}: table must have 256 entries, got ${table.length}`);
    }
    this.name = name;
    this.coding = coding;
    this.byteToChar = table;
    const charToByte = new Map<string, number>();
    table.forEach((ch, byte) => {
      if (ch !== null && !charToByte.has(ch)) charToByte.set(ch, byte);
    });
    this.charToByte = charToByte;
  }

  dataCoding(): number {
    return this.coding;
  }

  /** Characters this codec can encode. */
  get repertoireSize(): number {
    return this.charToByte.size;
  }

  encode(text: string): Uint8Array {
    const out = new Uint8Array(text.length);
    let length = 0;
    for (const { char, index } of characters(text)) {
      const byte = this.charToByte.get(char);
      if (byte === undefined) {
        throw new UnencodableCharacterError(this.name, char, index);
      }
      out[length++] = byte;
    }
    return out.slice(0, length);
  }

  decode(data: Uint8Array): string {
    let result = '';
    for (let i = 0; i < data.length; i++) {
      const ch = this.byteToChar[data[i]];
      if (ch === null) {
        throw new MalformedInputError(this.name, `byte 0x${data[i].toString(16).padStart(2, '0')} is unmapped`, i);
      }
      result += ch;
    }
    return result;
  }
}
