import table from '../tables/gsm7.json';
import { MalformedInputError, UnencodableCharacterError } from '../errors';
import { characters } from '../helpers';
import type { AtomicUnit } from '../segmentation';

/** Source form of a GSM 7-bit alphabet: basic table plus escaped extension table. */
export interface Gsm7Table {
  /** Septet that introduces an extension character. */
  escape: number;
  /** 128 entries indexed by septet; `null` at the escape slot. */
  basic: ReadonlyArray<string | null>;
  /** Extension character to the septet that follows the escape. */
  extension: Readonly<Record<string, number>>;
}

/**
 * Bidirectional mapping between characters and GSM 7-bit septets.
 * Characters in the basic table take one septet, extension characters
 * take two (escape + code).
 */
export class Gsm7Alphabet {
  readonly escape: number;
  private readonly basic: ReadonlyArray<string | null>;
  private readonly toSeptets: ReadonlyMap<string, AtomicUnit>;
  private readonly extensionByCode: ReadonlyMap<number, string>;

  constructor(source: Gsm7Table) {
    if (source.basic.length !== 128) {
      throw new Error(`GSM 7-bit basic table must have 128 entries, got ${source.basic.length}`);
    }
    this.escape = source.escape;
    this.basic = source.basic;

    const toSeptets = new Map<string, AtomicUnit>();
    source.basic.forEach((ch, code) => {
      if (ch !== null) toSeptets.set(ch, [code]);
    });
    const extensionByCode = new Map<number, string>();
    for (const [ch, code] of Object.entries(source.extension)) {
      // Basic-table mapping wins for a character listed in both.
      if (!toSeptets.has(ch)) toSeptets.set(ch, [this.escape, code]);
      extensionByCode.set(code, ch);
    }
    this.toSeptets = toSeptets;
    this.extensionByCode = extensionByCode;
  }

  /** Septets for one character, or undefined if it is not in the alphabet. */
  septetsOf(ch: string): AtomicUnit | undefined {
    return this.toSeptets.get(ch);
  }

  /** True if every character of `text` is in the alphabet. */
  canEncode(text: string): boolean {
    for (const ch of text) {
      if (!this.toSeptets.has(ch)) return false;
    }
    return true;
  }

  /**
   * Character for a basic-table septet. The escape slot has no character
   * of its own and reads as a space.
   */
  characterAt(code: number): string {
    return this.basic[code] ?? ' ';
  }

  /**
   * Per-character septet units of `text`.
   * Throws UnencodableCharacterError on the first character outside the alphabet.
   */
  encodeUnits(text: string, codec: string): AtomicUnit[] {
    const units: AtomicUnit[] = [];
    for (const { char, index } of characters(text)) {
      const septets = this.toSeptets.get(char);
      if (septets === undefined) {
        throw new UnencodableCharacterError(codec, char, index);
      }
      units.push(septets);
    }
    return units;
  }

  /** Flat septet sequence for `text`. */
  encodeSeptets(text: string, codec: string): number[] {
    const septets: number[] = [];
    for (const unit of this.encodeUnits(text, codec)) {
      septets.push(...unit);
    }
    return septets;
  }

  /**
   * Septets `text` occupies. Characters outside the alphabet count as one,
   * so the result is a size estimate that never throws.
   */
  septetCount(text: string): number {
    let count = 0;
    for (const ch of text) {
      count += this.toSeptets.get(ch)?.length ?? 1;
    }
    return count;
  }

  /**
   * Interpret septet values as text.
   * An escape consumes the next septet; an extension code with no character
   * falls back to the basic table (3GPP TS 23.038 §6.2.1.1).
   */
  decodeSeptets(septets: ArrayLike<number>, codec: string): string {
    let result = '';
    for (let i = 0; i < septets.length; i++) {
      const septet = septets[i];
      if (septet > 0x7f) {
        throw new MalformedInputError(codec, `value 0x${septet.toString(16)} is not a septet`, i);
      }
      if (septet !== this.escape) {
        result += this.characterAt(septet);
        continue;
      }
      if (i + 1 >= septets.length) {
        throw new MalformedInputError(codec, 'escape septet without a following code', i);
      }
      const code = septets[++i];
      if (code > 0x7f) {
        throw new MalformedInputError(codec, `value 0x${code.toString(16)} is not a septet`, i);
      }
      result += this.extensionByCode.get(code) ?? this.characterAt(code);
    }
    return result;
  }
}

/** The GSM 03.38 default alphabet with its default extension table. */
export const GSM7_DEFAULT_ALPHABET = new Gsm7Alphabet(table);
