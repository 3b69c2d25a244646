/**
 * Random message text and payload generators.
 *
 * Draws characters from the repertoires the codecs care about so that
 * segment boundaries land on escape pairs and surrogate pairs often.
 */

/** PRNG with seedable state for reproducible fuzzing. */
export class Rng {
  private state: number;

  constructor(seed: number) {
    // xorshift32 never leaves a zero state.
    this.state = seed === 0 ? 0x9e3779b9 : seed;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    // xorshift32
    this.state ^= this.state << 13;
    this.state ^= this.state >> 17;
    this.state ^= this.state << 5;
    return (this.state >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns true with the given probability. */
  chance(p: number): boolean {
    return this.next() < p;
  }
}

/** Basic-table characters of the GSM default alphabet. */
export const GSM_BASIC_CHARS = [...'@£$¥èéùìòÇ\nØø\rÅåΔ_ΦΓΛΩΠΨΣΘΞÆæßÉ !"#¤%&\'()*+,-./0123456789:;<=>?¡ABCDEFGHIJKLMNOPQRSTUVWXYZÄÖÑÜ§¿abcdefghijklmnopqrstuvwxyzäöñüà'];

/** Extension-table characters (two septets each). */
export const GSM_EXTENSION_CHARS = [...'\f^{}\\[~]|€'];

/** BMP characters outside the GSM alphabet. */
export const BMP_CHARS = [...'ủềđặạữứ中文ЖжשאĀ'];

/** Characters outside the BMP (surrogate pairs in UTF-16). */
export const ASTRAL_CHARS = ['💰', '😀', '𝄞', '🚀', '𠀀'];

export interface TextOptions {
  minLength?: number;
  maxLength?: number;
  /** Probability that a character comes from the extension table. */
  extensionRate?: number;
}

/** Random text that the GSM 7-bit codecs can encode. */
export function generateGsmText(rng: Rng, options: TextOptions = {}): string {
  const length = rng.int(options.minLength ?? 0, options.maxLength ?? 400);
  const extensionRate = options.extensionRate ?? 0.15;
  let text = '';
  for (let i = 0; i < length; i++) {
    text += rng.chance(extensionRate) ? rng.pick(GSM_EXTENSION_CHARS) : rng.pick(GSM_BASIC_CHARS);
  }
  return text;
}

/** Random text mixing GSM, other BMP and astral characters, for UCS2. */
export function generateUnicodeText(rng: Rng, options: TextOptions = {}): string {
  const length = rng.int(options.minLength ?? 0, options.maxLength ?? 200);
  let text = '';
  for (let i = 0; i < length; i++) {
    const roll = rng.next();
    if (roll < 0.5) text += rng.pick(GSM_BASIC_CHARS);
    else if (roll < 0.8) text += rng.pick(BMP_CHARS);
    else text += rng.pick(ASTRAL_CHARS);
  }
  return text;
}

/** Random bytes, for decoder robustness. */
export function generateBytes(rng: Rng, maxLength = 300): Uint8Array {
  const bytes = new Uint8Array(rng.int(0, maxLength));
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = rng.int(0, 255);
  }
  return bytes;
}
