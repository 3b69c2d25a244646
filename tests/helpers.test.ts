import {
  toHex,
  fromHex,
  assertOctetLimit,
  characters,
  codeUnitsToBytes,
  isHighSurrogate,
  isLowSurrogate,
} from '../src/helpers';

describe('helpers', () => {
  describe('toHex / fromHex', () => {
    it('converts bytes to lowercase hex', () => {
      expect(toHex(new Uint8Array([0x00, 0x1b, 0xab, 0xff]))).toBe('001babff');
    });

    it('parses mixed-case hex', () => {
      expect(fromHex('61676A77')).toEqual(new Uint8Array([0x61, 0x67, 0x6a, 0x77]));
    });

    it('parses the empty string', () => {
      expect(fromHex('').length).toBe(0);
    });

    it('throws for an odd number of digits', () => {
      expect(() => fromHex('abc')).toThrow(RangeError);
    });

    it('throws for non-hex characters', () => {
      expect(() => fromHex('zz')).toThrow(TypeError);
    });
  });

  describe('assertOctetLimit', () => {
    it('accepts non-negative integers', () => {
      expect(() => assertOctetLimit(0)).not.toThrow();
      expect(() => assertOctetLimit(140)).not.toThrow();
    });

    it('rejects negative and fractional limits', () => {
      expect(() => assertOctetLimit(-1)).toThrow(RangeError);
      expect(() => assertOctetLimit(1.5)).toThrow(RangeError);
      expect(() => assertOctetLimit(NaN)).toThrow(RangeError);
    });
  });

  describe('characters', () => {
    it('pairs surrogates and reports UTF-16 indexes', () => {
      expect(characters('a\u{1F4B0}b')).toEqual([
        { char: 'a', index: 0 },
        { char: '\u{1F4B0}', index: 1 },
        { char: 'b', index: 3 },
      ]);
    });

    it('yields a lone surrogate on its own', () => {
      expect(characters('\ud83dx')).toEqual([
        { char: '\ud83d', index: 0 },
        { char: 'x', index: 1 },
      ]);
    });
  });

  describe('surrogates', () => {
    it('classifies high and low halves', () => {
      expect(isHighSurrogate(0xd83d)).toBe(true);
      expect(isLowSurrogate(0xd83d)).toBe(false);
      expect(isLowSurrogate(0xdcb0)).toBe(true);
      expect(isHighSurrogate(0x0041)).toBe(false);
    });
  });

  describe('codeUnitsToBytes', () => {
    it('writes big-endian by default', () => {
      expect(toHex(codeUnitsToBytes([0x0061, 0x1ee7]))).toBe('00611ee7');
    });

    it('writes little-endian on request', () => {
      expect(toHex(codeUnitsToBytes([0x0061, 0x1ee7], true))).toBe('6100e71e');
    });
  });
});
