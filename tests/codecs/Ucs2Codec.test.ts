import { Ucs2Codec } from '../../src/codecs/Ucs2Codec';
import { MalformedInputError, SegmentLimitTooSmallError, UnencodableCharacterError } from '../../src/errors';
import { toHex, fromHex } from '../../src/helpers';

describe('Ucs2Codec', () => {
  const codec = new Ucs2Codec();

  it('reports data coding 8', () => {
    expect(codec.dataCoding()).toBe(8);
  });

  describe('encode / decode', () => {
    it('writes one big-endian unit per BMP character', () => {
      expect(toHex(codec.encode('agjwklgjkwP'))).toBe('00610067006a0077006b006c0067006a006b00770050');
      expect(codec.decode(fromHex('00610067006a0077006b006c0067006a006b00770050'))).toBe('agjwklgjkwP');
    });

    it('writes a surrogate pair for astral characters', () => {
      expect(toHex(codec.encode('a\u{1F4B0}'))).toBe('0061d83ddcb0');
      expect(codec.decode(fromHex('0061d83ddcb0'))).toBe('a\u{1F4B0}');
    });

    it('round-trips Vietnamese text', () => {
      const text = 'của nhiều để';
      expect(codec.decode(codec.encode(text))).toBe(text);
    });

    it('throws UnencodableCharacterError for a lone surrogate', () => {
      expect(() => codec.encode('\ud83d')).toThrow(UnencodableCharacterError);
      expect(() => codec.encode('a\ude00')).toThrow('UCS2: character U+DE00 at index 1 is not encodable');
    });

    it('throws MalformedInputError for an odd length', () => {
      expect(() => codec.decode(fromHex('006100'))).toThrow('UCS2: odd byte length 3 at offset 2');
    });

    it('throws MalformedInputError for unpaired surrogates', () => {
      expect(() => codec.decode(fromHex('dcb0'))).toThrow('low surrogate without a high surrogate at offset 0');
      expect(() => codec.decode(fromHex('0061d83d'))).toThrow('high surrogate at end of input at offset 2');
      expect(() => codec.decode(fromHex('d83d0061'))).toThrow(MalformedInputError);
    });
  });

  describe('shouldSplit', () => {
    it('fits 70 units in 140 octets', () => {
      expect(codec.shouldSplit('a'.repeat(70), 140)).toBe(false);
      expect(codec.shouldSplit('a'.repeat(71), 140)).toBe(true);
    });

    it('counts a surrogate pair as four octets', () => {
      expect(codec.shouldSplit('a'.repeat(69) + '\u{1F4B0}', 140)).toBe(true);
      expect(codec.shouldSplit('a'.repeat(68) + '\u{1F4B0}', 140)).toBe(false);
    });

    it('never splits empty text', () => {
      expect(codec.shouldSplit('', 140)).toBe(false);
    });
  });

  describe('encodeSplit', () => {
    it('returns a single empty segment for empty text', () => {
      const segments = codec.encodeSplit('', 134);
      expect(segments.length).toBe(1);
      expect(segments[0].length).toBe(0);
    });

    it('never cuts a unit at an odd limit', () => {
      const text = 'x'.repeat(50) + 'abcde';
      const segments = codec.encodeSplit(text, 107);
      expect(segments.map(s => s.length)).toEqual([106, 4]);
      expect(codec.decode(segments[0])).toBe('x'.repeat(50) + 'abc');
      expect(toHex(segments[1])).toBe('00640065');
    });

    it('defers a surrogate pair that straddles the limit', () => {
      const segments = codec.encodeSplit('abcd\u{1F4B0}e', 10);
      expect(segments.map(toHex)).toEqual(['0061006200630064', 'd83ddcb00065']);
      expect(codec.decode(segments[1])).toBe('\u{1F4B0}e');
    });

    it('reassembles to the original text', () => {
      const text = 'Chúc mừng \u{1F389} năm mới \u{1F4B0}! '.repeat(10);
      const segments = codec.encodeSplit(text, 134);
      expect(segments.length).toBeGreaterThan(1);
      for (const segment of segments) {
        expect(segment.length).toBeLessThanOrEqual(134);
        expect(segment.length % 2).toBe(0);
      }
      expect(segments.map(s => codec.decode(s)).join('')).toBe(text);
    });

    it('throws SegmentLimitTooSmallError when a surrogate pair cannot fit', () => {
      expect(() => codec.encodeSplit('\u{1F4B0}', 3)).toThrow(SegmentLimitTooSmallError);
      expect(() => codec.encodeSplit('\u{1F4B0}', 3)).toThrow('UCS2: octet limit 3 cannot hold a unit of 4 octet(s)');
    });

    it('throws SegmentLimitTooSmallError when one unit cannot fit', () => {
      expect(() => codec.encodeSplit('a', 1)).toThrow(SegmentLimitTooSmallError);
    });

    it('splits unit by unit at a two-octet limit', () => {
      expect(codec.encodeSplit('ab', 2).map(toHex)).toEqual(['0061', '0062']);
    });
  });
});
