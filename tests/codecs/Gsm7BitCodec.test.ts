import { Gsm7BitCodec, septetBudget } from '../../src/codecs/Gsm7BitCodec';
import { MalformedInputError, SegmentLimitTooSmallError, UnencodableCharacterError } from '../../src/errors';
import { toHex, fromHex } from '../../src/helpers';

describe('Gsm7BitCodec', () => {
  const codec = new Gsm7BitCodec();

  it('reports data coding 0', () => {
    expect(codec.dataCoding()).toBe(0);
  });

  describe('septetBudget', () => {
    it('converts an octet limit to packed septets', () => {
      expect(septetBudget(140)).toBe(160);
      expect(septetBudget(134)).toBe(153);
      expect(septetBudget(1)).toBe(1);
      expect(septetBudget(0)).toBe(0);
    });

    it('subtracts fill bits before dividing', () => {
      expect(septetBudget(140, 1)).toBe(159);
      expect(septetBudget(134, 1)).toBe(153);
    });
  });

  describe('encode / decode', () => {
    it('writes one octet per basic character', () => {
      expect(toHex(codec.encode('agjwklgjkwP'))).toBe('61676a776b6c676a6b7750');
    });

    it('writes extension characters as escape + code', () => {
      expect(toHex(codec.encode('Hi {€}'))).toBe('4869201b281b651b29');
    });

    it('round-trips mixed text', () => {
      const text = 'Grüße from Ærø: 5€ {ok} [x] ~ | ^ \\ ΔΩ¿¡';
      expect(codec.decode(codec.encode(text))).toBe(text);
    });

    it('encodes the empty string to no bytes', () => {
      expect(codec.encode('').length).toBe(0);
      expect(codec.decode(new Uint8Array(0))).toBe('');
    });

    it('throws UnencodableCharacterError for characters outside the alphabet', () => {
      expect(() => codec.encode('a中')).toThrow(UnencodableCharacterError);
      expect(() => codec.encode('a中')).toThrow('GSM7BIT: character U+4E2D at index 1 is not encodable');
    });

    it('throws MalformedInputError for an orphan escape', () => {
      expect(() => codec.decode(fromHex('611b'))).toThrow(MalformedInputError);
      expect(() => codec.decode(fromHex('611b'))).toThrow('at offset 1');
    });

    it('throws MalformedInputError for a byte with the high bit set', () => {
      expect(() => codec.decode(fromHex('61e1'))).toThrow('GSM7BIT: value 0xe1 is not a septet at offset 1');
    });
  });

  describe('shouldSplit', () => {
    it('fits 160 basic characters in 140 octets', () => {
      expect(codec.shouldSplit('a'.repeat(160), 140)).toBe(false);
      expect(codec.shouldSplit('a'.repeat(161), 140)).toBe(true);
    });

    it('counts extension characters as two septets', () => {
      expect(codec.shouldSplit('€'.repeat(80), 140)).toBe(false);
      expect(codec.shouldSplit('€'.repeat(81), 140)).toBe(true);
      expect(codec.shouldSplit('a'.repeat(159) + '{', 140)).toBe(true);
    });

    it('never splits empty or short text', () => {
      expect(codec.shouldSplit('', 140)).toBe(false);
      expect(codec.shouldSplit('1', 140)).toBe(false);
    });

    it('rejects an invalid limit', () => {
      expect(() => codec.shouldSplit('a', -1)).toThrow(RangeError);
    });
  });

  describe('encodeSplit', () => {
    it('returns a single empty segment for empty text', () => {
      const segments = codec.encodeSplit('', 134);
      expect(segments.length).toBe(1);
      expect(segments[0].length).toBe(0);
    });

    it('returns one segment when the text fits', () => {
      const segments = codec.encodeSplit('hello', 134);
      expect(segments.map(toHex)).toEqual(['68656c6c6f']);
    });

    it('splits 162 basic characters into 153 + 9', () => {
      const text = 'abcdefghi'.repeat(18);
      const segments = codec.encodeSplit(text, 134);
      expect(segments.map(s => s.length)).toEqual([153, 9]);
      expect(codec.decode(segments[1])).toBe('abcdefghi');
    });

    it('moves an extension pair that does not fit to the next segment', () => {
      const text = 'p'.repeat(152) + '€' + 'p'.repeat(7);
      const segments = codec.encodeSplit(text, 134);
      expect(segments.length).toBe(2);
      expect(segments[0]).toEqual(new Uint8Array(152).fill(0x70));
      expect(toHex(segments[1])).toBe('1b6570707070707070');
    });

    it('keeps a pair that fits exactly at the end of a segment', () => {
      const text = 'p'.repeat(150) + '{{' + 'p'.repeat(8);
      const segments = codec.encodeSplit(text, 134);
      expect(segments.map(s => s.length)).toEqual([152, 10]);
      expect(toHex(segments[0].subarray(-2))).toBe('1b28');
      expect(toHex(segments[1])).toBe('1b287070707070707070');
    });

    it('reassembles to the original text', () => {
      const text = '{[€]}'.repeat(20) + 'The quick brown fox jumps over the lazy dog. '.repeat(4);
      const segments = codec.encodeSplit(text, 134);
      expect(segments.length).toBeGreaterThan(1);
      for (const segment of segments) {
        expect(segment.length).toBeLessThanOrEqual(septetBudget(134));
      }
      expect(segments.map(s => codec.decode(s)).join('')).toBe(text);
    });

    it('splits into single septets at a one-octet limit', () => {
      expect(codec.encodeSplit('ab', 1).map(toHex)).toEqual(['61', '62']);
    });

    it('throws SegmentLimitTooSmallError when an escape pair cannot fit', () => {
      expect(() => codec.encodeSplit('a{', 1)).toThrow(SegmentLimitTooSmallError);
      expect(() => codec.encodeSplit('a{', 1)).toThrow('GSM7BIT: octet limit 1 cannot hold a unit of 2 septet(s)');
    });

    it('throws SegmentLimitTooSmallError for a zero limit', () => {
      expect(() => codec.encodeSplit('a', 0)).toThrow(SegmentLimitTooSmallError);
    });

    it('fails as a whole on an unencodable character', () => {
      expect(() => codec.encodeSplit('a'.repeat(200) + '中', 134)).toThrow(UnencodableCharacterError);
    });
  });
});
