import { describe, it, expect } from 'vitest';
import {
  decode,
  decodeWithSpans,
  encode,
  isBytes,
  isDict,
  isInteger,
  isList,
  type BencodeDict,
} from '../../src/engine/bencode.js';

describe('Bencode', () => {
  describe('decode', () => {
    describe('integers', () => {
      it('should decode positive and negative integers', () => {
        expect(decode(Buffer.from('i42e'))).toBe(42);
        expect(decode(Buffer.from('i0e'))).toBe(0);
        expect(decode(Buffer.from('i-42e'))).toBe(-42);
      });

      it('should decode very large integers as BigInt', () => {
        const result = decode(Buffer.from('i9007199254740993e'));
        expect(result).toBe(BigInt('9007199254740993'));
      });

      it('should reject leading zeros', () => {
        expect(() => decode(Buffer.from('i03e'))).toThrow('leading zeros');
        expect(() => decode(Buffer.from('i-03e'))).toThrow('leading zeros');
      });

      it('should reject negative zero', () => {
        expect(() => decode(Buffer.from('i-0e'))).toThrow('negative zero');
      });

      it('should reject an integer without digits', () => {
        expect(() => decode(Buffer.from('ie'))).toThrow(
          'Invalid integer: expected digit at position 1'
        );
      });

      it('should reject an unterminated integer', () => {
        expect(() => decode(Buffer.from('i42'))).toThrow(
          'Unexpected end of input while parsing integer'
        );
      });
    });

    describe('byte strings', () => {
      it('should decode byte strings as buffers', () => {
        const result = decode(Buffer.from('4:spam'));
        expect(isBytes(result) && result.toString()).toBe('spam');
      });

      it('should decode the empty string', () => {
        const result = decode(Buffer.from('0:'));
        expect(isBytes(result) && result.length).toBe(0);
      });

      it('should keep binary content intact', () => {
        const input = Buffer.concat([Buffer.from('3:'), Buffer.from([0x00, 0xff, 0x7f])]);
        expect(decode(input)).toEqual(Buffer.from([0x00, 0xff, 0x7f]));
      });

      it('should reject lengths with leading zeros', () => {
        expect(() => decode(Buffer.from('04:spam'))).toThrow(
          'Invalid byte string length: leading zeros not allowed'
        );
      });

      it('should reject a length longer than the input', () => {
        expect(() => decode(Buffer.from('5:abc'))).toThrow(
          'Invalid byte string: not enough data (expected 5 bytes, got 3)'
        );
      });
    });

    describe('lists and dictionaries', () => {
      it('should decode nested structures', () => {
        const result = decode(Buffer.from('d4:listli1e3:abce3:numi7ee'));
        expect(isDict(result)).toBe(true);
        if (!isDict(result)) return;

        expect(result['num']).toBe(7);
        expect(result['list']).toEqual([1, Buffer.from('abc')]);
      });

      it('should reject unsorted keys', () => {
        expect(() => decode(Buffer.from('d1:bi1e1:ai2ee'))).toThrow(
          'Invalid dictionary: keys must be sorted and unique (got "a" after "b")'
        );
      });

      it('should reject duplicate keys', () => {
        expect(() => decode(Buffer.from('d1:ai1e1:ai2ee'))).toThrow(
          'keys must be sorted and unique'
        );
      });

      it('should reject non-string keys', () => {
        expect(() => decode(Buffer.from('di1ei2ee'))).toThrow(
          'Invalid dictionary: expected string key at position 1'
        );
      });

      it('should reject an unterminated list', () => {
        expect(() => decode(Buffer.from('li1e'))).toThrow(
          'Unexpected end of input while parsing list'
        );
      });

      it('should keep a __proto__ key as a plain entry', () => {
        const result = decode(Buffer.from('d9:__proto__i1ee'));
        if (!isDict(result)) throw new Error('expected a dictionary');

        expect(Object.keys(result)).toEqual(['__proto__']);
        expect(result['__proto__']).toBe(1);
        expect(encode(result).toString()).toBe('d9:__proto__i1ee');
      });

      it('should reject keys that are not valid UTF-8', () => {
        const input = Buffer.concat([
          Buffer.from('d1:'),
          Buffer.from([0xfe]),
          Buffer.from('i1e1:'),
          Buffer.from([0xff]),
          Buffer.from('i2ee'),
        ]);

        expect(() => decode(input)).toThrow(
          'Invalid dictionary: key at position 3 is not valid UTF-8'
        );
      });

      it('should accept multi-byte UTF-8 keys and re-encode them exactly', () => {
        const input = Buffer.from('d2:\u00e9i1ee', 'utf8');
        const result = decode(input);
        if (!isDict(result)) throw new Error('expected a dictionary');

        expect(result['\u00e9']).toBe(1);
        expect(encode(result)).toEqual(input);
      });
    });

    describe('decodeWithSpans', () => {
      it('should return the input bytes of top-level values', () => {
        const { value, spans } = decodeWithSpans(Buffer.from('d1:ad1:bi1ee1:cli2eee'));

        expect(value).toEqual(decode(Buffer.from('d1:ad1:bi1ee1:cli2eee')));
        expect([...spans.keys()]).toEqual(['a', 'c']);
        expect(spans.get('a')?.toString()).toBe('d1:bi1ee');
        expect(spans.get('c')?.toString()).toBe('li2ee');
      });

      it('should record nothing for dictionaries nested in a list', () => {
        const { spans } = decodeWithSpans(Buffer.from('ld1:ai1eee'));
        expect(spans.size).toBe(0);
      });

      it('should apply the same validation as decode', () => {
        expect(() => decodeWithSpans(Buffer.alloc(0))).toThrow('Input buffer is empty');
        expect(() => decodeWithSpans(Buffer.from('i1ei2e'))).toThrow(
          'Unexpected data at position 3 (expected end of input)'
        );
      });
    });

    describe('framing', () => {
      it('should reject empty input', () => {
        expect(() => decode(Buffer.alloc(0))).toThrow('Input buffer is empty');
      });

      it('should reject trailing data', () => {
        expect(() => decode(Buffer.from('i1ei2e'))).toThrow(
          'Unexpected data at position 3 (expected end of input)'
        );
      });

      it('should reject unknown markers', () => {
        expect(() => decode(Buffer.from('x'))).toThrow(
          "Invalid bencode: unexpected character 'x' at position 0"
        );
      });
    });
  });

  describe('encode', () => {
    it('should encode scalars', () => {
      expect(encode(42).toString()).toBe('i42e');
      expect(encode(-7).toString()).toBe('i-7e');
      expect(encode(BigInt('9007199254740993')).toString()).toBe('i9007199254740993e');
      expect(encode(Buffer.from('spam')).toString()).toBe('4:spam');
    });

    it('should sort dictionary keys', () => {
      expect(encode({ b: 1, a: 2 }).toString()).toBe('d1:ai2e1:bi1ee');
    });

    it('should sort keys by their UTF-8 bytes', () => {
      // U+FF61 encodes as ef bd a1, U+1F600 as f0 9f 98 80
      const dict: BencodeDict = { '\u{1F600}': 1, '｡': 2 };
      expect(encode(dict)).toEqual(Buffer.from('d3:｡i2e4:\u{1F600}i1ee', 'utf8'));
    });

    it('should reject numbers that are not safe integers', () => {
      expect(() => encode(1.5)).toThrow('integers must be safe integers');
      expect(() => encode(Number.MAX_SAFE_INTEGER + 1)).toThrow();
    });

    it('should reproduce canonical input exactly', () => {
      const input = Buffer.from(
        'd8:announce13:udp://a:1/ann4:infod6:lengthi5e4:name3:abc12:piece lengthi16384eee'
      );
      expect(encode(decode(input))).toEqual(input);
    });
  });

  describe('type guards', () => {
    it('should tell values apart', () => {
      expect(isBytes(Buffer.from('x'))).toBe(true);
      expect(isBytes(1)).toBe(false);
      expect(isList([])).toBe(true);
      expect(isList({})).toBe(false);
      expect(isDict({})).toBe(true);
      expect(isDict([])).toBe(false);
      expect(isDict(Buffer.from('x'))).toBe(false);
      expect(isDict(undefined)).toBe(false);
      expect(isInteger(3)).toBe(true);
      expect(isInteger(BigInt(3))).toBe(true);
      expect(isInteger(Buffer.from('3'))).toBe(false);
    });
  });
});
