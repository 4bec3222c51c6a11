/**
 * Bencode codec.
 *
 * Bencode is the encoding used by .torrent descriptor files:
 * - Integers: i<number>e (i42e = 42)
 * - Byte strings: <length>:<data> (4:spam)
 * - Lists: l<contents>e
 * - Dictionaries: d<contents>e, keys sorted as raw bytes
 *
 * The decoder is strict: it only accepts the canonical form (no leading
 * zeros, no negative zero, strictly ascending unique keys, keys that are
 * valid UTF-8). Every value it accepts re-encodes to the exact input bytes.
 *
 * @module engine/bencode
 */

/**
 * Represents any valid bencode value
 */
export type BencodeValue =
  | number
  | bigint
  | Buffer
  | BencodeValue[]
  | BencodeDict;

/**
 * A decoded bencode dictionary
 */
export interface BencodeDict {
  [key: string]: BencodeValue;
}

const CHAR_D = 0x64;
const CHAR_E = 0x65;
const CHAR_I = 0x69;
const CHAR_L = 0x6c;
const CHAR_COLON = 0x3a;
const CHAR_MINUS = 0x2d;
const CHAR_0 = 0x30;
const CHAR_9 = 0x39;

function isDigit(byte: number | undefined): boolean {
  return byte !== undefined && byte >= CHAR_0 && byte <= CHAR_9;
}

/**
 * Cursor over a bencoded buffer.
 */
class Decoder {
  private offset = 0;
  private depth = 0;

  /** Raw bytes of each top-level dictionary value, when recording */
  readonly spans = new Map<string, Buffer>();

  constructor(
    private readonly data: Buffer,
    private readonly recordSpans = false
  ) {}

  get position(): number {
    return this.offset;
  }

  get done(): boolean {
    return this.offset >= this.data.length;
  }

  value(): BencodeValue {
    const marker = this.peek('value');

    if (marker === CHAR_I) return this.integer();
    if (marker === CHAR_L) return this.list();
    if (marker === CHAR_D) return this.dictionary();
    if (isDigit(marker)) return this.byteString();

    throw new Error(
      `Invalid bencode: unexpected character '${String.fromCharCode(marker)}' at position ${this.offset}`
    );
  }

  private peek(context: string): number {
    const byte = this.data[this.offset];
    if (byte === undefined) {
      throw new Error(`Unexpected end of input while parsing ${context}`);
    }
    return byte;
  }

  /** Reads a run of digits, rejecting leading zeros. */
  private digits(context: string): string {
    const start = this.offset;
    while (isDigit(this.data[this.offset])) {
      this.offset++;
    }
    if (this.offset === start) {
      throw new Error(`Invalid ${context}: expected digit at position ${start}`);
    }
    if (this.data[start] === CHAR_0 && this.offset - start > 1) {
      throw new Error(`Invalid ${context}: leading zeros not allowed`);
    }
    return this.data.toString('ascii', start, this.offset);
  }

  private expect(byte: number, context: string): void {
    if (this.peek(context) !== byte) {
      throw new Error(
        `Invalid ${context}: expected '${String.fromCharCode(byte)}' at position ${this.offset}`
      );
    }
    this.offset++;
  }

  private integer(): number | bigint {
    this.offset++; // 'i'

    let sign = '';
    if (this.peek('integer') === CHAR_MINUS) {
      sign = '-';
      this.offset++;
    }

    const magnitude = this.digits('integer');
    if (sign && magnitude === '0') {
      throw new Error('Invalid integer: negative zero not allowed');
    }
    this.expect(CHAR_E, 'integer');

    const text = sign + magnitude;
    const num = Number(text);
    return Number.isSafeInteger(num) ? num : BigInt(text);
  }

  private byteString(): Buffer {
    const length = Number(this.digits('byte string length'));
    this.expect(CHAR_COLON, 'byte string');

    const end = this.offset + length;
    if (end > this.data.length) {
      throw new Error(
        `Invalid byte string: not enough data (expected ${length} bytes, got ${this.data.length - this.offset})`
      );
    }

    const bytes = Buffer.from(this.data.subarray(this.offset, end));
    this.offset = end;
    return bytes;
  }

  private list(): BencodeValue[] {
    this.offset++; // 'l'
    this.depth++;

    const items: BencodeValue[] = [];
    while (this.peek('list') !== CHAR_E) {
      items.push(this.value());
    }
    this.offset++;
    this.depth--;
    return items;
  }

  private dictionary(): BencodeDict {
    this.offset++; // 'd'
    this.depth++;

    // Null prototype so keys such as "__proto__" stay plain entries.
    const dict: BencodeDict = Object.create(null);
    let previous: Buffer | null = null;

    while (this.peek('dictionary') !== CHAR_E) {
      if (!isDigit(this.data[this.offset])) {
        throw new Error(
          `Invalid dictionary: expected string key at position ${this.offset}`
        );
      }

      const rawKey = this.byteString();
      if (previous !== null && Buffer.compare(previous, rawKey) >= 0) {
        throw new Error(
          `Invalid dictionary: keys must be sorted and unique (got "${rawKey.toString('utf8')}" after "${previous.toString('utf8')}")`
        );
      }
      previous = rawKey;

      // Keys are strings; only keys that survive a UTF-8 round trip map back
      // to the same bytes on encode.
      const key = rawKey.toString('utf8');
      if (!Buffer.from(key, 'utf8').equals(rawKey)) {
        throw new Error(
          `Invalid dictionary: key at position ${this.offset - rawKey.length} is not valid UTF-8`
        );
      }

      const start = this.offset;
      dict[key] = this.value();
      if (this.recordSpans && this.depth === 1) {
        this.spans.set(key, Buffer.from(this.data.subarray(start, this.offset)));
      }
    }
    this.offset++;
    this.depth--;
    return dict;
  }
}

/**
 * Decode bencode data from a Buffer
 *
 * @throws Error if the input is malformed or has trailing bytes
 */
export function decode(data: Buffer): BencodeValue {
  return run(new Decoder(data));
}

/**
 * Result of decodeWithSpans
 */
export interface DecodedWithSpans {
  value: BencodeValue;

  /** Input bytes of each value in the top-level dictionary, by key */
  spans: Map<string, Buffer>;
}

/**
 * Decodes like {@link decode} and also returns the exact input bytes of
 * every value in the top-level dictionary.
 */
export function decodeWithSpans(data: Buffer): DecodedWithSpans {
  const decoder = new Decoder(data, true);
  const value = run(decoder);
  return { value, spans: decoder.spans };
}

function run(decoder: Decoder): BencodeValue {
  if (decoder.done) {
    throw new Error('Input buffer is empty');
  }

  const value = decoder.value();

  if (!decoder.done) {
    throw new Error(
      `Unexpected data at position ${decoder.position} (expected end of input)`
    );
  }

  return value;
}

/**
 * Encode a value to bencode format
 */
export function encode(value: BencodeValue): Buffer {
  const chunks: Buffer[] = [];
  write(value, chunks);
  return Buffer.concat(chunks);
}

function write(value: BencodeValue, out: Buffer[]): void {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new Error(`Cannot encode ${value}: integers must be safe integers (use BigInt for large values)`);
    }
    out.push(Buffer.from(`i${value}e`, 'ascii'));
  } else if (typeof value === 'bigint') {
    out.push(Buffer.from(`i${value.toString()}e`, 'ascii'));
  } else if (Buffer.isBuffer(value)) {
    out.push(Buffer.from(`${value.length}:`, 'ascii'), value);
  } else if (Array.isArray(value)) {
    out.push(Buffer.from('l', 'ascii'));
    for (const item of value) {
      write(item, out);
    }
    out.push(Buffer.from('e', 'ascii'));
  } else {
    out.push(Buffer.from('d', 'ascii'));
    const keys = Object.keys(value)
      .map((key) => ({ key, raw: Buffer.from(key, 'utf8') }))
      .sort((a, b) => Buffer.compare(a.raw, b.raw));
    for (const { key, raw } of keys) {
      out.push(Buffer.from(`${raw.length}:`, 'ascii'), raw);
      write(value[key], out);
    }
    out.push(Buffer.from('e', 'ascii'));
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard for byte strings
 */
export function isBytes(value: BencodeValue | undefined): value is Buffer {
  return Buffer.isBuffer(value);
}

/**
 * Type guard for dictionaries
 */
export function isDict(value: BencodeValue | undefined): value is BencodeDict {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Buffer.isBuffer(value) &&
    !Array.isArray(value)
  );
}

/**
 * Type guard for lists
 */
export function isList(value: BencodeValue | undefined): value is BencodeValue[] {
  return Array.isArray(value);
}

/**
 * Type guard for integers (number or bigint)
 */
export function isInteger(
  value: BencodeValue | undefined
): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint';
}
