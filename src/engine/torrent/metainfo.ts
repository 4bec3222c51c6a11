/**
 * Descriptor metainfo model.
 *
 * Converts between raw .torrent bytes and a structured MetaInfo, builds new
 * descriptors from an info definition, and derives the DescriptorSpec handed
 * back to store callers. Supports single-file and multi-file layouts (BEP 3),
 * announce tiers (BEP 12) and web seeds (BEP 19).
 *
 * @module engine/torrent/metainfo
 * @see http://bittorrent.org/beps/bep_0003.html
 */

import { createHash } from 'crypto';
import {
  decodeWithSpans,
  encode,
  isBytes,
  isDict,
  isList,
  type BencodeDict,
  type BencodeValue,
} from '../bencode.js';

// =============================================================================
// Constants
// =============================================================================

/** Length of one SHA-1 piece digest */
export const PIECE_HASH_LENGTH = 20;

/** Top-level keys that MetaInfo models as typed fields */
const KNOWN_KEYS = new Set([
  'info',
  'announce',
  'announce-list',
  'creation date',
  'created by',
  'comment',
  'url-list',
]);

// =============================================================================
// Types
// =============================================================================

/**
 * One file of a multi-file definition
 */
export interface InfoFile {
  /** Path components relative to the torrent root */
  path: string[];

  /** File size in bytes */
  length: number;
}

/**
 * Structured definition of a descriptor's info dictionary.
 *
 * Exactly one of `length` (single file) or `files` (multi file) is set.
 */
export interface InfoDefinition {
  name: string;
  pieceLength: number;

  /** Concatenated 20-byte SHA-1 digests, one per piece */
  pieces: Buffer;

  length?: number;
  files?: InfoFile[];

  /** Disables DHT/PEX for the torrent when true */
  private?: boolean;
}

/**
 * Auxiliary top-level fields supplied alongside an InfoDefinition
 */
export interface AdditionalMetaInfo {
  announce?: string;
  comment?: string;
  createdBy?: string;

  /** Unix timestamp in seconds */
  creationDate?: number;

  /** Web seed URLs */
  urlList?: string[];
}

/**
 * Decoded top-level descriptor dictionary
 */
export interface MetaInfo {
  /** Raw info dictionary */
  info: BencodeDict;

  /** Bencoded info dictionary (the bytes the info hash covers), as read */
  infoBytes: Buffer;

  announce?: string;
  announceList?: string[][];
  creationDate?: number;
  createdBy?: string;
  comment?: string;
  urlList?: string[];

  /** Top-level keys not modelled above, kept for re-encoding */
  extra: BencodeDict;
}

/**
 * A file within a loaded descriptor
 */
export interface DescriptorFile {
  /** Relative path, rooted at the torrent name for multi-file layouts */
  path: string;
  length: number;

  /** Byte offset within the concatenated torrent data */
  offset: number;
}

/**
 * Validated view of an info dictionary
 */
export interface DescriptorMetadata {
  name: string;
  pieceLength: number;
  pieceCount: number;
  files: DescriptorFile[];
  totalLength: number;
  isPrivate: boolean;
}

/**
 * Loaded descriptor as returned by the store
 */
export interface DescriptorSpec {
  /** Display name from the info dictionary */
  name: string;

  /** 20-byte SHA-1 of the bencoded info dictionary */
  infoHash: Buffer;
  infoHashHex: string;

  /** Announce tiers in effect for this descriptor */
  trackers: string[][];

  webSeeds: string[];
  infoBytes: Buffer;
  metadata: DescriptorMetadata;

  /** Decoded descriptor with the configured announce list applied */
  metaInfo: MetaInfo;
}

/**
 * Options for building a descriptor from a definition
 */
export interface BuildOptions {
  /** Announce tiers written to the descriptor */
  trackers: string[][];

  /** Default 'created by' value */
  createdBy: string;

  /** Clock used for the default creation date */
  now?: () => Date;
}

/**
 * Error thrown when descriptor metadata is invalid.
 */
export class MetaInfoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MetaInfoError';
  }
}

// =============================================================================
// Field Helpers
// =============================================================================

function text(value: Buffer): string {
  return value.toString('utf8');
}

function requiredBytes(dict: BencodeDict, key: string, context: string): Buffer {
  const value = dict[key];
  if (value === undefined) {
    throw new MetaInfoError(`Missing required field '${key}' in ${context}`);
  }
  if (!isBytes(value)) {
    throw new MetaInfoError(`Field '${key}' in ${context} must be a byte string`);
  }
  return value;
}

function requiredNumber(dict: BencodeDict, key: string, context: string): number {
  const value = dict[key];
  if (value === undefined) {
    throw new MetaInfoError(`Missing required field '${key}' in ${context}`);
  }
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new MetaInfoError(`Field '${key}' in ${context} must be a safe integer`);
  }
  return value;
}

function isValidComponent(part: string): boolean {
  return part !== '' && part !== '.' && part !== '..' && !/[/\\]/.test(part);
}

/**
 * Reads a list of lists of byte strings, or undefined if the shape differs.
 */
function readTiers(value: BencodeValue): string[][] | undefined {
  if (!isList(value)) return undefined;

  const tiers: string[][] = [];
  for (const tier of value) {
    if (!isList(tier) || !tier.every(isBytes)) return undefined;
    tiers.push(tier.map((url) => text(url)));
  }
  return tiers;
}

function readStrings(value: BencodeValue): string[] | undefined {
  if (!isList(value) || !value.every(isBytes)) return undefined;
  return value.map((item) => text(item));
}

function tiersToBencode(tiers: string[][]): BencodeValue[] {
  return tiers.map((tier) => tier.map((url) => Buffer.from(url, 'utf8')));
}

function cloneTiers(tiers: string[][]): string[][] {
  return tiers.map((tier) => [...tier]);
}

// =============================================================================
// Info Dictionary
// =============================================================================

/**
 * Validates an info dictionary and returns its structured view.
 *
 * @throws MetaInfoError if a required field is missing or inconsistent
 */
export function parseInfo(info: BencodeDict): DescriptorMetadata {
  const name = text(requiredBytes(info, 'name', 'info'));
  if (!isValidComponent(name)) {
    throw new MetaInfoError(`Invalid torrent name: '${name}'`);
  }

  const pieceLength = requiredNumber(info, 'piece length', 'info');
  if (pieceLength <= 0) {
    throw new MetaInfoError(`Invalid piece length: ${pieceLength}`);
  }

  const pieces = requiredBytes(info, 'pieces', 'info');
  // Empty only for zero-length content; the piece count check enforces that.
  if (pieces.length % PIECE_HASH_LENGTH !== 0) {
    throw new MetaInfoError(
      `Invalid 'pieces' length: ${pieces.length} (must be a multiple of ${PIECE_HASH_LENGTH})`
    );
  }
  const pieceCount = pieces.length / PIECE_HASH_LENGTH;

  const files: DescriptorFile[] = [];
  let totalLength = 0;

  if (info['files'] !== undefined) {
    const entries = info['files'];
    if (!isList(entries) || entries.length === 0) {
      throw new MetaInfoError("Multi-file torrent needs a non-empty 'files' list");
    }

    entries.forEach((entry, i) => {
      if (!isDict(entry)) {
        throw new MetaInfoError(`Invalid file entry at index ${i}`);
      }
      const length = requiredNumber(entry, 'length', `files[${i}]`);
      if (length < 0) {
        throw new MetaInfoError(`Invalid file length at index ${i}: ${length}`);
      }
      const parts = readStrings(entry['path'] ?? []);
      if (!parts || parts.length === 0 || !parts.every(isValidComponent)) {
        throw new MetaInfoError(`Missing or invalid 'path' in files[${i}]`);
      }

      files.push({ path: [name, ...parts].join('/'), length, offset: totalLength });
      totalLength += length;
    });
  } else {
    const length = requiredNumber(info, 'length', 'info');
    if (length < 0) {
      throw new MetaInfoError(`Invalid file length: ${length}`);
    }
    files.push({ path: name, length, offset: 0 });
    totalLength = length;
  }

  const expectedPieceCount = Math.ceil(totalLength / pieceLength);
  if (pieceCount !== expectedPieceCount) {
    throw new MetaInfoError(
      `Piece count mismatch: got ${pieceCount}, expected ${expectedPieceCount} for total length ${totalLength}`
    );
  }

  return {
    name,
    pieceLength,
    pieceCount,
    files,
    totalLength,
    isPrivate: info['private'] === 1,
  };
}

/**
 * Converts an InfoDefinition into a bencode info dictionary and validates it.
 *
 * @throws MetaInfoError if the definition does not describe a valid torrent
 */
export function infoFromDefinition(definition: InfoDefinition): BencodeDict {
  const hasLength = definition.length !== undefined;
  const hasFiles = definition.files !== undefined;
  if (hasLength === hasFiles) {
    throw new MetaInfoError(
      `Definition '${definition.name}' must set exactly one of 'length' or 'files'`
    );
  }

  const info: BencodeDict = {
    name: Buffer.from(definition.name, 'utf8'),
    'piece length': definition.pieceLength,
    pieces: definition.pieces,
  };

  if (definition.files) {
    info['files'] = definition.files.map((file) => ({
      length: file.length,
      path: file.path.map((part) => Buffer.from(part, 'utf8')),
    }));
  } else if (definition.length !== undefined) {
    info['length'] = definition.length;
  }

  if (definition.private) {
    info['private'] = 1;
  }

  parseInfo(info);
  return info;
}

// =============================================================================
// MetaInfo Codec
// =============================================================================

/**
 * Decodes descriptor bytes into a MetaInfo.
 *
 * The info dictionary is validated; unrecognised top-level keys and
 * non-standard shapes of optional fields land in `extra`.
 *
 * @throws MetaInfoError if the bytes are not a valid descriptor
 */
export function decodeMetaInfo(data: Buffer): MetaInfo {
  let decoded: BencodeValue;
  let spans: Map<string, Buffer>;
  try {
    ({ value: decoded, spans } = decodeWithSpans(data));
  } catch (err) {
    throw new MetaInfoError(
      `Failed to decode torrent file: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  if (!isDict(decoded)) {
    throw new MetaInfoError('Torrent file must be a dictionary');
  }
  const root = decoded;

  const info = root['info'];
  if (!isDict(info)) {
    throw new MetaInfoError("Missing or invalid 'info' dictionary");
  }
  parseInfo(info);

  const metaInfo: MetaInfo = {
    info,
    infoBytes: spans.get('info') ?? encode(info),
    extra: Object.create(null),
  };

  for (const [key, value] of Object.entries(root)) {
    if (!KNOWN_KEYS.has(key)) {
      metaInfo.extra[key] = value;
    }
  }

  const keepOrStash = <T>(key: string, parsed: T | undefined): T | undefined => {
    const raw = root[key];
    if (raw !== undefined && parsed === undefined) {
      metaInfo.extra[key] = raw;
    }
    return parsed;
  };

  const field = (key: string): BencodeValue | undefined => root[key];
  const asText = (value: BencodeValue | undefined): string | undefined =>
    isBytes(value) ? text(value) : undefined;

  metaInfo.announce = keepOrStash('announce', asText(field('announce')));
  metaInfo.comment = keepOrStash('comment', asText(field('comment')));
  metaInfo.createdBy = keepOrStash('created by', asText(field('created by')));

  const created = field('creation date');
  metaInfo.creationDate = keepOrStash(
    'creation date',
    typeof created === 'number' ? created : undefined
  );

  const tiers = field('announce-list');
  metaInfo.announceList = keepOrStash(
    'announce-list',
    tiers === undefined ? undefined : readTiers(tiers)
  );

  const urls = field('url-list');
  metaInfo.urlList = keepOrStash(
    'url-list',
    urls === undefined ? undefined : readStrings(urls)
  );

  return metaInfo;
}

/**
 * Encodes a MetaInfo back into descriptor bytes.
 */
export function encodeMetaInfo(metaInfo: MetaInfo): Buffer {
  const dict: BencodeDict = { ...metaInfo.extra, info: metaInfo.info };

  if (metaInfo.announce !== undefined) {
    dict['announce'] = Buffer.from(metaInfo.announce, 'utf8');
  }
  if (metaInfo.announceList !== undefined) {
    dict['announce-list'] = tiersToBencode(metaInfo.announceList);
  }
  if (metaInfo.creationDate !== undefined) {
    dict['creation date'] = metaInfo.creationDate;
  }
  if (metaInfo.createdBy !== undefined) {
    dict['created by'] = Buffer.from(metaInfo.createdBy, 'utf8');
  }
  if (metaInfo.comment !== undefined) {
    dict['comment'] = Buffer.from(metaInfo.comment, 'utf8');
  }
  if (metaInfo.urlList !== undefined) {
    dict['url-list'] = metaInfo.urlList.map((url) => Buffer.from(url, 'utf8'));
  }

  return encode(dict);
}

/**
 * Builds a MetaInfo from a structured definition plus auxiliary fields.
 *
 * The announce list is always the configured tracker set; the additional
 * data cannot override it.
 *
 * @throws MetaInfoError if the definition is invalid
 */
export function buildMetaInfo(
  definition: InfoDefinition,
  additional: AdditionalMetaInfo | undefined,
  options: BuildOptions
): MetaInfo {
  const info = infoFromDefinition(definition);
  const now = options.now ?? (() => new Date());
  const trackers = cloneTiers(options.trackers);

  return {
    info,
    infoBytes: encode(info),
    announce: additional?.announce ?? trackers[0]?.[0],
    announceList: trackers.length > 0 ? trackers : undefined,
    creationDate: additional?.creationDate ?? Math.floor(now().getTime() / 1000),
    createdBy: additional?.createdBy ?? options.createdBy,
    comment: additional?.comment,
    urlList: additional?.urlList ? [...additional.urlList] : undefined,
    extra: {},
  };
}

// =============================================================================
// Descriptor Spec
// =============================================================================

/**
 * Computes the SHA-1 info hash of a MetaInfo
 */
export function infoHashOf(metaInfo: MetaInfo): Buffer {
  return createHash('sha1').update(metaInfo.infoBytes).digest();
}

/**
 * Returns the effective announce tiers: the announce list when present,
 * otherwise a single tier holding the announce URL.
 */
export function upvertedAnnounceList(metaInfo: MetaInfo): string[][] {
  if (metaInfo.announceList && metaInfo.announceList.length > 0) {
    return cloneTiers(metaInfo.announceList);
  }
  if (metaInfo.announce) {
    return [[metaInfo.announce]];
  }
  return [];
}

/**
 * Derives the loaded DescriptorSpec, replacing the stored announce list
 * with the configured trackers.
 */
export function toDescriptorSpec(
  metaInfo: MetaInfo,
  trackers: string[][]
): DescriptorSpec {
  const effective: MetaInfo = {
    ...metaInfo,
    announceList: trackers.length > 0 ? cloneTiers(trackers) : undefined,
  };
  const metadata = parseInfo(effective.info);
  const infoHash = infoHashOf(effective);
  const singleSeed = effective.extra['url-list'];

  return {
    name: metadata.name,
    infoHash,
    infoHashHex: infoHash.toString('hex'),
    trackers: upvertedAnnounceList(effective),
    webSeeds: effective.urlList ?? (isBytes(singleSeed) ? [text(singleSeed)] : []),
    infoBytes: effective.infoBytes,
    metadata,
    metaInfo: effective,
  };
}
