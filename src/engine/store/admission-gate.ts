/**
 * Admission gate for download-once mode.
 *
 * The whitelist file `prohibit_new_downloads.lock` records name patterns
 * that may still start new downloads. Its absence means no restriction;
 * its presence (even holding `[]`) means only matching names are admitted.
 * A node moves into download-once mode exactly once, and the file keeps
 * that transition across restarts.
 *
 * @module engine/store/admission-gate
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  DecodeError,
  StoreIOError,
  WhitelistWriteError,
  errnoCode,
  isStoreError,
} from '../types.js';
import type { TypedEventEmitter, StoreEvents } from '../events.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { AsyncLock } from './lock.js';
import { writeFileAtomic, DEFAULT_FILE_MODE } from './atomic.js';
import { WHITELIST_FILE } from './names.js';

/**
 * Patterns passed to a whitelist update. A bare string is not accepted,
 * since it would iterate as single characters.
 */
export type PatternList = readonly string[] | ReadonlySet<string>;

/**
 * Options for an AdmissionGate
 */
export interface AdmissionGateOptions {
  /** Lock shared with the owning store; a private lock is created if omitted */
  lock?: AsyncLock;

  logger?: Logger;

  /** Emitter that receives whitelistUpdated events */
  events?: TypedEventEmitter<StoreEvents>;

  fileMode?: number;
}

/**
 * Parses whitelist file contents.
 *
 * A zero-byte file and a JSON `null` are both an empty whitelist.
 *
 * @throws DecodeError unless the contents are a JSON array of strings
 */
export function parseWhitelist(data: string, filePath: string): string[] {
  if (data.length === 0) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    throw new DecodeError(
      `Whitelist ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      'readWhitelist',
      filePath,
      { cause: err }
    );
  }

  if (parsed === null) {
    return [];
  }
  if (!Array.isArray(parsed) || !parsed.every((item) => typeof item === 'string')) {
    throw new DecodeError(
      `Whitelist ${filePath} must be a JSON array of strings`,
      'readWhitelist',
      filePath
    );
  }
  return parsed;
}

/**
 * Applies a whitelist update: drops `remove`, adds missing `add` entries,
 * and returns the sorted, duplicate-free result.
 */
export function applyWhitelistChange(
  current: readonly string[],
  add: PatternList,
  remove: PatternList
): string[] {
  const removed = new Set(remove);
  const next = new Set(current.filter((pattern) => !removed.has(pattern)));

  for (const pattern of add) {
    next.add(pattern);
  }
  return [...next].sort();
}

/**
 * Returns true if `name` contains any whitelist pattern as a substring.
 */
export function matchesWhitelist(name: string, whitelist: readonly string[]): boolean {
  return whitelist.some((pattern) => name.includes(pattern));
}

/**
 * Gate deciding whether new downloads may start for a name.
 *
 * Every operation runs under the lock it shares with its DescriptorStore.
 */
export class AdmissionGate {
  readonly filePath: string;

  private readonly lock: AsyncLock;
  private readonly logger: Logger;
  private readonly events?: TypedEventEmitter<StoreEvents>;
  private readonly fileMode: number;

  constructor(dir: string, options: AdmissionGateOptions = {}) {
    this.filePath = path.join(dir, WHITELIST_FILE);
    this.lock = options.lock ?? new AsyncLock();
    this.logger = options.logger ?? silentLogger;
    this.events = options.events;
    this.fileMode = options.fileMode ?? DEFAULT_FILE_MODE;
  }

  /**
   * Enters (or stays in) download-once mode and updates the whitelist.
   *
   * @param add - Patterns to admit
   * @param remove - Patterns to stop admitting
   * @returns The whitelist now stored, sorted
   * @throws DecodeError if the existing file is malformed
   * @throws WhitelistWriteError if the new list could not be written; its
   *   `whitelist` holds the list that would have been stored
   */
  prohibitNewDownloads(add: PatternList, remove: PatternList): Promise<string[]> {
    return this.lock.runExclusive(async () => {
      const current = (await this.read('prohibitNewDownloads')) ?? [];
      const whitelist = applyWhitelistChange(current, add, remove);

      try {
        await writeFileAtomic(
          this.filePath,
          Buffer.from(JSON.stringify(whitelist), 'utf-8'),
          this.fileMode,
          'prohibitNewDownloads'
        );
      } catch (err) {
        const cause = isStoreError(err, 'IO') && err.cause !== undefined ? err.cause : err;
        throw new WhitelistWriteError(this.filePath, cause, whitelist);
      }

      this.logger.info(
        `New downloads prohibited; whitelist has ${whitelist.length} pattern(s)`
      );
      this.events?.emit('whitelistUpdated', { whitelist: [...whitelist] });
      return whitelist;
    });
  }

  /**
   * Checks whether a new download for `name` is blocked.
   *
   * @returns false when no whitelist exists or a pattern occurs in `name`
   * @throws DecodeError if the whitelist file is malformed
   */
  newDownloadsAreProhibited(name: string): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const whitelist = await this.read('newDownloadsAreProhibited');
      if (whitelist === null) {
        return false;
      }
      return !matchesWhitelist(name, whitelist);
    });
  }

  /**
   * Returns the current whitelist, or null when downloads are unrestricted.
   */
  whitelist(): Promise<string[] | null> {
    return this.lock.runExclusive(() => this.read('whitelist'));
  }

  /**
   * Reads the whitelist file. Must be called with the lock held.
   */
  private async read(operation: string): Promise<string[] | null> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return null;
      }
      throw new StoreIOError(operation, this.filePath, err);
    }
    return parseWhitelist(data, this.filePath);
  }
}
