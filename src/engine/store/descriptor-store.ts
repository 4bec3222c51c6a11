/**
 * Atomic descriptor store.
 *
 * Owns every create/read/delete of `.torrent` files in one directory. All
 * operations on an instance are serialized by a single FIFO lock, and files
 * only become visible through a temp-file + fsync + rename sequence, so no
 * reader ever sees a partially written descriptor.
 *
 * File layout:
 *   <dir>/<name>.torrent            descriptors
 *   <dir>/<name>.torrent.tmp        in-flight writes (crash leftovers ignored)
 *   <dir>/prohibit_new_downloads.lock  admission whitelist
 *
 * @module engine/store/descriptor-store
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  DecodeError,
  InvalidInputError,
  NotFoundError,
  StoreIOError,
  errnoCode,
  type StoreConfig,
} from '../types.js';
import { TypedEventEmitter, type StoreEvents } from '../events.js';
import { DEFAULT_TRACKERS, resolveDescriptorsDir } from '../config/defaults.js';
import {
  MetaInfoError,
  buildMetaInfo,
  decodeMetaInfo,
  encodeMetaInfo,
  infoHashOf,
  toDescriptorSpec,
  type AdditionalMetaInfo,
  type DescriptorSpec,
  type InfoDefinition,
} from '../torrent/metainfo.js';
import { createLogger, silentLogger, type Logger } from '../../utils/logger.js';
import { APP_NAME, VERSION } from '../../shared/constants.js';
import { AsyncLock } from './lock.js';
import { writeFileAtomic, DEFAULT_FILE_MODE } from './atomic.js';
import { AdmissionGate, type PatternList } from './admission-gate.js';
import { canonicalName, descriptorPath } from './names.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a DescriptorStore
 */
export interface DescriptorStoreOptions {
  /** Announce tiers injected on every load and build */
  trackers?: string[][];

  /** 'created by' value for descriptors built from definitions */
  createdBy?: string;

  /** Permission bits for written files */
  fileMode?: number;

  logger?: Logger;

  /** Clock used for creation dates of built descriptors */
  now?: () => Date;
}

/**
 * Result of DescriptorStore.create
 */
export interface CreateResult {
  /** The descriptor now on disk */
  spec: DescriptorSpec;

  /** True only for the call that wrote the file */
  created: boolean;
}

// =============================================================================
// DescriptorStore Class
// =============================================================================

/**
 * Thread-safe CRUD over .torrent descriptor files.
 *
 * @example
 * ```typescript
 * const store = new DescriptorStore('/var/lib/node/snapshots');
 * const { spec, created } = await store.create('v1-headers.seg', bytes);
 * if (await store.newDownloadsAreProhibited(spec.name)) {
 *   // caller decides what to do
 * }
 * ```
 */
export class DescriptorStore {
  /** Managed directory */
  readonly dir: string;

  /** Lifecycle events for descriptors and the whitelist */
  readonly events = new TypedEventEmitter<StoreEvents>();

  /** Admission gate sharing this store's lock */
  readonly gate: AdmissionGate;

  private readonly lock = new AsyncLock();
  private readonly trackers: string[][];
  private readonly createdBy: string;
  private readonly fileMode: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(dir: string, options: DescriptorStoreOptions = {}) {
    this.dir = dir;
    this.trackers = (options.trackers ?? DEFAULT_TRACKERS).map((tier) => [...tier]);
    this.createdBy = options.createdBy ?? `${APP_NAME}/${VERSION}`;
    this.fileMode = options.fileMode ?? DEFAULT_FILE_MODE;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());

    this.gate = new AdmissionGate(dir, {
      lock: this.lock,
      logger: this.logger,
      events: this.events,
      fileMode: this.fileMode,
    });
  }

  /**
   * Opens a store for a configuration, creating the descriptors directory
   * if needed.
   *
   * @throws StoreIOError if the directory cannot be created
   */
  static async open(
    config: StoreConfig,
    options: Pick<DescriptorStoreOptions, 'logger' | 'now'> = {}
  ): Promise<DescriptorStore> {
    const dir = resolveDescriptorsDir(config);

    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (err) {
      throw new StoreIOError('open', dir, err);
    }

    return new DescriptorStore(dir, {
      trackers: config.trackers,
      createdBy: config.createdBy,
      fileMode: config.fileMode,
      logger: options.logger ?? createLogger({ logFile: config.logFile }),
      now: options.now,
    });
  }

  // ===========================================================================
  // Descriptor Operations
  // ===========================================================================

  /**
   * Checks whether a descriptor exists for `name`.
   *
   * Never throws: any stat failure counts as "not present".
   */
  exists(name: string): Promise<boolean> {
    const filePath = descriptorPath(this.dir, name);
    return this.lock.runExclusive(() => this.isPresent(filePath));
  }

  /**
   * Deletes the descriptor for `name`.
   *
   * @throws NotFoundError if no descriptor exists
   * @throws StoreIOError if removal fails
   */
  delete(name: string): Promise<void> {
    const canonical = canonicalName(name);
    const filePath = path.join(this.dir, canonical);

    return this.lock.runExclusive(async () => {
      try {
        await fs.unlink(filePath);
      } catch (err) {
        if (errnoCode(err) === 'ENOENT') {
          throw new NotFoundError('delete', filePath);
        }
        throw new StoreIOError('delete', filePath, err);
      }

      this.logger.info(`Deleted descriptor ${canonical}`);
      this.events.emit('descriptorDeleted', { name: canonical, path: filePath });
    });
  }

  /**
   * Creates the descriptor for `name` from encoded bytes unless one already
   * exists, then loads whichever descriptor is on disk.
   *
   * Concurrent creators of the same name converge: exactly one sees
   * `created: true`, the others load the winner's file.
   *
   * @throws InvalidInputError if `bytes` is empty and no descriptor exists
   * @throws DecodeError if the descriptor on disk does not decode
   * @throws StoreIOError if writing fails
   */
  create(name: string, bytes: Uint8Array): Promise<CreateResult> {
    const canonical = canonicalName(name);
    const filePath = path.join(this.dir, canonical);

    return this.lock.runExclusive(async () => {
      let created = false;

      if (!(await this.isPresent(filePath))) {
        if (bytes.length === 0) {
          throw new InvalidInputError(
            `create: refusing to write 0 bytes to ${canonical}`,
            'create',
            filePath
          );
        }
        await writeFileAtomic(filePath, bytes, this.fileMode, 'create');
        created = true;
      } else {
        this.logger.debug(`Descriptor ${canonical} already exists`);
      }

      const spec = await this.load(filePath, 'create');

      if (created) {
        this.logger.info(`Created descriptor ${canonical} (${spec.infoHashHex})`);
        this.events.emit('descriptorCreated', {
          name: canonical,
          path: filePath,
          infoHashHex: spec.infoHashHex,
        });
      }

      return { spec, created };
    });
  }

  /**
   * Builds a descriptor from a structured definition and writes it as
   * `<definition.name>.torrent` unless that file already exists.
   *
   * The announce list is always the configured tracker set.
   *
   * @returns true if this call wrote the file
   * @throws InvalidInputError if the definition is not a valid torrent
   * @throws StoreIOError if writing fails
   */
  async createFromDefinition(
    definition: InfoDefinition,
    additional?: AdditionalMetaInfo
  ): Promise<boolean> {
    const canonical = canonicalName(definition.name);
    const filePath = path.join(this.dir, canonical);

    let encoded: Buffer;
    let infoHashHex: string;
    try {
      const metaInfo = buildMetaInfo(definition, additional, {
        trackers: this.trackers,
        createdBy: this.createdBy,
        now: this.now,
      });
      encoded = encodeMetaInfo(metaInfo);
      infoHashHex = infoHashOf(metaInfo).toString('hex');
    } catch (err) {
      if (err instanceof MetaInfoError) {
        throw new InvalidInputError(err.message, 'createFromDefinition', filePath);
      }
      throw err;
    }

    return this.lock.runExclusive(async () => {
      if (await this.isPresent(filePath)) {
        this.logger.debug(`Descriptor ${canonical} already exists`);
        return false;
      }

      await writeFileAtomic(filePath, encoded, this.fileMode, 'createFromDefinition');

      this.logger.info(`Created descriptor ${canonical} (${infoHashHex})`);
      this.events.emit('descriptorCreated', { name: canonical, path: filePath, infoHashHex });
      return true;
    });
  }

  /**
   * Loads the descriptor stored under `name`.
   *
   * @throws NotFoundError if it does not exist
   * @throws DecodeError if its contents are not a valid descriptor
   */
  loadByName(name: string): Promise<DescriptorSpec> {
    const filePath = descriptorPath(this.dir, name);
    return this.lock.runExclusive(() => this.load(filePath, 'loadByName'));
  }

  /**
   * Loads a descriptor from an explicit path (the extension is appended if
   * missing). The path need not lie inside the managed directory.
   *
   * @throws NotFoundError if it does not exist
   * @throws DecodeError if its contents are not a valid descriptor
   */
  loadByPath(filePath: string): Promise<DescriptorSpec> {
    const resolved = canonicalName(filePath);
    return this.lock.runExclusive(() => this.load(resolved, 'loadByPath'));
  }

  // ===========================================================================
  // Admission Gate
  // ===========================================================================

  /**
   * Updates the download-once whitelist. See AdmissionGate.prohibitNewDownloads.
   */
  prohibitNewDownloads(add: PatternList, remove: PatternList): Promise<string[]> {
    return this.gate.prohibitNewDownloads(add, remove);
  }

  /**
   * Checks whether a new download for `name` is blocked.
   * See AdmissionGate.newDownloadsAreProhibited.
   */
  newDownloadsAreProhibited(name: string): Promise<boolean> {
    return this.gate.newDownloadsAreProhibited(name);
  }

  // ===========================================================================
  // Internals (lock must be held)
  // ===========================================================================

  private async isPresent(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  private async load(filePath: string, operation: string): Promise<DescriptorSpec> {
    let data: Buffer;
    try {
      data = await fs.readFile(filePath);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new NotFoundError(operation, filePath);
      }
      throw new StoreIOError(operation, filePath, err);
    }

    try {
      return toDescriptorSpec(decodeMetaInfo(data), this.trackers);
    } catch (err) {
      if (err instanceof MetaInfoError) {
        throw new DecodeError(`${operation}: ${err.message}, file=${filePath}`, operation, filePath, {
          cause: err,
        });
      }
      throw err;
    }
  }
}
