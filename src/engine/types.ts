/**
 * Core type definitions for the seedfile engine.
 *
 * Holds the store configuration shape and the error hierarchy shared by the
 * descriptor store, the admission gate and the CLI.
 *
 * @module engine/types
 */

// =============================================================================
// Configuration
// =============================================================================

/**
 * Configuration for a descriptor store and its admission gate.
 */
export interface StoreConfig {
  /** Base directory for application state (may start with ~) */
  dataDir: string;

  /**
   * Directory holding the .torrent descriptors and the whitelist file.
   * Defaults to `<dataDir>/torrents` when left empty.
   */
  descriptorsDir: string;

  /**
   * Announce tiers injected into every descriptor on load and build.
   * Each inner array is one tier of tracker URLs.
   */
  trackers: string[][];

  /** Value written to the 'created by' field of built descriptors */
  createdBy: string;

  /** Permission bits for newly written files */
  fileMode: number;

  /** Optional log file path (may start with ~) */
  logFile?: string;
}

/**
 * Partial configuration accepted from config files and CLI flags.
 */
export type PartialStoreConfig = Partial<StoreConfig>;

// =============================================================================
// Error Types
// =============================================================================

/**
 * Machine-readable error category.
 *
 * - INVALID_INPUT: empty payload or malformed definition
 * - NOT_FOUND: no backing file for the name
 * - DECODE: on-disk bytes are not a valid descriptor or whitelist
 * - IO: open/write/sync/rename/remove failed at the OS boundary
 * - CONFIG: configuration file cannot be used
 */
export type StoreErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'DECODE'
  | 'IO'
  | 'CONFIG';

/**
 * Base error class for all store errors.
 */
export class StoreError extends Error {
  /** Error category */
  readonly code: StoreErrorCode;

  /** Operation that failed, e.g. "create" or "loadByPath" */
  readonly operation: string;

  /** Path or name the operation was working on */
  readonly target: string;

  constructor(
    code: StoreErrorCode,
    message: string,
    operation: string,
    target: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoreError';
    this.code = code;
    this.operation = operation;
    this.target = target;
  }
}

/**
 * Error thrown when the caller supplies unusable input.
 */
export class InvalidInputError extends StoreError {
  constructor(message: string, operation: string, target: string) {
    super('INVALID_INPUT', message, operation, target);
    this.name = 'InvalidInputError';
  }
}

/**
 * Error thrown when no file backs the requested name.
 */
export class NotFoundError extends StoreError {
  constructor(operation: string, target: string) {
    super('NOT_FOUND', `${operation}: not found: ${target}`, operation, target);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when stored bytes cannot be decoded.
 */
export class DecodeError extends StoreError {
  constructor(
    message: string,
    operation: string,
    target: string,
    options?: { cause?: unknown }
  ) {
    super('DECODE', message, operation, target, options);
    this.name = 'DecodeError';
  }
}

/**
 * Error thrown when a filesystem call fails.
 */
export class StoreIOError extends StoreError {
  /** errno code of the underlying failure (e.g. EACCES), if any */
  readonly sysCode?: string;

  constructor(operation: string, target: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('IO', `${operation}: ${detail}`, operation, target, { cause });
    this.name = 'StoreIOError';
    this.sysCode = errnoCode(cause);
  }
}

/**
 * Error thrown when the whitelist could not be written.
 *
 * Carries the list that would have been stored so callers can still see it.
 */
export class WhitelistWriteError extends StoreIOError {
  readonly whitelist: string[];

  constructor(target: string, cause: unknown, whitelist: string[]) {
    super('prohibitNewDownloads', target, cause);
    this.name = 'WhitelistWriteError';
    this.whitelist = whitelist;
  }
}

/**
 * Error thrown when a configuration file is unreadable or malformed.
 */
export class ConfigError extends StoreError {
  constructor(message: string, target: string, options?: { cause?: unknown }) {
    super('CONFIG', message, 'loadConfig', target, options);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Error Helpers
// =============================================================================

/**
 * Narrows an unknown value to a StoreError, optionally of a given code.
 */
export function isStoreError(
  err: unknown,
  code?: StoreErrorCode
): err is StoreError {
  return err instanceof StoreError && (code === undefined || err.code === code);
}

/**
 * Reads the errno code (ENOENT, EACCES, ...) off a Node.js system error.
 */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
