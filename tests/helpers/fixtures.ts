/**
 * Shared fixtures: temp directories and small, valid descriptors.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { encode, type BencodeDict } from '../../src/engine/bencode.js';
import type { Logger, LogLevel } from '../../src/utils/logger.js';

// =============================================================================
// Directories
// =============================================================================

/**
 * Creates a temporary test directory
 */
export async function createTestDir(label: string): Promise<string> {
  const dir = path.join(
    tmpdir(),
    `seedfile-${label}-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
  );
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

/**
 * Removes the test directory
 */
export async function cleanupTestDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

// =============================================================================
// Descriptors
// =============================================================================

export const TEST_TRACKER = 'udp://tracker.test:6969/announce';

/**
 * `count` fake 20-byte piece digests
 */
export function pieceHashes(count: number, fill = 0xab): Buffer {
  return Buffer.alloc(count * 20, fill);
}

/**
 * Info dictionary of a single-file torrent with one 16 KiB piece
 */
export function singleFileInfo(name: string, length = 1000): BencodeDict {
  return {
    name: Buffer.from(name),
    'piece length': 16384,
    pieces: pieceHashes(Math.ceil(length / 16384)),
    length,
  };
}

/**
 * Encoded single-file descriptor.
 *
 * Extra top-level keys are merged in as given.
 */
export function descriptorBytes(
  name: string,
  top: BencodeDict = {},
  length = 1000
): Buffer {
  return encode({
    announce: Buffer.from('udp://stored.test:80/announce'),
    ...top,
    info: singleFileInfo(name, length),
  });
}

// =============================================================================
// Logging
// =============================================================================

export interface RecordedLine {
  level: LogLevel;
  message: string;
}

/**
 * Logger that keeps every message for assertions
 */
export function recordingLogger(): Logger & { lines: RecordedLine[] } {
  const lines: RecordedLine[] = [];
  return {
    lines,
    debug: (message) => lines.push({ level: 'debug', message }),
    info: (message) => lines.push({ level: 'info', message }),
    warn: (message) => lines.push({ level: 'warn', message }),
    error: (message) => lines.push({ level: 'error', message }),
  };
}
