/**
 * Crash-consistent file replacement.
 *
 * Data is written to a sibling temp file, flushed to durable storage, closed
 * and then renamed over the final path. Readers either see the old file (or
 * none) or the complete new one; a crash leaves at most a stray temp file.
 *
 * @module engine/store/atomic
 */

import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { StoreIOError, errnoCode } from '../types.js';
import { tempPath } from './names.js';

/** Default permission bits for written files */
export const DEFAULT_FILE_MODE = 0o644;

/**
 * Atomically writes `data` to `filePath`.
 *
 * Any stale temp file from an earlier crash is truncated and reused.
 *
 * @param filePath - Final path
 * @param data - Complete file contents
 * @param mode - Permission bits for a newly created file
 * @param operation - Operation name reported in errors
 * @throws StoreIOError if any step fails; the temp file is removed first
 */
export async function writeFileAtomic(
  filePath: string,
  data: Uint8Array,
  mode: number = DEFAULT_FILE_MODE,
  operation = 'write'
): Promise<void> {
  const tmp = tempPath(filePath);
  let handle: FileHandle | null = null;

  try {
    handle = await fs.open(tmp, 'w', mode);
    await handle.writeFile(data);
    await handle.sync();
    await handle.close();
    handle = null;

    await fs.rename(tmp, filePath);
  } catch (err) {
    await discardTemp(handle, tmp, err);
    throw new StoreIOError(operation, filePath, err);
  }
}

/**
 * Closes and unlinks a temp file after a failed write.
 *
 * Cleanup failures are attached to the original error rather than replacing it.
 */
async function discardTemp(
  handle: FileHandle | null,
  tmp: string,
  original: unknown
): Promise<void> {
  const problems: unknown[] = [];

  if (handle) {
    await handle.close().catch((err: unknown) => problems.push(err));
  }
  await fs.unlink(tmp).catch((err: unknown) => {
    if (errnoCode(err) !== 'ENOENT') problems.push(err);
  });

  if (problems.length > 0 && original instanceof Error) {
    original.message += ` (cleanup of ${tmp} also failed: ${problems
      .map((p) => (p instanceof Error ? p.message : String(p)))
      .join('; ')})`;
  }
}
