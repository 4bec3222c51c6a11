/**
 * File naming inside a managed descriptor directory.
 *
 * Names are canonicalized once, at the store's API boundary.
 *
 * @module engine/store/names
 */

import * as path from 'path';

/** Extension every descriptor file carries */
export const DESCRIPTOR_EXT = '.torrent';

/** Suffix of in-flight temporary files */
export const TEMP_SUFFIX = '.tmp';

/** Whitelist file recording download-once admission rules */
export const WHITELIST_FILE = 'prohibit_new_downloads.lock';

/**
 * Appends the descriptor extension unless the name already ends with it.
 *
 * @example
 * canonicalName('v1-000000-000500-headers.seg'); // 'v1-000000-000500-headers.seg.torrent'
 * canonicalName('a.torrent');                    // 'a.torrent'
 */
export function canonicalName(name: string): string {
  return name.endsWith(DESCRIPTOR_EXT) ? name : `${name}${DESCRIPTOR_EXT}`;
}

/**
 * Resolves the descriptor path for a name inside a directory.
 */
export function descriptorPath(dir: string, name: string): string {
  return path.join(dir, canonicalName(name));
}

/**
 * Path of the temporary sibling used while writing `finalPath`.
 */
export function tempPath(finalPath: string): string {
  return `${finalPath}${TEMP_SUFFIX}`;
}
