/**
 * Platform-specific path helpers.
 *
 * @module utils/platform
 */

import { platform, homedir } from 'os';
import { join, resolve } from 'path';
import { APP_NAME } from '../shared/constants.js';

/** Current platform is Windows */
export const isWindows = platform() === 'win32';

/**
 * Expands a path that may contain ~ to the user's home directory.
 *
 * @param path - Path that may start with ~/ or ~
 * @returns Expanded absolute path
 */
export function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  if (path.startsWith('~')) {
    return resolve(homedir(), path.slice(1));
  }
  return path;
}

/**
 * Gets the platform-appropriate default data directory.
 *
 * - Windows: %LOCALAPPDATA%/seedfile
 * - Unix/macOS: ~/.seedfile
 */
export function getDefaultDataDir(): string {
  if (isWindows) {
    return join(process.env.LOCALAPPDATA || homedir(), APP_NAME);
  }
  return join(homedir(), `.${APP_NAME}`);
}
