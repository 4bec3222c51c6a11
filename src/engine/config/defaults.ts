/**
 * Default configuration values for the descriptor store.
 *
 * @module engine/config/defaults
 */

import * as path from 'path';
import type { PartialStoreConfig, StoreConfig } from '../types.js';
import { expandPath, getDefaultDataDir } from '../../utils/platform.js';
import { APP_NAME, VERSION } from '../../shared/constants.js';

/** Subdirectory of dataDir used when descriptorsDir is left empty */
export const DESCRIPTORS_SUBDIR = 'torrents';

/**
 * Announce tiers injected into descriptors when nothing else is configured.
 */
export const DEFAULT_TRACKERS: string[][] = [
  ['udp://tracker.opentrackr.org:1337/announce'],
  ['udp://open.stealth.si:80/announce'],
  ['udp://tracker.torrent.eu.org:451/announce'],
  ['udp://exodus.desync.com:6969/announce'],
];

/**
 * Default store configuration.
 *
 * - State lives under ~/.seedfile (%LOCALAPPDATA%/seedfile on Windows),
 *   descriptors in its torrents/ subdirectory
 * - Files are written world-readable, owner-writable
 */
export const DEFAULT_CONFIG: StoreConfig = {
  dataDir: getDefaultDataDir(),

  /** Empty means `<dataDir>/torrents` */
  descriptorsDir: '',

  trackers: DEFAULT_TRACKERS,

  createdBy: `${APP_NAME}/${VERSION}`,

  fileMode: 0o644,
};

/**
 * Merges a partial configuration with the default configuration.
 *
 * Tracker tiers are copied so callers never share arrays with the defaults.
 */
export function mergeWithDefaults(partialConfig?: PartialStoreConfig): StoreConfig {
  const merged: StoreConfig = {
    ...DEFAULT_CONFIG,
    ...partialConfig,
  };

  return {
    ...merged,
    trackers: merged.trackers.map((tier) => [...tier]),
  };
}

/**
 * Resolves the absolute directory holding descriptors for a configuration.
 */
export function resolveDescriptorsDir(config: StoreConfig): string {
  if (config.descriptorsDir) {
    return expandPath(config.descriptorsDir);
  }
  return path.join(expandPath(config.dataDir), DESCRIPTORS_SUBDIR);
}
