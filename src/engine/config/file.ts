/**
 * Configuration file loading.
 *
 * File format: <dataDir>/config.json, a JSON object holding any subset of
 * StoreConfig fields.
 *
 * @module engine/config/file
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  ConfigError,
  errnoCode,
  type PartialStoreConfig,
  type StoreConfig,
} from '../types.js';
import { expandPath } from '../../utils/platform.js';
import { mergeWithDefaults, DEFAULT_CONFIG } from './defaults.js';

/** Config file name inside the data directory */
export const CONFIG_FILE = 'config.json';

/** Highest permission bits accepted for fileMode */
const MAX_FILE_MODE = 0o777;

function isStringTiers(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (tier) => Array.isArray(tier) && tier.every((url) => typeof url === 'string')
    )
  );
}

function invalidField(source: string, key: string, expected: string): never {
  throw new ConfigError(`${source}: '${key}' must be ${expected}`, source);
}

/**
 * Validates parsed JSON against the StoreConfig field types.
 *
 * Unknown keys and undefined values are ignored.
 *
 * @throws ConfigError naming the first field with the wrong type
 */
export function parseConfig(raw: unknown, source: string): PartialStoreConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${source}: config must be a JSON object`, source);
  }

  const config: PartialStoreConfig = {};

  const entries: Array<[string, unknown]> = Object.entries(raw);
  for (const [key, value] of entries) {
    if (value === undefined) continue;

    switch (key) {
      case 'dataDir':
      case 'descriptorsDir':
      case 'createdBy':
      case 'logFile':
        if (typeof value !== 'string') invalidField(source, key, 'a string');
        config[key] = value;
        break;
      case 'fileMode':
        if (
          typeof value !== 'number' ||
          !Number.isInteger(value) ||
          value < 0 ||
          value > MAX_FILE_MODE
        ) {
          invalidField(source, key, 'an integer between 0 and 0o777');
        }
        config.fileMode = value;
        break;
      case 'trackers':
        if (!isStringTiers(value)) {
          invalidField(source, key, 'an array of arrays of strings');
        }
        config.trackers = value.map((tier) => [...tier]);
        break;
      default:
        break;
    }
  }

  return config;
}

/**
 * Loads the configuration file from a data directory
 *
 * @returns The partial configuration, or null if no file exists
 * @throws ConfigError if the file cannot be read or is malformed
 */
export async function loadConfig(dataDir: string): Promise<PartialStoreConfig | null> {
  const configPath = path.join(expandPath(dataDir), CONFIG_FILE);

  let data: string;
  try {
    data = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      return null; // Config file doesn't exist yet
    }
    throw new ConfigError(`Failed to read ${configPath}`, configPath, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (err) {
    throw new ConfigError(
      `${configPath}: invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
      configPath,
      { cause: err }
    );
  }

  return parseConfig(raw, configPath);
}

/**
 * Builds the effective configuration: defaults, then the config file found
 * in the data directory, then explicit overrides (undefined values skipped).
 */
export async function resolveConfig(
  overrides: PartialStoreConfig = {}
): Promise<StoreConfig> {
  const explicit = parseConfig(overrides, 'overrides');
  const dataDir = explicit.dataDir ?? DEFAULT_CONFIG.dataDir;
  const fromFile = (await loadConfig(dataDir)) ?? {};

  return mergeWithDefaults({ ...fromFile, ...explicit, dataDir });
}
