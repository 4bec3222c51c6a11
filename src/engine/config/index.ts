/**
 * Store configuration module.
 *
 * @module engine/config
 */

export {
  DEFAULT_CONFIG,
  DEFAULT_TRACKERS,
  DESCRIPTORS_SUBDIR,
  mergeWithDefaults,
  resolveDescriptorsDir,
} from './defaults.js';
export { CONFIG_FILE, parseConfig, loadConfig, resolveConfig } from './file.js';
