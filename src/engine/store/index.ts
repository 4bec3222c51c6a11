/**
 * Descriptor store module.
 *
 * @module engine/store
 */

export {
  DescriptorStore,
  type DescriptorStoreOptions,
  type CreateResult,
} from './descriptor-store.js';
export {
  AdmissionGate,
  applyWhitelistChange,
  matchesWhitelist,
  parseWhitelist,
  type AdmissionGateOptions,
  type PatternList,
} from './admission-gate.js';
export { AsyncLock } from './lock.js';
export { writeFileAtomic, DEFAULT_FILE_MODE } from './atomic.js';
export {
  DESCRIPTOR_EXT,
  TEMP_SUFFIX,
  WHITELIST_FILE,
  canonicalName,
  descriptorPath,
  tempPath,
} from './names.js';
