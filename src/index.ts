/**
 * seedfile public API.
 *
 * @module seedfile
 */

export * from './engine/index.js';
export {
  createLogger,
  silentLogger,
  formatLogLine,
  type Logger,
  type LineLogger,
  type LoggerOptions,
  type LogLevel,
} from './utils/logger.js';
export { expandPath, getDefaultDataDir } from './utils/platform.js';
export { APP_NAME, VERSION } from './shared/constants.js';
