/**
 * Store construction for CLI commands.
 *
 * @module cli/utils/store
 */

import { resolveConfig } from '../../engine/config/file.js';
import { DescriptorStore } from '../../engine/store/descriptor-store.js';
import { createLogger, type LineLogger } from '../../utils/logger.js';

/** Loggers opened by commands in this process */
const openLoggers = new Set<LineLogger>();

/**
 * Options every command accepts
 */
export interface StoreCommandOptions {
  /** Descriptors directory; overrides the configured one */
  dir?: string;

  /** Data directory holding config.json */
  dataDir?: string;

  /** Log debug lines as well */
  verbose?: boolean;
}

/**
 * Resolves configuration and opens the descriptor store for a command.
 *
 * Log lines go to the configured log file only, so they never interleave
 * with Ink's rendering. Call flushLogs before the process exits.
 */
export async function openStore(options: StoreCommandOptions): Promise<DescriptorStore> {
  const config = await resolveConfig({
    dataDir: options.dataDir,
    descriptorsDir: options.dir,
  });

  const logger = createLogger({
    level: options.verbose ? 'debug' : 'info',
    logFile: config.logFile,
    sink: () => undefined,
  });
  openLoggers.add(logger);

  return DescriptorStore.open(config, { logger });
}

/**
 * Waits for every pending log file append of the loggers opened so far.
 */
export async function flushLogs(): Promise<void> {
  await Promise.all([...openLoggers].map((logger) => logger.flush()));
}
