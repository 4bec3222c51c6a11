#!/usr/bin/env node
/**
 * seedfile CLI Entry Point
 *
 * Parses command-line arguments and routes to the command implementations.
 *
 * @module cli
 */

import React from 'react';
import { render, Text, Box } from 'ink';
import meow from 'meow';
import { VERSION } from '../shared/constants.js';
import { runCreate } from './commands/create.js';
import { runShow } from './commands/show.js';
import { runExists } from './commands/exists.js';
import { runRemove } from './commands/remove.js';
import { runGate, runCheck } from './commands/gate.js';
import { flushLogs, type StoreCommandOptions } from './utils/store.js';

// =============================================================================
// CLI Configuration
// =============================================================================

const cli = meow(
  `
  Usage
    $ seedfile <command> [options]

  Commands
    create <name> <file>   Store a .torrent file under a descriptor name
    show <name>            Show a stored descriptor
    exists <name>          Check whether a descriptor is stored
    remove <name>          Delete a stored descriptor
    gate                   Prohibit new downloads, editing the whitelist
    check <name>           Check whether a new download of <name> is allowed

  Options
    --dir, -d           Descriptors directory (default: <data-dir>/torrents)
    --data-dir          Data directory holding config.json (default: ~/.seedfile)
    --path, -p          show: treat <name> as a file path
    --allow, -a         gate: admit names containing this pattern (repeatable)
    --revoke, -r        gate: stop admitting this pattern (repeatable)
    --verbose           Write debug lines to the log file
    --version, -v       Show version
    --help, -h          Show help

  Examples
    $ seedfile create v1-000000-000500-headers.seg ./headers.seg.torrent
    $ seedfile show v1-000000-000500-headers.seg
    $ seedfile gate --allow headers --allow bodies
    $ seedfile check v1-000500-001000-transactions.seg
`,
  {
    importMeta: import.meta,
    version: VERSION,
    flags: {
      version: {
        type: 'boolean',
        shortFlag: 'v',
      },
      dir: {
        type: 'string',
        shortFlag: 'd',
      },
      dataDir: {
        type: 'string',
      },
      path: {
        type: 'boolean',
        shortFlag: 'p',
        default: false,
      },
      allow: {
        type: 'string',
        shortFlag: 'a',
        isMultiple: true,
        default: [],
      },
      revoke: {
        type: 'string',
        shortFlag: 'r',
        isMultiple: true,
        default: [],
      },
      verbose: {
        type: 'boolean',
        default: false,
      },
    },
  }
);

// =============================================================================
// Error Display Component
// =============================================================================

/**
 * Usage error display
 */
function ErrorDisplay({ message }: { message: string }) {
  return (
    <Box flexDirection="column" padding={1}>
      <Text color="red" bold>
        Error: {message}
      </Text>
      <Box marginTop={1}>
        <Text>Run </Text>
        <Text color="yellow">seedfile --help</Text>
        <Text> for usage information</Text>
      </Box>
    </Box>
  );
}

function usageError(message: string): Promise<void> {
  render(<ErrorDisplay message={message} />).unmount();
  return Promise.reject(new Error(message));
}

// =============================================================================
// Command Routing
// =============================================================================

/**
 * Route the command to the appropriate handler
 */
function routeCommand(): Promise<void> {
  const [command, ...args] = cli.input;
  const { flags } = cli;

  const storeOptions: StoreCommandOptions = {
    dir: flags.dir,
    dataDir: flags.dataDir,
    verbose: flags.verbose,
  };

  if (flags.version) {
    console.log(VERSION);
    return Promise.resolve();
  }

  if (!command) {
    cli.showHelp(0);
    return Promise.resolve();
  }

  const name = args[0];

  switch (command.toLowerCase()) {
    case 'create':
    case 'add': {
      const file = args[1];
      if (!name || !file) {
        return usageError('create needs a descriptor name and a .torrent file');
      }
      return runCreate({ ...storeOptions, name, file });
    }

    case 'show':
    case 'info': {
      if (!name) return usageError('Missing descriptor name');
      return runShow({ ...storeOptions, name, path: flags.path });
    }

    case 'exists': {
      if (!name) return usageError('Missing descriptor name');
      return runExists({ ...storeOptions, name });
    }

    case 'remove':
    case 'rm':
    case 'delete': {
      if (!name) return usageError('Missing descriptor name');
      return runRemove({ ...storeOptions, name });
    }

    case 'gate':
    case 'prohibit':
      return runGate({ ...storeOptions, allow: flags.allow, revoke: flags.revoke });

    case 'check': {
      if (!name) return usageError('Missing descriptor name');
      return runCheck({ ...storeOptions, name });
    }

    default:
      return usageError(`Unknown command: ${command}`);
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

routeCommand()
  .then(
    () => 0,
    () => 1
  )
  .then(async (code) => {
    await flushLogs();
    process.exit(code);
  });
