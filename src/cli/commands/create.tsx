/**
 * Create command.
 *
 * Stores the bytes of a .torrent file under a descriptor name. Creating a
 * name that already exists is not an error; the existing descriptor is shown.
 *
 * @module cli/commands/create
 */

import React from 'react';
import { render, Box, Text } from 'ink';
import { promises as fs } from 'fs';
import { StoreIOError } from '../../engine/types.js';
import type { CreateResult, DescriptorStore } from '../../engine/store/descriptor-store.js';
import { CommandStatus } from '../components/CommandStatus.js';
import { DescriptorSummary } from '../components/DescriptorSummary.js';
import { useCommand } from '../hooks/useCommand.js';
import { openStore, type StoreCommandOptions } from '../utils/store.js';

// =============================================================================
// Types
// =============================================================================

export interface CreateCommandOptions extends StoreCommandOptions {
  /** Descriptor name (the .torrent suffix is optional) */
  name: string;

  /** Path of an encoded .torrent file to store */
  file: string;
}

// =============================================================================
// Operation
// =============================================================================

/**
 * Reads `file` and creates descriptor `name` from its bytes.
 *
 * @throws StoreIOError if the source file cannot be read
 */
export async function performCreate(
  store: DescriptorStore,
  name: string,
  file: string
): Promise<CreateResult> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(file);
  } catch (err) {
    throw new StoreIOError('readSource', file, err);
  }
  return store.create(name, bytes);
}

// =============================================================================
// Components
// =============================================================================

/**
 * Outcome of a create call
 */
export const CreateResultView: React.FC<{ outcome: CreateResult }> = ({ outcome }) => (
  <Box flexDirection="column">
    {outcome.created ? (
      <Text color="green">[OK] Descriptor created</Text>
    ) : (
      <Text color="yellow">[INFO] Descriptor already present, nothing written</Text>
    )}
    <Box marginTop={1}>
      <DescriptorSummary spec={outcome.spec} />
    </Box>
  </Box>
);

/**
 * Create command component using Ink for rendering
 */
export function CreateCommand(options: CreateCommandOptions): React.ReactElement | null {
  const state = useCommand(async () => {
    const store = await openStore(options);
    return performCreate(store, options.name, options.file);
  });

  return (
    <CommandStatus state={state} loadingText="Creating descriptor...">
      {(outcome) => <CreateResultView outcome={outcome} />}
    </CommandStatus>
  );
}

/**
 * Run the create command with Ink rendering
 */
export function runCreate(options: CreateCommandOptions): Promise<void> {
  return render(<CreateCommand {...options} />).waitUntilExit();
}
