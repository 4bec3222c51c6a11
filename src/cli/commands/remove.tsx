/**
 * Remove command.
 *
 * Deletes a descriptor file. Removing a name that does not exist fails.
 *
 * @module cli/commands/remove
 */

import React from 'react';
import { render, Text } from 'ink';
import { canonicalName } from '../../engine/store/names.js';
import { CommandStatus } from '../components/CommandStatus.js';
import { useCommand } from '../hooks/useCommand.js';
import { openStore, type StoreCommandOptions } from '../utils/store.js';

export interface RemoveCommandOptions extends StoreCommandOptions {
  name: string;
}

/**
 * Remove command component using Ink for rendering
 */
export function RemoveCommand(options: RemoveCommandOptions): React.ReactElement | null {
  const state = useCommand(async () => {
    const store = await openStore(options);
    await store.delete(options.name);
    return canonicalName(options.name);
  });

  return (
    <CommandStatus state={state} loadingText="Removing descriptor...">
      {(removed) => <Text color="green">[OK] Removed {removed}</Text>}
    </CommandStatus>
  );
}

/**
 * Run the remove command with Ink rendering
 */
export function runRemove(options: RemoveCommandOptions): Promise<void> {
  return render(<RemoveCommand {...options} />).waitUntilExit();
}
