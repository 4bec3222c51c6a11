/**
 * Exists command.
 *
 * @module cli/commands/exists
 */

import React from 'react';
import { render, Text } from 'ink';
import { canonicalName } from '../../engine/store/names.js';
import { CommandStatus } from '../components/CommandStatus.js';
import { useCommand } from '../hooks/useCommand.js';
import { openStore, type StoreCommandOptions } from '../utils/store.js';

export interface ExistsCommandOptions extends StoreCommandOptions {
  name: string;
}

export const ExistsResultView: React.FC<{ name: string; present: boolean }> = ({
  name,
  present,
}) =>
  present ? (
    <Text color="green">[OK] {canonicalName(name)} exists</Text>
  ) : (
    <Text color="yellow">[INFO] {canonicalName(name)} does not exist</Text>
  );

/**
 * Exists command component using Ink for rendering
 */
export function ExistsCommand(options: ExistsCommandOptions): React.ReactElement | null {
  const state = useCommand(async () => {
    const store = await openStore(options);
    return store.exists(options.name);
  });

  return (
    <CommandStatus state={state} loadingText="Checking...">
      {(present) => <ExistsResultView name={options.name} present={present} />}
    </CommandStatus>
  );
}

/**
 * Run the exists command with Ink rendering
 */
export function runExists(options: ExistsCommandOptions): Promise<void> {
  return render(<ExistsCommand {...options} />).waitUntilExit();
}
