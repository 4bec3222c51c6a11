/**
 * Admission gate commands.
 *
 * `gate` enters download-once mode and edits the whitelist; `check` reports
 * whether a new download for a name would be admitted.
 *
 * @module cli/commands/gate
 */

import React from 'react';
import { render, Box, Text } from 'ink';
import { CommandStatus } from '../components/CommandStatus.js';
import { useCommand } from '../hooks/useCommand.js';
import { openStore, type StoreCommandOptions } from '../utils/store.js';

// =============================================================================
// gate
// =============================================================================

export interface GateCommandOptions extends StoreCommandOptions {
  /** Patterns to admit */
  allow: string[];

  /** Patterns to stop admitting */
  revoke: string[];
}

/**
 * Whitelist after an update
 */
export const WhitelistView: React.FC<{ whitelist: string[] }> = ({ whitelist }) => (
  <Box flexDirection="column">
    <Text color="yellow">[INFO] New downloads prohibited except for names containing:</Text>
    {whitelist.length === 0 ? (
      <Text dimColor>  (nothing - all new downloads are blocked)</Text>
    ) : (
      whitelist.map((pattern) => <Text key={pattern}>  {pattern}</Text>)
    )}
  </Box>
);

/**
 * Gate command component using Ink for rendering
 */
export function GateCommand(options: GateCommandOptions): React.ReactElement | null {
  const state = useCommand(async () => {
    const store = await openStore(options);
    return store.prohibitNewDownloads(options.allow, options.revoke);
  });

  return (
    <CommandStatus state={state} loadingText="Updating whitelist...">
      {(whitelist) => <WhitelistView whitelist={whitelist} />}
    </CommandStatus>
  );
}

/**
 * Run the gate command with Ink rendering
 */
export function runGate(options: GateCommandOptions): Promise<void> {
  return render(<GateCommand {...options} />).waitUntilExit();
}

// =============================================================================
// check
// =============================================================================

export interface CheckCommandOptions extends StoreCommandOptions {
  name: string;
}

export const CheckResultView: React.FC<{ name: string; prohibited: boolean }> = ({
  name,
  prohibited,
}) =>
  prohibited ? (
    <Text color="red">[BLOCKED] New downloads of {name} are prohibited</Text>
  ) : (
    <Text color="green">[OK] New downloads of {name} are allowed</Text>
  );

/**
 * Check command component using Ink for rendering
 */
export function CheckCommand(options: CheckCommandOptions): React.ReactElement | null {
  const state = useCommand(async () => {
    const store = await openStore(options);
    return store.newDownloadsAreProhibited(options.name);
  });

  return (
    <CommandStatus state={state} loadingText="Checking whitelist...">
      {(prohibited) => <CheckResultView name={options.name} prohibited={prohibited} />}
    </CommandStatus>
  );
}

/**
 * Run the check command with Ink rendering
 */
export function runCheck(options: CheckCommandOptions): Promise<void> {
  return render(<CheckCommand {...options} />).waitUntilExit();
}
