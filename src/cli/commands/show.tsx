/**
 * Show command.
 *
 * Loads a descriptor and prints its identity, files and effective trackers.
 *
 * @module cli/commands/show
 */

import React from 'react';
import { render, Box, Text } from 'ink';
import type { DescriptorSpec } from '../../engine/torrent/metainfo.js';
import { CommandStatus } from '../components/CommandStatus.js';
import { DescriptorSummary } from '../components/DescriptorSummary.js';
import { useCommand } from '../hooks/useCommand.js';
import { openStore, type StoreCommandOptions } from '../utils/store.js';

export interface ShowCommandOptions extends StoreCommandOptions {
  /** Descriptor name, or a path when `path` is set */
  name: string;

  /** Treat `name` as a file path instead of a name in the store */
  path?: boolean;
}

/**
 * Loaded descriptor with files and trackers
 */
export const ShowResultView: React.FC<{ spec: DescriptorSpec }> = ({ spec }) => (
  <Box flexDirection="column" paddingY={1}>
    <Box marginBottom={1}>
      <Text bold>{spec.name}</Text>
    </Box>
    <DescriptorSummary spec={spec} showFiles showTrackers />
    <Box marginTop={1}>
      <Text dimColor>
        {spec.metadata.files.length} file(s), {spec.webSeeds.length} web seed(s)
      </Text>
    </Box>
  </Box>
);

/**
 * Show command component using Ink for rendering
 */
export function ShowCommand(options: ShowCommandOptions): React.ReactElement | null {
  const state = useCommand(async () => {
    const store = await openStore(options);
    return options.path ? store.loadByPath(options.name) : store.loadByName(options.name);
  });

  return (
    <CommandStatus state={state} loadingText="Loading descriptor...">
      {(spec) => <ShowResultView spec={spec} />}
    </CommandStatus>
  );
}

/**
 * Run the show command with Ink rendering
 */
export function runShow(options: ShowCommandOptions): Promise<void> {
  return render(<ShowCommand {...options} />).waitUntilExit();
}
