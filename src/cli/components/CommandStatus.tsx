/**
 * Loading and error states shared by every command.
 *
 * @module cli/components/CommandStatus
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { CommandState } from '../hooks/useCommand.js';

export interface CommandStatusProps<T> {
  state: CommandState<T>;

  /** Shown while the task is running */
  loadingText: string;

  /** Renders the successful result */
  children: (result: T) => React.ReactElement | null;
}

/**
 * Renders a command's loading text, its error, or its result.
 */
export function CommandStatus<T>({
  state,
  loadingText,
  children,
}: CommandStatusProps<T>): React.ReactElement | null {
  if (state.status === 'loading') {
    return (
      <Box>
        <Text color="cyan">{loadingText}</Text>
      </Box>
    );
  }

  if (state.status === 'failed') {
    return (
      <Box>
        <Text color="red">[ERROR] {state.error}</Text>
      </Box>
    );
  }

  return children(state.result);
}
