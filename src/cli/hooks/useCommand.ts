/**
 * Hook running a single async CLI task.
 *
 * @module cli/hooks/useCommand
 */

import { useEffect, useState } from 'react';
import { useApp } from 'ink';
import { describeError } from '../utils/output.js';

/**
 * Lifecycle of a one-shot command
 */
export type CommandState<T> =
  | { status: 'loading' }
  | { status: 'done'; result: T }
  | { status: 'failed'; error: string };

/**
 * Runs `task` once on mount and exits the Ink app after the outcome has
 * been rendered.
 *
 * A failed task exits with an error so `waitUntilExit()` rejects and the
 * process can report a non-zero status.
 */
export function useCommand<T>(task: () => Promise<T>): CommandState<T> {
  const { exit } = useApp();
  const [state, setState] = useState<CommandState<T>>({ status: 'loading' });

  useEffect(() => {
    let active = true;

    task().then(
      (result) => {
        if (active) setState({ status: 'done', result });
      },
      (err: unknown) => {
        if (active) setState({ status: 'failed', error: describeError(err) });
      }
    );

    return () => {
      active = false;
    };
  }, []);

  useEffect(() => {
    if (state.status === 'done') {
      exit();
    } else if (state.status === 'failed') {
      exit(new Error(state.error));
    }
  }, [state]);

  return state;
}
