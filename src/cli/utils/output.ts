/**
 * CLI output utilities.
 *
 * Shared formatting helpers for consistent command-line output.
 *
 * @module cli/utils/output
 */

import { isStoreError, type StoreErrorCode } from '../../engine/types.js';

/**
 * Formats bytes to a human-readable string (e.g. "1.5 GB", "256 KB").
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
  const base = 1024;

  const exponent = Math.floor(Math.log(bytes) / Math.log(base));
  const unitIndex = Math.min(exponent, units.length - 1);
  const value = bytes / Math.pow(base, unitIndex);

  if (unitIndex === 0) {
    return `${Math.round(value)} ${units[unitIndex]}`;
  }
  return `${value.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Truncates text to a maximum length, ending with an ellipsis.
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 1) + '…';
}

const ERROR_LABELS: Record<StoreErrorCode, string> = {
  INVALID_INPUT: 'Invalid input',
  NOT_FOUND: 'Not found',
  DECODE: 'Corrupt file',
  IO: 'Filesystem error',
  CONFIG: 'Configuration error',
};

/**
 * Renders an error for display, prefixing store errors with their category.
 */
export function describeError(err: unknown): string {
  if (isStoreError(err)) {
    return `${ERROR_LABELS[err.code]}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Flattens announce tiers into numbered display lines ("1. url").
 */
export function formatTrackerLines(tiers: string[][]): string[] {
  return tiers.flatMap((tier, index) =>
    tier.map((url) => `${(index + 1).toString().padStart(2)}. ${url}`)
  );
}
