/**
 * Descriptor detail view.
 *
 * @module cli/components/DescriptorSummary
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { DescriptorSpec } from '../../engine/torrent/metainfo.js';
import { formatBytes, formatTrackerLines, truncateText } from '../utils/output.js';

/**
 * Section header
 */
const SectionHeader: React.FC<{ title: string }> = ({ title }) => (
  <Box marginTop={1}>
    <Text bold color="cyan">{title}</Text>
  </Box>
);

/**
 * Key-value row
 */
const InfoRow: React.FC<{ label: string; value: string; width?: number }> = ({
  label,
  value,
  width = 12,
}) => (
  <Box>
    <Box width={width}>
      <Text dimColor>{label}:</Text>
    </Box>
    <Text>{value}</Text>
  </Box>
);

export interface DescriptorSummaryProps {
  spec: DescriptorSpec;

  /** Include the file list */
  showFiles?: boolean;

  /** Include the announce tiers */
  showTrackers?: boolean;
}

/**
 * Shows the identity of a descriptor and, optionally, its files and trackers.
 */
export const DescriptorSummary: React.FC<DescriptorSummaryProps> = ({
  spec,
  showFiles = false,
  showTrackers = false,
}) => {
  const { metadata } = spec;

  return (
    <Box flexDirection="column">
      <InfoRow label="Name" value={truncateText(spec.name, 60)} />
      <InfoRow label="Hash" value={spec.infoHashHex} />
      <InfoRow label="Size" value={formatBytes(metadata.totalLength)} />
      <InfoRow
        label="Pieces"
        value={`${metadata.pieceCount} x ${formatBytes(metadata.pieceLength)}`}
      />
      {metadata.isPrivate && <InfoRow label="Private" value="yes" />}

      {showFiles && (
        <Box flexDirection="column">
          <SectionHeader title="Files" />
          {metadata.files.map((file, index) => (
            <Box key={file.path}>
              <Box width={5}>
                <Text dimColor>{(index + 1).toString().padStart(3)}.</Text>
              </Box>
              <Box width={50}>
                <Text>{truncateText(file.path, 48)}</Text>
              </Box>
              <Text dimColor>{formatBytes(file.length)}</Text>
            </Box>
          ))}
        </Box>
      )}

      {showTrackers && (
        <Box flexDirection="column">
          <SectionHeader title="Trackers" />
          {spec.trackers.length === 0 ? (
            <Text dimColor>(none)</Text>
          ) : (
            formatTrackerLines(spec.trackers).map((line) => <Text key={line}>{line}</Text>)
          )}
        </Box>
      )}
    </Box>
  );
};
