/**
 * @fileoverview LogPane component
 *
 * Shows the last lines of the selected tool's output that fit in the given
 * height. Long lines are truncated rather than wrapped.
 */

import React, { useMemo } from 'react';
import { Box, Text } from 'ink';
import type { ToolSummary } from '../../types.js';

interface LogPaneProps {
  lines: string[];
  height: number;
  tool: ToolSummary | null;
}

export function LogPane({ lines, height, tool }: LogPaneProps): React.ReactElement {
  // Reserve 2 lines for border, 1 for the title
  const visible = useMemo(() => lines.slice(-Math.max(1, height - 3)), [lines, height]);

  if (!tool) {
    return (
      <Box borderStyle="single" borderColor="gray" height={height} paddingX={1} justifyContent="center">
        <Text dimColor>No tool selected</Text>
      </Box>
    );
  }

  return (
    <Box
      flexDirection="column"
      borderStyle="single"
      borderColor={tool.status === 'error' ? 'red' : 'green'}
      height={height}
      paddingX={1}
      overflow="hidden"
    >
      <Text bold color="cyan">{tool.name}{tool.logFile ? ` — ${tool.logFile}` : ''}</Text>
      {visible.length === 0 ? (
        <Text dimColor>Waiting for output...</Text>
      ) : (
        visible.map((line, index) => (
          <Text key={index} wrap="truncate">
            {line}
          </Text>
        ))
      )}
    </Box>
  );
}
