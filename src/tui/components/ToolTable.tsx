/**
 * @fileoverview ToolTable component
 *
 * One row per configured tool: status dot, id, status, PID and uptime.
 * The selected row is highlighted.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { ToolStatus, ToolSummary } from '../../types.js';
import { formatDuration } from '../../utils/log-format.js';

interface ToolTableProps {
  tools: ToolSummary[];
  selectedIndex: number;
}

const STATUS_COLORS: Record<ToolStatus, string> = {
  not_started: 'gray',
  starting: 'yellow',
  running: 'green',
  error: 'red',
  stopped: 'gray',
};

export function ToolTable({ tools, selectedIndex }: ToolTableProps): React.ReactElement {
  return (
    <Box flexDirection="column" borderStyle="single" borderColor="cyan" paddingX={1}>
      <Box>
        <Text bold>{'  TOOL'.padEnd(20)}</Text>
        <Text bold>{'STATUS'.padEnd(14)}</Text>
        <Text bold>{'PID'.padEnd(9)}</Text>
        <Text bold>UPTIME</Text>
      </Box>
      {tools.length === 0 && <Text dimColor>No tools configured</Text>}
      {tools.map((tool, index) => {
        const selected = index === selectedIndex;
        return (
          <Box key={tool.toolId}>
            <Text color={selected ? 'cyan' : undefined} bold={selected}>
              {(selected ? '> ' : '  ') + tool.toolId.padEnd(18)}
            </Text>
            <Text color={STATUS_COLORS[tool.status]}>
              {'● '}{tool.status.padEnd(12)}
            </Text>
            <Text>{(tool.pid === null ? '-' : String(tool.pid)).padEnd(9)}</Text>
            <Text>{tool.uptimeMs === null ? '-' : formatDuration(tool.uptimeMs)}</Text>
            {!tool.installed && <Text color="red"> (not installed)</Text>}
          </Box>
        );
      })}
    </Box>
  );
}
