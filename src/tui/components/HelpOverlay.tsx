/**
 * @fileoverview HelpOverlay component
 *
 * Keyboard shortcut reference. Dismissed with Escape, q or ?.
 */

import React from 'react';
import { Box, Text } from 'ink';

const SHORTCUTS: Array<{ key: string; description: string }> = [
  { key: '↑/↓ or k/j', description: 'Select tool' },
  { key: 'l', description: 'Launch selected tool' },
  { key: 's', description: 'Stop selected tool (SIGTERM, SIGKILL after 10s)' },
  { key: '?', description: 'Toggle this help' },
  { key: 'q / Ctrl+C', description: 'Quit the dashboard (tools keep running)' },
];

export function HelpOverlay(): React.ReactElement {
  return (
    <Box flexDirection="column" padding={2}>
      <Box borderStyle="double" borderColor="cyan" paddingX={2} marginBottom={1} justifyContent="center">
        <Text bold color="cyan">Keyboard Shortcuts</Text>
      </Box>
      {SHORTCUTS.map((shortcut) => (
        <Box key={shortcut.key} marginLeft={2}>
          <Text color="green">{shortcut.key.padEnd(20)}</Text>
          <Text>{shortcut.description}</Text>
        </Box>
      ))}
      <Box marginTop={1} borderStyle="single" borderColor="gray" paddingX={1}>
        <Text dimColor>Press Escape, q, or ? to close</Text>
      </Box>
    </Box>
  );
}
