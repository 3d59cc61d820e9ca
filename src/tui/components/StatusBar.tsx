/**
 * @fileoverview StatusBar component
 *
 * Bottom bar with the API connection state, the last action message and
 * keyboard hints.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface StatusBarProps {
  url: string;
  connected: boolean;
  message: string | null;
}

export function StatusBar({ url, connected, message }: StatusBarProps): React.ReactElement {
  return (
    <Box borderStyle="single" borderColor={connected ? 'cyan' : 'red'} paddingX={1} justifyContent="space-between">
      <Box>
        <Text color={connected ? 'green' : 'red'} bold>
          {'●'} {connected ? 'connected' : 'disconnected'}
        </Text>
        <Text dimColor> {url}</Text>
        {message && (
          <>
            <Text> | </Text>
            <Text color="yellow">{message}</Text>
          </>
        )}
      </Box>
      <Text dimColor>{'↑/↓'} select | l launch | s stop | ? help | q quit</Text>
    </Box>
  );
}
