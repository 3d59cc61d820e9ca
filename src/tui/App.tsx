/**
 * @fileoverview Main TUI App component
 *
 * Tool table on top, the selected tool's log pane below, status bar at the
 * bottom. Keyboard shortcuts are handled globally via Ink's useInput hook.
 */

import React, { useState, useEffect } from 'react';
import { Box, useApp, useInput, useStdout } from 'ink';
import type { SupervisorClient } from '../api-client.js';
import { ToolTable, LogPane, StatusBar, HelpOverlay } from './components/index.js';
import { useSupervisor } from './hooks/useSupervisor.js';

interface AppProps {
  client: SupervisorClient;
}

export function App({ client }: AppProps): React.ReactElement {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [showHelp, setShowHelp] = useState(false);
  const [rows, setRows] = useState(stdout.rows || 24);

  const {
    tools,
    selectedIndex,
    selectedTool,
    logLines,
    message,
    connected,
    selectNext,
    selectPrev,
    launchSelected,
    stopSelected,
  } = useSupervisor(client);

  useEffect(() => {
    const updateRows = () => setRows(stdout.rows || 24);
    stdout.on('resize', updateRows);
    return () => {
      stdout.off('resize', updateRows);
    };
  }, [stdout]);

  useInput((input, key) => {
    if (showHelp) {
      if (key.escape || input === 'q' || input === '?') setShowHelp(false);
      return;
    }
    if (input === '?') {
      setShowHelp(true);
    } else if (input === 'q' || (key.ctrl && input === 'c')) {
      exit();
    } else if (key.upArrow || input === 'k') {
      selectPrev();
    } else if (key.downArrow || input === 'j') {
      selectNext();
    } else if (input === 'l') {
      launchSelected();
    } else if (input === 's') {
      stopSelected();
    }
  });

  if (showHelp) {
    return <HelpOverlay />;
  }

  // Table: header + rows + border; status bar: 3
  const tableHeight = Math.max(1, tools.length) + 3;
  const logHeight = Math.max(6, rows - tableHeight - 3);

  return (
    <Box flexDirection="column">
      <ToolTable tools={tools} selectedIndex={selectedIndex} />
      <LogPane lines={logLines} height={logHeight} tool={selectedTool} />
      <StatusBar url={client.baseUrl} connected={connected} message={message} />
    </Box>
  );
}
