/**
 * @fileoverview TUI entry point
 *
 * Full-screen terminal dashboard for a running supervisor, built with Ink.
 * It is a client of the HTTP API: quitting the dashboard leaves tools running.
 *
 * @example
 * ```bash
 * webui-supervisor dashboard --url http://127.0.0.1:7860
 * ```
 */

import React from 'react';
import { render } from 'ink';
import type { SupervisorClient } from '../api-client.js';
import { App } from './App.js';

/** Raw mode is needed for key input; it is missing when stdin is piped. */
function isRawModeSupported(): boolean {
  return Boolean(process.stdin.isTTY && typeof process.stdin.setRawMode === 'function');
}

/**
 * Starts the dashboard in the current terminal.
 * Resolves when the user quits.
 */
export async function startTUI(client: SupervisorClient): Promise<void> {
  if (!isRawModeSupported()) {
    console.error('Error: the dashboard requires an interactive terminal with TTY support.');
    process.exitCode = 1;
    return;
  }

  process.stdout.write('\x1b[2J\x1b[H');

  const { waitUntilExit } = render(<App client={client} />);
  await waitUntilExit();
}
