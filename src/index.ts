#!/usr/bin/env node
/**
 * @fileoverview Executable entry for webui-supervisor.
 *
 * While `serve` runs, the process is the parent of every launched tool.
 * Dying on a stray exception would leave those tools running with nobody
 * to stop them, so in that mode stray errors are logged and survived unless
 * they keep coming. One-shot commands exit 1 instead.
 *
 * @module index
 */

import { program } from './cli.js';
import { ERROR_RESET_MS, MAX_CONSECUTIVE_ERRORS } from './config/supervisor-timing.js';

function installCrashGuards(survive: boolean): void {
  let strikes = 0;
  let quietTimer: ReturnType<typeof setTimeout> | null = null;

  const onStrayError = (kind: string, detail: unknown): void => {
    console.error(`[Entry] ${kind}:`, detail);
    if (!survive) {
      process.exit(1);
    }

    strikes++;
    console.error(`[RECOVERED] Supervisor server still up after ${kind} (${strikes}/${MAX_CONSECUTIVE_ERRORS})`);
    if (strikes >= MAX_CONSECUTIVE_ERRORS) {
      console.error(`[FATAL] Giving up after ${strikes} stray errors in a row`);
      process.exit(1);
    }

    // A quiet minute clears the count
    if (quietTimer) clearTimeout(quietTimer);
    quietTimer = setTimeout(() => {
      strikes = 0;
    }, ERROR_RESET_MS);
    quietTimer.unref();
  };

  process.on('uncaughtException', (err) => onStrayError('uncaught exception', err.stack ?? err.message));
  process.on('unhandledRejection', (reason) => onStrayError('unhandled rejection', reason));
}

installCrashGuards(process.argv.includes('serve'));

await program.parseAsync();
