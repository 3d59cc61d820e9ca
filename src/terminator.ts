/**
 * @fileoverview Graceful-then-forced process termination.
 *
 * SIGTERM, wait up to the grace period, then SIGKILL and wait for exit.
 * The caller decides what to do with the record; this module only deals with
 * the process.
 *
 * @module terminator
 */

import { STOP_GRACE_PERIOD_MS } from './config/supervisor-timing.js';
import { TerminationError } from './errors.js';
import type { ProcessHandle } from './process-handle.js';

export type TerminationOutcome = 'already_exited' | 'graceful' | 'forced';

export interface TerminateOptions {
  gracePeriodMs?: number;
  /** Signal sent first. SIGTERM everywhere; Node maps it on Windows. */
  gracefulSignal?: NodeJS.Signals;
  /** Label used in log lines */
  label?: string;
}

/**
 * Stop a process.
 *
 * @returns how the process ended
 * @throws TerminationError when the process is alive but cannot be signalled
 */
export async function terminateProcess(
  handle: ProcessHandle,
  options: TerminateOptions = {},
): Promise<TerminationOutcome> {
  const gracePeriodMs = options.gracePeriodMs ?? STOP_GRACE_PERIOD_MS;
  const gracefulSignal = options.gracefulSignal ?? 'SIGTERM';
  const label = options.label ?? `PID ${handle.pid}`;

  if (handle.hasExited) {
    return 'already_exited';
  }

  console.log(`[Terminator] Sending ${gracefulSignal} to ${label}`);
  if (!handle.signal(gracefulSignal)) {
    // Could have exited between the check and the signal
    if (handle.hasExited) return 'already_exited';
    throw new TerminationError(`Failed to send ${gracefulSignal} to ${label}`);
  }

  if (await handle.waitForExit(gracePeriodMs)) {
    console.log(`[Terminator] ${label} exited after ${gracefulSignal}`);
    return 'graceful';
  }

  console.warn(`[Terminator] ${label} still running ${gracePeriodMs}ms after ${gracefulSignal}, sending SIGKILL`);
  if (!handle.signal('SIGKILL') && !handle.hasExited) {
    throw new TerminationError(`Failed to send SIGKILL to ${label}`);
  }
  await handle.waitForExit();
  console.log(`[Terminator] ${label} killed`);
  return 'forced';
}
