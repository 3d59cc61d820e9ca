/**
 * @fileoverview Log line and file name formatting.
 *
 * @module utils/log-format
 */

import type { LogEntry } from '../types.js';

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local wall-clock time as HH:MM:SS */
export function formatClock(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/** `[HH:MM:SS] text`, the format used in log files and log reads */
export function formatLogEntry(entry: LogEntry): string {
  return `[${formatClock(new Date(entry.timestamp))}] ${entry.text}`;
}

/** Compact local timestamp for file names, e.g. 20240131-142507 */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `-${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

/** `<toolId>-<timestamp>.log`, one file per launch */
export function logFileName(toolId: string, launchedAt: Date): string {
  return `${toolId}-${formatFileTimestamp(launchedAt)}.log`;
}

/**
 * Formats a duration from milliseconds to a human-readable string.
 *
 * @returns Formatted string like "45s", "5m 30s", or "2h 15m"
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}
