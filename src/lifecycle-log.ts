/**
 * @fileoverview Append-only JSONL audit log for tool lifecycle events.
 *
 * Records every launch, failed launch, exit, stop request, forced kill,
 * monitor failure, and server start/stop to
 * `<logs_dir>/supervisor-lifecycle.jsonl`. Survives restarts, unlike the
 * in-memory registry.
 *
 * @module lifecycle-log
 */

import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { MAX_LIFECYCLE_LOG_LINES, TRIM_LIFECYCLE_LOG_TO } from './config/buffer-limits.js';
import type { LifecycleEventType, LifecycleEntry } from './types.js';

export const LIFECYCLE_LOG_FILE = 'supervisor-lifecycle.jsonl';

export interface LifecycleQuery {
  toolId?: string;
  event?: LifecycleEventType;
  since?: number;
  limit?: number;
}

export class LifecycleLog {
  readonly filePath: string;
  private writeQueue: Promise<void> = Promise.resolve();
  private dirReady: Promise<void> | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  static inDir(logsDir: string): LifecycleLog {
    return new LifecycleLog(join(logsDir, LIFECYCLE_LOG_FILE));
  }

  private ensureDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = mkdir(dirname(this.filePath), { recursive: true }).then(() => undefined);
    }
    return this.dirReady;
  }

  /**
   * Append a lifecycle event. Fire-and-forget: errors are logged, never thrown.
   */
  log(entry: Omit<LifecycleEntry, 'ts'> & { ts?: number }): void {
    const line = JSON.stringify({ ts: Date.now(), ...entry }) + '\n';
    // Chain writes to prevent interleaving
    this.writeQueue = this.writeQueue
      .then(() => this.ensureDir())
      .then(() => appendFile(this.filePath, line, 'utf-8'))
      .catch((err: unknown) => {
        this.dirReady = null;
        console.error('[LifecycleLog] Failed to write:', err);
      });
  }

  /** Resolves once every queued write has been attempted. */
  flush(): Promise<void> {
    return this.writeQueue;
  }

  /**
   * Query the log file with optional filters, newest first.
   */
  async query(opts?: LifecycleQuery): Promise<LifecycleEntry[]> {
    const limit = opts?.limit ?? 200;

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw err;
    }

    const lines = raw.trim().split('\n').filter(Boolean);
    const entries: LifecycleEntry[] = [];

    for (let i = lines.length - 1; i >= 0 && entries.length < limit; i--) {
      let entry: LifecycleEntry;
      try {
        entry = JSON.parse(lines[i]) as LifecycleEntry;
      } catch {
        continue; // Skip malformed lines
      }

      if (opts?.toolId && entry.toolId !== opts.toolId) continue;
      if (opts?.event && entry.event !== opts.event) continue;
      if (opts?.since && entry.ts < opts.since) continue;

      entries.push(entry);
    }

    return entries;
  }

  /**
   * Trim the log file if it exceeds the line limit. Called on server start.
   */
  async trimIfNeeded(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return;
      throw err;
    }

    const lines = raw.trim().split('\n').filter(Boolean);
    if (lines.length <= MAX_LIFECYCLE_LOG_LINES) return;

    const trimmed = lines.slice(-TRIM_LIFECYCLE_LOG_TO);
    await writeFile(this.filePath, trimmed.join('\n') + '\n', 'utf-8');
    console.log(`[LifecycleLog] Trimmed from ${lines.length} to ${trimmed.length} entries`);
  }
}
