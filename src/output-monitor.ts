/**
 * @fileoverview Per-launch output monitor.
 *
 * One monitor owns one process's merged output stream for the lifetime of
 * that launch. For every line it:
 *
 * 1. appends `[HH:MM:SS] line` to the launch's log file
 * 2. offers the entry to the bounded log buffer (dropped if full)
 * 3. runs the status classifier and applies any transition to the registry
 *
 * Reading the next line is the only place the monitor waits. It ends when the
 * stream closes (process exited or killed); there is no other way to cancel
 * it. A read failure is logged and ends this monitor only; the process keeps
 * running untracked and its output is discarded from then on.
 *
 * @module output-monitor
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createInterface } from 'node:readline';
import { MonitorError } from './errors.js';
import type { BoundedLogBuffer } from './log-buffer.js';
import type { ExitInfo, ProcessHandle } from './process-handle.js';
import type { ProcessRegistry } from './process-registry.js';
import { classifyLine, nextStatus, type ClassifiedStatus } from './status-classifier.js';
import { getErrorMessage, type LogEntry } from './types.js';
import { formatLogEntry } from './utils/log-format.js';

/** How long to wait for an exit code after the output stream ends (ms) */
const EXIT_SETTLE_MS = 2000;

export interface OutputMonitorHooks {
  onEntry?(entry: LogEntry): void;
  onExit?(info: ExitInfo | null): void;
  onFailure?(error: MonitorError): void;
}

export interface OutputMonitorOptions {
  toolId: string;
  launchId: string;
  handle: ProcessHandle;
  registry: ProcessRegistry;
  buffer: BoundedLogBuffer;
  logFilePath: string;
  now?: () => number;
  classify?: (line: string) => ClassifiedStatus | null;
  hooks?: OutputMonitorHooks;
}

async function openLogFile(path: string): Promise<WriteStream> {
  await mkdir(dirname(path), { recursive: true });
  return new Promise<WriteStream>((resolve, reject) => {
    const stream = createWriteStream(path, { flags: 'a', encoding: 'utf-8' });
    stream.once('open', () => {
      stream.off('error', reject);
      resolve(stream);
    });
    stream.once('error', reject);
  });
}

function closeLogFile(stream: WriteStream | null): Promise<void> {
  if (!stream || stream.destroyed) return Promise.resolve();
  return new Promise<void>((resolve) => {
    stream.end(() => resolve());
  });
}

export class OutputMonitor {
  readonly toolId: string;
  readonly launchId: string;
  private readonly handle: ProcessHandle;
  private readonly registry: ProcessRegistry;
  private readonly buffer: BoundedLogBuffer;
  private readonly logFilePath: string;
  private readonly now: () => number;
  private readonly classify: (line: string) => ClassifiedStatus | null;
  private readonly hooks: OutputMonitorHooks;
  private logFile: WriteStream | null = null;
  private _linesRead = 0;
  private _done: Promise<void> | null = null;

  constructor(options: OutputMonitorOptions) {
    this.toolId = options.toolId;
    this.launchId = options.launchId;
    this.handle = options.handle;
    this.registry = options.registry;
    this.buffer = options.buffer;
    this.logFilePath = options.logFilePath;
    this.now = options.now ?? Date.now;
    this.classify = options.classify ?? classifyLine;
    this.hooks = options.hooks ?? {};
  }

  get linesRead(): number {
    return this._linesRead;
  }

  /** Settles when the monitor has finished; never rejects. */
  get done(): Promise<void> {
    return this._done ?? Promise.resolve();
  }

  /** Start the monitor loop. Calling again returns the same run. */
  start(): Promise<void> {
    if (!this._done) {
      this._done = this.run();
    }
    return this._done;
  }

  private async run(): Promise<void> {
    try {
      this.logFile = await openLogFile(this.logFilePath);
      this.logFile.on('error', (err) => {
        console.error(`[OutputMonitor] ${this.toolId}: log file write failed:`, err.message);
      });
    } catch (err) {
      console.error(`[OutputMonitor] ${this.toolId}: cannot open log file ${this.logFilePath}:`, getErrorMessage(err));
      this.logFile = null;
    }

    const lines = createInterface({ input: this.handle.output, crlfDelay: Infinity });
    let streamEnded = false;
    try {
      for await (const line of lines) {
        this.handleLine(line);
      }
      streamEnded = true;
    } catch (err) {
      const error = new MonitorError(
        `Reading output of ${this.toolId} (PID ${this.handle.pid}) failed: ${getErrorMessage(err)}`,
        { cause: err },
      );
      console.error(`[OutputMonitor] ${error.message}`);
      this.hooks.onFailure?.(error);
    } finally {
      lines.close();
      // Nobody reads the pipes after a failure; keep them from filling up
      if (!streamEnded) this.handle.discardOutput();
      await closeLogFile(this.logFile);
      this.logFile = null;
    }

    if (!streamEnded) return;

    this.registry.updateStatus(this.toolId, 'stopped', this.launchId);
    await this.handle.waitForExit(EXIT_SETTLE_MS);
    const info = this.handle.exitInfo;
    console.log(
      `[OutputMonitor] ${this.toolId} output closed after ${this._linesRead} lines` +
      (info ? ` (exit code ${info.exitCode ?? 'none'}${info.signal ? `, signal ${info.signal}` : ''})` : ''),
    );
    this.hooks.onExit?.(info);
  }

  private handleLine(text: string): void {
    const entry: LogEntry = { timestamp: this.now(), text };
    this._linesRead++;

    this.logFile?.write(formatLogEntry(entry) + '\n');
    this.buffer.tryPush(entry);

    const classified = this.classify(text);
    if (classified !== null) {
      this.registry.applyStatus(this.toolId, (current) => nextStatus(current, classified), this.launchId);
    }

    this.hooks.onEntry?.(entry);
  }
}
