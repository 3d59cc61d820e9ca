/**
 * @fileoverview Handle over a spawned tool process.
 *
 * Wraps a ChildProcess with what the supervisor needs: a single merged
 * stdout+stderr stream, exit tracking, signalling, and a bounded wait for
 * exit. The spawn function is injectable so tests can hand in fake children.
 *
 * @module process-handle
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { PassThrough, type Readable } from 'node:stream';
import { LaunchError } from './errors.js';
import { getErrorMessage } from './types.js';

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface ExitInfo {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/** Opaque process handle owned by a ProcessRecord. */
export interface ProcessHandle {
  readonly pid: number;
  readonly hasExited: boolean;
  readonly exitInfo: ExitInfo | null;
  /** stdout and stderr merged in arrival order; ends once both close */
  readonly output: Readable;
  /** Send a signal. Returns false when the process could not be signalled. */
  signal(sig: NodeJS.Signals): boolean;
  /**
   * Resolve true once the process has exited, or false if `timeoutMs` elapses
   * first. Without a timeout, waits indefinitely.
   */
  waitForExit(timeoutMs?: number): Promise<boolean>;
  /** Stop delivering output and let the process write into the void */
  discardOutput(): void;
}

export interface ChildProcessHandleOptions {
  /** Signal the whole process group (child spawned as group leader) */
  processGroup?: boolean;
}

/**
 * Merge several readables into one PassThrough that ends after all of them.
 * Chunks keep their per-stream order; interleaving follows arrival.
 */
export function mergeStreams(streams: Array<Readable | null | undefined>): PassThrough {
  const merged = new PassThrough();
  const sources = streams.filter((s): s is Readable => s != null);
  let remaining = sources.length;

  if (remaining === 0) {
    merged.end();
    return merged;
  }

  const onDone = () => {
    remaining--;
    if (remaining === 0) merged.end();
  };

  for (const source of sources) {
    source.pipe(merged, { end: false });
    source.once('end', onDone);
    source.once('error', (err) => {
      merged.destroy(err);
    });
  }
  return merged;
}

export class ChildProcessHandle implements ProcessHandle {
  readonly pid: number;
  readonly output: Readable;
  private readonly child: ChildProcess;
  private readonly processGroup: boolean;
  private _exitInfo: ExitInfo | null = null;
  private readonly exited: Promise<void>;

  constructor(child: ChildProcess, options: ChildProcessHandleOptions = {}) {
    if (child.pid === undefined) {
      throw new LaunchError('Child process has no PID (spawn did not complete)');
    }
    this.pid = child.pid;
    this.child = child;
    this.processGroup = options.processGroup ?? false;
    this.output = mergeStreams([child.stdout, child.stderr]);
    // Post-spawn errors (failed kill, IPC) must not become uncaught exceptions
    child.on('error', (err) => {
      console.error(`[ProcessHandle] PID ${this.pid} error:`, err.message);
    });

    if (child.exitCode !== null || child.signalCode !== null) {
      this._exitInfo = { exitCode: child.exitCode, signal: child.signalCode };
      this.exited = Promise.resolve();
    } else {
      this.exited = new Promise<void>((resolve) => {
        child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
          this._exitInfo = { exitCode: code, signal };
          resolve();
        });
      });
    }
  }

  get hasExited(): boolean {
    return this._exitInfo !== null;
  }

  get exitInfo(): ExitInfo | null {
    return this._exitInfo;
  }

  signal(sig: NodeJS.Signals): boolean {
    if (this.hasExited) return false;
    if (this.processGroup) {
      try {
        process.kill(-this.pid, sig);
        return true;
      } catch {
        // Group may already be gone; fall back to the leader itself
      }
    }
    return this.child.kill(sig);
  }

  discardOutput(): void {
    for (const source of [this.child.stdout, this.child.stderr]) {
      if (!source || source.destroyed) continue;
      source.unpipe();
      source.resume();
    }
    if (!this.output.destroyed) this.output.resume();
  }

  waitForExit(timeoutMs?: number): Promise<boolean> {
    if (this.hasExited) return Promise.resolve(true);
    if (timeoutMs === undefined) return this.exited.then(() => true);

    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void this.exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }
}

/**
 * Spawn a process and wait until the OS confirms it started.
 * Rejects with LaunchError if spawning throws or emits 'error' first
 * (missing interpreter, bad cwd, permissions), so callers never register a
 * process that does not exist.
 */
export function spawnProcess(
  spawnFn: SpawnFn,
  command: string,
  args: string[],
  options: SpawnOptions,
  handleOptions: ChildProcessHandleOptions = {},
): Promise<ChildProcessHandle> {
  let child: ChildProcess;
  try {
    child = spawnFn(command, args, options);
  } catch (err) {
    return Promise.reject(new LaunchError(`Failed to spawn ${command}: ${getErrorMessage(err)}`, { cause: err }));
  }

  return new Promise<ChildProcessHandle>((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      try {
        resolve(new ChildProcessHandle(child, handleOptions));
      } catch (err) {
        reject(err);
      }
    };
    const onError = (err: Error) => {
      child.off('spawn', onSpawn);
      reject(new LaunchError(`Failed to spawn ${command}: ${err.message}`, { cause: err }));
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

export const defaultSpawn: SpawnFn = spawn;
