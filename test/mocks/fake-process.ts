/**
 * In-process stand-ins for child processes.
 *
 * - {@link createFakeChild}: a ChildProcess-shaped EventEmitter with
 *   PassThrough stdout/stderr, for code that spawns
 * - {@link createFakeSpawn}: a SpawnFn that hands out fake children and
 *   records its calls
 * - {@link FakeProcessHandle}: a ProcessHandle for code that only needs a handle
 */

import type { ChildProcess, SpawnOptions } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { ExitInfo, ProcessHandle, SpawnFn } from '../../src/process-handle.js';

export type FakeChild = ChildProcess & {
  stdout: PassThrough;
  stderr: PassThrough;
  /** Signals received through kill() */
  signals: NodeJS.Signals[];
  /** Exit the fake process and close its output */
  finish: (code: number | null, signal?: NodeJS.Signals | null) => void;
};

export interface FakeChildOptions {
  pid?: number;
  /** Signals that make the fake exit; others are recorded and ignored */
  exitOn?: NodeJS.Signals[];
}

export function createFakeChild(options: FakeChildOptions = {}): FakeChild {
  const exitOn = new Set(options.exitOn ?? ['SIGTERM', 'SIGKILL']);
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  const signals: NodeJS.Signals[] = [];
  let exitCode: number | null = null;
  let signalCode: NodeJS.Signals | null = null;
  let exited = false;

  const emitter = new EventEmitter();
  const child = Object.assign(emitter, {
    pid: options.pid ?? 4242,
    stdout,
    stderr,
    signals,
    kill: (sig?: NodeJS.Signals | number) => {
      if (exited) return false;
      const name = typeof sig === 'string' ? sig : 'SIGTERM';
      signals.push(name);
      if (exitOn.has(name)) {
        queueMicrotask(() => child.finish(null, name));
      }
      return true;
    },
    finish: (code: number | null, signal: NodeJS.Signals | null = null) => {
      if (exited) return;
      exited = true;
      exitCode = code;
      signalCode = signal;
      child.emit('exit', code, signal);
      stdout.end();
      stderr.end();
      child.emit('close', code, signal);
    },
  }) as unknown as FakeChild;

  Object.defineProperty(child, 'exitCode', { get: () => exitCode });
  Object.defineProperty(child, 'signalCode', { get: () => signalCode });

  return child;
}

export interface SpawnCall {
  command: string;
  args: string[];
  options: SpawnOptions;
}

/**
 * SpawnFn handing out `children` in order. Each fake emits 'spawn' on the
 * next microtask, like a real process that started.
 */
export function createFakeSpawn(children: FakeChild[]): { spawnFn: SpawnFn; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawnFn: SpawnFn = (command, args, options) => {
    calls.push({ command, args, options });
    const child = children.shift();
    if (!child) throw new Error('No fake child left to spawn');
    queueMicrotask(() => child.emit('spawn'));
    return child;
  };
  return { spawnFn, calls };
}

/** SpawnFn whose child fails to start with `code` (ENOENT for a missing interpreter) */
export function createFailingSpawn(code = 'ENOENT'): SpawnFn {
  return (command) => {
    const child = new EventEmitter() as unknown as ChildProcess;
    queueMicrotask(() => {
      child.emit('error', Object.assign(new Error(`spawn ${command} ${code}`), { code }));
    });
    return child;
  };
}

export class FakeProcessHandle implements ProcessHandle {
  readonly pid: number;
  readonly output = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];
  /** When set, signal() reports failure without recording anything */
  signalFails = false;
  /** Set once discardOutput() has been called */
  outputDiscarded = false;
  private readonly exitOn: Set<NodeJS.Signals>;
  private _exitInfo: ExitInfo | null = null;
  private waiters: Array<() => void> = [];

  constructor(pid = 1234, exitOn: NodeJS.Signals[] = ['SIGTERM', 'SIGKILL']) {
    this.pid = pid;
    this.exitOn = new Set(exitOn);
  }

  get hasExited(): boolean {
    return this._exitInfo !== null;
  }

  get exitInfo(): ExitInfo | null {
    return this._exitInfo;
  }

  exit(exitCode: number | null, signal: NodeJS.Signals | null = null): void {
    if (this._exitInfo) return;
    this._exitInfo = { exitCode, signal };
    for (const wake of this.waiters.splice(0)) wake();
  }

  signal(sig: NodeJS.Signals): boolean {
    if (this.hasExited || this.signalFails) return false;
    this.signals.push(sig);
    if (this.exitOn.has(sig)) this.exit(null, sig);
    return true;
  }

  discardOutput(): void {
    this.outputDiscarded = true;
    this.output.resume();
  }

  waitForExit(timeoutMs?: number): Promise<boolean> {
    if (this.hasExited) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const wake = () => {
        if (timer) clearTimeout(timer);
        resolve(true);
      };
      this.waiters.push(wake);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== wake);
          resolve(false);
        }, timeoutMs);
      }
    });
  }
}
