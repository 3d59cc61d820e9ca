/**
 * @fileoverview Process supervisor for tool back-ends.
 *
 * Public surface used by the CLI and the dashboard API:
 *
 * - `launch(toolId, { customArgs, hardwareProfile })`: build the command,
 *   spawn with stdout+stderr merged, register a `starting` record, start its
 *   output monitor
 * - `stop(toolId)`: SIGTERM, wait up to 10s, SIGKILL; idempotent
 * - `status(toolId)`: current status, reconciled against the live process
 * - `logs(toolId, maxLines)`: drain buffered `[HH:MM:SS] line` entries
 *
 * A tool whose current process is still alive cannot be launched again; the
 * caller has to stop it first. Once it has exited, a new launch replaces the
 * record.
 *
 * Events emitted:
 * - `statusChanged` (event: StatusChangeEvent)
 * - `log` (data: { toolId: string; entry: LogEntry })
 * - `exited` (data: { toolId: string; exitCode: number | null; signal: string | null })
 *
 * @module supervisor
 */

import { EventEmitter } from 'node:events';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { buildLaunchCommand, buildToolEnv } from './command-builder.js';
import { MAX_LOG_BUFFER_ENTRIES } from './config/buffer-limits.js';
import { STARTUP_FALLBACK_MS, STOP_GRACE_PERIOD_MS } from './config/supervisor-timing.js';
import { AlreadyRunningError, LaunchError, NotInstalledError, TerminationError } from './errors.js';
import type { LifecycleLog } from './lifecycle-log.js';
import { BoundedLogBuffer } from './log-buffer.js';
import { OutputMonitor } from './output-monitor.js';
import { defaultSpawn, spawnProcess, type ChildProcessHandle, type SpawnFn } from './process-handle.js';
import { ProcessRegistry, type StatusChangeEvent } from './process-registry.js';
import { terminateProcess } from './terminator.js';
import { isToolInstalled, resolveTool, type ResolvedTool, type SupervisorConfig } from './tool-config.js';
import {
  getErrorMessage,
  type LaunchOptions,
  type LaunchResult,
  type LogEntry,
  type ProcessRecordSnapshot,
  type ToolStatus,
  type ToolSummary,
} from './types.js';
import { formatLogEntry, logFileName } from './utils/log-format.js';

export interface ProcessSupervisorOptions {
  config: SupervisorConfig;
  spawnFn?: SpawnFn;
  registry?: ProcessRegistry;
  lifecycleLog?: LifecycleLog | null;
  now?: () => number;
  isInstalled?: (tool: ResolvedTool) => boolean;
  gracePeriodMs?: number;
  startupFallbackMs?: number;
  bufferCapacity?: number;
  /** Spawn tools as process-group leaders and signal the whole group */
  processGroup?: boolean;
  env?: NodeJS.ProcessEnv;
}

interface LaunchState {
  launchId: string;
  buffer: BoundedLogBuffer;
  monitor: OutputMonitor;
}

export class ProcessSupervisor extends EventEmitter {
  readonly config: SupervisorConfig;
  readonly registry: ProcessRegistry;
  private readonly spawnFn: SpawnFn;
  private readonly lifecycleLog: LifecycleLog | null;
  private readonly now: () => number;
  private readonly isInstalled: (tool: ResolvedTool) => boolean;
  private readonly gracePeriodMs: number;
  private readonly startupFallbackMs: number;
  private readonly bufferCapacity: number;
  private readonly processGroup: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private launches: Map<string, LaunchState> = new Map();
  /** Launches between the running check and registration, keyed by tool */
  private launching: Map<string, Promise<LaunchResult>> = new Map();
  /** In-flight stops, so concurrent stop() calls share one escalation */
  private stopping: Map<string, Promise<boolean>> = new Map();

  constructor(options: ProcessSupervisorOptions) {
    super();
    this.setMaxListeners(50);
    this.config = options.config;
    this.registry = options.registry ?? new ProcessRegistry();
    this.spawnFn = options.spawnFn ?? defaultSpawn;
    this.lifecycleLog = options.lifecycleLog ?? null;
    this.now = options.now ?? Date.now;
    this.isInstalled = options.isInstalled ?? isToolInstalled;
    this.gracePeriodMs = options.gracePeriodMs ?? STOP_GRACE_PERIOD_MS;
    this.startupFallbackMs = options.startupFallbackMs ?? STARTUP_FALLBACK_MS;
    this.bufferCapacity = options.bufferCapacity ?? MAX_LOG_BUFFER_ENTRIES;
    this.processGroup = options.processGroup ?? process.platform !== 'win32';
    this.env = options.env ?? process.env;

    this.registry.on('statusChanged', (event: StatusChangeEvent) => {
      this.emit('statusChanged', event);
    });
  }

  // ========== Launcher ==========

  /**
   * Launch a tool.
   *
   * @throws ConfigurationError for an unknown tool id. Every other problem is
   *   logged and returned as a failure result.
   */
  async launch(toolId: string, options: LaunchOptions = {}): Promise<LaunchResult> {
    const tool = resolveTool(this.config, toolId);

    if (!this.isInstalled(tool)) {
      return this.launchFailed(toolId, new NotInstalledError(toolId, tool.installDir));
    }

    const existing = this.registry.get(toolId);
    if (existing && !existing.handle.hasExited) {
      return this.launchFailed(toolId, new AlreadyRunningError(toolId, existing.handle.pid));
    }
    if (this.launching.has(toolId)) {
      return this.launchFailed(toolId, new LaunchError(`Tool "${toolId}" is already being launched`));
    }

    const pending = this.spawnAndRegister(tool, options).finally(() => {
      this.launching.delete(toolId);
    });
    this.launching.set(toolId, pending);
    return pending;
  }

  private async spawnAndRegister(tool: ResolvedTool, options: LaunchOptions): Promise<LaunchResult> {
    const toolId = tool.id;
    const cmd = buildLaunchCommand(tool, this.config.workspace.modelsDir, options.customArgs, options.hardwareProfile);
    if (options.hardwareProfile && !cmd.profileApplied) {
      console.warn(`[Supervisor] ${toolId}: no hardware profile "${options.hardwareProfile}", launching without profile args`);
    }

    const startTime = this.now();
    const logFilePath = join(this.config.workspace.logsDir, logFileName(toolId, new Date(startTime)));

    let handle: ChildProcessHandle;
    try {
      handle = await spawnProcess(
        this.spawnFn,
        cmd.command,
        cmd.args,
        {
          cwd: cmd.cwd,
          env: buildToolEnv(tool, this.env),
          stdio: ['ignore', 'pipe', 'pipe'],
          detached: this.processGroup,
          windowsHide: true,
        },
        { processGroup: this.processGroup },
      );
    } catch (err) {
      const error = err instanceof LaunchError
        ? err
        : new LaunchError(`Failed to launch ${toolId}: ${getErrorMessage(err)}`, { cause: err });
      return this.launchFailed(toolId, error);
    }

    const launchId = uuidv4();
    const command = [cmd.command, ...cmd.args];
    this.registry.register({
      toolId,
      launchId,
      handle,
      startTime,
      status: 'starting',
      logFilePath,
      command,
      config: tool,
    });

    const buffer = new BoundedLogBuffer(this.bufferCapacity);
    const monitor = new OutputMonitor({
      toolId,
      launchId,
      handle,
      registry: this.registry,
      buffer,
      logFilePath,
      now: this.now,
      hooks: {
        onEntry: (entry: LogEntry) => {
          this.emit('log', { toolId, entry });
        },
        onExit: (info) => {
          this.lifecycleLog?.log({
            event: 'exit',
            toolId,
            pid: handle.pid,
            exitCode: info?.exitCode ?? null,
            signal: info?.signal ?? null,
          });
          this.emit('exited', { toolId, exitCode: info?.exitCode ?? null, signal: info?.signal ?? null });
        },
        onFailure: (error) => {
          this.lifecycleLog?.log({ event: 'monitor_failed', toolId, pid: handle.pid, reason: error.message });
        },
      },
    });
    this.launches.set(toolId, { launchId, buffer, monitor });
    monitor.start().catch((err: unknown) => {
      console.error(`[Supervisor] ${toolId}: output monitor crashed:`, getErrorMessage(err));
    });

    console.log(`[Supervisor] Launched ${tool.name} (${toolId}) PID ${handle.pid}: ${command.join(' ')}`);
    this.lifecycleLog?.log({
      event: 'launched',
      toolId,
      pid: handle.pid,
      extra: { command, logFile: logFilePath, profile: cmd.profileApplied ? options.hardwareProfile : undefined },
    });

    return { success: true, toolId, pid: handle.pid, logFile: logFilePath, command };
  }

  private launchFailed(toolId: string, error: NotInstalledError | AlreadyRunningError | LaunchError): LaunchResult {
    console.error(`[Supervisor] Launch of ${toolId} failed: ${error.message}`);
    this.lifecycleLog?.log({ event: 'launch_failed', toolId, reason: error.message });
    return { success: false, toolId, code: error.code, error: error.message };
  }

  // ========== Terminator ==========

  /**
   * Stop a tool's current process. A launch still spawning is waited for and
   * then stopped. Unknown or already-exited tools count as stopped. Returns false only when the process could not be signalled.
   */
  stop(toolId: string): Promise<boolean> {
    const inFlight = this.stopping.get(toolId);
    if (inFlight) return inFlight;

    const pending = this.doStop(toolId).finally(() => {
      this.stopping.delete(toolId);
    });
    this.stopping.set(toolId, pending);
    return pending;
  }

  private async doStop(toolId: string): Promise<boolean> {
    const pendingLaunch = this.launching.get(toolId);
    if (pendingLaunch) {
      console.log(`[Supervisor] ${toolId}: launch in progress, stopping once it has spawned`);
      // A failed launch is reported to its own caller
      await Promise.allSettled([pendingLaunch]);
    }

    const record = this.registry.get(toolId);
    if (!record) return true;

    const { handle, launchId } = record;
    if (handle.hasExited) {
      this.registry.updateStatus(toolId, 'stopped', launchId);
      return true;
    }

    this.lifecycleLog?.log({ event: 'stop_requested', toolId, pid: handle.pid });
    try {
      const outcome = await terminateProcess(handle, {
        gracePeriodMs: this.gracePeriodMs,
        label: `${toolId} (PID ${handle.pid})`,
      });
      this.registry.updateStatus(toolId, 'stopped', launchId);
      this.lifecycleLog?.log({
        event: outcome === 'forced' ? 'force_killed' : 'stopped',
        toolId,
        pid: handle.pid,
        exitCode: handle.exitInfo?.exitCode ?? null,
        signal: handle.exitInfo?.signal ?? null,
      });
      return true;
    } catch (err) {
      const message = err instanceof TerminationError ? err.message : `Failed to stop ${toolId}: ${getErrorMessage(err)}`;
      console.error(`[Supervisor] ${message}`);
      this.lifecycleLog?.log({ event: 'stop_requested', toolId, pid: handle.pid, reason: `failed: ${message}` });
      return false;
    }
  }

  /** Stop every live process concurrently. True when all stops succeeded. */
  async stopAll(): Promise<boolean> {
    const live = this.registry.list().filter(([, record]) => !record.handle.hasExited);
    if (live.length === 0) return true;
    console.log(`[Supervisor] Stopping ${live.length} tool(s)`);
    const results = await Promise.all(live.map(([toolId]) => this.stop(toolId)));
    return results.every(Boolean);
  }

  // ========== Readers ==========

  /**
   * Current status of a tool.
   *
   * Reconciles with the process: an exited process is always `stopped`, and a
   * live process still `starting` after the startup fallback is promoted to
   * `running` for tools that never print a recognized ready line.
   */
  status(toolId: string): ToolStatus {
    const record = this.registry.get(toolId);
    if (!record) return 'not_started';

    if (record.handle.hasExited) {
      this.registry.updateStatus(toolId, 'stopped', record.launchId);
      return 'stopped';
    }

    if (record.status === 'starting' && this.now() - record.startTime > this.startupFallbackMs) {
      return this.registry.applyStatus(
        toolId,
        (current) => (current === 'starting' ? 'running' : current),
        record.launchId,
      ) ?? record.status;
    }

    return record.status;
  }

  /**
   * Drain up to `maxLines` buffered lines, oldest first, formatted
   * `[HH:MM:SS] text`. Drained lines are gone from the buffer.
   */
  logs(toolId: string, maxLines: number): string[] {
    const launch = this.launches.get(toolId);
    if (!launch) return [];
    return launch.buffer.drain(maxLines).map(formatLogEntry);
  }

  getRecord(toolId: string): ProcessRecordSnapshot | undefined {
    return this.registry.get(toolId);
  }

  /** The output monitor of a tool's current launch */
  getMonitor(toolId: string): OutputMonitor | undefined {
    return this.launches.get(toolId)?.monitor;
  }

  /** Entries dropped from the current launch's buffer because it was full */
  droppedLogLines(toolId: string): number {
    return this.launches.get(toolId)?.buffer.dropped ?? 0;
  }

  /** Every configured tool, with its current record when it has one. */
  list(): ToolSummary[] {
    const now = this.now();
    return [...this.config.tools.values()].map((tool) => {
      const status = this.status(tool.id);
      const record = this.registry.get(tool.id);
      const live = record && !record.handle.hasExited ? record : undefined;
      return {
        toolId: tool.id,
        name: tool.name,
        installed: this.isInstalled(tool),
        status,
        pid: live ? live.handle.pid : null,
        startTime: record?.startTime ?? null,
        uptimeMs: live ? now - live.startTime : null,
        logFile: record?.logFilePath ?? null,
      };
    });
  }
}
