/**
 * @fileoverview Error taxonomy for the supervisor.
 *
 * Only {@link ConfigurationError} is thrown past the public API. The others are
 * caught at the operation boundary, logged, and turned into failure results.
 *
 * @module errors
 */

export type SupervisorErrorCode =
  | 'CONFIGURATION'
  | 'NOT_INSTALLED'
  | 'ALREADY_RUNNING'
  | 'LAUNCH_FAILED'
  | 'MONITOR_FAILED'
  | 'TERMINATION_FAILED';

export abstract class SupervisorError extends Error {
  abstract readonly code: SupervisorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** Unknown tool id, unreadable config file, or a config that fails validation. */
export class ConfigurationError extends SupervisorError {
  readonly code = 'CONFIGURATION';
}

export class NotInstalledError extends SupervisorError {
  readonly code = 'NOT_INSTALLED';
  readonly installDir: string;

  constructor(toolId: string, installDir: string) {
    super(`Tool "${toolId}" is not installed (missing ${installDir})`);
    this.installDir = installDir;
  }
}

export class AlreadyRunningError extends SupervisorError {
  readonly code = 'ALREADY_RUNNING';
  readonly pid: number;

  constructor(toolId: string, pid: number) {
    super(`Tool "${toolId}" is already running (PID ${pid}); stop it first`);
    this.pid = pid;
  }
}

export class LaunchError extends SupervisorError {
  readonly code = 'LAUNCH_FAILED';
}

export class MonitorError extends SupervisorError {
  readonly code = 'MONITOR_FAILED';
}

export class TerminationError extends SupervisorError {
  readonly code = 'TERMINATION_FAILED';
}
