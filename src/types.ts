/**
 * @fileoverview Shared types for the process supervisor.
 *
 * @module types
 */

import type { ProcessHandle } from './process-handle.js';
import type { ResolvedTool } from './tool-config.js';

export type { LifecycleEventType, LifecycleEntry } from './types/lifecycle.js';

/**
 * Lifecycle status of one tool's current process record.
 * `stopped` is terminal for a record; a later launch creates a new record.
 */
export type ToolStatus = 'not_started' | 'starting' | 'running' | 'error' | 'stopped';

/** One line captured from a tool's merged output stream. */
export interface LogEntry {
  readonly timestamp: number;
  readonly text: string;
}

/**
 * Registry-owned state for a single launch of a tool.
 * Readers receive frozen snapshots; only the registry mutates the live record.
 */
export interface ProcessRecord {
  toolId: string;
  /** Unique per launch, used so stale monitors cannot touch a newer record */
  launchId: string;
  handle: ProcessHandle;
  startTime: number;
  status: ToolStatus;
  logFilePath: string;
  /** Interpreter followed by its arguments, exactly as spawned */
  command: readonly string[];
  config: ResolvedTool;
}

export type ProcessRecordSnapshot = Readonly<ProcessRecord>;

export type LaunchFailureCode =
  | 'NOT_INSTALLED'
  | 'ALREADY_RUNNING'
  | 'LAUNCH_FAILED';

export type LaunchResult =
  | { success: true; toolId: string; pid: number; logFile: string; command: readonly string[] }
  | { success: false; toolId: string; code: LaunchFailureCode; error: string };

export interface LaunchOptions {
  customArgs?: readonly string[];
  hardwareProfile?: string;
}

/** Row shown by `list()`, the dashboard and `GET /api/tools` */
export interface ToolSummary {
  toolId: string;
  name: string;
  installed: boolean;
  status: ToolStatus;
  pid: number | null;
  startTime: number | null;
  uptimeMs: number | null;
  logFile: string | null;
}

// ========== API Responses ==========

export enum ApiErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  INVALID_INPUT = 'INVALID_INPUT',
  NOT_INSTALLED = 'NOT_INSTALLED',
  ALREADY_RUNNING = 'ALREADY_RUNNING',
  OPERATION_FAILED = 'OPERATION_FAILED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface ApiErrorResponse {
  success: false;
  error: {
    code: ApiErrorCode;
    message: string;
  };
}

export function createErrorResponse(code: ApiErrorCode, message: string): ApiErrorResponse {
  return { success: false, error: { code, message } };
}

/** Extracts a message from anything that was thrown. */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
