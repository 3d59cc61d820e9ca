/**
 * @fileoverview Tool lifecycle audit types
 */

/** Types of lifecycle events recorded to the audit log */
export type LifecycleEventType =
  | 'launched' // Child process spawned and registered
  | 'launch_failed' // Spawn refused or failed before registration
  | 'exit' // Output stream closed and the process exited
  | 'stop_requested' // Terminator sent the graceful signal
  | 'stopped' // Process confirmed exited after a stop request
  | 'force_killed' // Graceful wait expired, SIGKILL sent
  | 'monitor_failed' // Output monitor hit a read error and gave up
  | 'server_started' // Dashboard API started
  | 'server_stopped'; // Dashboard API shutting down

/** A single entry in the lifecycle audit log */
export interface LifecycleEntry {
  ts: number;
  event: LifecycleEventType;
  toolId: string;
  pid?: number | null;
  exitCode?: number | null;
  signal?: string | null;
  reason?: string;
  extra?: Record<string, unknown>;
}
