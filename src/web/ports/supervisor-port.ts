/**
 * @fileoverview Supervisor port — capabilities for launching, stopping and
 * reading tools. Route modules that manage tools depend on this port.
 */

import type { ProcessSupervisor } from '../../supervisor.js';

/** The slice of ProcessSupervisor the routes call */
export type ToolSupervisor = Pick<
  ProcessSupervisor,
  'config' | 'launch' | 'stop' | 'stopAll' | 'status' | 'logs' | 'list' | 'getRecord' | 'droppedLogLines'
>;

export interface SupervisorPort {
  readonly supervisor: ToolSupervisor;
}
