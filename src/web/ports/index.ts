/**
 * @fileoverview Barrel export for all port interfaces.
 *
 * Ports define the capabilities that route modules can depend on.
 * WebServer implements all ports; route modules declare only what they need
 * via TypeScript intersection types (e.g., SupervisorPort & ConfigPort).
 */

export type { SupervisorPort, ToolSupervisor } from './supervisor-port.js';
export type { ConfigPort } from './config-port.js';
