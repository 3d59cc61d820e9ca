/**
 * @fileoverview Config port — server metadata and the lifecycle audit log.
 * Route modules that report on the server itself depend on this port.
 */

import type { LifecycleLog } from '../../lifecycle-log.js';

export interface ConfigPort {
  readonly version: string;
  readonly port: number;
  readonly host: string;
  readonly serverStartTime: number;
  readonly lifecycleLog: LifecycleLog | null;
}
