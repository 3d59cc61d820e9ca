/**
 * @fileoverview Dashboard web server and REST API
 *
 * Provides a Fastify-based server that owns a ProcessSupervisor and exposes:
 * - REST API for launching, stopping, and inspecting tools
 * - Log draining for dashboards and the CLI
 * - Lifecycle audit log queries
 *
 * On SIGINT/SIGTERM every running tool is stopped before the server closes.
 *
 * @module web/server
 */

import Fastify, { FastifyInstance } from 'fastify';
import { DEFAULT_SERVER_HOST, DEFAULT_SERVER_PORT } from '../config/supervisor-timing.js';
import type { LifecycleLog } from '../lifecycle-log.js';
import type { ProcessSupervisor } from '../supervisor.js';
import { getErrorMessage } from '../types.js';
import { getVersion } from '../version.js';
import type { ConfigPort, SupervisorPort } from './ports/index.js';
import { registerErrorHandler } from './route-helpers.js';
import { registerSystemRoutes, registerToolRoutes } from './routes/index.js';

export interface WebServerOptions {
  supervisor: ProcessSupervisor;
  lifecycleLog?: LifecycleLog | null;
  port?: number;
  host?: string;
}

export class WebServer implements SupervisorPort, ConfigPort {
  readonly app: FastifyInstance;
  readonly supervisor: ProcessSupervisor;
  readonly lifecycleLog: LifecycleLog | null;
  readonly port: number;
  readonly host: string;
  readonly version = getVersion();
  readonly serverStartTime = Date.now();
  private stopped = false;

  constructor(options: WebServerOptions) {
    this.supervisor = options.supervisor;
    this.lifecycleLog = options.lifecycleLog ?? null;
    this.port = options.port ?? DEFAULT_SERVER_PORT;
    this.host = options.host ?? DEFAULT_SERVER_HOST;
    this.app = Fastify({ logger: false });

    registerErrorHandler(this.app);
    registerToolRoutes(this.app, this);
    registerSystemRoutes(this.app, this);
  }

  async start(): Promise<void> {
    await this.lifecycleLog?.trimIfNeeded();
    await this.app.listen({ port: this.port, host: this.host });
    this.lifecycleLog?.log({ event: 'server_started', toolId: '*', extra: { port: this.port, host: this.host } });
    console.log(`[WebServer] Listening on http://${this.host}:${this.port} (v${this.version})`);
  }

  /** Stop every tool, then close the HTTP server. Safe to call twice. */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    console.log('[WebServer] Shutting down, stopping tools...');
    const allStopped = await this.supervisor.stopAll();
    if (!allStopped) {
      console.warn('[WebServer] Some tools could not be stopped');
    }
    this.lifecycleLog?.log({ event: 'server_stopped', toolId: '*' });
    await this.lifecycleLog?.flush();
    await this.app.close();
  }
}

/**
 * Start a server and wire SIGINT/SIGTERM to a clean shutdown.
 */
export async function startWebServer(options: WebServerOptions): Promise<WebServer> {
  const server = new WebServer(options);
  await server.start();

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`[WebServer] Received ${signal}`);
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[WebServer] Shutdown failed:', getErrorMessage(err));
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return server;
}
