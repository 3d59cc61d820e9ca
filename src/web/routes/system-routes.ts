/**
 * @fileoverview System routes.
 * Server status and lifecycle audit log queries.
 */

import { FastifyInstance } from 'fastify';
import { ApiErrorCode, createErrorResponse } from '../../types.js';
import { LifecycleQuerySchema } from '../schemas.js';
import { formatUptime } from '../route-helpers.js';
import type { ConfigPort, SupervisorPort } from '../ports/index.js';

export function registerSystemRoutes(app: FastifyInstance, ctx: SupervisorPort & ConfigPort): void {
  app.get('/api/status', async () => {
    const tools = ctx.supervisor.list();
    const uptimeSeconds = Math.floor((Date.now() - ctx.serverStartTime) / 1000);
    return {
      version: ctx.version,
      uptime: formatUptime(uptimeSeconds),
      uptimeSeconds,
      toolCount: tools.length,
      runningCount: tools.filter((t) => t.pid !== null).length,
    };
  });

  app.get('/api/lifecycle', async (req, reply) => {
    const result = LifecycleQuerySchema.safeParse(req.query);
    if (!result.success) {
      reply.code(400);
      return createErrorResponse(ApiErrorCode.INVALID_INPUT, result.error.issues[0]?.message ?? 'Invalid query');
    }
    if (!ctx.lifecycleLog) {
      return { entries: [] };
    }
    const entries = await ctx.lifecycleLog.query(result.data);
    return { entries };
  });
}
