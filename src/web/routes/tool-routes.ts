/**
 * @fileoverview Tool routes.
 * Listing, launching, stopping, status and log draining for configured tools.
 */

import { FastifyInstance } from 'fastify';
import { ApiErrorCode, createErrorResponse, type LaunchFailureCode } from '../../types.js';
import { LaunchToolSchema, LogsQuerySchema } from '../schemas.js';
import { findToolOrFail } from '../route-helpers.js';
import type { SupervisorPort } from '../ports/index.js';

const LAUNCH_FAILURE_HTTP: Record<LaunchFailureCode, { status: number; code: ApiErrorCode }> = {
  NOT_INSTALLED: { status: 409, code: ApiErrorCode.NOT_INSTALLED },
  ALREADY_RUNNING: { status: 409, code: ApiErrorCode.ALREADY_RUNNING },
  LAUNCH_FAILED: { status: 500, code: ApiErrorCode.OPERATION_FAILED },
};

export function registerToolRoutes(app: FastifyInstance, ctx: SupervisorPort): void {
  app.get('/api/tools', async () => {
    return { tools: ctx.supervisor.list() };
  });

  app.get('/api/tools/:toolId', async (req) => {
    const { toolId } = req.params as { toolId: string };
    findToolOrFail(ctx.supervisor, toolId);
    const summary = ctx.supervisor.list().find((t) => t.toolId === toolId);
    const record = ctx.supervisor.getRecord(toolId);
    return {
      ...summary,
      command: record?.command ?? null,
      droppedLogLines: ctx.supervisor.droppedLogLines(toolId),
    };
  });

  app.get('/api/tools/:toolId/status', async (req) => {
    const { toolId } = req.params as { toolId: string };
    findToolOrFail(ctx.supervisor, toolId);
    return { toolId, status: ctx.supervisor.status(toolId) };
  });

  app.get('/api/tools/:toolId/logs', async (req, reply) => {
    const { toolId } = req.params as { toolId: string };
    findToolOrFail(ctx.supervisor, toolId);
    const result = LogsQuerySchema.safeParse(req.query);
    if (!result.success) {
      reply.code(400);
      return createErrorResponse(ApiErrorCode.INVALID_INPUT, result.error.issues[0]?.message ?? 'Invalid query');
    }
    return { toolId, lines: ctx.supervisor.logs(toolId, result.data.max) };
  });

  app.post('/api/tools/:toolId/launch', async (req, reply) => {
    const { toolId } = req.params as { toolId: string };
    findToolOrFail(ctx.supervisor, toolId);
    const parsed = LaunchToolSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      reply.code(400);
      return createErrorResponse(ApiErrorCode.INVALID_INPUT, parsed.error.issues[0]?.message ?? 'Validation failed');
    }

    const result = await ctx.supervisor.launch(toolId, {
      customArgs: parsed.data.args,
      hardwareProfile: parsed.data.profile,
    });
    if (!result.success) {
      const mapped = LAUNCH_FAILURE_HTTP[result.code];
      reply.code(mapped.status);
      return createErrorResponse(mapped.code, result.error);
    }
    return { success: true, toolId, pid: result.pid, logFile: result.logFile, command: result.command };
  });

  app.post('/api/tools/:toolId/stop', async (req, reply) => {
    const { toolId } = req.params as { toolId: string };
    findToolOrFail(ctx.supervisor, toolId);
    const success = await ctx.supervisor.stop(toolId);
    if (!success) {
      reply.code(500);
      return createErrorResponse(ApiErrorCode.OPERATION_FAILED, `Failed to stop ${toolId}`);
    }
    return { success: true, toolId, status: ctx.supervisor.status(toolId) };
  });
}
