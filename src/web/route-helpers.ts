/**
 * @fileoverview Shared helper functions for route modules.
 *
 * Contains the tool lookup helper used by every `/api/tools/:toolId` route and
 * the error handler that turns thrown route errors into API error bodies.
 */

import type { FastifyInstance } from 'fastify';
import { ApiErrorCode, createErrorResponse, getErrorMessage, type ApiErrorResponse } from '../types.js';
import type { ResolvedTool } from '../tool-config.js';
import type { ToolSupervisor } from './ports/index.js';

export type RouteError = Error & { statusCode: number; body: ApiErrorResponse };

export function routeError(statusCode: number, code: ApiErrorCode, message: string): RouteError {
  return Object.assign(new Error(message), {
    statusCode,
    body: createErrorResponse(code, message),
  });
}

/**
 * Look up a configured tool by ID or throw a structured 404.
 */
export function findToolOrFail(supervisor: ToolSupervisor, toolId: string): ResolvedTool {
  const tool = supervisor.config.tools.get(toolId);
  if (!tool) {
    throw routeError(404, ApiErrorCode.NOT_FOUND, `Tool ${toolId} not found`);
  }
  return tool;
}

/**
 * Formats uptime in seconds to a human-readable string (e.g., "1d 2h 30m 15s").
 */
export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);

  return parts.join(' ');
}

/**
 * Errors carrying `statusCode` + `body` (from routeError) are sent as-is;
 * anything else becomes a 500 OPERATION_FAILED.
 */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, _req, reply) => {
    const statusCode = (error as { statusCode?: number }).statusCode ?? 500;
    const body = (error as { body?: unknown }).body;
    if (body) {
      reply.code(statusCode).send(body);
    } else {
      reply.code(statusCode).send(createErrorResponse(
        statusCode >= 500 ? ApiErrorCode.OPERATION_FAILED : ApiErrorCode.INVALID_INPUT,
        getErrorMessage(error),
      ));
    }
  });
}
