/**
 * @fileoverview Zod validation schemas for API routes
 *
 * @module web/schemas
 */

import { z } from 'zod';
import { MAX_LOG_BUFFER_ENTRIES, DEFAULT_LOG_READ_LINES } from '../config/buffer-limits.js';

/** Tool ids as accepted by the config file */
export const ToolIdSchema = z.string().min(1).max(100).regex(/^[A-Za-z0-9._-]+$/, 'Invalid tool id');

/** Custom CLI args: no NUL bytes, bounded count and length */
const ArgSchema = z.string().max(4096).refine((arg) => !arg.includes('\0'), {
  message: 'Arguments must not contain NUL bytes',
});

/**
 * Schema for POST /api/tools/:toolId/launch
 */
export const LaunchToolSchema = z.object({
  args: z.array(ArgSchema).max(200).optional(),
  profile: z.string().min(1).max(100).optional(),
}).strict();

/**
 * Query for GET /api/tools/:toolId/logs
 */
export const LogsQuerySchema = z.object({
  max: z.coerce.number().int().min(1).max(MAX_LOG_BUFFER_ENTRIES).default(DEFAULT_LOG_READ_LINES),
});

/**
 * Query for GET /api/lifecycle
 */
export const LifecycleQuerySchema = z.object({
  toolId: ToolIdSchema.optional(),
  event: z.enum([
    'launched',
    'launch_failed',
    'exit',
    'stop_requested',
    'stopped',
    'force_killed',
    'monitor_failed',
    'server_started',
    'server_stopped',
  ]).optional(),
  since: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(200),
});

export const ToolStatusSchema = z.enum(['not_started', 'starting', 'running', 'error', 'stopped']);

export type LaunchToolInput = z.infer<typeof LaunchToolSchema>;
