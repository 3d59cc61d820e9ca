/**
 * @fileoverview HTTP client for a running dashboard API.
 *
 * Used by the CLI's remote commands and by the terminal dashboard. Responses
 * are validated with zod so a version mismatch surfaces as a clear error
 * instead of undefined fields.
 *
 * @module api-client
 */

import { z } from 'zod';
import { DEFAULT_SERVER_HOST, DEFAULT_SERVER_PORT } from './config/supervisor-timing.js';
import { ToolStatusSchema } from './web/schemas.js';
import type { ToolStatus, ToolSummary } from './types.js';

export const DEFAULT_API_URL = `http://${DEFAULT_SERVER_HOST}:${DEFAULT_SERVER_PORT}`;

const ToolSummarySchema = z.object({
  toolId: z.string(),
  name: z.string(),
  installed: z.boolean(),
  status: ToolStatusSchema,
  pid: z.number().nullable(),
  startTime: z.number().nullable(),
  uptimeMs: z.number().nullable(),
  logFile: z.string().nullable(),
});

const ErrorBodySchema = z.object({
  success: z.literal(false),
  error: z.object({ code: z.string(), message: z.string() }),
});

const ToolsResponseSchema = z.object({ tools: z.array(ToolSummarySchema) });
const StatusResponseSchema = z.object({ toolId: z.string(), status: ToolStatusSchema });
const LogsResponseSchema = z.object({ toolId: z.string(), lines: z.array(z.string()) });
const LaunchResponseSchema = z.object({
  success: z.literal(true),
  toolId: z.string(),
  pid: z.number(),
  logFile: z.string(),
  command: z.array(z.string()),
});
const StopResponseSchema = z.object({ success: z.literal(true), toolId: z.string(), status: ToolStatusSchema });

export type LaunchResponse = z.infer<typeof LaunchResponseSchema>;

export class ApiClientError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = 'ApiClientError';
    this.status = status;
    this.code = code;
  }
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export class SupervisorClient {
  readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(baseUrl: string = DEFAULT_API_URL, fetchFn: FetchFn = fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.fetchFn = fetchFn;
  }

  private async request<T>(schema: z.ZodType<T>, path: string, init?: RequestInit): Promise<T> {
    let res: Response;
    try {
      res = await this.fetchFn(`${this.baseUrl}${path}`, init);
    } catch (err) {
      throw new ApiClientError(
        `Cannot reach supervisor at ${this.baseUrl} (is \`webui-supervisor serve\` running?): ${err instanceof Error ? err.message : String(err)}`,
        0,
        'UNREACHABLE',
      );
    }

    const body: unknown = await res.json().catch(() => null);
    if (!res.ok) {
      const parsed = ErrorBodySchema.safeParse(body);
      if (parsed.success) {
        throw new ApiClientError(parsed.data.error.message, res.status, parsed.data.error.code);
      }
      throw new ApiClientError(`Request failed with HTTP ${res.status}`, res.status, 'HTTP_ERROR');
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ApiClientError(`Unexpected response from ${path}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`, res.status, 'BAD_RESPONSE');
    }
    return parsed.data;
  }

  private post<T>(schema: z.ZodType<T>, path: string, body: unknown): Promise<T> {
    return this.request(schema, path, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  async listTools(): Promise<ToolSummary[]> {
    return (await this.request(ToolsResponseSchema, '/api/tools')).tools;
  }

  async status(toolId: string): Promise<ToolStatus> {
    return (await this.request(StatusResponseSchema, `/api/tools/${encodeURIComponent(toolId)}/status`)).status;
  }

  async logs(toolId: string, maxLines: number): Promise<string[]> {
    const path = `/api/tools/${encodeURIComponent(toolId)}/logs?max=${maxLines}`;
    return (await this.request(LogsResponseSchema, path)).lines;
  }

  launch(toolId: string, options: { args?: string[]; profile?: string } = {}): Promise<LaunchResponse> {
    return this.post(LaunchResponseSchema, `/api/tools/${encodeURIComponent(toolId)}/launch`, options);
  }

  async stop(toolId: string): Promise<ToolStatus> {
    return (await this.post(StopResponseSchema, `/api/tools/${encodeURIComponent(toolId)}/stop`, {})).status;
  }
}
