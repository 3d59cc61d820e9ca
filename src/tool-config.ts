/**
 * @fileoverview Tool configuration loading and resolution.
 *
 * Reads the workspace `config.json`, validates it with zod, and resolves each
 * tool's paths (install dir, interpreter, entry script) to absolute paths.
 * Installing tools is out of scope; the supervisor only checks whether a
 * tool's install directory exists.
 *
 * @module tool-config
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { getErrorMessage } from './types.js';

/** Placeholder replaced with the models directory in centralization args */
export const MODELS_DIR_PLACEHOLDER = '{models_dir}';

/** Environment variable naming the config file */
export const CONFIG_PATH_ENV = 'WEBUI_SUPERVISOR_CONFIG';

const argListSchema = z.array(z.string());

export const ModelCentralizationSchema = z.object({
  method: z.enum(['cli_args', 'symlink', 'none']),
  args: argListSchema.optional(),
});

export const ToolConfigSchema = z.object({
  name: z.string().min(1),
  repo: z.string().optional(),
  venv_python: z.string().optional(),
  install_dir: z.string().optional(),
  interpreter: z.string().optional(),
  entry_script: z.string().min(1),
  default_args: argListSchema.optional(),
  hardware_profiles: z.record(z.string(), argListSchema).optional(),
  model_centralization: ModelCentralizationSchema.optional(),
  env: z.record(z.string(), z.string()).optional(),
});

export const WorkspaceSettingsSchema = z.object({
  workspace_dir: z.string().min(1),
  models_dir: z.string().min(1),
  logs_dir: z.string().optional(),
});

export const SupervisorConfigSchema = z.object({
  $schema: z.string().optional(),
  workspace_settings: WorkspaceSettingsSchema,
  tools: z.record(z.string().regex(/^[A-Za-z0-9._-]+$/, 'tool ids may only use letters, digits, ".", "_" and "-"'), ToolConfigSchema),
});

export type ToolConfigInput = z.infer<typeof ToolConfigSchema>;
export type SupervisorConfigInput = z.infer<typeof SupervisorConfigSchema>;
export type CentralizationMethod = z.infer<typeof ModelCentralizationSchema>['method'];

/** A tool's configuration with every path made absolute. Read-only after load. */
export interface ResolvedTool {
  readonly id: string;
  readonly name: string;
  readonly repo?: string;
  readonly installDir: string;
  readonly interpreter: string;
  readonly entryScript: string;
  readonly defaultArgs: readonly string[];
  readonly hardwareProfiles: Readonly<Record<string, readonly string[]>>;
  readonly centralization: {
    readonly method: CentralizationMethod;
    readonly args: readonly string[];
  };
  readonly env: Readonly<Record<string, string>>;
}

export interface WorkspaceSettings {
  readonly workspaceDir: string;
  readonly modelsDir: string;
  readonly logsDir: string;
}

export interface SupervisorConfig {
  readonly workspace: WorkspaceSettings;
  readonly tools: ReadonlyMap<string, ResolvedTool>;
}

function resolveFrom(baseDir: string, p: string): string {
  return isAbsolute(p) ? p : resolve(baseDir, p);
}

function resolveToolEntry(id: string, raw: ToolConfigInput, workspaceDir: string): ResolvedTool {
  const installDir = resolveFrom(workspaceDir, raw.install_dir ?? id);
  return {
    id,
    name: raw.name,
    repo: raw.repo,
    installDir,
    interpreter: raw.interpreter
      ? resolveFrom(installDir, raw.interpreter)
      : join(installDir, 'venv', 'bin', 'python'),
    entryScript: resolveFrom(installDir, raw.entry_script),
    defaultArgs: raw.default_args ?? [],
    hardwareProfiles: raw.hardware_profiles ?? {},
    centralization: {
      method: raw.model_centralization?.method ?? 'none',
      args: raw.model_centralization?.args ?? [],
    },
    env: raw.env ?? {},
  };
}

/**
 * Turn a validated config object into absolute, resolved settings.
 * `WORKSPACE_DIR` and `MODELS_DIR` in `env` override the file's values.
 */
export function resolveConfig(
  input: SupervisorConfigInput,
  configDir: string,
  env: NodeJS.ProcessEnv = process.env,
): SupervisorConfig {
  const settings = input.workspace_settings;
  const workspaceDir = resolveFrom(configDir, env.WORKSPACE_DIR || settings.workspace_dir);
  const modelsDir = resolveFrom(workspaceDir, env.MODELS_DIR || settings.models_dir);
  const logsDir = resolveFrom(workspaceDir, settings.logs_dir ?? 'logs');

  const tools = new Map<string, ResolvedTool>();
  for (const [id, raw] of Object.entries(input.tools)) {
    tools.set(id, resolveToolEntry(id, raw, workspaceDir));
  }

  return {
    workspace: { workspaceDir, modelsDir, logsDir },
    tools,
  };
}

/**
 * Parse and validate config text. Throws ConfigurationError naming the source
 * and the first failing field.
 */
export function parseConfig(
  text: string,
  source: string,
  env: NodeJS.ProcessEnv = process.env,
): SupervisorConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in config file ${source}: ${getErrorMessage(err)}`);
  }

  const result = SupervisorConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigurationError(
      `Invalid config file ${source}: ${where}: ${issue?.message ?? 'validation failed'}`,
    );
  }

  return resolveConfig(result.data, dirname(source), env);
}

export async function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<SupervisorConfig> {
  const absPath = resolve(configPath);

  let raw: string;
  try {
    raw = await readFile(absPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigurationError(`Config file not found: ${absPath}`);
    }
    throw new ConfigurationError(`Cannot read config file ${absPath}: ${getErrorMessage(err)}`, { cause: err });
  }

  return parseConfig(raw, absPath, env);
}

/**
 * Pick the config path: explicit flag, then $WEBUI_SUPERVISOR_CONFIG, then
 * `config.json` in $WORKSPACE_DIR or the current directory.
 */
export function defaultConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) return resolve(explicit);
  const fromEnv = env[CONFIG_PATH_ENV];
  if (fromEnv) return resolve(fromEnv);
  return resolve(env.WORKSPACE_DIR || process.cwd(), 'config.json');
}

/** Look up a tool by id. Unknown ids are a configuration error. */
export function resolveTool(config: SupervisorConfig, toolId: string): ResolvedTool {
  const tool = config.tools.get(toolId);
  if (!tool) {
    const known = [...config.tools.keys()].join(', ') || 'none';
    throw new ConfigurationError(`Unknown tool "${toolId}" (configured: ${known})`);
  }
  return tool;
}

export function isToolInstalled(tool: ResolvedTool): boolean {
  return existsSync(tool.installDir);
}
