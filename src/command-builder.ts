/**
 * @fileoverview Pure functions for building a tool's launch command line.
 *
 * Kept separate from the supervisor so argument ordering is testable without
 * spawning anything.
 *
 * @module command-builder
 */

import { delimiter, dirname } from 'node:path';
import { MODELS_DIR_PLACEHOLDER, type ResolvedTool } from './tool-config.js';

export interface LaunchCommand {
  /** Executable to spawn (the tool's interpreter) */
  command: string;
  /** Entry script followed by every argument */
  args: string[];
  cwd: string;
  /** Whether the requested hardware profile existed and was applied */
  profileApplied: boolean;
}

/**
 * Args that point the tool at the shared models directory.
 * Only the `cli_args` centralization method contributes arguments.
 */
export function buildCentralizationArgs(tool: ResolvedTool, modelsDir: string): string[] {
  if (tool.centralization.method !== 'cli_args') return [];
  return tool.centralization.args.map((arg) => arg.split(MODELS_DIR_PLACEHOLDER).join(modelsDir));
}

export function buildProfileArgs(tool: ResolvedTool, hardwareProfile?: string): string[] | null {
  if (!hardwareProfile) return null;
  if (!Object.hasOwn(tool.hardwareProfiles, hardwareProfile)) return null;
  return [...tool.hardwareProfiles[hardwareProfile]];
}

/**
 * Assemble the full command line, always in this order:
 * entry script, default args, hardware profile args, centralized model args,
 * custom args.
 *
 * @param tool - Resolved tool configuration
 * @param modelsDir - Absolute models directory substituted into centralization args
 * @param customArgs - Extra args from the caller, appended last
 * @param hardwareProfile - Profile name; silently skipped when the tool has no such profile
 */
export function buildLaunchCommand(
  tool: ResolvedTool,
  modelsDir: string,
  customArgs: readonly string[] = [],
  hardwareProfile?: string,
): LaunchCommand {
  const profileArgs = buildProfileArgs(tool, hardwareProfile);
  const args = [
    tool.entryScript,
    ...tool.defaultArgs,
    ...(profileArgs ?? []),
    ...buildCentralizationArgs(tool, modelsDir),
    ...customArgs,
  ];

  return {
    command: tool.interpreter,
    args,
    cwd: tool.installDir,
    profileApplied: profileArgs !== null,
  };
}

/**
 * Environment for a tool process: inherited env with the interpreter's venv
 * activated (bin dir first on PATH, VIRTUAL_ENV set), unbuffered UTF-8 Python
 * output so lines reach the monitor as they are printed, then the tool's own env.
 */
export function buildToolEnv(tool: ResolvedTool, baseEnv: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const binDir = dirname(tool.interpreter);
  return {
    ...baseEnv,
    PATH: baseEnv.PATH ? `${binDir}${delimiter}${baseEnv.PATH}` : binDir,
    VIRTUAL_ENV: dirname(binDir),
    PYTHONUNBUFFERED: '1',
    PYTHONIOENCODING: 'utf-8',
    ...tool.env,
  };
}
