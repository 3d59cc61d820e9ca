/**
 * Tool and config fixtures.
 */

import type { ResolvedTool, SupervisorConfig } from '../../src/tool-config.js';

export function makeTool(overrides: Partial<ResolvedTool> & { id: string }): ResolvedTool {
  const installDir = overrides.installDir ?? `/w/${overrides.id}`;
  return {
    name: overrides.id,
    installDir,
    interpreter: `${installDir}/venv/bin/python`,
    entryScript: `${installDir}/main.py`,
    defaultArgs: [],
    hardwareProfiles: {},
    centralization: { method: 'none', args: [] },
    env: {},
    ...overrides,
  };
}

export function makeConfig(tools: ResolvedTool[], logsDir = '/w/logs'): SupervisorConfig {
  return {
    workspace: { workspaceDir: '/w', modelsDir: '/w/models', logsDir },
    tools: new Map(tools.map((t) => [t.id, t])),
  };
}
