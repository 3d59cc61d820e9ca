/**
 * @fileoverview Command-line interface.
 *
 * `serve` and `run` host a supervisor in this process. `launch`, `stop`,
 * `status`, `logs`, `list` and `dashboard` talk to a running `serve`
 * instance over HTTP, so tools outlive the command that started them.
 *
 * @module cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { ApiClientError, DEFAULT_API_URL, SupervisorClient } from './api-client.js';
import { DEFAULT_LOG_READ_LINES, MAX_LOG_BUFFER_ENTRIES } from './config/buffer-limits.js';
import { DEFAULT_SERVER_HOST, DEFAULT_SERVER_PORT } from './config/supervisor-timing.js';
import { ConfigurationError } from './errors.js';
import { LifecycleLog } from './lifecycle-log.js';
import { ProcessSupervisor } from './supervisor.js';
import { defaultConfigPath, isToolInstalled, loadConfig } from './tool-config.js';
import { getErrorMessage, type LogEntry, type ToolSummary } from './types.js';
import { formatDuration, formatLogEntry } from './utils/log-format.js';
import { getVersion } from './version.js';
import { startWebServer } from './web/server.js';

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

function parseLineCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > MAX_LOG_BUFFER_ENTRIES) {
    throw new InvalidArgumentError(`Line count must be between 1 and ${MAX_LOG_BUFFER_ENTRIES}.`);
  }
  return n;
}

/** One row per tool, aligned for a terminal */
export function formatToolTable(tools: readonly ToolSummary[]): string {
  if (tools.length === 0) return 'No tools configured.';
  const rows = tools.map((t) => [
    t.toolId,
    t.name,
    t.status,
    t.pid === null ? '-' : String(t.pid),
    t.uptimeMs === null ? '-' : formatDuration(t.uptimeMs),
  ]);
  const header = ['TOOL', 'NAME', 'STATUS', 'PID', 'UPTIME'];
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));
  const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();
  return [line(header), ...rows.map(line)].join('\n');
}

/** Print an error and mark the process as failed, without throwing */
function fail(err: unknown): void {
  if (err instanceof ApiClientError || err instanceof ConfigurationError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error('Error:', getErrorMessage(err));
  }
  process.exitCode = 1;
}

export const program = new Command();

program
  .name('webui-supervisor')
  .description('Launch, monitor and stop ML web UI back-ends')
  .version(getVersion());

program
  .command('serve')
  .description('Run the dashboard API with an in-process supervisor')
  .option('-c, --config <path>', 'config.json path')
  .option('-p, --port <port>', 'port to listen on', parsePort, DEFAULT_SERVER_PORT)
  .option('-H, --host <host>', 'address to bind', DEFAULT_SERVER_HOST)
  .action(async (options: { config?: string; port: number; host: string }) => {
    try {
      const config = await loadConfig(defaultConfigPath(options.config));
      const lifecycleLog = LifecycleLog.inDir(config.workspace.logsDir);
      const supervisor = new ProcessSupervisor({ config, lifecycleLog });
      await startWebServer({ supervisor, lifecycleLog, port: options.port, host: options.host });
    } catch (err) {
      fail(err);
    }
  });

program
  .command('run <tool> [args...]')
  .description('Launch a tool in the foreground and stream its output until it exits (Ctrl-C stops it)')
  .option('-c, --config <path>', 'config.json path')
  .option('--profile <name>', 'hardware profile to apply')
  .action(async (toolId: string, args: string[], options: { config?: string; profile?: string }) => {
    try {
      const config = await loadConfig(defaultConfigPath(options.config));
      const lifecycleLog = LifecycleLog.inDir(config.workspace.logsDir);
      const supervisor = new ProcessSupervisor({ config, lifecycleLog });

      supervisor.on('log', ({ entry }: { toolId: string; entry: LogEntry }) => {
        process.stdout.write(formatLogEntry(entry) + '\n');
      });

      const result = await supervisor.launch(toolId, { customArgs: args, hardwareProfile: options.profile });
      if (!result.success) {
        console.error(`Error: ${result.error}`);
        process.exitCode = 1;
        return;
      }
      console.log(`[Supervisor] Logging to ${result.logFile}`);

      process.once('SIGINT', () => {
        console.log(`\n[Supervisor] Stopping ${toolId}...`);
        supervisor.stop(toolId).then(
          (ok) => {
            if (!ok) process.exitCode = 1;
          },
          (err: unknown) => fail(err),
        );
      });

      await supervisor.getMonitor(toolId)?.done;
      const exit = supervisor.getRecord(toolId)?.handle.exitInfo;
      if (exit && exit.exitCode !== null && exit.exitCode !== 0) {
        process.exitCode = exit.exitCode;
      }
      await lifecycleLog.flush();
    } catch (err) {
      fail(err);
    }
  });

program
  .command('tools')
  .description('List configured tools and whether they are installed')
  .option('-c, --config <path>', 'config.json path')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(defaultConfigPath(options.config));
      for (const tool of config.tools.values()) {
        const state = isToolInstalled(tool) ? 'installed' : 'not installed';
        console.log(`${tool.id.padEnd(16)} ${tool.name.padEnd(32)} ${state}  ${tool.installDir}`);
      }
    } catch (err) {
      fail(err);
    }
  });

// ========== Remote commands (talk to `serve`) ==========

program
  .command('launch <tool> [args...]')
  .description('Launch a tool on the running supervisor')
  .option('--profile <name>', 'hardware profile to apply')
  .option('-u, --url <url>', 'supervisor API URL', DEFAULT_API_URL)
  .action(async (toolId: string, args: string[], options: { profile?: string; url: string }) => {
    try {
      const client = new SupervisorClient(options.url);
      const result = await client.launch(toolId, { args, profile: options.profile });
      console.log(`Launched ${toolId} (PID ${result.pid}), logging to ${result.logFile}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('stop <tool>')
  .description('Stop a tool (SIGTERM, then SIGKILL after 10s)')
  .option('-u, --url <url>', 'supervisor API URL', DEFAULT_API_URL)
  .action(async (toolId: string, options: { url: string }) => {
    try {
      const status = await new SupervisorClient(options.url).stop(toolId);
      console.log(`${toolId}: ${status}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('status <tool>')
  .description('Show a tool\'s status')
  .option('-u, --url <url>', 'supervisor API URL', DEFAULT_API_URL)
  .action(async (toolId: string, options: { url: string }) => {
    try {
      console.log(await new SupervisorClient(options.url).status(toolId));
    } catch (err) {
      fail(err);
    }
  });

program
  .command('logs <tool>')
  .description('Drain buffered log lines (each line is returned once)')
  .option('-n, --lines <count>', 'maximum lines to read', parseLineCount, DEFAULT_LOG_READ_LINES)
  .option('-u, --url <url>', 'supervisor API URL', DEFAULT_API_URL)
  .action(async (toolId: string, options: { lines: number; url: string }) => {
    try {
      const lines = await new SupervisorClient(options.url).logs(toolId, options.lines);
      for (const line of lines) console.log(line);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('list')
  .description('List tools with status, PID and uptime')
  .option('-u, --url <url>', 'supervisor API URL', DEFAULT_API_URL)
  .action(async (options: { url: string }) => {
    try {
      console.log(formatToolTable(await new SupervisorClient(options.url).listTools()));
    } catch (err) {
      fail(err);
    }
  });

program
  .command('dashboard')
  .description('Interactive terminal dashboard')
  .option('-u, --url <url>', 'supervisor API URL', DEFAULT_API_URL)
  .action(async (options: { url: string }) => {
    try {
      const { startTUI } = await import('./tui/index.js');
      await startTUI(new SupervisorClient(options.url));
    } catch (err) {
      fail(err);
    }
  });
