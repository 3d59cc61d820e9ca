/**
 * Tests for the per-launch output monitor.
 *
 * Feeds lines through a fake handle's output stream and checks the log file,
 * the buffer and the registry status.
 * Port: N/A (unit tests, no server)
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MonitorError } from '../src/errors.js';
import { BoundedLogBuffer } from '../src/log-buffer.js';
import { OutputMonitor, type OutputMonitorOptions } from '../src/output-monitor.js';
import { ProcessRegistry } from '../src/process-registry.js';
import { FakeProcessHandle, FIXED_NOW, makeTempDir, makeTool } from './mocks/index.js';

describe('OutputMonitor', () => {
  let registry: ProcessRegistry;
  let handle: FakeProcessHandle;
  let buffer: BoundedLogBuffer;
  let logFilePath: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    registry = new ProcessRegistry();
    handle = new FakeProcessHandle(900);
    buffer = new BoundedLogBuffer(10);
    logFilePath = join(await makeTempDir(), 'logs', 'comfy-20240131-142507.log');
    registry.register({
      toolId: 'comfy',
      launchId: 'launch-1',
      handle,
      startTime: FIXED_NOW,
      status: 'starting',
      logFilePath,
      command: ['/w/comfy/venv/bin/python', '/w/comfy/main.py'],
      config: makeTool({ id: 'comfy' }),
    });
  });

  function createMonitor(overrides: Partial<OutputMonitorOptions> = {}): OutputMonitor {
    return new OutputMonitor({
      toolId: 'comfy',
      launchId: 'launch-1',
      handle,
      registry,
      buffer,
      logFilePath,
      now: () => FIXED_NOW,
      ...overrides,
    });
  }

  it('writes, buffers and classifies every line, then marks the record stopped', async () => {
    const statuses: string[] = [];
    registry.on('statusChanged', (e: { status: string }) => statuses.push(e.status));
    const exits: unknown[] = [];
    const monitor = createMonitor({ hooks: { onExit: (info) => exits.push(info) } });
    const done = monitor.start();

    handle.output.write('Loading checkpoint\n');
    handle.output.write('Traceback (most recent call last):\n');
    handle.output.write('Running on local URL:  http://127.0.0.1:8188\r\n');
    handle.exit(0);
    handle.output.end();
    await done;

    expect(monitor.linesRead).toBe(3);
    expect(statuses).toEqual(['error', 'running', 'stopped']);
    expect(registry.get('comfy')?.status).toBe('stopped');
    expect(exits).toEqual([{ exitCode: 0, signal: null }]);

    expect(buffer.drain(10).map((e) => e.text)).toEqual([
      'Loading checkpoint',
      'Traceback (most recent call last):',
      'Running on local URL:  http://127.0.0.1:8188',
    ]);
    expect(await readFile(logFilePath, 'utf-8')).toBe(
      '[14:25:07] Loading checkpoint\n' +
      '[14:25:07] Traceback (most recent call last):\n' +
      '[14:25:07] Running on local URL:  http://127.0.0.1:8188\n',
    );
  });

  it('keeps very long lines whole in the file, the buffer and the classifier', async () => {
    const statuses: string[] = [];
    registry.on('statusChanged', (e: { status: string }) => statuses.push(e.status));
    const line = 'x'.repeat(20_000) + ' Running on http://127.0.0.1:7860';
    const done = createMonitor().start();

    handle.output.write(line + '\n');
    handle.exit(0);
    handle.output.end();
    await done;

    expect(statuses).toEqual(['running', 'stopped']);
    expect(buffer.drain(10).map((e) => e.text)).toEqual([line]);
    expect(await readFile(logFilePath, 'utf-8')).toBe(`[14:25:07] ${line}\n`);
  });

  it('replaces undecodable bytes instead of dropping them', async () => {
    const done = createMonitor().start();

    handle.output.write(Buffer.from([0x61, 0xff, 0xfe, 0x62, 0x0a]));
    handle.output.write('next\n');
    handle.exit(0);
    handle.output.end();
    await done;

    expect(buffer.drain(10).map((e) => e.text)).toEqual(['a\uFFFD\uFFFDb', 'next']);
    expect(await readFile(logFilePath, 'utf-8')).toBe('[14:25:07] a\uFFFD\uFFFDb\n[14:25:07] next\n');
  });

  it('emits the last line even without a trailing newline', async () => {
    const monitor = createMonitor();
    const done = monitor.start();

    handle.output.write('partial');
    handle.exit(1);
    handle.output.end();
    await done;

    expect(buffer.drain(10).map((e) => e.text)).toEqual(['partial']);
  });

  it('keeps reading when the buffer is full', async () => {
    buffer = new BoundedLogBuffer(2);
    const entries: string[] = [];
    const monitor = createMonitor({ buffer, hooks: { onEntry: (e) => entries.push(e.text) } });
    const done = monitor.start();

    handle.output.write('a\nb\nc\n');
    handle.exit(0);
    handle.output.end();
    await done;

    expect(entries).toEqual(['a', 'b', 'c']);
    expect(buffer.dropped).toBe(1);
    expect(buffer.drain(10).map((e) => e.text)).toEqual(['a', 'b']);
    expect(await readFile(logFilePath, 'utf-8')).toContain('[14:25:07] c\n');
  });

  it('leaves a newer launch untouched', async () => {
    const current = registry.get('comfy');
    if (!current) throw new Error('record missing');
    registry.register({ ...current, launchId: 'launch-2', status: 'running' });
    const done = createMonitor().start();

    handle.output.write('RuntimeError: boom\n');
    handle.exit(0);
    handle.output.end();
    await done;

    expect(registry.get('comfy')?.status).toBe('running');
  });

  it('reports a failure, leaves the record alone and discards further output', async () => {
    const failures: MonitorError[] = [];
    const monitor = createMonitor({
      classify: () => {
        throw new Error('classifier exploded');
      },
      hooks: { onFailure: (err) => failures.push(err) },
    });
    const done = monitor.start();

    handle.output.write('anything\n');
    await done;

    expect(failures).toHaveLength(1);
    expect(failures[0]).toBeInstanceOf(MonitorError);
    expect(failures[0].message).toBe('Reading output of comfy (PID 900) failed: classifier exploded');
    expect(registry.get('comfy')?.status).toBe('starting');
    expect(handle.outputDiscarded).toBe(true);
    expect(handle.output.readableFlowing).toBe(true);
  });

  it('runs without a log file when it cannot be opened', async () => {
    const monitor = createMonitor({ logFilePath: '/dev/null/not-a-dir/comfy.log' });
    const done = monitor.start();

    handle.output.write('Model loaded\n');
    handle.exit(0);
    handle.output.end();
    await done;

    expect(buffer.drain(10).map((e) => e.text)).toEqual(['Model loaded']);
    expect(console.error).toHaveBeenCalled();
  });

  it('start() is idempotent', () => {
    const monitor = createMonitor();
    expect(monitor.start()).toBe(monitor.start());
    handle.exit(0);
    handle.output.end();
    return monitor.done;
  });
});
