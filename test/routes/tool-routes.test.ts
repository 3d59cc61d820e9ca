/**
 * @fileoverview Tests for tool-routes route handlers.
 *
 * Uses app.inject() — no real HTTP ports needed.
 * Port: N/A (app.inject doesn't open ports)
 */

import { createRouteTestHarness, type RouteTestHarness } from './_route-test-utils.js';
import { registerToolRoutes } from '../../src/web/routes/tool-routes.js';

describe('tool-routes', () => {
  let harness: RouteTestHarness;

  beforeEach(async () => {
    harness = await createRouteTestHarness(registerToolRoutes);
  });

  afterEach(async () => {
    await harness.app.close();
  });

  // ========== GET /api/tools ==========

  describe('GET /api/tools', () => {
    it('lists every tool summary', async () => {
      const res = await harness.app.inject({ method: 'GET', url: '/api/tools' });
      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body).tools).toEqual([
        expect.objectContaining({ toolId: 'comfy', status: 'running', pid: 4321 }),
      ]);
    });
  });

  describe('GET /api/tools/:toolId', () => {
    it('returns the summary with command and dropped line count', async () => {
      harness.ctx.supervisor.droppedLogLines.mockReturnValueOnce(7);
      const res = await harness.app.inject({ method: 'GET', url: '/api/tools/comfy' });
      const body = JSON.parse(res.body);
      expect(res.statusCode).toBe(200);
      expect(body.toolId).toBe('comfy');
      expect(body.command).toBeNull();
      expect(body.droppedLogLines).toBe(7);
    });
  });

  // ========== GET /api/tools/:toolId/status ==========

  describe('GET /api/tools/:toolId/status', () => {
    it('returns the status', async () => {
      harness.ctx.supervisor.status.mockReturnValueOnce('starting');
      const res = await harness.app.inject({ method: 'GET', url: '/api/tools/comfy/status' });
      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({ toolId: 'comfy', status: 'starting' });
    });

    it('returns 404 for an unknown tool', async () => {
      const res = await harness.app.inject({ method: 'GET', url: '/api/tools/nope/status' });
      expect(res.statusCode).toBe(404);
      expect(JSON.parse(res.body)).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Tool nope not found' },
      });
      expect(harness.ctx.supervisor.status).not.toHaveBeenCalled();
    });
  });

  // ========== GET /api/tools/:toolId/logs ==========

  describe('GET /api/tools/:toolId/logs', () => {
    it('drains 100 lines by default', async () => {
      const res = await harness.app.inject({ method: 'GET', url: '/api/tools/comfy/logs' });
      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({ toolId: 'comfy', lines: ['[14:25:07] Model loaded'] });
      expect(harness.ctx.supervisor.logs).toHaveBeenCalledWith('comfy', 100);
    });

    it('honours max', async () => {
      await harness.app.inject({ method: 'GET', url: '/api/tools/comfy/logs?max=5' });
      expect(harness.ctx.supervisor.logs).toHaveBeenCalledWith('comfy', 5);
    });

    it('rejects max outside 1..1000', async () => {
      for (const max of ['0', '1001', 'abc']) {
        const res = await harness.app.inject({ method: 'GET', url: `/api/tools/comfy/logs?max=${max}` });
        expect(res.statusCode).toBe(400);
        expect(JSON.parse(res.body).error.code).toBe('INVALID_INPUT');
      }
      expect(harness.ctx.supervisor.logs).not.toHaveBeenCalled();
    });
  });

  // ========== POST /api/tools/:toolId/launch ==========

  describe('POST /api/tools/:toolId/launch', () => {
    it('launches with args and profile', async () => {
      const res = await harness.app.inject({
        method: 'POST',
        url: '/api/tools/comfy/launch',
        payload: { args: ['--port', '9000'], profile: 'cpu' },
      });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({
        success: true,
        toolId: 'comfy',
        pid: 4321,
        logFile: '/w/logs/comfy-20240131-142507.log',
        command: ['/w/comfy/venv/bin/python', '/w/comfy/main.py'],
      });
      expect(harness.ctx.supervisor.launch).toHaveBeenCalledWith('comfy', {
        customArgs: ['--port', '9000'],
        hardwareProfile: 'cpu',
      });
    });

    it('accepts an empty body', async () => {
      const res = await harness.app.inject({ method: 'POST', url: '/api/tools/comfy/launch' });
      expect(res.statusCode).toBe(200);
      expect(harness.ctx.supervisor.launch).toHaveBeenCalledWith('comfy', {
        customArgs: undefined,
        hardwareProfile: undefined,
      });
    });

    it('rejects unknown fields and non-string args', async () => {
      const extra = await harness.app.inject({ method: 'POST', url: '/api/tools/comfy/launch', payload: { force: true } });
      const badArgs = await harness.app.inject({ method: 'POST', url: '/api/tools/comfy/launch', payload: { args: [1, 2] } });

      expect(extra.statusCode).toBe(400);
      expect(badArgs.statusCode).toBe(400);
      expect(harness.ctx.supervisor.launch).not.toHaveBeenCalled();
    });

    it('maps ALREADY_RUNNING and NOT_INSTALLED to 409', async () => {
      harness.ctx.supervisor.launch.mockResolvedValueOnce({
        success: false,
        toolId: 'comfy',
        code: 'ALREADY_RUNNING',
        error: 'Tool "comfy" is already running (PID 4321); stop it first',
      });
      harness.ctx.supervisor.launch.mockResolvedValueOnce({
        success: false,
        toolId: 'comfy',
        code: 'NOT_INSTALLED',
        error: 'Tool "comfy" is not installed (missing /w/comfy)',
      });

      const running = await harness.app.inject({ method: 'POST', url: '/api/tools/comfy/launch', payload: {} });
      const missing = await harness.app.inject({ method: 'POST', url: '/api/tools/comfy/launch', payload: {} });

      expect(running.statusCode).toBe(409);
      expect(JSON.parse(running.body).error).toEqual({
        code: 'ALREADY_RUNNING',
        message: 'Tool "comfy" is already running (PID 4321); stop it first',
      });
      expect(missing.statusCode).toBe(409);
      expect(JSON.parse(missing.body).error.code).toBe('NOT_INSTALLED');
    });

    it('maps a spawn failure to 500', async () => {
      harness.ctx.supervisor.launch.mockResolvedValueOnce({
        success: false,
        toolId: 'comfy',
        code: 'LAUNCH_FAILED',
        error: 'Failed to spawn /w/comfy/venv/bin/python: spawn /w/comfy/venv/bin/python ENOENT',
      });
      const res = await harness.app.inject({ method: 'POST', url: '/api/tools/comfy/launch', payload: {} });
      expect(res.statusCode).toBe(500);
      expect(JSON.parse(res.body).error.code).toBe('OPERATION_FAILED');
    });

    it('returns 404 for an unknown tool', async () => {
      const res = await harness.app.inject({ method: 'POST', url: '/api/tools/nope/launch', payload: {} });
      expect(res.statusCode).toBe(404);
    });
  });

  // ========== POST /api/tools/:toolId/stop ==========

  describe('POST /api/tools/:toolId/stop', () => {
    it('stops and reports the resulting status', async () => {
      harness.ctx.supervisor.status.mockReturnValueOnce('stopped');
      const res = await harness.app.inject({ method: 'POST', url: '/api/tools/comfy/stop' });
      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({ success: true, toolId: 'comfy', status: 'stopped' });
      expect(harness.ctx.supervisor.stop).toHaveBeenCalledWith('comfy');
    });

    it('returns 500 when the process could not be stopped', async () => {
      harness.ctx.supervisor.stop.mockResolvedValueOnce(false);
      const res = await harness.app.inject({ method: 'POST', url: '/api/tools/comfy/stop' });
      expect(res.statusCode).toBe(500);
      expect(JSON.parse(res.body).error).toEqual({ code: 'OPERATION_FAILED', message: 'Failed to stop comfy' });
    });
  });
});
