/**
 * @fileoverview Dashboard state hook
 *
 * Polls the supervisor API for the tool list and drains log lines for the
 * selected tool. Drained lines are kept locally (the server hands each line
 * out once), capped at {@link MAX_VISIBLE_LOG_LINES}.
 */

import { useState, useEffect, useCallback, useRef } from 'react';
import type { SupervisorClient } from '../../api-client.js';
import { DASHBOARD_POLL_INTERVAL_MS } from '../../config/supervisor-timing.js';
import { DEFAULT_LOG_READ_LINES } from '../../config/buffer-limits.js';
import { getErrorMessage, type ToolSummary } from '../../types.js';

/** Lines kept per tool in the log pane */
export const MAX_VISIBLE_LOG_LINES = 500;

export interface UseSupervisorResult {
  tools: ToolSummary[];
  selectedIndex: number;
  selectedTool: ToolSummary | null;
  logLines: string[];
  /** Last action result or connection error */
  message: string | null;
  connected: boolean;
  selectNext: () => void;
  selectPrev: () => void;
  launchSelected: () => void;
  stopSelected: () => void;
}

export function useSupervisor(client: SupervisorClient): UseSupervisorResult {
  const [tools, setTools] = useState<ToolSummary[]>([]);
  const [selectedIndex, setSelectedIndex] = useState(0);
  const [logsByTool, setLogsByTool] = useState<Record<string, string[]>>({});
  const [message, setMessage] = useState<string | null>(null);
  const [connected, setConnected] = useState(false);
  const polling = useRef(false);

  const selectedTool = tools[selectedIndex] ?? null;
  const selectedId = selectedTool?.toolId ?? null;

  const appendLines = useCallback((toolId: string, lines: string[]) => {
    if (lines.length === 0) return;
    setLogsByTool((prev) => {
      const merged = [...(prev[toolId] ?? []), ...lines].slice(-MAX_VISIBLE_LOG_LINES);
      return { ...prev, [toolId]: merged };
    });
  }, []);

  const poll = useCallback(async () => {
    // Skip a tick rather than stack requests behind a slow server
    if (polling.current) return;
    polling.current = true;
    try {
      const list = await client.listTools();
      setTools(list);
      setConnected(true);
      if (selectedId) {
        appendLines(selectedId, await client.logs(selectedId, DEFAULT_LOG_READ_LINES));
      }
    } catch (err) {
      setConnected(false);
      setMessage(getErrorMessage(err));
    } finally {
      polling.current = false;
    }
  }, [client, selectedId, appendLines]);

  useEffect(() => {
    poll().catch((err: unknown) => setMessage(getErrorMessage(err)));
    const timer = setInterval(() => {
      poll().catch((err: unknown) => setMessage(getErrorMessage(err)));
    }, DASHBOARD_POLL_INTERVAL_MS);
    return () => clearInterval(timer);
  }, [poll]);

  // Keep the selection in range when the list shrinks
  useEffect(() => {
    if (selectedIndex >= tools.length && tools.length > 0) {
      setSelectedIndex(tools.length - 1);
    }
  }, [tools.length, selectedIndex]);

  const selectNext = useCallback(() => {
    setSelectedIndex((i) => (tools.length === 0 ? 0 : (i + 1) % tools.length));
  }, [tools.length]);

  const selectPrev = useCallback(() => {
    setSelectedIndex((i) => (tools.length === 0 ? 0 : (i - 1 + tools.length) % tools.length));
  }, [tools.length]);

  const launchSelected = useCallback(() => {
    if (!selectedId) return;
    setMessage(`Launching ${selectedId}...`);
    client.launch(selectedId).then(
      (result) => setMessage(`Launched ${selectedId} (PID ${result.pid})`),
      (err: unknown) => setMessage(`Launch failed: ${getErrorMessage(err)}`),
    );
  }, [client, selectedId]);

  const stopSelected = useCallback(() => {
    if (!selectedId) return;
    setMessage(`Stopping ${selectedId}...`);
    client.stop(selectedId).then(
      (status) => setMessage(`${selectedId}: ${status}`),
      (err: unknown) => setMessage(`Stop failed: ${getErrorMessage(err)}`),
    );
  }, [client, selectedId]);

  return {
    tools,
    selectedIndex,
    selectedTool,
    logLines: selectedId ? logsByTool[selectedId] ?? [] : [],
    message,
    connected,
    selectNext,
    selectPrev,
    launchSelected,
    stopSelected,
  };
}
