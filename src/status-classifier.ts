/**
 * @fileoverview Output-line status inference.
 *
 * Tools print free-form text. A small ordered rule table maps recognizable
 * phrases to a status transition. Rules are checked top to bottom and the
 * first match wins, so a line that says both "model loaded" and "error" is
 * classified as running.
 *
 * @module status-classifier
 */

import type { ToolStatus } from './types.js';

export type ClassifiedStatus = Extract<ToolStatus, 'running' | 'error'>;

export interface StatusRule {
  status: ClassifiedStatus;
  /** Lower-case substrings; any one matching triggers the rule */
  phrases: readonly string[];
}

/** Ordered: running phrases take precedence over error phrases on the same line. */
export const STATUS_RULES: readonly StatusRule[] = [
  { status: 'running', phrases: ['running on', 'server started', 'listening on', 'model loaded'] },
  { status: 'error', phrases: ['error', 'failed', 'exception', 'traceback'] },
];

/**
 * Classify one raw output line (case-insensitive).
 * Returns the status the line implies, or null when it implies nothing.
 */
export function classifyLine(line: string, rules: readonly StatusRule[] = STATUS_RULES): ClassifiedStatus | null {
  const lower = line.toLowerCase();
  for (const rule of rules) {
    if (rule.phrases.some((phrase) => lower.includes(phrase))) {
      return rule.status;
    }
  }
  return null;
}

/**
 * Apply a classified transition to a current status.
 * `stopped` is terminal and `not_started` has no process to classify, so both
 * are left as they are; no transition also leaves the status unchanged.
 */
export function nextStatus(current: ToolStatus, classified: ClassifiedStatus | null): ToolStatus {
  if (classified === null) return current;
  if (current === 'stopped' || current === 'not_started') return current;
  return classified;
}
