/**
 * @fileoverview Authoritative map from tool id to its current process record.
 *
 * The registry is the only place a ProcessRecord is mutated. Every method runs
 * to completion on the event loop, so a status update and a lookup can never
 * interleave; readers get frozen snapshots and never observe a record while
 * it is being changed.
 *
 * Writers that act on behalf of one launch (the output monitor) pass its
 * `launchId`, so a monitor left over from an earlier launch cannot touch the
 * record of a later one.
 *
 * Events emitted:
 * - `registered` (snapshot: ProcessRecordSnapshot)
 * - `statusChanged` (event: StatusChangeEvent)
 * - `removed` ({ toolId: string })
 *
 * @module process-registry
 */

import { EventEmitter } from 'node:events';
import type { ProcessRecord, ProcessRecordSnapshot, ToolStatus } from './types.js';

export interface StatusChangeEvent {
  toolId: string;
  launchId: string;
  previous: ToolStatus;
  status: ToolStatus;
}

export class ProcessRegistry extends EventEmitter {
  private records: Map<string, ProcessRecord> = new Map();

  constructor() {
    super();
    this.setMaxListeners(50);
  }

  private snapshot(record: ProcessRecord): ProcessRecordSnapshot {
    return Object.freeze({ ...record, command: Object.freeze([...record.command]) });
  }

  /**
   * Store a record as the current one for its tool.
   * @returns the record it replaced, if any
   */
  register(record: ProcessRecord): ProcessRecordSnapshot | undefined {
    const previous = this.records.get(record.toolId);
    const stored: ProcessRecord = { ...record, command: [...record.command] };
    this.records.set(record.toolId, stored);
    this.emit('registered', this.snapshot(stored));
    return previous ? this.snapshot(previous) : undefined;
  }

  get(toolId: string): ProcessRecordSnapshot | undefined {
    const record = this.records.get(toolId);
    return record ? this.snapshot(record) : undefined;
  }

  has(toolId: string): boolean {
    return this.records.has(toolId);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Set a record's status.
   *
   * `stopped` is terminal: once a record is stopped, only `stopped` is
   * accepted. When `launchId` is given and does not match the current
   * record, nothing changes.
   *
   * @returns true if the stored status now equals `status`
   */
  updateStatus(toolId: string, status: ToolStatus, launchId?: string): boolean {
    return this.applyStatus(toolId, () => status, launchId) === status;
  }

  /**
   * Compute and store a new status from the current one in a single step.
   * @returns the resulting status, or null when there is no matching record
   */
  applyStatus(
    toolId: string,
    compute: (current: ToolStatus) => ToolStatus,
    launchId?: string,
  ): ToolStatus | null {
    const record = this.records.get(toolId);
    if (!record) return null;
    if (launchId !== undefined && record.launchId !== launchId) return null;

    const previous = record.status;
    const next = compute(previous);
    if (next === previous) return previous;
    if (previous === 'stopped') return previous;

    record.status = next;
    this.emit('statusChanged', {
      toolId,
      launchId: record.launchId,
      previous,
      status: next,
    } satisfies StatusChangeEvent);
    return next;
  }

  /** All current records, in registration order. */
  list(): Array<[string, ProcessRecordSnapshot]> {
    return Array.from(this.records.entries(), ([toolId, record]) => [toolId, this.snapshot(record)]);
  }

  remove(toolId: string, launchId?: string): boolean {
    const record = this.records.get(toolId);
    if (!record) return false;
    if (launchId !== undefined && record.launchId !== launchId) return false;
    this.records.delete(toolId);
    this.emit('removed', { toolId });
    return true;
  }
}
