/**
 * @fileoverview Bounded, drain-on-read log queue.
 *
 * One instance per launch. The output monitor pushes formatted entries; log
 * readers drain them. Unlike a ring buffer, a full queue rejects the incoming
 * entry and keeps what it already holds, so a burst of output never pushes
 * unread lines out. The producer never waits.
 *
 * @module log-buffer
 */

import { MAX_LOG_BUFFER_ENTRIES } from './config/buffer-limits.js';
import type { LogEntry } from './types.js';

export class BoundedLogBuffer {
  private entries: LogEntry[] = [];
  private head = 0;
  private _dropped = 0;
  readonly capacity: number;

  constructor(capacity: number = MAX_LOG_BUFFER_ENTRIES) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.length - this.head;
  }

  get isFull(): boolean {
    return this.size >= this.capacity;
  }

  /** Entries rejected because the buffer was full */
  get dropped(): number {
    return this._dropped;
  }

  /**
   * Non-blocking push.
   * @returns false when the buffer was full and the entry was dropped
   */
  tryPush(entry: LogEntry): boolean {
    if (this.isFull) {
      this._dropped++;
      return false;
    }
    this.entries.push(entry);
    return true;
  }

  /**
   * Remove and return up to `maxEntries` entries in arrival order.
   * Drained entries are never returned again.
   */
  drain(maxEntries: number): LogEntry[] {
    const count = Math.max(0, Math.min(Math.floor(maxEntries), this.size));
    if (count === 0) return [];

    const out = this.entries.slice(this.head, this.head + count);
    this.head += count;

    // Compact once the consumed prefix dominates, so the array doesn't grow forever
    if (this.head >= this.capacity || this.head * 2 >= this.entries.length) {
      this.entries = this.entries.slice(this.head);
      this.head = 0;
    }
    return out;
  }

  clear(): void {
    this.entries = [];
    this.head = 0;
  }
}
