/**
 * Tests for BoundedLogBuffer.
 *
 * Port: N/A (unit tests, no server)
 */

import { BoundedLogBuffer } from '../src/log-buffer.js';
import type { LogEntry } from '../src/types.js';

function entry(n: number): LogEntry {
  return { timestamp: n, text: `line ${n}` };
}

describe('BoundedLogBuffer', () => {
  it('defaults to 1000 entries', () => {
    expect(new BoundedLogBuffer().capacity).toBe(1000);
  });

  it('rejects non-positive capacities', () => {
    expect(() => new BoundedLogBuffer(0)).toThrow(RangeError);
    expect(() => new BoundedLogBuffer(1.5)).toThrow(RangeError);
  });

  it('drains in arrival order', () => {
    const buffer = new BoundedLogBuffer(10);
    for (let i = 1; i <= 3; i++) buffer.tryPush(entry(i));

    expect(buffer.drain(10).map((e) => e.text)).toEqual(['line 1', 'line 2', 'line 3']);
    expect(buffer.size).toBe(0);
  });

  it('never returns a drained entry twice', () => {
    const buffer = new BoundedLogBuffer(10);
    for (let i = 1; i <= 5; i++) buffer.tryPush(entry(i));

    expect(buffer.drain(2).map((e) => e.timestamp)).toEqual([1, 2]);
    expect(buffer.drain(2).map((e) => e.timestamp)).toEqual([3, 4]);
    expect(buffer.drain(2).map((e) => e.timestamp)).toEqual([5]);
    expect(buffer.drain(2)).toEqual([]);
  });

  it('drops the incoming entry when full and keeps unread ones', () => {
    const buffer = new BoundedLogBuffer(1000);
    for (let i = 1; i <= 1000; i++) {
      expect(buffer.tryPush(entry(i))).toBe(true);
    }
    expect(buffer.isFull).toBe(true);

    expect(buffer.tryPush(entry(1001))).toBe(false);
    expect(buffer.size).toBe(1000);
    expect(buffer.dropped).toBe(1);

    const drained = buffer.drain(1000);
    expect(drained[0].timestamp).toBe(1);
    expect(drained[999].timestamp).toBe(1000);
  });

  it('accepts entries again after a drain frees space', () => {
    const buffer = new BoundedLogBuffer(2);
    buffer.tryPush(entry(1));
    buffer.tryPush(entry(2));
    buffer.drain(1);

    expect(buffer.tryPush(entry(3))).toBe(true);
    expect(buffer.drain(5).map((e) => e.timestamp)).toEqual([2, 3]);
  });

  it('treats zero, negative and fractional drain sizes sensibly', () => {
    const buffer = new BoundedLogBuffer(5);
    buffer.tryPush(entry(1));
    buffer.tryPush(entry(2));

    expect(buffer.drain(0)).toEqual([]);
    expect(buffer.drain(-3)).toEqual([]);
    expect(buffer.drain(1.9).map((e) => e.timestamp)).toEqual([1]);
  });

  it('clear() empties the buffer', () => {
    const buffer = new BoundedLogBuffer(5);
    buffer.tryPush(entry(1));
    buffer.clear();
    expect(buffer.size).toBe(0);
    expect(buffer.drain(5)).toEqual([]);
  });
});
