/**
 * @fileoverview Centralized buffer size limits for memory management.
 *
 * Each launched tool keeps a bounded in-memory queue of recent log lines next
 * to its on-disk log file. The file is the durable record; the queue only
 * serves log readers (CLI, dashboard) and is drained as they read.
 *
 * Memory budget: ~200 bytes per formatted line × 1000 lines × a handful of
 * tools stays well under a few MB.
 *
 * @module config/buffer-limits
 */

// ============================================================================
// Log Buffer Limits
// ============================================================================

/**
 * Maximum entries held in a tool's log buffer.
 * When full, newly arriving lines are dropped (oldest entries are kept).
 */
export const MAX_LOG_BUFFER_ENTRIES = 1000;

/**
 * Default number of entries returned by one log read.
 */
export const DEFAULT_LOG_READ_LINES = 100;

// ============================================================================
// Lifecycle Log Limits
// ============================================================================

/** Lifecycle log is trimmed on server start once it exceeds this many lines */
export const MAX_LIFECYCLE_LOG_LINES = 10_000;

/** Lines kept after trimming the lifecycle log */
export const TRIM_LIFECYCLE_LOG_TO = 8_000;
