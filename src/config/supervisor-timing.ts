/**
 * @fileoverview Supervisor timing constants.
 *
 * Controls termination escalation, the startup fallback heuristic, and
 * dashboard polling.
 *
 * @module config/supervisor-timing
 */

// ============================================================================
// Termination
// ============================================================================

/** How long a stopped tool gets to exit after SIGTERM before SIGKILL (ms) */
export const STOP_GRACE_PERIOD_MS = 10_000;

// ============================================================================
// Status Inference
// ============================================================================

/**
 * A tool still `starting` after this long is reported as `running` even if it
 * never printed a recognized ready phrase (ms).
 */
export const STARTUP_FALLBACK_MS = 30_000;

// ============================================================================
// Web Server & Dashboard
// ============================================================================

/** Default dashboard API port (matches the usual web UI port range) */
export const DEFAULT_SERVER_PORT = 7860;

/** Default bind address; the API can launch processes, keep it local */
export const DEFAULT_SERVER_HOST = '127.0.0.1';

/** Dashboard refresh interval (ms) */
export const DASHBOARD_POLL_INTERVAL_MS = 1000;

// ============================================================================
// Process Error Recovery
// ============================================================================

/** Max consecutive unhandled errors before the server exits */
export const MAX_CONSECUTIVE_ERRORS = 5;

/** Error counter reset interval; errors are forgiven after a quiet period (ms) */
export const ERROR_RESET_MS = 60_000;
