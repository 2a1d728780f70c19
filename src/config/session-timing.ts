/**
 * @fileoverview Session timing and buffer constants.
 *
 * @module config/session-timing
 */

// ============================================================================
// Output Pump
// ============================================================================

/** Output poll interval — worst-case relay latency for interpreter output (ms) */
export const OUTPUT_POLL_INTERVAL_MS = 200;

/** Upper bound accepted for a configured poll interval (ms) */
export const MAX_POLL_INTERVAL_MS = 10_000;

// ============================================================================
// Stream Buffers
// ============================================================================

/** Max unpolled text held per output stream (chars) */
export const MAX_STREAM_BUFFER_SIZE = 1024 * 1024;

/** Size kept after trimming an overfull stream buffer (chars) */
export const TRIM_STREAM_BUFFER_TO = 768 * 1024;
