/**
 * Promote Core — Log Sink Interface
 *
 * Injection point for promotion log persistence. The core owns the contract;
 * the runtime host provides the file-backed implementation, so the core never
 * writes to disk.
 */

import type { PromotionLogEntry } from '../types/log.js';

/**
 * Receives and persists promotion log entries.
 *
 * append() completes before the workflow returns. Implementations must not
 * silently discard entries.
 */
export interface LogSink {
  append(entry: PromotionLogEntry): void;
}
