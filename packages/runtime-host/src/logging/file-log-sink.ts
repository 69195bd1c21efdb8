/**
 * Promote Runtime Host — File-backed Promotion Log Sink
 *
 * Implements the LogSink interface from @promote/core by appending one JSONL
 * line per promotion attempt to `<home>/logs/promotions.jsonl`.
 *
 * The write is synchronous: the entry is on disk before the workflow returns
 * its result.
 */

import type { LogSink, PromotionLogEntry } from '@promote/core';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const PROMOTION_LOG_FILE = 'promotions.jsonl';

export class FileLogSink implements LogSink {
  constructor(private readonly stateIO: StateIO) {}

  append(entry: PromotionLogEntry): void {
    const line = JSON.stringify({ event_id: ulid(), ...entry });
    this.stateIO.appendLine(PROMOTION_LOG_FILE, line);
  }
}
