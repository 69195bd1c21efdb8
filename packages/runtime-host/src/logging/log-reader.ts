/**
 * Promote Runtime Host — LogReader
 *
 * Pure functions for reading promotions.jsonl with dedupe-on-read.
 *
 * Guarantees:
 *   LOGR-U1: parse every valid JSONL event; drop malformed lines (counted in parseErrors)
 *   LOGR-U2: deduplicate events by event_id; first-seen wins, later copies counted in duplicates
 *   LOGR-U3: content not ending with '\n' has a partial trailing line; it is dropped and flagged
 *   LOGR-U4: output events are sorted by (timestamp asc, event_id asc)
 *   LOGR-U5: empty input returns an empty result with zero stats
 *
 * No I/O here. Callers obtain raw content via StateIO.readLogRaw().
 */

import { PromotionErrorKind, PromotionLogOutcome, type PromotionLogEntry } from '@promote/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * One parsed line of promotions.jsonl. Only event_id is guaranteed; the
 * remaining fields are present for lines written by FileLogSink.
 */
export type PromotionLogEvent = Partial<PromotionLogEntry> & {
  /** 26-character ULID, the deduplication key. */
  readonly event_id: string;
};

export interface LogReadStats {
  /** Non-empty lines processed. */
  totalLines: number;
  /** Events kept after deduplication. */
  parsedEvents: number;
  duplicates: number;
  /** Lines that were not JSON objects with a string event_id. */
  parseErrors: number;
  /** True if the content did not end with '\n' (mid-write truncation). */
  partialTrailingLine: boolean;
}

export interface LogReadResult {
  events: ReadonlyArray<PromotionLogEvent>;
  stats: LogReadStats;
}

export interface LogFilter {
  readonly app?: string | undefined;
  /** Matches either end of the promotion. */
  readonly env?: string | undefined;
  readonly outcome?: string | undefined;
  /** Keep only the most recent N events. */
  readonly limit?: number | undefined;
}

// ---------------------------------------------------------------------------
// readLog
// ---------------------------------------------------------------------------

export function readLog(rawContent: string): LogReadResult {
  if (rawContent.length === 0) {
    return {
      events: [],
      stats: { totalLines: 0, parsedEvents: 0, duplicates: 0, parseErrors: 0, partialTrailingLine: false },
    };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  // A trailing '\n' yields an empty last element; a partial line is dropped.
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Map<string, PromotionLogEvent>();

  for (const line of lines) {
    const event = parseEvent(line);
    if (event === null) {
      parseErrors++;
    } else if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.set(event.event_id, event);
    }
  }

  const events = [...seen.values()].sort((a, b) => {
    const ta = a.timestamp ?? '';
    const tb = b.timestamp ?? '';
    if (ta !== tb) return ta < tb ? -1 : 1;
    if (a.event_id === b.event_id) return 0;
    return a.event_id < b.event_id ? -1 : 1;
  });

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}

// ---------------------------------------------------------------------------
// filterEvents
// ---------------------------------------------------------------------------

/** Apply a LogFilter to events already in time order. */
export function filterEvents(
  events: ReadonlyArray<PromotionLogEvent>,
  filter: LogFilter,
): PromotionLogEvent[] {
  const matching = events.filter(
    (e) =>
      (filter.app === undefined || e.app === filter.app) &&
      (filter.env === undefined || e.from_env === filter.env || e.to_env === filter.env) &&
      (filter.outcome === undefined || e.outcome === filter.outcome),
  );
  if (filter.limit === undefined || matching.length <= filter.limit) return matching;
  return matching.slice(matching.length - filter.limit);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const OUTCOMES: ReadonlyArray<PromotionLogOutcome> = Object.values(PromotionLogOutcome);
const ERROR_KINDS: ReadonlyArray<PromotionErrorKind> = Object.values(PromotionErrorKind);

function parseEvent(line: string): PromotionLogEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
  if (!('event_id' in parsed) || typeof parsed.event_id !== 'string') return null;

  const fields: { [key: string]: unknown } = { ...parsed };
  return {
    event_id: parsed.event_id,
    app: stringField(fields, 'app'),
    from_env: stringField(fields, 'from_env'),
    to_env: stringField(fields, 'to_env'),
    outcome: outcomeField(fields),
    error_kind: errorKindField(fields),
    message: nullableString(fields, 'message'),
    image: nullableString(fields, 'image'),
    anchor_sha: nullableString(fields, 'anchor_sha'),
    promoted_at: nullableString(fields, 'promoted_at'),
    commit_sha: nullableString(fields, 'commit_sha'),
    timestamp: stringField(fields, 'timestamp'),
  };
}

function stringField(fields: { [key: string]: unknown }, key: string): string | undefined {
  const value = fields[key];
  return typeof value === 'string' ? value : undefined;
}

function nullableString(fields: { [key: string]: unknown }, key: string): string | null | undefined {
  const value = fields[key];
  if (value === null) return null;
  return typeof value === 'string' ? value : undefined;
}

function outcomeField(fields: { [key: string]: unknown }): PromotionLogOutcome | undefined {
  const value = fields['outcome'];
  return OUTCOMES.find((o) => o === value);
}

function errorKindField(fields: { [key: string]: unknown }): PromotionErrorKind | null | undefined {
  const value = fields['error_kind'];
  if (value === null) return null;
  return ERROR_KINDS.find((k) => k === value);
}
