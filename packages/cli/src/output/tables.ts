/**
 * Column layouts for `status`, `history` and `log`.
 */

import { parsePromotionMessage, type CommitInfo, type RecordSummary } from '@promote/core';
import type { PromotionLogEvent } from '@promote/runtime-host';

const EMPTY = '-';

/** Left-aligned columns separated by two spaces; trailing blanks trimmed. */
export function formatTable(headers: ReadonlyArray<string>, rows: ReadonlyArray<ReadonlyArray<string>>): string[] {
  const widths = headers.map((header, i) => Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)));
  const render = (cells: ReadonlyArray<string>): string =>
    widths.map((width, i) => (cells[i] ?? '').padEnd(width)).join('  ').trimEnd();
  return [render(headers), ...rows.map(render)];
}

function cell(value: string | null | undefined): string {
  return value === undefined || value === null || value.trim() === '' ? EMPTY : value;
}

// ---------------------------------------------------------------------------
// status
// ---------------------------------------------------------------------------

export type StatusRow =
  | { readonly env: string; readonly summary: RecordSummary }
  | { readonly env: string; readonly error: string };

/**
 * Order environments by the configured chain, then any others by name.
 */
export function sortEnvironments(envs: ReadonlyArray<string>, order: ReadonlyArray<string>): string[] {
  const rank = (env: string): number => {
    const i = order.indexOf(env);
    return i === -1 ? order.length : i;
  };
  return [...envs].sort((a, b) => rank(a) - rank(b) || (a < b ? -1 : a > b ? 1 : 0));
}

export function formatStatus(rows: ReadonlyArray<StatusRow>): string[] {
  return formatTable(
    ['ENV', 'TAG', 'ANCHOR', 'FROM', 'PROMOTED AT'],
    rows.map((row) =>
      'error' in row
        ? [row.env, `unreadable: ${row.error}`]
        : [
            row.env,
            cell(row.summary.tag),
            cell(row.summary.anchorSha),
            cell(row.summary.fromEnv),
            cell(row.summary.promotedAt),
          ],
    ),
  );
}

// ---------------------------------------------------------------------------
// history
// ---------------------------------------------------------------------------

export interface PromotionCommit {
  readonly sha: string;
  readonly date: string;
  readonly author: string;
  readonly app: string;
  readonly fromEnv: string;
  readonly toEnv: string;
  readonly tag: string;
  readonly anchorSha: string;
}

/** Keep the commits whose subject is a promotion message, optionally for one app. */
export function promotionCommits(commits: ReadonlyArray<CommitInfo>, app?: string): PromotionCommit[] {
  const result: PromotionCommit[] = [];
  for (const commit of commits) {
    const message = parsePromotionMessage(commit.subject);
    if (message === null || (app !== undefined && message.app !== app)) continue;
    result.push({ sha: commit.sha, date: commit.date, author: commit.author, ...message });
  }
  return result;
}

export function formatHistory(commits: ReadonlyArray<PromotionCommit>): string[] {
  return formatTable(
    ['COMMIT', 'DATE', 'APP', 'PROMOTION', 'TAG', 'ANCHOR', 'AUTHOR'],
    commits.map((c) => [
      c.sha.slice(0, 12),
      c.date,
      c.app,
      `${c.fromEnv}→${c.toEnv}`,
      c.tag,
      c.anchorSha,
      c.author,
    ]),
  );
}

// ---------------------------------------------------------------------------
// log
// ---------------------------------------------------------------------------

/** One line per audit entry: time, outcome, promotion, then detail. */
export function formatLogEvent(event: PromotionLogEvent): string {
  const promotion = `${cell(event.app)} ${cell(event.from_env)}→${cell(event.to_env)}`;
  const detail =
    event.error_kind !== undefined && event.error_kind !== null
      ? `${event.error_kind}: ${cell(event.message)}`
      : `${cell(event.image)} anchor=${cell(event.anchor_sha)}` +
        (event.commit_sha !== undefined && event.commit_sha !== null ? ` commit=${event.commit_sha.slice(0, 12)}` : '');
  return `${cell(event.timestamp)}  ${cell(event.outcome).padEnd(8)}  ${promotion}  ${detail}`;
}
