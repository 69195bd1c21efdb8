/**
 * Promote Core — Promotion Logger
 *
 * Turns the end state of one promotion attempt into a PromotionLogEntry and
 * forwards it to the LogSink. With no sink record() is a no-op.
 *
 * A sink failure is returned, not thrown: the entry is written after the
 * commit and push, and must not hide their result.
 *
 * Outcome mapping:
 *   published             → Promoted
 *   dry run               → Planned
 *   rejection kind        → Rejected (nothing was written)
 *   any other failure     → Failed
 */

import { PromotionLogOutcome, type PromotionLogEntry } from '../types/log.js';
import type { PromotionPlan, PromotionRequest, PromotionResult } from '../types/promotion.js';
import { REJECTION_KINDS, describeError } from '../types/errors.js';
import type { LogSink } from './log-sink.js';

/** How an attempt ended: a result, or an error that was not a PromotionError. */
export type AttemptEnd =
  | { readonly result: PromotionResult }
  | { readonly unexpected: unknown };

export class PromotionLogger {
  constructor(private readonly sink?: LogSink) {}

  /** Returns the sink's error message, or null when the entry was written. */
  record(request: PromotionRequest, plan: PromotionPlan | null, end: AttemptEnd, finishedAt: Date): string | null {
    if (this.sink === undefined) return null;
    try {
      this.sink.append(promotionLogEntry(request, plan, end, finishedAt));
      return null;
    } catch (err: unknown) {
      return describeError(err);
    }
  }
}

export function promotionLogEntry(
  request: PromotionRequest,
  plan: PromotionPlan | null,
  end: AttemptEnd,
  finishedAt: Date,
): PromotionLogEntry {
  const base = {
    app: request.app,
    from_env: request.fromEnv,
    to_env: request.toEnv,
    image: plan === null ? null : `${plan.image.repository}:${plan.image.tag}`,
    anchor_sha: plan?.anchorSha ?? null,
    promoted_at: plan?.promotedAt ?? null,
    timestamp: finishedAt.toISOString(),
  };

  if (!('result' in end)) {
    return {
      ...base,
      outcome: PromotionLogOutcome.Failed,
      error_kind: null,
      message: describeError(end.unexpected),
      commit_sha: null,
    };
  }

  const { result } = end;
  if (result.ok) {
    const { published } = result.outcome;
    return {
      ...base,
      outcome: published === null ? PromotionLogOutcome.Planned : PromotionLogOutcome.Promoted,
      error_kind: null,
      message: null,
      commit_sha: published?.commitSha ?? null,
    };
  }

  return {
    ...base,
    outcome: REJECTION_KINDS.has(result.error.kind) ? PromotionLogOutcome.Rejected : PromotionLogOutcome.Failed,
    error_kind: result.error.kind,
    message: result.error.message,
    commit_sha: result.error.details.commitSha ?? null,
  };
}
