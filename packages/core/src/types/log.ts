/**
 * Promote Core — Promotion Log Types
 *
 * Every promotion attempt produces exactly one log entry, whatever its
 * outcome: a refused promotion is as much part of the audit trail as a
 * published one.
 */

import type { PromotionErrorKind } from './errors.js';

export enum PromotionLogOutcome {
  /** Committed and pushed. */
  Promoted = 'Promoted',
  /** Dry run: planned, nothing written. */
  Planned = 'Planned',
  /** Refused before anything was written (input, record or guard failure). */
  Rejected = 'Rejected',
  /** Failed after the write began, or on an unexpected error. */
  Failed = 'Failed',
}

export interface PromotionLogEntry {
  readonly app: string;
  readonly from_env: string;
  readonly to_env: string;
  readonly outcome: PromotionLogOutcome;
  /** Null unless the attempt failed with a PromotionError. */
  readonly error_kind: PromotionErrorKind | null;
  readonly message: string | null;
  /** `<repository>:<tag>`, once the source image was read. */
  readonly image: string | null;
  readonly anchor_sha: string | null;
  readonly promoted_at: string | null;
  /** Local commit, present on success and on push failure. */
  readonly commit_sha: string | null;
  /** ISO-8601 time the attempt finished. */
  readonly timestamp: string;
}
