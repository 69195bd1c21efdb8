/**
 * Promote Core — Promotion Types
 */

import type { RecordLayout, RecordLocation } from './record.js';
import type { PromotionError } from './errors.js';

/** What the operator asked for. */
export interface PromotionRequest {
  readonly app: string;
  readonly fromEnv: string;
  readonly toEnv: string;
}

/**
 * Everything environment-dependent, passed explicitly so the workflow never
 * reads ambient process state.
 */
export interface PromotionContext {
  readonly layout: RecordLayout;
  /** First environment in the chain; seeded by CI and exempt from ChainIntegrity. */
  readonly rootEnvironment: string;
  readonly remote: string;
  readonly branch: string;
  /** Number of leading hex characters kept from the source revision. */
  readonly anchorLength: number;
}

export interface SourceImage {
  readonly repository: string;
  readonly tag: string;
}

/** The fully computed promotion, before anything is written. */
export interface PromotionPlan {
  readonly app: string;
  readonly fromEnv: string;
  readonly toEnv: string;
  readonly source: RecordLocation;
  readonly target: RecordLocation;
  readonly image: SourceImage;
  /** Full revision id of the last commit touching the source record. */
  readonly sourceRevision: string;
  /** `sourceRevision` truncated to the configured anchor length. */
  readonly anchorSha: string;
  /** ISO-8601 UTC, second precision. */
  readonly promotedAt: string;
  readonly commitMessage: string;
}

export interface PublishReceipt {
  readonly commitSha: string;
  readonly remote: string;
  readonly branch: string;
}

export interface PromotionOutcome {
  readonly plan: PromotionPlan;
  /** Null for a dry run. */
  readonly published: PublishReceipt | null;
}

/**
 * `logError` is set when the audit entry could not be written. It never
 * changes the outcome: a pushed promotion stays pushed.
 */
export type PromotionResult =
  | { readonly ok: true; readonly outcome: PromotionOutcome; readonly logError?: string | undefined }
  | {
      readonly ok: false;
      readonly error: PromotionError;
      readonly plan: PromotionPlan | null;
      readonly logError?: string | undefined;
    };

export interface PromoteOptions {
  /** Stop after planning: no write, no commit, no push. */
  readonly dryRun?: boolean | undefined;
  /** Called once with the plan, before the target record is written. */
  readonly onPlan?: ((plan: PromotionPlan) => void) | undefined;
}
