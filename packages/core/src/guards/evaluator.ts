/**
 * Promote Core — Guard Evaluator
 *
 * Decides whether a promotion may proceed. Guards run in a fixed order and
 * the first failure aborts the promotion before anything is written:
 *
 *   1. CleanSource     — the source record matches its last commit, and has one.
 *                        An anchor computed against uncommitted content would
 *                        name a commit that does not hold what is promoted.
 *   2. ChainIntegrity  — a non-root source carries a non-empty promotion anchor,
 *                        i.e. it was itself promoted into through this workflow.
 *   3. CleanTarget     — the target record has no uncommitted edits that the
 *                        promotion commit would otherwise carry along.
 */

import type { RecordStore, VersionControl } from '../adapters/index.js';
import { RecordField, type RecordLocation } from '../types/record.js';
import { PromotionError, PromotionErrorKind } from '../types/errors.js';

export enum GuardName {
  CleanSource = 'clean-source',
  ChainIntegrity = 'chain-integrity',
  CleanTarget = 'clean-target',
}

export interface GuardInput {
  readonly source: RecordLocation;
  readonly target: RecordLocation;
  /** The environment seeded by CI; exempt from ChainIntegrity. */
  readonly rootEnvironment: string;
}

export interface GuardReport {
  /** Guards that ran and passed, in evaluation order. */
  readonly passed: ReadonlyArray<GuardName>;
  /** Full revision id of the last commit touching the source record. */
  readonly sourceRevision: string;
  /** The source's existing anchor; undefined for a root source. */
  readonly sourceAnchor: string | undefined;
}

/**
 * Run all guards.
 *
 * @throws {PromotionError} DirtySource | BrokenChain | DirtyTarget — first failure wins
 */
export async function evaluateGuards(
  input: GuardInput,
  capabilities: { readonly vcs: VersionControl; readonly store: RecordStore },
): Promise<GuardReport> {
  const { vcs, store } = capabilities;
  const { source, target, rootEnvironment } = input;
  const passed: GuardName[] = [];

  // CleanSource
  if (await vcs.isDirty(source.path)) {
    throw new PromotionError(
      PromotionErrorKind.DirtySource,
      `${source.path} has uncommitted local changes. Commit or stash them before promoting.`,
      { path: source.path },
    );
  }
  const sourceRevision = await vcs.lastRevision(source.path);
  if (sourceRevision === null) {
    throw new PromotionError(
      PromotionErrorKind.DirtySource,
      `${source.path} has never been committed. Commit it before promoting.`,
      { path: source.path },
    );
  }
  passed.push(GuardName.CleanSource);

  // ChainIntegrity
  let sourceAnchor: string | undefined;
  if (source.env !== rootEnvironment) {
    sourceAnchor = await store.readField(source.path, RecordField.AnchorGitSha);
    if (sourceAnchor === undefined || sourceAnchor.trim() === '') {
      throw new PromotionError(
        PromotionErrorKind.BrokenChain,
        `${source.env} record for ${source.app} has no promotionAnchor.gitSHA. ` +
          `${source.env} must be promoted into before promoting to ${target.env}.`,
        { path: source.path },
      );
    }
  }
  passed.push(GuardName.ChainIntegrity);

  // CleanTarget
  if (await vcs.isDirty(target.path)) {
    throw new PromotionError(
      PromotionErrorKind.DirtyTarget,
      `${target.path} has uncommitted local changes that would be swept into the promotion commit.`,
      { path: target.path },
    );
  }
  passed.push(GuardName.CleanTarget);

  return { passed, sourceRevision, sourceAnchor };
}
