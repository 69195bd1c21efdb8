/**
 * Promote Core — Commit Publisher
 *
 * Persists the rewritten target record as one commit touching only that path
 * and pushes it to the shared upstream.
 *
 * Failure handling:
 * - Local commit fails: the target record is restored to its pre-promotion
 *   bytes, so the working copy is as it was before the run.
 * - Push fails: the local commit is kept (a safe, inspectable state) and the
 *   failure is reported with its revision. No rollback, no retry; the
 *   operator pulls/rebases and re-pushes rather than re-running.
 */

import type { RecordStore, VersionControl } from '../adapters/index.js';
import type { RecordLocation } from '../types/record.js';
import type { PublishReceipt } from '../types/promotion.js';
import { PromotionError, PromotionErrorKind, describeError } from '../types/errors.js';

export interface PublishDestination {
  readonly remote: string;
  readonly branch: string;
}

export class CommitPublisher {
  constructor(
    private readonly vcs: VersionControl,
    private readonly store: RecordStore,
  ) {}

  /**
   * Commit `target` with `message` and push.
   *
   * @param originalText - the target's content before the anchor write; restored if the commit fails
   * @throws {PromotionError} PublishFailed with details.stage = 'commit' | 'push'
   */
  async publish(
    target: RecordLocation,
    message: string,
    destination: PublishDestination,
    originalText: string,
  ): Promise<PublishReceipt> {
    let commitSha: string;
    try {
      commitSha = await this.vcs.commit([target.path], message);
    } catch (err: unknown) {
      let restoreNote = ' The record was restored to its previous content.';
      try {
        await this.store.restoreText(target.path, originalText);
      } catch (restoreErr: unknown) {
        restoreNote = ` Restoring the record also failed: ${describeError(restoreErr)}`;
      }
      throw new PromotionError(
        PromotionErrorKind.PublishFailed,
        `Commit of ${target.path} failed: ${describeError(err)}.${restoreNote}`,
        { path: target.path, stage: 'commit' },
        { cause: err },
      );
    }

    try {
      await this.vcs.push(destination.remote, destination.branch);
    } catch (err: unknown) {
      throw new PromotionError(
        PromotionErrorKind.PublishFailed,
        `Committed ${commitSha.slice(0, 12)} locally but push to ${destination.remote}/${destination.branch} failed: ` +
          `${describeError(err)}. Pull/rebase and push again; do not re-run the promotion.`,
        { path: target.path, stage: 'push', commitSha },
        { cause: err },
      );
    }

    return { commitSha, remote: destination.remote, branch: destination.branch };
  }
}
