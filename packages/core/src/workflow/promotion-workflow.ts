/**
 * Promote Core — Promotion Workflow
 *
 * The single path from a promotion request to a published commit:
 *
 *   Resolver → Guard Evaluator → Anchor Writer → Commit Publisher
 *
 * Stages run strictly in sequence and each aborts the whole promotion on
 * failure. Nothing is written before every guard has passed, and nothing is
 * retried. Every attempt is logged exactly once, whatever its outcome; a
 * failed log write is reported on the result as `logError`.
 *
 * Re-promoting an unchanged source is not short-circuited: the anchor comes
 * out the same, promotedAt does not, and a new commit is published.
 */

import type { PromotionCapabilities } from '../adapters/index.js';
import type { LogSink } from '../logging/log-sink.js';
import { PromotionLogger } from '../logging/promotion-log.js';
import type {
  PromoteOptions,
  PromotionContext,
  PromotionPlan,
  PromotionRequest,
  PromotionResult,
} from '../types/promotion.js';
import { PromotionError, PromotionErrorKind, describeError, isPromotionError } from '../types/errors.js';
import { assertSegment, resolveRecord } from '../resolver/environment-resolver.js';
import { evaluateGuards } from '../guards/evaluator.js';
import { buildPlan, readSourceImage, writeAnchor } from '../anchor/writer.js';
import { CommitPublisher } from '../publish/commit-publisher.js';

interface Progress {
  plan: PromotionPlan | null;
}

export class PromotionWorkflow {
  private readonly logger: PromotionLogger;
  private readonly publisher: CommitPublisher;

  constructor(
    private readonly capabilities: PromotionCapabilities,
    logSink?: LogSink,
  ) {
    this.logger = new PromotionLogger(logSink);
    this.publisher = new CommitPublisher(capabilities.vcs, capabilities.store);
  }

  /**
   * Promote `request.app` from `request.fromEnv` to `request.toEnv`.
   *
   * Resolves to `{ ok: false, error }` for every PromotionError. Any other
   * error is logged and re-thrown.
   */
  async promote(
    request: PromotionRequest,
    context: PromotionContext,
    options: PromoteOptions = {},
  ): Promise<PromotionResult> {
    const progress: Progress = { plan: null };
    let result: PromotionResult;

    try {
      result = await this.run(request, context, options, progress);
    } catch (err: unknown) {
      if (!isPromotionError(err)) {
        const logError = this.logger.record(request, progress.plan, { unexpected: err }, this.capabilities.clock.now());
        if (logError !== null) {
          throw new AggregateError([err, new Error(logError)], describeError(err), { cause: err });
        }
        throw err;
      }
      result = { ok: false, error: err, plan: progress.plan };
    }

    const logError = this.logger.record(request, progress.plan, { result }, this.capabilities.clock.now());
    return logError === null ? result : { ...result, logError };
  }

  private async run(
    request: PromotionRequest,
    context: PromotionContext,
    options: PromoteOptions,
    progress: Progress,
  ): Promise<PromotionResult> {
    const { vcs, store, clock } = this.capabilities;

    assertSegment('Application', request.app);
    assertSegment('Source environment', request.fromEnv);
    assertSegment('Target environment', request.toEnv);
    if (request.fromEnv === request.toEnv) {
      throw new PromotionError(
        PromotionErrorKind.InvalidArgument,
        `Source and target environment are both ${JSON.stringify(request.fromEnv)}.`,
      );
    }
    if (!Number.isInteger(context.anchorLength) || context.anchorLength < 1) {
      throw new PromotionError(
        PromotionErrorKind.InvalidArgument,
        `Anchor length must be a positive integer, got ${context.anchorLength}.`,
      );
    }

    // 1. Resolve both records before any version-control call.
    const source = await resolveRecord(store, context.layout, request.app, request.fromEnv);
    const target = await resolveRecord(store, context.layout, request.app, request.toEnv);

    // 2. Guards. Throws on the first failure; nothing has been written.
    const guards = await evaluateGuards(
      { source, target, rootEnvironment: context.rootEnvironment },
      { vcs, store },
    );

    // 3. Plan.
    const image = await readSourceImage(store, source);
    const plan = buildPlan({
      source,
      target,
      image,
      sourceRevision: guards.sourceRevision,
      anchorLength: context.anchorLength,
      clock,
    });
    progress.plan = plan;
    options.onPlan?.(plan);

    if (options.dryRun === true) {
      return { ok: true, outcome: { plan, published: null } };
    }

    // 4. Write the anchor into the working copy.
    const originalText = await store.readText(target.path);
    await writeAnchor(store, plan);

    // 5. Commit and push.
    const published = await this.publisher.publish(
      target,
      plan.commitMessage,
      { remote: context.remote, branch: context.branch },
      originalText,
    );

    return { ok: true, outcome: { plan, published } };
  }
}
