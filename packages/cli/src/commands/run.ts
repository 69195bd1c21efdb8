/**
 * promote <from-env> <to-env> [app] — Promote an image between environments
 *
 * Copies image.repository / image.tag from the source record to the target
 * record, stamps the target's promotion anchor with the source record's last
 * revision, commits only the target record and pushes.
 *
 * Exit status is 0 for a pushed promotion (or a dry run), otherwise the code
 * of the error kind (see output/errors.ts).
 */

import { Command } from 'commander';
import { PromotionWorkflow, systemClock, type PromotionResult } from '@promote/core';
import { buildRuntime, openLogSink, promotionContext, type RepoOptions } from '../runtime.js';
import { printErrorLines, printJson, printLines } from '../output/console.js';
import { EXIT_CODES, failureJson, formatFailure } from '../output/errors.js';
import { formatLogWarning, formatPlan, formatSuccess, formatSyncHint } from '../output/promotion.js';
import { t } from '../output/theme.js';
import { reportFailure, withRepoOptions } from './shared.js';

interface RunOptions extends RepoOptions {
  readonly dryRun?: boolean;
  readonly pushHint: boolean;
  readonly json?: boolean;
}

export const runCommand = withRepoOptions(
  new Command('run')
    .description('Promote an app from one environment to another (default command)')
    .argument('<from-env>', 'Environment to copy the image from')
    .argument('<to-env>', 'Environment to promote into')
    .argument('[app]', 'Application (default: hello-web, or defaultApp from promote.config.json)'),
)
  .option('--dry-run', 'Plan and check guards without writing, committing or pushing')
  .option('--no-push-hint', 'Do not print the reconciler sync hint after success')
  .option('--json', 'Output the result as JSON')
  .action(async (fromEnv: string, toEnv: string, app: string | undefined, options: RunOptions) => {
    try {
      const result = await runPromotion(fromEnv, toEnv, app, options);
      if (!result.ok) process.exitCode = EXIT_CODES[result.error.kind];
    } catch (err: unknown) {
      if (options.json === true) {
        printJson({ ok: false, error: failureJson(err), plan: null });
        process.exitCode = failureJson(err).exitCode;
      } else {
        reportFailure(err);
      }
    }
  });

async function runPromotion(
  fromEnv: string,
  toEnv: string,
  app: string | undefined,
  options: RunOptions,
): Promise<PromotionResult> {
  const runtime = await buildRuntime(options);
  const context = await promotionContext(runtime);
  const workflow = new PromotionWorkflow(
    { vcs: runtime.vcs, store: runtime.store, clock: systemClock },
    openLogSink(options),
  );
  const dryRun = options.dryRun === true;
  const json = options.json === true;

  const result = await workflow.promote(
    { app: app ?? runtime.config.defaultApp, fromEnv, toEnv },
    context,
    {
      dryRun,
      onPlan: json ? undefined : (plan) => printLines(formatPlan(plan, runtime.repoRoot, dryRun)),
    },
  );

  if (json) {
    printJson(
      result.ok
        ? { ok: true, plan: result.outcome.plan, published: result.outcome.published, logError: result.logError ?? null }
        : { ok: false, error: failureJson(result.error), plan: result.plan, logError: result.logError ?? null },
    );
    return result;
  }

  // The outcome and its exit code stand; only the audit trail is incomplete.
  if (result.logError !== undefined) {
    printErrorLines([formatLogWarning(result.logError)], t.amber);
  }

  if (!result.ok) {
    printErrorLines(formatFailure(result.error), t.red);
    return result;
  }

  const { plan, published } = result.outcome;
  printLines([formatSuccess(result.outcome)], published === null ? t.blue : t.green);
  if (published !== null && runtime.config.syncHint && options.pushHint) {
    printLines(formatSyncHint(plan.app, plan.toEnv), t.muted);
  }
  return result;
}
