/**
 * Promotion plan box, success line and reconciler hint.
 */

import { relative } from 'node:path';
import type { PromotionOutcome, PromotionPlan } from '@promote/core';

const LABEL_WIDTH = 12;

/**
 * The boxed plan printed before anything is written:
 *
 *   ┌─ promotion plan ──────────
 *   │ app         hello-web
 *   │ ...
 *   └───────────────────────────
 */
export function formatPlan(plan: PromotionPlan, repoRoot: string, dryRun: boolean): string[] {
  const rows: Array<[string, string]> = [
    ['app', plan.app],
    ['from → to', `${plan.fromEnv} → ${plan.toEnv}`],
    ['image', `${plan.image.repository}:${plan.image.tag}`],
    ['anchor', `${plan.anchorSha}  (last commit on ${plan.fromEnv})`],
    ['promoted at', plan.promotedAt],
    ['record', relative(repoRoot, plan.target.path)],
  ];
  const title = dryRun ? 'promotion plan (dry run)' : 'promotion plan';
  const body = rows.map(([label, value]) => `│ ${label.padEnd(LABEL_WIDTH)}${value}`);
  const width = Math.max(title.length + 4, ...body.map((line) => line.length));

  return [
    `┌─ ${title} ${'─'.repeat(width - title.length - 4)}`,
    ...body,
    `└${'─'.repeat(width - 1)}`,
  ];
}

export function formatSuccess(outcome: PromotionOutcome): string {
  const { plan, published } = outcome;
  if (published === null) {
    return `Dry run: ${plan.app} would move to ${plan.image.tag} in ${plan.toEnv}. Nothing was written.`;
  }
  return (
    `✓ Promoted ${plan.app} to ${plan.toEnv} ` +
    `(commit ${published.commitSha.slice(0, 12)} pushed to ${published.remote}/${published.branch}).`
  );
}

/** How to get the cluster reconciler to pick the change up now. */
export function formatSyncHint(app: string, toEnv: string): string[] {
  const application = `${app}-${toEnv}`;
  return [
    `ArgoCD will sync ${application} within ~3 minutes. To sync now:`,
    `  kubectl -n argocd patch application ${application} --type merge ` +
      `-p '{"metadata":{"annotations":{"argocd.argoproj.io/refresh":"hard"}}}'`,
  ];
}

export function formatLogWarning(logError: string): string {
  return `! Promotion log entry not written: ${logError}`;
}
