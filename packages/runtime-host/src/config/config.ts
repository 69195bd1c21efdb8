/**
 * Promote Runtime Host — Configuration
 *
 * PromoteConfig is assembled from four layers, highest precedence first:
 *
 *   1. Overrides (CLI flags)
 *   2. PROMOTE_* environment variables
 *   3. promote.config.json at the repository root
 *   4. Schema defaults
 *
 * The merged object is validated with zod. Invalid values, unknown keys in
 * the config file, and unparsable JSON are reported as
 * PromotionError(InvalidArgument) naming their source.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { PromotionError, PromotionErrorKind } from '@promote/core';
import { isNodeError } from '../state/state-io.js';

export const CONFIG_FILENAME = 'promote.config.json';

const name = z.string().trim().min(1);

export const PromoteConfigSchema = z
  .object({
    /** Directory holding `<app>/<env>/<recordFile>`, relative to the repository root. */
    recordsDir: name.default('gitops-repo/apps'),
    recordFile: name.default('values.yaml'),
    /** First environment of every chain; its records need no anchor. */
    rootEnvironment: name.default('dev'),
    defaultApp: name.default('hello-web'),
    remote: name.default('origin'),
    /** Upstream branch to push; null means the checked-out branch. */
    branch: name.nullable().default(null),
    anchorLength: z.number().int().min(4).max(40).default(8),
    /** Display order for `promote status`; unlisted environments follow alphabetically. */
    environmentOrder: z.array(name).default(['dev', 'staging', 'prod']),
    /** Print the reconciler sync hint after a successful promotion. */
    syncHint: z.boolean().default(true),
  })
  .strict();

export type PromoteConfig = z.infer<typeof PromoteConfigSchema>;
export type PromoteConfigInput = z.input<typeof PromoteConfigSchema>;

/** Environment variables read by loadConfig, by config key. */
export const CONFIG_ENV_VARS = {
  rootEnvironment: 'PROMOTE_ROOT_ENV',
  defaultApp: 'PROMOTE_DEFAULT_APP',
  remote: 'PROMOTE_REMOTE',
  branch: 'PROMOTE_BRANCH',
  recordsDir: 'PROMOTE_RECORDS_DIR',
  anchorLength: 'PROMOTE_ANCHOR_LENGTH',
} as const;

export interface LoadConfigOptions {
  /** Highest-precedence values; undefined entries are ignored. */
  readonly overrides?: PromoteConfigInput | undefined;
  /** Default: process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export function loadConfig(repoRoot: string, opts: LoadConfigOptions = {}): PromoteConfig {
  const fromFile = readConfigFile(join(repoRoot, CONFIG_FILENAME));
  const fromEnv = readConfigEnv(opts.env ?? process.env);
  const fromFlags = dropUndefined(opts.overrides ?? {});

  const parsed = PromoteConfigSchema.safeParse({ ...fromFile, ...fromEnv, ...fromFlags });
  if (!parsed.success) {
    throw new PromotionError(
      PromotionErrorKind.InvalidArgument,
      `invalid configuration: ${formatIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Layers
// ---------------------------------------------------------------------------

function readConfigFile(path: string): { [key: string]: unknown } {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return {};
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new PromotionError(
      PromotionErrorKind.InvalidArgument,
      `${path} is not valid JSON`,
      { path },
      { cause: err },
    );
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new PromotionError(PromotionErrorKind.InvalidArgument, `${path} must contain a JSON object`, { path });
  }
  return { ...parsed };
}

function readConfigEnv(env: NodeJS.ProcessEnv): { [key: string]: unknown } {
  const values: { [key: string]: unknown } = {};
  for (const [key, variable] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[variable];
    if (value === undefined || value === '') continue;
    values[key] = key === 'anchorLength' ? Number(value) : value;
  }
  return values;
}

function dropUndefined(values: PromoteConfigInput): { [key: string]: unknown } {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
