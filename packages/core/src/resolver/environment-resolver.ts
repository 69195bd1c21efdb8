/**
 * Promote Core — Environment Resolver
 *
 * Maps an (app, env) pair to the location of its configuration record and
 * confirms the record exists. Environment names are not enumerated: any name
 * is accepted as long as it resolves to an existing record.
 *
 * Runs before any version-control call. No side effects.
 */

import { join } from 'node:path';
import type { RecordStore } from '../adapters/index.js';
import type { RecordLayout, RecordLocation } from '../types/record.js';
import { PromotionError, PromotionErrorKind } from '../types/errors.js';

/**
 * Reject names that are empty or would step outside their directory level.
 *
 * @throws {PromotionError} InvalidArgument
 */
export function assertSegment(label: string, value: string): void {
  if (value.trim() === '') {
    throw new PromotionError(PromotionErrorKind.InvalidArgument, `${label} must be a non-empty string.`);
  }
  if (value === '.' || value === '..' || /[/\\\0]/.test(value)) {
    throw new PromotionError(
      PromotionErrorKind.InvalidArgument,
      `${label} ${JSON.stringify(value)} is not a valid name: path separators and '.'/'..' are not allowed.`,
    );
  }
}

/** Compute the record path for (app, env) without checking it exists. */
export function recordPath(layout: RecordLayout, app: string, env: string): string {
  return join(layout.repoRoot, layout.recordsDir, app, env, layout.recordFile);
}

/**
 * Resolve and check the record for (app, env).
 *
 * @throws {PromotionError} InvalidArgument for unusable names
 * @throws {PromotionError} RecordNotFound when the file is absent
 */
export async function resolveRecord(
  store: RecordStore,
  layout: RecordLayout,
  app: string,
  env: string,
): Promise<RecordLocation> {
  assertSegment('Application', app);
  assertSegment('Environment', env);

  const path = recordPath(layout, app, env);
  if (!(await store.exists(path))) {
    throw new PromotionError(
      PromotionErrorKind.RecordNotFound,
      `${env} record for ${app} not found: ${path}`,
      { path },
    );
  }
  return { app, env, path };
}
