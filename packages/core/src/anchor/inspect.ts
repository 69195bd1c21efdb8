/**
 * Promote Core — Anchor Inspection
 *
 * Read-only views over records: the promotion summary shown by `status`, and
 * the traceability check behind `verify` (a non-empty anchor must name a
 * commit that modified the record it was promoted from).
 */

import type { RecordStore, VersionControl } from '../adapters/index.js';
import { RecordField, type RecordLayout, type RecordLocation, type RecordSummary } from '../types/record.js';
import { recordPath, resolveRecord } from '../resolver/environment-resolver.js';

export async function readSummary(store: RecordStore, location: RecordLocation): Promise<RecordSummary> {
  const path = location.path;
  return {
    location,
    repository: await store.readField(path, RecordField.ImageRepository),
    tag: await store.readField(path, RecordField.ImageTag),
    lastPromotedTag: await store.readField(path, RecordField.LastPromotedTag),
    anchorSha: await store.readField(path, RecordField.AnchorGitSha),
    promotedAt: await store.readField(path, RecordField.AnchorPromotedAt),
    fromEnv: await store.readField(path, RecordField.AnchorFromEnv),
    environment: await store.readField(path, RecordField.Environment),
  };
}

export type AnchorVerification =
  | { readonly status: 'unanchored'; readonly summary: RecordSummary }
  | { readonly status: 'unverifiable'; readonly summary: RecordSummary; readonly reason: string }
  | {
      readonly status: 'traceable' | 'untraceable';
      readonly summary: RecordSummary;
      readonly anchorSha: string;
      readonly sourcePath: string;
    };

/**
 * Check that the anchor on (app, env) references a commit touching the record
 * of the environment it was promoted from.
 *
 * @throws {PromotionError} InvalidArgument | RecordNotFound from resolution
 */
export async function verifyAnchor(
  capabilities: { readonly vcs: VersionControl; readonly store: RecordStore },
  layout: RecordLayout,
  app: string,
  env: string,
): Promise<AnchorVerification> {
  const location = await resolveRecord(capabilities.store, layout, app, env);
  const summary = await readSummary(capabilities.store, location);

  const anchorSha = summary.anchorSha?.trim() ?? '';
  if (anchorSha === '') {
    return { status: 'unanchored', summary };
  }
  const fromEnv = summary.fromEnv?.trim() ?? '';
  if (fromEnv === '') {
    return {
      status: 'unverifiable',
      summary,
      reason: 'promotionAnchor.fromEnv is empty, so the source record is unknown.',
    };
  }

  // The source record may since have been moved or removed; history still knows its path.
  const sourcePath = recordPath(layout, app, fromEnv);
  const touches = await capabilities.vcs.commitTouches(anchorSha, sourcePath);
  return {
    status: touches ? 'traceable' : 'untraceable',
    summary,
    anchorSha,
    sourcePath,
  };
}
