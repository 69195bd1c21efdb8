/**
 * Promote Core — Anchor Writer
 *
 * Computes the new anchor for the target record and writes it as one
 * structural merge. Only the six promotion fields change; everything else in
 * the target (resources, health checks, ingress hosts, replica counts, comments) is
 * the store's responsibility to keep intact.
 */

import type { Clock, RecordStore } from '../adapters/index.js';
import {
  RecordField,
  formatFieldPath,
  type FieldAssignment,
  type RecordLocation,
} from '../types/record.js';
import type { PromotionPlan, SourceImage } from '../types/promotion.js';
import { PromotionError, PromotionErrorKind } from '../types/errors.js';
import { formatPromotionMessage } from '../publish/commit-message.js';

/**
 * Format a timestamp as ISO-8601 UTC with second precision: `2026-10-19T08:15:00Z`.
 */
export function formatPromotedAt(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Truncate a full revision id to its short anchor form.
 *
 * @throws {PromotionError} VersionControlFailed if the revision is not hexadecimal
 */
export function shortRevision(revision: string, length: number): string {
  const trimmed = revision.trim();
  if (!/^[0-9a-fA-F]+$/.test(trimmed)) {
    throw new PromotionError(
      PromotionErrorKind.VersionControlFailed,
      `Version control returned an unexpected revision id: ${JSON.stringify(revision)}`,
    );
  }
  return trimmed.slice(0, length).toLowerCase();
}

/**
 * Read the image reference to promote from the source record.
 *
 * @throws {PromotionError} SourceFieldMissing when tag or repository is absent or empty
 * @throws {PromotionError} MalformedRecord when either holds whitespace, which
 *   no image reference has and the promotion commit subject cannot carry
 */
export async function readSourceImage(store: RecordStore, source: RecordLocation): Promise<SourceImage> {
  const tag = await store.readField(source.path, RecordField.ImageTag);
  const repository = await store.readField(source.path, RecordField.ImageRepository);

  const missing = [
    ...(tag === undefined || tag === '' ? [formatFieldPath(RecordField.ImageTag)] : []),
    ...(repository === undefined || repository === '' ? [formatFieldPath(RecordField.ImageRepository)] : []),
  ];
  if (tag === undefined || repository === undefined || missing.length > 0) {
    throw new PromotionError(
      PromotionErrorKind.SourceFieldMissing,
      `${source.env} record for ${source.app} is missing ${missing.join(' and ')}: ${source.path}`,
      { path: source.path },
    );
  }
  const spaced = [
    ...(/\s/.test(tag) ? [formatFieldPath(RecordField.ImageTag)] : []),
    ...(/\s/.test(repository) ? [formatFieldPath(RecordField.ImageRepository)] : []),
  ];
  if (spaced.length > 0) {
    throw new PromotionError(
      PromotionErrorKind.MalformedRecord,
      `${source.env} record for ${source.app} has whitespace in ${spaced.join(' and ')}: ${source.path}`,
      { path: source.path },
    );
  }
  return { repository, tag };
}

/**
 * Assemble the plan from already-resolved inputs. Pure.
 */
export function buildPlan(input: {
  readonly source: RecordLocation;
  readonly target: RecordLocation;
  readonly image: SourceImage;
  readonly sourceRevision: string;
  readonly anchorLength: number;
  readonly clock: Clock;
}): PromotionPlan {
  const anchorSha = shortRevision(input.sourceRevision, input.anchorLength);
  const promotedAt = formatPromotedAt(input.clock.now());
  return {
    app: input.source.app,
    fromEnv: input.source.env,
    toEnv: input.target.env,
    source: input.source,
    target: input.target,
    image: input.image,
    sourceRevision: input.sourceRevision.trim(),
    anchorSha,
    promotedAt,
    commitMessage: formatPromotionMessage({
      app: input.source.app,
      fromEnv: input.source.env,
      toEnv: input.target.env,
      tag: input.image.tag,
      anchorSha,
    }),
  };
}

/** The six field writes a plan implies. */
export function anchorAssignments(plan: PromotionPlan): ReadonlyArray<FieldAssignment> {
  return [
    { path: RecordField.ImageTag, value: plan.image.tag },
    { path: RecordField.ImageRepository, value: plan.image.repository },
    { path: RecordField.LastPromotedTag, value: plan.image.tag },
    { path: RecordField.AnchorGitSha, value: plan.anchorSha },
    { path: RecordField.AnchorPromotedAt, value: plan.promotedAt },
    { path: RecordField.AnchorFromEnv, value: plan.fromEnv },
  ];
}

/**
 * Write the plan into the target record's working copy. Does not commit.
 *
 * @throws {PromotionError} MalformedRecord (raised by the store)
 */
export async function writeAnchor(store: RecordStore, plan: PromotionPlan): Promise<void> {
  await store.writeFields(plan.target.path, anchorAssignments(plan));
}
