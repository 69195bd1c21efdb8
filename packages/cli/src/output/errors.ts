/**
 * Failure reporting: one `✗ <Kind>: <message>` line, a hint, and a distinct
 * process exit code per error kind.
 */

import { PromotionErrorKind, describeError, isPromotionError, type PromotionError } from '@promote/core';

export const EXIT_UNEXPECTED = 1;

export const EXIT_CODES: Readonly<Record<PromotionErrorKind, number>> = {
  [PromotionErrorKind.InvalidArgument]: 2,
  [PromotionErrorKind.RecordNotFound]: 3,
  [PromotionErrorKind.DirtySource]: 4,
  [PromotionErrorKind.DirtyTarget]: 5,
  [PromotionErrorKind.BrokenChain]: 6,
  [PromotionErrorKind.SourceFieldMissing]: 7,
  [PromotionErrorKind.MalformedRecord]: 8,
  [PromotionErrorKind.PublishFailed]: 9,
  [PromotionErrorKind.VersionControlFailed]: 10,
};

export function exitCodeFor(err: unknown): number {
  return isPromotionError(err) ? EXIT_CODES[err.kind] : EXIT_UNEXPECTED;
}

export function hintFor(error: PromotionError): string {
  switch (error.kind) {
    case PromotionErrorKind.InvalidArgument:
      return 'Usage: promote <from-env> <to-env> [app]. Names are single path segments.';
    case PromotionErrorKind.RecordNotFound:
      return 'Check the app and environment names, or run `promote status <app>` to list environments.';
    case PromotionErrorKind.DirtySource:
      return 'Commit the source record first: the anchor must name a committed revision.';
    case PromotionErrorKind.DirtyTarget:
      return 'Commit or discard local edits to the target record, then promote again.';
    case PromotionErrorKind.BrokenChain:
      return 'Promote into the source environment first; only the root environment may be unanchored.';
    case PromotionErrorKind.SourceFieldMissing:
      return 'Set image.repository and image.tag in the source record and commit it.';
    case PromotionErrorKind.MalformedRecord:
      return 'Fix the record by hand and commit it; it was left unchanged.';
    case PromotionErrorKind.PublishFailed:
      return error.details.stage === 'push'
        ? 'The commit exists locally. Pull --rebase, then git push.'
        : 'Check git hooks and identity (user.name, user.email), then promote again.';
    case PromotionErrorKind.VersionControlFailed:
      return 'Run inside the GitOps repository or pass --repo <dir>.';
  }
}

export function formatFailure(err: unknown): string[] {
  if (!isPromotionError(err)) {
    return [`✗ Unexpected error: ${describeError(err)}`];
  }
  return [`✗ ${err.kind}: ${err.message}`, `  hint: ${hintFor(err)}`];
}

/** JSON shape of a failure for --json output. */
export function failureJson(err: unknown): { kind: string; message: string; details: object; exitCode: number } {
  if (!isPromotionError(err)) {
    return { kind: 'Unexpected', message: describeError(err), details: {}, exitCode: EXIT_UNEXPECTED };
  }
  return { kind: err.kind, message: err.message, details: err.details, exitCode: EXIT_CODES[err.kind] };
}
