/**
 * Rendering of `promote verify` results.
 */

import { relative } from 'node:path';
import type { AnchorVerification } from '@promote/core';

export interface VerifyReport {
  /** False when the anchor is missing or does not trace back. */
  readonly ok: boolean;
  readonly line: string;
}

export function formatVerification(
  verification: AnchorVerification,
  opts: { readonly repoRoot: string; readonly rootEnvironment: string },
): VerifyReport {
  const { location } = verification.summary;
  const subject = `${location.app}/${location.env}`;

  switch (verification.status) {
    case 'unanchored':
      return location.env === opts.rootEnvironment
        ? { ok: true, line: `✓ ${subject}: root environment, no anchor expected` }
        : { ok: false, line: `✗ ${subject}: no promotion anchor` };
    case 'unverifiable':
      return { ok: false, line: `✗ ${subject}: ${verification.reason}` };
    case 'traceable':
      return {
        ok: true,
        line: `✓ ${subject}: anchor ${verification.anchorSha} modified ${relative(opts.repoRoot, verification.sourcePath)}`,
      };
    case 'untraceable':
      return {
        ok: false,
        line:
          `✗ ${subject}: anchor ${verification.anchorSha} is not a commit that modified ` +
          relative(opts.repoRoot, verification.sourcePath),
      };
  }
}
