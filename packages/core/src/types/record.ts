/**
 * Promote Core — Environment Configuration Record Types
 *
 * A record is the structured document holding one (application, environment)
 * pair's deployment state. The core never sees the document format; it reads
 * and writes individual fields through the RecordStore capability using the
 * field paths declared here.
 *
 * Record shape:
 *
 *   image:
 *     repository: <string>
 *     tag: <string>
 *   appMetadata:
 *     lastPromotedTag: <string>
 *     promotionAnchor:
 *       gitSHA: <string>
 *       promotedAt: <ISO-8601 UTC>
 *       fromEnv: <string>
 *     environment: <string>
 */

// ---------------------------------------------------------------------------
// Field paths
// ---------------------------------------------------------------------------

/** A non-empty sequence of mapping keys from the document root to a scalar. */
export type FieldPath = readonly [string, ...string[]];

/**
 * Every record field the core reads or writes.
 *
 * The six fields written by a promotion are listed in PROMOTION_FIELDS;
 * `Environment` is set once when the record is created and is read-only here.
 */
export const RecordField = {
  ImageRepository: ['image', 'repository'],
  ImageTag: ['image', 'tag'],
  LastPromotedTag: ['appMetadata', 'lastPromotedTag'],
  AnchorGitSha: ['appMetadata', 'promotionAnchor', 'gitSHA'],
  AnchorPromotedAt: ['appMetadata', 'promotionAnchor', 'promotedAt'],
  AnchorFromEnv: ['appMetadata', 'promotionAnchor', 'fromEnv'],
  Environment: ['appMetadata', 'environment'],
} as const satisfies Record<string, FieldPath>;

/** The fields a promotion replaces on the target record, in write order. */
export const PROMOTION_FIELDS: ReadonlyArray<FieldPath> = [
  RecordField.ImageTag,
  RecordField.ImageRepository,
  RecordField.LastPromotedTag,
  RecordField.AnchorGitSha,
  RecordField.AnchorPromotedAt,
  RecordField.AnchorFromEnv,
];

/** Render a field path in dotted form (`appMetadata.promotionAnchor.gitSHA`). */
export function formatFieldPath(path: FieldPath): string {
  return path.join('.');
}

/** A single scalar write: the value replaces whatever the path held. */
export interface FieldAssignment {
  readonly path: FieldPath;
  readonly value: string;
}

// ---------------------------------------------------------------------------
// Record location
// ---------------------------------------------------------------------------

/**
 * Where records live inside a repository working copy.
 *
 * A record for (app, env) is found at `<repoRoot>/<recordsDir>/<app>/<env>/<recordFile>`.
 */
export interface RecordLayout {
  readonly repoRoot: string;
  readonly recordsDir: string;
  readonly recordFile: string;
}

/** A resolved, existing record for one (app, env) pair. */
export interface RecordLocation {
  readonly app: string;
  readonly env: string;
  readonly path: string;
}

/**
 * The promotion-relevant view of a record. Fields are undefined when absent;
 * an empty string is preserved as-is.
 */
export interface RecordSummary {
  readonly location: RecordLocation;
  readonly repository: string | undefined;
  readonly tag: string | undefined;
  readonly lastPromotedTag: string | undefined;
  readonly anchorSha: string | undefined;
  readonly promotedAt: string | undefined;
  readonly fromEnv: string | undefined;
  readonly environment: string | undefined;
}
