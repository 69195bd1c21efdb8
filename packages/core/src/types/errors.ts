/**
 * Promote Core — Error Taxonomy
 *
 * Every failure a promotion can report is a PromotionError carrying one kind.
 * Kinds are distinct and non-overlapping: callers switch on `kind`, never on
 * message text.
 */

export enum PromotionErrorKind {
  /** App or environment name is empty, escapes the records directory, or from === to. */
  InvalidArgument = 'InvalidArgument',
  /** The source or target record file does not exist. */
  RecordNotFound = 'RecordNotFound',
  /** The source record has uncommitted changes or was never committed. */
  DirtySource = 'DirtySource',
  /** The target record has uncommitted changes. */
  DirtyTarget = 'DirtyTarget',
  /** A non-root source record has an empty promotion anchor. */
  BrokenChain = 'BrokenChain',
  /** `image.tag` or `image.repository` is absent in the source record. */
  SourceFieldMissing = 'SourceFieldMissing',
  /** A record cannot be parsed or rewritten without data loss. */
  MalformedRecord = 'MalformedRecord',
  /** The local commit or the push to the shared upstream failed. */
  PublishFailed = 'PublishFailed',
  /** A version-control query failed (not a repository, git missing, ...). */
  VersionControlFailed = 'VersionControlFailed',
}

/**
 * Kinds raised before anything is written. A promotion that fails with one of
 * these left every record untouched.
 */
export const REJECTION_KINDS: ReadonlySet<PromotionErrorKind> = new Set([
  PromotionErrorKind.InvalidArgument,
  PromotionErrorKind.RecordNotFound,
  PromotionErrorKind.DirtySource,
  PromotionErrorKind.DirtyTarget,
  PromotionErrorKind.BrokenChain,
  PromotionErrorKind.SourceFieldMissing,
]);

/** The publish step that failed. */
export type PublishStage = 'commit' | 'push';

export interface PromotionErrorDetails {
  /** Record path the failure concerns, when there is one. */
  readonly path?: string | undefined;
  /** For PublishFailed: which step failed. */
  readonly stage?: PublishStage | undefined;
  /** For PublishFailed at the push stage: the local commit that was kept. */
  readonly commitSha?: string | undefined;
}

export class PromotionError extends Error {
  readonly kind: PromotionErrorKind;
  readonly details: PromotionErrorDetails;

  constructor(
    kind: PromotionErrorKind,
    message: string,
    details: PromotionErrorDetails = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PromotionError';
    this.kind = kind;
    this.details = details;
  }
}

export function isPromotionError(err: unknown): err is PromotionError {
  return err instanceof PromotionError;
}

/** Extract a printable message from an unknown thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
