/**
 * Promote Core — Promotion Commit Message Convention
 *
 *   chore(gitops): promote <app> <from>→<to> tag=<tag> anchor=<sha>
 *
 * The subject line alone identifies a promotion, so history can be audited by
 * scanning commit subjects.
 */

export interface PromotionMessage {
  readonly app: string;
  readonly fromEnv: string;
  readonly toEnv: string;
  readonly tag: string;
  readonly anchorSha: string;
}

export const PROMOTION_COMMIT_PREFIX = 'chore(gitops): promote';

const PROMOTION_SUBJECT = /^chore\(gitops\): promote (\S+) (\S+?)→(\S+) tag=(\S+) anchor=([0-9a-fA-F]+)$/;

export function formatPromotionMessage(message: PromotionMessage): string {
  return (
    `${PROMOTION_COMMIT_PREFIX} ${message.app} ${message.fromEnv}→${message.toEnv}` +
    ` tag=${message.tag} anchor=${message.anchorSha}`
  );
}

/** Parse a commit subject. Returns null for anything that is not a promotion commit. */
export function parsePromotionMessage(subject: string): PromotionMessage | null {
  const match = PROMOTION_SUBJECT.exec(subject.trim());
  if (match === null) return null;
  const [, app, fromEnv, toEnv, tag, anchorSha] = match;
  if (
    app === undefined ||
    fromEnv === undefined ||
    toEnv === undefined ||
    tag === undefined ||
    anchorSha === undefined
  ) {
    return null;
  }
  return { app, fromEnv, toEnv, tag, anchorSha };
}
