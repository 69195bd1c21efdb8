/**
 * Promote Runtime Host — Git Version Control
 *
 * Implements the VersionControl capability from @promote/core by running the
 * git CLI through an ExecAdapter bound to the repository root.
 *
 * Query failures (not a repository, git missing, unknown remote) surface as
 * PromotionError(VersionControlFailed). The commit publisher in the core
 * re-labels commit and push failures as PublishFailed.
 */

import {
  PromotionError,
  PromotionErrorKind,
  describeError,
  type CommitInfo,
  type VersionControl,
} from '@promote/core';
import { NodeExecAdapter, type ExecAdapter, type ExecResult } from '../adapters/exec.js';

/**
 * Fixed for every git invocation: never prompt for credentials (a push must
 * fail rather than hang) and keep messages untranslated.
 */
const GIT_ENV: Readonly<Record<string, string>> = {
  GIT_TERMINAL_PROMPT: '0',
  LC_ALL: 'C',
};

/** A push that has not finished by then is treated as failed. */
const PUSH_TIMEOUT_MS = 120_000;

/** Unit and record separators used in `git log --format`. */
const FIELD_SEP = '\x1f';
const RECORD_SEP = '\x1e';

export class GitVersionControl implements VersionControl {
  private readonly exec: ExecAdapter;

  constructor(readonly repoRoot: string, exec?: ExecAdapter) {
    this.exec = exec ?? new NodeExecAdapter(repoRoot);
  }

  /**
   * Top-level directory of the working copy containing `cwd`.
   *
   * @throws {PromotionError} VersionControlFailed when `cwd` is not inside a repository
   */
  static async discoverRoot(cwd: string, exec: ExecAdapter = new NodeExecAdapter(cwd)): Promise<string> {
    const result = await runGit(exec, ['rev-parse', '--show-toplevel']);
    return result.stdout.trim();
  }

  /** Name of the checked-out branch; `HEAD` when detached. */
  async currentBranch(): Promise<string> {
    const result = await this.git(['rev-parse', '--abbrev-ref', 'HEAD']);
    return result.stdout.trim();
  }

  async isDirty(path: string): Promise<boolean> {
    // --quiet implies --exit-code: 0 = no difference, 1 = difference.
    const result = await this.git(['diff', '--quiet', 'HEAD', '--', path], [0, 1]);
    return result.exitCode === 1;
  }

  async lastRevision(path: string): Promise<string | null> {
    const result = await this.git(['log', '-1', '--format=%H', '--', path]);
    const revision = result.stdout.trim();
    return revision === '' ? null : revision;
  }

  async commit(paths: ReadonlyArray<string>, message: string): Promise<string> {
    await this.git(['add', '--', ...paths]);
    try {
      // A pathspec on commit commits only those paths, whatever else is staged.
      await this.git(['commit', '--quiet', '-m', message, '--', ...paths]);
    } catch (err: unknown) {
      // Unstage what add staged so the index matches HEAD again for these paths.
      await this.git(['reset', '--quiet', '--', ...paths]);
      throw err;
    }
    const head = await this.git(['rev-parse', 'HEAD']);
    return head.stdout.trim();
  }

  async push(remote: string, branch: string): Promise<void> {
    await runGit(this.exec, ['push', '--quiet', remote, `HEAD:refs/heads/${branch}`], [0], PUSH_TIMEOUT_MS);
  }

  async commitTouches(revision: string, path: string): Promise<boolean> {
    const exists = await this.git(['cat-file', '-e', `${revision}^{commit}`], [0, 1, 128]);
    if (exists.exitCode !== 0) return false;

    const result = await this.git(['show', '--name-only', '--format=', revision, '--', path]);
    return result.stdout.trim() !== '';
  }

  async log(path: string | undefined, limit: number): Promise<ReadonlyArray<CommitInfo>> {
    const args = ['log', `-n${limit}`, '--format=%H%x1f%an%x1f%aI%x1f%s%x1e'];
    if (path !== undefined) args.push('--', path);

    const result = await this.git(args);
    return parseLog(result.stdout);
  }

  private git(args: ReadonlyArray<string>, okExitCodes: ReadonlyArray<number> = [0]): Promise<ExecResult> {
    return runGit(this.exec, args, okExitCodes);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function runGit(
  exec: ExecAdapter,
  args: ReadonlyArray<string>,
  okExitCodes: ReadonlyArray<number> = [0],
  timeoutMs?: number,
): Promise<ExecResult> {
  let result: ExecResult;
  try {
    result = await exec.run('git', args, { env: GIT_ENV, timeoutMs });
  } catch (err: unknown) {
    throw new PromotionError(
      PromotionErrorKind.VersionControlFailed,
      `could not run git ${args[0] ?? ''}: ${describeError(err)}`,
      {},
      { cause: err },
    );
  }

  if (!okExitCodes.includes(result.exitCode)) {
    const stderr = result.stderr.trim();
    throw new PromotionError(
      PromotionErrorKind.VersionControlFailed,
      `git ${args.join(' ')} exited with status ${result.exitCode}${stderr === '' ? '' : `: ${stderr}`}`,
    );
  }
  return result;
}

/** Parse `git log` output written with FIELD_SEP / RECORD_SEP separators. */
export function parseLog(stdout: string): CommitInfo[] {
  const commits: CommitInfo[] = [];
  for (const record of stdout.split(RECORD_SEP)) {
    const trimmed = record.trim();
    if (trimmed === '') continue;
    const [sha, author, date, subject] = trimmed.split(FIELD_SEP);
    if (sha === undefined || author === undefined || date === undefined || subject === undefined) continue;
    commits.push({ sha, author, date, subject });
  }
  return commits;
}
