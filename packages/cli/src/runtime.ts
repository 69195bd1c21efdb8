/**
 * Promote CLI — Runtime Construction
 *
 * Wires the runtime-host capabilities for one invocation: locate the
 * repository, load configuration, and open the audit log.
 */

import { resolve } from 'node:path';
import {
  PromotionError,
  PromotionErrorKind,
  type PromotionContext,
  type RecordLayout,
} from '@promote/core';
import {
  FileLogSink,
  FileStateIO,
  GitVersionControl,
  YamlRecordStore,
  loadConfig,
  resolvePromoteHome,
  type PromoteConfig,
  type StateIO,
} from '@promote/runtime-host';

/** What `git rev-parse --abbrev-ref HEAD` prints without a branch. */
const DETACHED_HEAD = 'HEAD';

/** Flags shared by every command that works on the repository. */
export interface RepoOptions {
  readonly repo?: string | undefined;
  readonly remote?: string | undefined;
  readonly branch?: string | undefined;
  readonly rootEnv?: string | undefined;
  readonly home?: string | undefined;
}

export interface Runtime {
  readonly repoRoot: string;
  readonly config: PromoteConfig;
  readonly vcs: GitVersionControl;
  readonly store: YamlRecordStore;
  readonly layout: RecordLayout;
}

export async function buildRuntime(options: RepoOptions, env: NodeJS.ProcessEnv = process.env): Promise<Runtime> {
  const start = options.repo !== undefined ? resolve(options.repo) : process.cwd();
  const repoRoot = await GitVersionControl.discoverRoot(start);
  const config = loadConfig(repoRoot, {
    env,
    overrides: { remote: options.remote, branch: options.branch, rootEnvironment: options.rootEnv },
  });

  return {
    repoRoot,
    config,
    vcs: new GitVersionControl(repoRoot),
    store: new YamlRecordStore(),
    layout: { repoRoot, recordsDir: config.recordsDir, recordFile: config.recordFile },
  };
}

/**
 * Context for a publishing promotion. The branch defaults to the checked-out
 * one; a detached HEAD needs --branch.
 *
 * The push sends HEAD, so a configured branch must be the checked-out one:
 * otherwise every local commit of the current branch would reach it along
 * with the promotion.
 */
export async function promotionContext(runtime: Runtime): Promise<PromotionContext> {
  const current = await runtime.vcs.currentBranch();
  const configured = runtime.config.branch;
  if (configured === null && current === DETACHED_HEAD) {
    throw new PromotionError(
      PromotionErrorKind.InvalidArgument,
      'HEAD is detached; pass --branch <name> to choose the branch to push',
    );
  }
  if (configured !== null && current !== DETACHED_HEAD && current !== configured) {
    throw new PromotionError(
      PromotionErrorKind.InvalidArgument,
      `branch ${configured} is configured but ${current} is checked out; ` +
        `check out ${configured} or detach HEAD at the commit to promote from`,
    );
  }
  return {
    layout: runtime.layout,
    rootEnvironment: runtime.config.rootEnvironment,
    remote: runtime.config.remote,
    branch: configured ?? current,
    anchorLength: runtime.config.anchorLength,
  };
}

export function openStateIO(options: { readonly home?: string | undefined }, env: NodeJS.ProcessEnv = process.env): StateIO {
  return new FileStateIO(resolvePromoteHome({ home: options.home, env }));
}

export function openLogSink(options: { readonly home?: string | undefined }, env: NodeJS.ProcessEnv = process.env): FileLogSink {
  return new FileLogSink(openStateIO(options, env));
}
