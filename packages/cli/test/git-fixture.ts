/**
 * A working copy of a small GitOps repository whose `origin` is a bare
 * repository in the same temp directory. No network.
 */

import { execFileSync } from 'node:child_process';
import { mkdirSync, mkdtempSync, realpathSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export interface GitFixture {
  readonly work: string;
  readonly remote: string;
  /** Audit log home for --home. */
  readonly home: string;
  git(...args: string[]): string;
  remoteGit(...args: string[]): string;
}

const RECORD_DIR = join('gitops-repo', 'apps', 'hello-web');

function run(cwd: string, args: string[]): string {
  return execFileSync('git', args, { cwd, encoding: 'utf-8', env: { ...process.env, LC_ALL: 'C' } }).trim();
}

export function hasGit(): boolean {
  try {
    execFileSync('git', ['--version'], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

function record(env: string, tag: string): string {
  return `image:
  repository: registry.example.com/hello-web
  tag: ${tag}
appMetadata:
  environment: ${env}
  lastPromotedTag: ${tag}
  promotionAnchor:
    gitSHA: ""
    promotedAt: ""
    fromEnv: ""
`;
}

export function createGitFixture(): GitFixture {
  const base = realpathSync(mkdtempSync(join(tmpdir(), 'promote-cli-')));
  const remote = join(base, 'remote.git');
  const work = join(base, 'work');
  const home = join(base, 'home');

  run(base, ['init', '--quiet', '--bare', remote]);
  run(remote, ['symbolic-ref', 'HEAD', 'refs/heads/main']);

  mkdirSync(work);
  run(work, ['init', '--quiet']);
  run(work, ['symbolic-ref', 'HEAD', 'refs/heads/main']);
  run(work, ['config', 'user.email', 'operator@example.com']);
  run(work, ['config', 'user.name', 'Test Operator']);
  run(work, ['config', 'commit.gpgsign', 'false']);

  for (const [env, tag] of [['dev', 'v2'], ['staging', 'v1'], ['prod', 'v0']] as const) {
    const path = join(work, RECORD_DIR, env, 'values.yaml');
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, record(env, tag), 'utf-8');
  }
  run(work, ['add', '.']);
  run(work, ['commit', '--quiet', '-m', 'seed records']);
  run(work, ['remote', 'add', 'origin', remote]);
  run(work, ['push', '--quiet', 'origin', 'main']);

  return {
    work,
    remote,
    home,
    git: (...args) => run(work, args),
    remoteGit: (...args) => run(remote, args),
  };
}
