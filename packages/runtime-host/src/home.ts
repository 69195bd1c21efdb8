/**
 * Promote Runtime Host — Home Directory Resolution
 *
 * The home directory holds the promotion audit log:
 *
 *   <PROMOTE_HOME>/
 *     logs/
 *       promotions.jsonl
 *
 * Precedence (highest first):
 *   1. Explicit `home` option (the --home CLI flag)
 *   2. PROMOTE_HOME environment variable
 *   3. Default: ~/.promote
 *
 * The resolved directory is created if it does not exist.
 */

import { mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

export interface ResolvePromoteHomeOptions {
  readonly home?: string | undefined;
  /** Environment to read PROMOTE_HOME from. Default: process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export function resolvePromoteHome(opts: ResolvePromoteHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const fromEnv = env['PROMOTE_HOME'];

  let home: string;
  if (opts.home !== undefined && opts.home !== '') {
    home = opts.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = join(homedir(), '.promote');
  }

  const absolute = resolve(home);
  mkdirSync(absolute, { recursive: true });
  return absolute;
}
