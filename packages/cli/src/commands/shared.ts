/**
 * Options and error handling shared by the commands.
 */

import { InvalidArgumentError, type Command } from 'commander';
import { printErrorLines } from '../output/console.js';
import { exitCodeFor, formatFailure } from '../output/errors.js';
import { t } from '../output/theme.js';

export function withRepoOptions(command: Command): Command {
  return command
    .option('--repo <dir>', 'GitOps repository (default: the repository containing the working directory)')
    .option('--remote <name>', 'Remote to push to (default: origin)')
    .option('--branch <name>', 'Branch to push (default: the checked-out branch)')
    .option('--root-env <env>', 'Root environment of the chain (default: dev)')
    .option('--home <dir>', 'Directory holding the promotion audit log (default: ~/.promote)');
}

/** Parse a positive integer flag value. */
export function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`expected a positive integer, got "${value}"`);
  }
  return n;
}

/**
 * Report a failure on stderr and set the exit code for its kind. Errors are
 * reported, not rethrown: the exit code carries the outcome.
 */
export function reportFailure(err: unknown): void {
  printErrorLines(formatFailure(err), t.red);
  process.exitCode = exitCodeFor(err);
}
