/**
 * promote history [app] — List promotion commits from git history
 */

import { Command } from 'commander';
import { join } from 'node:path';
import { assertSegment } from '@promote/core';
import { buildRuntime, type RepoOptions } from '../runtime.js';
import { printJson, printLines } from '../output/console.js';
import { formatHistory, promotionCommits } from '../output/tables.js';
import { parseLimit, reportFailure, withRepoOptions } from './shared.js';

/** Commits scanned per promotion shown; CI tag bumps share the records directory. */
const SCAN_FACTOR = 10;

interface HistoryOptions extends RepoOptions {
  readonly limit: number;
  readonly json?: boolean;
}

export const historyCommand = withRepoOptions(
  new Command('history')
    .description('List promotion commits, newest first')
    .argument('[app]', 'Only promotions of this application'),
)
  .option('--limit <n>', 'Maximum number of promotions to list', parseLimit, 20)
  .option('--json', 'Output as JSON')
  .action(async (app: string | undefined, options: HistoryOptions) => {
    try {
      const runtime = await buildRuntime(options);
      if (app !== undefined) assertSegment('app', app);
      const scope = app === undefined
        ? join(runtime.repoRoot, runtime.layout.recordsDir)
        : join(runtime.repoRoot, runtime.layout.recordsDir, app);

      const commits = await runtime.vcs.log(scope, options.limit * SCAN_FACTOR);
      const promotions = promotionCommits(commits, app).slice(0, options.limit);

      if (options.json === true) {
        printJson(promotions);
        return;
      }
      if (promotions.length === 0) {
        printLines(['No promotions found.']);
        return;
      }
      printLines(formatHistory(promotions));
    } catch (err: unknown) {
      reportFailure(err);
    }
  });
