/**
 * promote status [app] — Show each environment's image and promotion anchor
 */

import { Command } from 'commander';
import {
  PromotionError,
  PromotionErrorKind,
  assertSegment,
  isPromotionError,
  readSummary,
  recordPath,
} from '@promote/core';
import { buildRuntime, type RepoOptions } from '../runtime.js';
import { printJson, printLines } from '../output/console.js';
import { formatStatus, sortEnvironments, type StatusRow } from '../output/tables.js';
import { t } from '../output/theme.js';
import { reportFailure, withRepoOptions } from './shared.js';

interface StatusOptions extends RepoOptions {
  readonly json?: boolean;
}

export const statusCommand = withRepoOptions(
  new Command('status')
    .description('Show image tag and promotion anchor for every environment of an app')
    .argument('[app]', 'Application (default: hello-web, or defaultApp from promote.config.json)'),
)
  .option('--json', 'Output as JSON')
  .action(async (appArg: string | undefined, options: StatusOptions) => {
    try {
      const runtime = await buildRuntime(options);
      const app = appArg ?? runtime.config.defaultApp;
      assertSegment('app', app);

      const envs = sortEnvironments(
        await runtime.store.listEnvironments(runtime.layout, app),
        runtime.config.environmentOrder,
      );
      if (envs.length === 0) {
        throw new PromotionError(
          PromotionErrorKind.RecordNotFound,
          `no ${runtime.layout.recordFile} records for ${app} under ${runtime.layout.recordsDir}/${app}`,
        );
      }

      const rows: StatusRow[] = [];
      for (const env of envs) {
        const location = { app, env, path: recordPath(runtime.layout, app, env) };
        try {
          rows.push({ env, summary: await readSummary(runtime.store, location) });
        } catch (err: unknown) {
          if (!isPromotionError(err) || err.kind !== PromotionErrorKind.MalformedRecord) throw err;
          rows.push({ env, error: err.message });
        }
      }

      if (options.json === true) {
        printJson({ app, environments: rows });
        return;
      }
      printLines([`${app}  (${runtime.layout.recordsDir}/${app})`], t.white);
      printLines(formatStatus(rows));
    } catch (err: unknown) {
      reportFailure(err);
    }
  });
