/**
 * promote verify <env> [app] — Check that an environment's anchor traces back
 *
 * Passes when the anchor names a commit that modified the record of the
 * environment it was promoted from, or when the environment is the root.
 * Exits with the BrokenChain code otherwise.
 */

import { Command } from 'commander';
import { PromotionErrorKind, verifyAnchor } from '@promote/core';
import { buildRuntime, type RepoOptions } from '../runtime.js';
import { printJson, printLines } from '../output/console.js';
import { EXIT_CODES } from '../output/errors.js';
import { t } from '../output/theme.js';
import { formatVerification } from '../output/verify.js';
import { reportFailure, withRepoOptions } from './shared.js';

interface VerifyOptions extends RepoOptions {
  readonly json?: boolean;
}

export const verifyCommand = withRepoOptions(
  new Command('verify')
    .description('Verify that an environment\'s promotion anchor traces to its source record')
    .argument('<env>', 'Environment to verify')
    .argument('[app]', 'Application (default: hello-web, or defaultApp from promote.config.json)'),
)
  .option('--json', 'Output as JSON')
  .action(async (env: string, appArg: string | undefined, options: VerifyOptions) => {
    try {
      const runtime = await buildRuntime(options);
      const app = appArg ?? runtime.config.defaultApp;
      const verification = await verifyAnchor(runtime, runtime.layout, app, env);
      const report = formatVerification(verification, {
        repoRoot: runtime.repoRoot,
        rootEnvironment: runtime.config.rootEnvironment,
      });

      if (options.json === true) {
        printJson({ ok: report.ok, ...verification });
      } else {
        printLines([report.line], report.ok ? t.green : t.red);
      }
      if (!report.ok) process.exitCode = EXIT_CODES[PromotionErrorKind.BrokenChain];
    } catch (err: unknown) {
      reportFailure(err);
    }
  });
