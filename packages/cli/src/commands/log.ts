/**
 * promote log — Query the promotion audit log
 *
 * Every promotion attempt is logged, whatever its outcome, to
 * <home>/logs/promotions.jsonl. Entries are deduplicated by event_id on read.
 */

import { Command, Option } from 'commander';
import { PromotionLogOutcome } from '@promote/core';
import { PROMOTION_LOG_FILE, filterEvents, readLog } from '@promote/runtime-host';
import { openStateIO } from '../runtime.js';
import { printJson, printLines } from '../output/console.js';
import { formatLogEvent } from '../output/tables.js';
import { outcomeColor } from '../output/theme.js';
import { parseLimit, reportFailure } from './shared.js';

interface LogOptions {
  readonly app?: string;
  readonly env?: string;
  readonly outcome?: string;
  readonly limit: number;
  readonly json?: boolean;
  readonly home?: string;
}

export const logCommand = new Command('log')
  .description('Query the promotion audit log')
  .option('--app <app>', 'Filter by application')
  .option('--env <env>', 'Filter by source or target environment')
  .addOption(new Option('--outcome <outcome>', 'Filter by outcome').choices(Object.values(PromotionLogOutcome)))
  .option('--limit <n>', 'Show the most recent N entries', parseLimit, 50)
  .option('--json', 'Output as JSON')
  .option('--home <dir>', 'Directory holding the promotion audit log (default: ~/.promote)')
  .action((options: LogOptions) => {
    try {
      const stateIO = openStateIO(options);
      const { events } = readLog(stateIO.readLogRaw(PROMOTION_LOG_FILE));
      const selected = filterEvents(events, options);

      if (options.json === true) {
        printJson(selected);
        return;
      }
      if (selected.length === 0) {
        printLines([`No log entries in ${stateIO.describe(PROMOTION_LOG_FILE)}.`]);
        return;
      }
      for (const event of selected) {
        printLines([formatLogEvent(event)], outcomeColor(event.outcome ?? ''));
      }
    } catch (err: unknown) {
      reportFailure(err);
    }
  });
