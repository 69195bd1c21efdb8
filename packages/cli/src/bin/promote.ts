#!/usr/bin/env -S node --import tsx
/**
 * bin/promote.ts — Entry point for the `promote` CLI command.
 *
 * Usage:
 *   promote <from-env> <to-env> [app] [--dry-run] [--json]
 *   promote status [app]
 *   promote verify <env> [app]
 *   promote history [app] [--limit <n>]
 *   promote log [--app <app>] [--env <env>] [--outcome <outcome>]
 */

import { main } from '../commands/index.js'

await main()
