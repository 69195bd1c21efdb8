/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/promote.ts.
 *
 * `run` is the default command, so `promote dev staging` is `promote run dev staging`.
 * Every command throws CommanderError instead of exiting; main() maps it to an
 * exit code: 0 for --help and --version, 2 (the InvalidArgument code) for
 * usage errors.
 */

import { CommanderError, program } from 'commander'
import { reportFailure } from './shared.js'
import { runCommand } from './run.js'
import { statusCommand } from './status.js'
import { verifyCommand } from './verify.js'
import { historyCommand } from './history.js'
import { logCommand } from './log.js'

program
  .name('promote')
  .description(
    'Promote container images between GitOps environments.\n' +
    'Each promotion records the source record\'s git revision as its anchor,\n' +
    'commits only the target record, and pushes.',
  )
  .version('0.1.0')
  .exitOverride()

program.addCommand(runCommand, { isDefault: true })
program.addCommand(statusCommand)
program.addCommand(verifyCommand)
program.addCommand(historyCommand)
program.addCommand(logCommand)

for (const command of program.commands) command.exitOverride()

export const EXIT_USAGE = 2

/** Parse `argv` (including the node and script entries) and run the command. */
export async function main(argv: ReadonlyArray<string> = process.argv): Promise<void> {
  try {
    await program.parseAsync([...argv])
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode === 0 ? 0 : EXIT_USAGE
    } else {
      reportFailure(err)
    }
  }
}

export { program }
