import chalk from 'chalk'
import { Command, CommanderError } from 'commander'
import { isStoreError } from '@hashdrop/core/errors'
import { registerCheckCommand } from './commands/check.js'
import { registerCleanCommand } from './commands/clean.js'
import { registerHashCommand } from './commands/hash.js'
import { registerListCommand } from './commands/list.js'
import { registerPushCommand } from './commands/push.js'
import { registerRenameCommand } from './commands/rename.js'
import { registerVerifyCommand } from './commands/verify.js'
import type { CliDeps } from './context.js'
import { processOutput } from './output.js'

export const VERSION = '0.1.0'

/**
 * Format error for display.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`)
  }
  return chalk.red(`Error: ${String(error)}`)
}

/** Exit status for a failed command: the error's own, else 1. */
export function exitCodeFor(error: unknown): number {
  if (isStoreError(error)) return error.exitCode
  if (error instanceof CommanderError) return error.exitCode
  return 1
}

/**
 * Create the CLI program.
 */
export function createProgram(deps: CliDeps = {}): Command {
  const out = deps.out ?? processOutput
  const program = new Command()
    .name('hashdrop')
    .description('Share files through a content-addressed store on your own server')
    .version(VERSION)
    .option('-c, --config <dir>', 'Config directory (default: ~/.config/hashdrop)')
    .option('-H, --host <alias>', 'Configured host to use')
    .option('-v, --verbose', 'Log debug output to stderr')
    .configureOutput({
      writeOut: (text) => out.write(text),
      writeErr: (text) => out.writeError(text),
    })
    .exitOverride()

  registerListCommand(program, deps)
  registerCheckCommand(program, deps)
  registerVerifyCommand(program, deps)
  registerCleanCommand(program, deps)
  registerPushCommand(program, deps)
  registerRenameCommand(program, deps)
  registerHashCommand(program, deps)

  return program
}

/**
 * Parse and run one command line.
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? processOutput
  try {
    await createProgram(deps).parseAsync([...argv], { from: 'user' })
    return 0
  } catch (error) {
    // Commander has already printed its own usage errors
    if (!(error instanceof CommanderError)) {
      out.writeError(`${formatError(error)}\n`)
    }
    return exitCodeFor(error)
  }
}
