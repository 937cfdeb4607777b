import chalk from 'chalk'
import type { Command } from 'commander'
import { buildCatalog } from '@hashdrop/core/catalog'
import { runSelection } from '@hashdrop/core/selection'
import { assertVerified, verifySelection } from '@hashdrop/core/verify'
import { collectIndices, parseCount } from '../arguments.js'
import { openRemote, type CliDeps, type GlobalOptions } from '../context.js'
import { printLine } from '../output.js'

interface VerifyOptions {
  file?: string[]
  filter?: string
  last?: number
  sortSize?: boolean
  reverse?: boolean
}

/**
 * Register the verify command. Re-hashes remote files and compares against
 * their folder names; all selected files are checked before failing.
 */
export function registerVerifyCommand(program: Command, deps: CliDeps): void {
  program
    .command('verify')
    .description('Verify remote files against their content hash (all if none selected)')
    .argument('[indices...]', 'Indices to verify; put -- before negative ones', collectIndices, [])
    .option('-f, --file <files...>', 'Local files whose uploads to verify')
    .option('-F, --filter <regex>', 'Only files whose name matches the regex')
    .option('-n, --last <n>', 'Only the last n selected files', parseCount)
    .option('-S, --sort-size', 'Sort by size before truncating')
    .option('-r, --reverse', 'Reverse before truncating')
    .action(async (indices: number[], options: VerifyOptions) => {
      const ctx = await openRemote(program.opts<GlobalOptions>(), deps)

      const catalog = await buildCatalog(ctx.site, { logger: ctx.logger })
      const selection = await runSelection(catalog, ctx.selectionDeps, {
        indices,
        filter: options.filter,
        files: options.file,
        prefixLength: ctx.host.prefixLength,
        bailOnMissing: true,
        allIfNone: true,
        sortBySize: options.sortSize,
        reverse: options.reverse,
        last: options.last,
      })

      const report = await verifySelection(ctx.site, selection, {
        batchSize: ctx.config.hashBatchSize,
        logger: ctx.logger,
      })

      for (const { entry, outcome } of report.results) {
        if (outcome.status === 'verified') {
          printLine(ctx.out, `${chalk.green('ok')}  ${entry.relativePath}`)
        } else {
          printLine(
            ctx.out,
            `${chalk.red('FAILED')}  ${entry.relativePath} (${
              outcome.actual === '' ? 'not a hash folder' : `found ${outcome.actual}`
            })`,
          )
        }
      }
      assertVerified(report)
    })
}
