import chalk from 'chalk'
import type { Command } from 'commander'
import { buildCatalog } from '@hashdrop/core/catalog'
import { InvalidUsageError } from '@hashdrop/core/errors'
import { runSelection } from '@hashdrop/core/selection'
import { removeEntry } from '@hashdrop/core/workflows'
import { collectIndices } from '../arguments.js'
import { openRemote, type CliDeps, type GlobalOptions } from '../context.js'
import { printLine } from '../output.js'

interface CleanOptions {
  all?: boolean
  file?: string[]
  filter?: string
  yes?: boolean
}

/**
 * Register the clean command. Without --yes it only reports what it would delete.
 */
export function registerCleanCommand(program: Command, deps: CliDeps): void {
  program
    .command('clean')
    .description('Remove uploaded files from the remote site')
    .argument('[indices...]', 'Indices to remove; put -- before negative ones', collectIndices, [])
    .option('--all', 'Select every remote file')
    .option('-f, --file <files...>', 'Local files whose uploads to remove')
    .option('-F, --filter <regex>', 'Files whose name matches the regex')
    .option('-y, --yes', 'Delete without asking')
    .action(async (indices: number[], options: CleanOptions) => {
      const noSelection =
        indices.length === 0 && !options.all && !options.file?.length && options.filter === undefined
      if (noSelection) {
        throw new InvalidUsageError({
          reason: 'Nothing selected: give indices, --file, --filter or --all',
          command: 'clean',
        })
      }

      const ctx = await openRemote(program.opts<GlobalOptions>(), deps)
      const catalog = await buildCatalog(ctx.site, { logger: ctx.logger })
      const selection = await runSelection(catalog, ctx.selectionDeps, {
        indices,
        filter: options.filter,
        files: options.file,
        prefixLength: ctx.host.prefixLength,
        bailOnMissing: true,
        all: options.all,
      })

      if (selection.count() === 0) {
        printLine(ctx.out, 'No matching files.')
        return
      }

      if (!options.yes) {
        printLine(ctx.out, chalk.bold('Would delete the following files:'))
        for (const row of selection) printLine(ctx.out, ` * ${row.relativePath}`)
        printLine(ctx.out, chalk.dim('Re-run with --yes to delete them.'))
        return
      }

      for (const row of selection) {
        await removeEntry(ctx.site, row.relativePath)
        ctx.logger.info({ path: row.relativePath }, 'Removed remote file')
        printLine(ctx.out, `Deleted ${row.relativePath}`)
      }
    })
}
