import type { Command } from 'commander'
import { buildCatalog } from '@hashdrop/core/catalog'
import { entryUrl } from '@hashdrop/core/config'
import { runSelection } from '@hashdrop/core/selection'
import { collectIndices, parseCount } from '../arguments.js'
import { openRemote, type CliDeps, type GlobalOptions } from '../context.js'
import { formatRows } from '../format.js'
import { printLine } from '../output.js'

interface ListOptions {
  details?: boolean
  filenames?: boolean
  filter?: string
  first?: number
  last?: number
  indices?: boolean
  reverse?: boolean
  newer?: string
  older?: string
  sortSize?: boolean
  sortTime?: boolean
  urlOnly?: boolean
  withTime?: boolean
  withSize?: boolean
}

/**
 * Register the list command.
 */
export function registerListCommand(program: Command, deps: CliDeps): void {
  program
    .command('list')
    .alias('ls')
    .description('List uploaded files and their URLs')
    .argument('[indices...]', 'Indices to list (all if none); put -- before negative ones', collectIndices, [])
    .option('-d, --details', 'Show size and modification time')
    .option('-f, --filenames', 'Show file names instead of full URLs')
    .option('-F, --filter <regex>', 'Only files whose name matches the regex')
    .option('--first <n>', 'Only the first n entries of the listing', parseCount)
    .option('-n, --last <n>', 'Only the last n entries of the listing', parseCount)
    .option('-i, --indices', 'Only print indices, e.g. as input for clean')
    .option('-r, --reverse', 'Reverse the listing')
    .option('--newer <duration>', 'Only files modified within the duration (e.g. 2h, 3days)')
    .option('--older <duration>', 'Only files modified before the duration')
    .option('-S, --sort-size', 'Sort by size')
    .option('-T, --sort-time', 'Sort by modification time')
    .option('-u, --url-only', 'Only print URLs')
    .option('-t, --with-time', 'Show modification time')
    .option('-s, --with-size', 'Show file size')
    .action(async (indices: number[], options: ListOptions) => {
      const ctx = await openRemote(program.opts<GlobalOptions>(), deps)
      const details = options.details ?? ctx.config.details
      const withSize = details || options.withSize === true
      const withTime = details || options.withTime === true

      const catalog = await buildCatalog(ctx.site, { logger: ctx.logger })
      const selection = await runSelection(catalog, ctx.selectionDeps, {
        indices,
        filter: options.filter,
        allIfNone: options.filter === undefined,
        newer: options.newer,
        older: options.older,
        sortBySize: options.sortSize,
        sortByTime: options.sortTime,
        reverse: options.reverse,
        first: options.first,
        last: options.last,
        withStats: withSize || withTime,
      })

      if (options.urlOnly) {
        for (const row of selection) printLine(ctx.out, entryUrl(ctx.host, row.relativePath))
      } else if (options.indices) {
        printLine(ctx.out, selection.indices.join(' '))
      } else {
        const lines = formatRows(selection.rows(), {
          host: ctx.host,
          filenames: options.filenames,
          withSize,
          withTime,
        })
        for (const line of lines) printLine(ctx.out, line)
      }
    })
}
