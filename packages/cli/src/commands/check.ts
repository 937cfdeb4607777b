import type { Command } from 'commander'
import { buildCatalog } from '@hashdrop/core/catalog'
import { entryUrl } from '@hashdrop/core/config'
import { MissingRemoteFilesError } from '@hashdrop/core/errors'
import { hashFile } from '@hashdrop/core/hash'
import { runSelection } from '@hashdrop/core/selection'
import { openRemote, type CliDeps, type GlobalOptions } from '../context.js'
import { formatRows } from '../format.js'
import { printLine } from '../output.js'

interface CheckOptions {
  details?: boolean
  filenames?: boolean
  urlOnly?: boolean
  withTime?: boolean
  withSize?: boolean
}

/**
 * Register the check command: are these local files on the remote site?
 */
export function registerCheckCommand(program: Command, deps: CliDeps): void {
  program
    .command('check')
    .description('Check whether local files have been uploaded already')
    .argument('<files...>', 'Local files to look up by content')
    .option('-d, --details', 'Show size and modification time')
    .option('-D, --no-details', 'Hide details even if the config enables them')
    .option('-f, --filenames', 'Show file names instead of full URLs')
    .option('-u, --url-only', 'Only print URLs')
    .option('-t, --with-time', 'Show modification time')
    .option('-s, --with-size', 'Show file size')
    .action(async (files: string[], options: CheckOptions) => {
      const ctx = await openRemote(program.opts<GlobalOptions>(), deps)
      const details = options.details ?? ctx.config.details
      const withSize = details || options.withSize === true
      const withTime = details || options.withTime === true

      const catalog = await buildCatalog(ctx.site, { logger: ctx.logger })
      const found = await runSelection(catalog, ctx.selectionDeps, {
        files,
        prefixLength: ctx.host.prefixLength,
        bailOnMissing: false,
        withStats: withSize || withTime,
      })

      if (options.urlOnly) {
        for (const row of found) printLine(ctx.out, entryUrl(ctx.host, row.relativePath))
      } else {
        const lines = formatRows(found.rows(), {
          host: ctx.host,
          filenames: options.filenames,
          withSize,
          withTime,
        })
        for (const line of lines) printLine(ctx.out, line)
      }

      // Files with the same content share one remote entry
      const tokens = new Set<string>()
      for (const file of files) tokens.add(await hashFile(file, ctx.host.prefixLength))
      if (found.count() !== tokens.size) {
        throw new MissingRemoteFilesError({ expected: tokens.size, found: found.count() })
      }
    })
}
