import type { Command } from 'commander'
import { buildCatalog } from '@hashdrop/core/catalog'
import { entryUrl } from '@hashdrop/core/config'
import { runSelection, type SelectionQuery } from '@hashdrop/core/selection'
import { renameEntry } from '@hashdrop/core/workflows'
import { openRemote, type CliDeps, type GlobalOptions } from '../context.js'
import { printLine } from '../output.js'

/**
 * Register the rename command. The entry is given by index or by the local
 * file it was uploaded from.
 */
export function registerRenameCommand(program: Command, deps: CliDeps): void {
  program
    .command('rename')
    .description('Rename an uploaded file, keeping its hash folder')
    .argument('<entry>', 'Index or local file of the upload')
    .argument('<name>', 'New remote file name')
    .action(async (entry: string, name: string) => {
      const ctx = await openRemote(program.opts<GlobalOptions>(), deps)
      const catalog = await buildCatalog(ctx.site, { logger: ctx.logger })

      const query: SelectionQuery = /^-?\d+$/.test(entry)
        ? { indices: [Number(entry)] }
        : { files: [entry], prefixLength: ctx.host.prefixLength, bailOnMissing: true }
      const [row] = (await runSelection(catalog, ctx.selectionDeps, query)).rows()

      const target = await renameEntry(ctx.site, row.relativePath, name)
      printLine(ctx.out, entryUrl(ctx.host, target))
    })
}
