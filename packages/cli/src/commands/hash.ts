import type { Command } from 'commander'
import { hashFile } from '@hashdrop/core/hash'
import { parseHashLength } from '../arguments.js'
import { openLocal, type CliDeps, type GlobalOptions } from '../context.js'
import { printLine } from '../output.js'

/**
 * Register the hash command: print the folder name a file would get.
 */
export function registerHashCommand(program: Command, deps: CliDeps): void {
  program
    .command('hash')
    .description('Print the content hash of local files')
    .argument('<files...>', 'Local files to hash')
    .option('-l, --length <n>', 'Hash length (default: configured prefix length)', parseHashLength)
    .action(async (files: string[], options: { length?: number }) => {
      const ctx = await openLocal(program.opts<GlobalOptions>(), deps)
      const length = options.length ?? ctx.config.prefixLength

      for (const file of files) {
        printLine(ctx.out, `${await hashFile(file, length)}  ${file}`)
      }
    })
}
