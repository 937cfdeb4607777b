import type { Command } from 'commander'
import { entryUrl } from '@hashdrop/core/config'
import { InvalidUsageError } from '@hashdrop/core/errors'
import { pushFile, transformFilename } from '@hashdrop/core/workflows'
import { openRemote, type CliDeps, type GlobalOptions } from '../context.js'
import { printLine } from '../output.js'

interface PushOptions {
  alias?: string[]
  prefix?: string
  suffix?: string
  verify?: boolean
}

function targetNames(files: readonly string[], options: PushOptions): string[] {
  const aliases = options.alias ?? []
  if (aliases.length === 0) {
    return files.map((file) => transformFilename(file, options))
  }
  if (options.prefix !== undefined || options.suffix !== undefined) {
    throw new InvalidUsageError({
      reason: '--alias cannot be combined with --prefix or --suffix',
      command: 'push',
    })
  }
  if (aliases.length !== files.length) {
    throw new InvalidUsageError({
      reason: 'You need to specify as many aliases as you specify files!',
      command: 'push',
    })
  }
  return aliases
}

/**
 * Register the push command. Prints the public URL of every upload.
 */
export function registerPushCommand(program: Command, deps: CliDeps): void {
  program
    .command('push')
    .description('Upload files and print their URLs')
    .argument('<files...>', 'Local files to upload')
    .option('-a, --alias <names...>', 'Remote names, one per file')
    .option('-p, --prefix <prefix>', 'Prepend to each remote file name')
    .option('-s, --suffix <suffix>', 'Append to each file name, before the extension')
    .option('--no-verify', 'Skip re-hashing the upload on the remote side')
    .action(async (files: string[], options: PushOptions) => {
      const names = targetNames(files, options)
      const ctx = await openRemote(program.opts<GlobalOptions>(), deps)
      const verify = options.verify !== false && ctx.config.verifyViaHash

      for (const [i, file] of files.entries()) {
        const { relativePath } = await pushFile(ctx.site, file, {
          prefixLength: ctx.host.prefixLength,
          targetName: names[i],
          verify,
          group: ctx.host.group,
          batchSize: ctx.config.hashBatchSize,
          logger: ctx.logger,
        })
        printLine(ctx.out, entryUrl(ctx.host, relativePath))
      }
    })
}
