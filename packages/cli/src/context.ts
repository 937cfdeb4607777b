import { loadConfig, resolveHost, type ResolvedHost } from '@hashdrop/core/config'
import { createLogger, type Logger } from '@hashdrop/core/logger'
import type { RemoteSite } from '@hashdrop/core/remote'
import type { LoggingConfig, StoreConfig } from '@hashdrop/core/schemas'
import { createStatFetcher, type SelectionDeps } from '@hashdrop/core/selection'
import { SshRemoteSite } from '@hashdrop/ssh'
import { processOutput, type Output } from './output.js'

/** Options every command accepts. */
export interface GlobalOptions {
  config?: string
  host?: string
  verbose?: boolean
}

/** Seams the tests replace; everything defaults to the real thing. */
export interface CliDeps {
  out?: Output
  env?: NodeJS.ProcessEnv
  /** Current time in epoch seconds */
  now?: () => number
  createLogger?: (config: LoggingConfig) => Logger
  createSite?: (host: ResolvedHost, logger: Logger) => RemoteSite
}

export interface LocalContext {
  config: StoreConfig
  logger: Logger
  out: Output
}

export interface RemoteContext extends LocalContext {
  host: ResolvedHost
  site: RemoteSite
  selectionDeps: SelectionDeps
}

function createSshSite(host: ResolvedHost, logger: Logger): RemoteSite {
  return new SshRemoteSite({
    hostname: host.hostname,
    user: host.user,
    port: host.port,
    sshOptions: host.sshOptions,
    storeRoot: host.folder,
    logger,
  })
}

/** Config and logger, for commands that never touch the remote side. */
export async function openLocal(options: GlobalOptions, deps: CliDeps): Promise<LocalContext> {
  const config = await loadConfig({ configDir: options.config, env: deps.env })
  const logging: LoggingConfig = options.verbose
    ? { ...config.logging, level: 'debug' }
    : config.logging
  const logger = (deps.createLogger ?? createLogger)(logging)
  return { config, logger, out: deps.out ?? processOutput }
}

export async function openRemote(options: GlobalOptions, deps: CliDeps): Promise<RemoteContext> {
  const local = await openLocal(options, deps)
  const host = resolveHost(local.config, options.host)
  const logger = local.logger.child({ host: host.alias })
  const site = (deps.createSite ?? createSshSite)(host, logger)
  logger.debug({ hostname: host.hostname, folder: host.folder }, 'Opened remote site')

  return {
    ...local,
    logger,
    host,
    site,
    selectionDeps: {
      statFetcher: createStatFetcher(site, { logger }),
      logger,
      now: deps.now,
    },
  }
}
