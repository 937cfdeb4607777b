import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { stripVTControlCharacters } from 'node:util'
import {
  FakeRemoteSite,
  createSilentLogger,
  type FakeRemoteSiteOptions,
} from '@hashdrop/core/test-utils'
import { runCli } from '../program.js'

export const TEST_URL = 'https://files.example.org'

export const DEFAULT_TEST_CONFIG = {
  prefixLength: 8,
  hosts: { web: { folder: '/srv/store', url: TEST_URL } },
}

export interface CliResult {
  code: number
  stdout: string
  stderr: string
}

export interface Harness {
  site: FakeRemoteSite
  dir: string
  run(...argv: string[]): Promise<CliResult>
  localFile(name: string, content: string): Promise<string>
  cleanup(): Promise<void>
}

/**
 * CLI wired to an in-memory remote site and a temporary config directory.
 * Output is captured with colors stripped; the clock reads `now`.
 */
export async function createHarness(options?: {
  config?: Record<string, unknown>
  site?: FakeRemoteSiteOptions
  now?: number
}): Promise<Harness> {
  const dir = await mkdtemp(join(tmpdir(), 'hashdrop-cli-'))
  const configDir = join(dir, 'config')
  await mkdir(configDir)
  await writeFile(
    join(configDir, 'config.json'),
    JSON.stringify(options?.config ?? DEFAULT_TEST_CONFIG),
  )
  const site = new FakeRemoteSite(options?.site)
  const now = options?.now ?? 1_000

  return {
    site,
    dir,
    async run(...argv) {
      let stdout = ''
      let stderr = ''
      const code = await runCli(argv, {
        env: { HASHDROP_CONFIG: configDir },
        now: () => now,
        createLogger: createSilentLogger,
        createSite: () => site,
        out: {
          write: (text) => {
            stdout += text
          },
          writeError: (text) => {
            stderr += text
          },
        },
      })
      return {
        code,
        stdout: stripVTControlCharacters(stdout),
        stderr: stripVTControlCharacters(stderr),
      }
    },
    async localFile(name, content) {
      const path = join(dir, name)
      await writeFile(path, content)
      return path
    },
    async cleanup() {
      await rm(dir, { recursive: true, force: true })
    },
  }
}
