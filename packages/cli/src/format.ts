import chalk from 'chalk'
import { entryUrl } from '@hashdrop/core/config'
import type { HostConfig } from '@hashdrop/core/schemas'
import type { SelectionRow } from '@hashdrop/core/selection'

const SIZE_UNITS = ['B', 'K', 'M', 'G', 'T', 'P', 'E']
const SEPARATOR = '  '

/**
 * Human readable size, e.g. ` 12.50K`.
 * Moves to the next unit from 999 on so the column never shows 1000.00.
 */
export function formatSize(bytes: number): string {
  let unit = 0
  let scaled = bytes
  while (scaled >= 999 && unit < SIZE_UNITS.length - 1) {
    scaled = Math.floor(scaled / 1024)
    unit++
  }
  return `${(bytes / 1024 ** unit).toFixed(2).padStart(6)}${SIZE_UNITS[unit]}`
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTime(epochSeconds: number): string {
  const date = new Date(epochSeconds * 1000)
  const pad = (n: number) => String(n).padStart(2, '0')
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

export interface FormatRowsOptions {
  host: Pick<HostConfig, 'url'>
  /** Show file names instead of full URLs */
  filenames?: boolean
  withSize?: boolean
  withTime?: boolean
}

/** Listing lines: index, reverse index, optional size and time, URL. */
export function formatRows(rows: readonly SelectionRow[], options: FormatRowsOptions): string[] {
  if (rows.length === 0) return []
  const indexWidth = Math.max(...rows.map((r) => String(r.index).length))
  const reverseWidth = Math.max(...rows.map((r) => String(r.reverseIndex).length))

  return rows.map((row) => {
    const columns = [
      chalk.bold(String(row.index).padStart(indexWidth)),
      chalk.dim(String(row.reverseIndex).padStart(reverseWidth)),
    ]
    if (options.withSize && row.stat) columns.push(chalk.cyan(formatSize(row.stat.size)))
    if (options.withTime && row.stat) columns.push(chalk.yellow(formatTime(row.stat.mtime)))
    columns.push(options.filenames ? row.fileName : entryUrl(options.host, row.relativePath))
    return columns.join(SEPARATOR)
  })
}
