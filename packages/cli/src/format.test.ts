import { describe, it, expect } from 'vitest'
import { stripVTControlCharacters } from 'node:util'
import { formatRows, formatSize } from './format.js'

describe('formatSize', () => {
  it('keeps bytes below 999', () => {
    expect(formatSize(2)).toBe('  2.00B')
    expect(formatSize(500)).toBe('500.00B')
  })

  it('moves to the next unit from 999 on', () => {
    expect(formatSize(1000)).toBe('  0.98K')
    expect(formatSize(1048576)).toBe('  1.00M')
  })
})

describe('formatRows', () => {
  const host = { url: 'https://files.example.org/' }
  const rows = [
    { index: 0, reverseIndex: -11, relativePath: 'aa/x y.txt', prefix: 'aa', fileName: 'x y.txt' },
    { index: 10, reverseIndex: -1, relativePath: 'bb/z.txt', prefix: 'bb', fileName: 'z.txt' },
  ]

  it('pads both index columns and encodes URLs', () => {
    const lines = formatRows(rows, { host }).map(stripVTControlCharacters)

    expect(lines).toEqual([
      ' 0  -11  https://files.example.org/aa/x%20y.txt',
      '10   -1  https://files.example.org/bb/z.txt',
    ])
  })

  it('shows file names and sizes when asked', () => {
    const withStats = rows.map((row) => ({ ...row, stat: { size: 2048, mtime: 0 } }))

    const lines = formatRows(withStats, { host, filenames: true, withSize: true })

    expect(lines.map(stripVTControlCharacters)).toEqual([
      ' 0  -11    2.00K  x y.txt',
      '10   -1    2.00K  z.txt',
    ])
  })

  it('returns nothing for an empty selection', () => {
    expect(formatRows([], { host })).toEqual([])
  })
})
