import { InvalidArgumentError } from 'commander'

/** Signed catalog index; negative values count from the newest entry. */
export function parseIndex(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError(`Not an index: ${value}`)
  }
  return Number(value)
}

export function collectIndices(value: string, previous: number[] = []): number[] {
  return [...previous, parseIndex(value)]
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`Not a non-negative integer: ${value}`)
  }
  return Number(value)
}

export function parseHashLength(value: string): number {
  const length = parseCount(value)
  if (length < 1 || length > 64) {
    throw new InvalidArgumentError('Hash length must be between 1 and 64')
  }
  return length
}
