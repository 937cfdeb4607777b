import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { hashLocal } from '@hashdrop/core/hash'
import { createHarness, TEST_URL, type Harness } from '../test-utils/harness.js'

describe('push', () => {
  let h: Harness

  beforeEach(async () => {
    h = await createHarness()
  })

  afterEach(async () => {
    await h.cleanup()
  })

  it('uploads, verifies and prints the URL', async () => {
    const file = await h.localFile('notes.txt', 'some notes\n')
    const token = await hashLocal('some notes\n', 8)

    const result = await h.run('push', file)

    expect(result.code).toBe(0)
    expect(result.stdout).toBe(`${TEST_URL}/${token}/notes.txt\n`)
    expect(h.site.has(`${token}/notes.txt`)).toBe(true)
    expect(h.site.commands.some((c) => c.startsWith('sha256sum'))).toBe(true)
  })

  it('skips verification with --no-verify', async () => {
    const file = await h.localFile('notes.txt', 'x')

    await h.run('push', '--no-verify', file)

    expect(h.site.commands.some((c) => c.startsWith('sha256sum'))).toBe(false)
  })

  it('applies prefix and suffix to the remote name', async () => {
    const file = await h.localFile('photo.jpg', 'jpeg')
    const token = await hashLocal('jpeg', 8)

    const result = await h.run('push', file, '-p', 'trip-', '-s', '_small')

    expect(result.stdout).toBe(`${TEST_URL}/${token}/trip-photo_small.jpg\n`)
  })

  it('uses aliases as remote names', async () => {
    const a = await h.localFile('a.txt', 'a')
    const b = await h.localFile('b.txt', 'b')

    const result = await h.run('push', a, b, '--alias', 'first.txt', 'second.txt')

    expect(result.stdout.split('\n').filter(Boolean).map((url) => url.split('/').pop())).toEqual([
      'first.txt',
      'second.txt',
    ])
  })

  it('rejects a mismatched number of aliases', async () => {
    const a = await h.localFile('a.txt', 'a')
    const b = await h.localFile('b.txt', 'b')

    const result = await h.run('push', a, b, '--alias', 'only-one.txt')

    expect(result.code).toBe(2)
    expect(result.stderr).toBe('Error: You need to specify as many aliases as you specify files!\n')
    expect(h.site.commands).toEqual([])
  })
})
