import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createHarness, TEST_URL, type Harness } from '../test-utils/harness.js'

describe('check', () => {
  let h: Harness

  beforeEach(async () => {
    h = await createHarness()
  })

  afterEach(async () => {
    await h.cleanup()
  })

  it('lists the remote copies of uploaded files', async () => {
    const path = await h.site.storeFile('a.txt', 'alpha', { prefixLength: 8 })
    const local = await h.localFile('a.txt', 'alpha')

    const result = await h.run('check', local)

    expect(result.code).toBe(0)
    expect(result.stdout).toBe(`0  -1  ${TEST_URL}/${path}\n`)
  })

  it('fails when some files are missing remotely', async () => {
    await h.site.storeFile('a.txt', 'alpha', { prefixLength: 8 })
    const uploaded = await h.localFile('a.txt', 'alpha')
    const missing = await h.localFile('b.txt', 'beta')

    const result = await h.run('check', '-f', uploaded, missing)

    expect(result.code).toBe(1)
    expect(result.stdout).toBe('0  -1  a.txt\n')
    expect(result.stderr).toBe('Error: # of files expected/found differs: 2/1\n')
  })

  it('counts files with identical content once', async () => {
    const path = await h.site.storeFile('a.txt', 'alpha', { prefixLength: 8 })
    const local = await h.localFile('a.txt', 'alpha')
    const copy = await h.localFile('copy.txt', 'alpha')

    const result = await h.run('check', '-u', local, copy, local)

    expect(result.code).toBe(0)
    expect(result.stdout).toBe(`${TEST_URL}/${path}\n`)
    expect(result.stderr).toBe('')
  })
})
