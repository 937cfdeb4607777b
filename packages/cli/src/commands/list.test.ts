import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createHarness, TEST_URL, type Harness } from '../test-utils/harness.js'

describe('list', () => {
  let h: Harness

  beforeEach(async () => {
    h = await createHarness({ now: 400 })
    h.site.addFile('h1/a.txt', 'aaaa', 100)
    h.site.addFile('h2/b.png', 'bbbbbbbbb', 200)
    h.site.addFile('h3/c.png', 'cc', 300)
  })

  afterEach(async () => {
    await h.cleanup()
  })

  it('lists every entry with both indices and its URL', async () => {
    const result = await h.run('list')

    expect(result.code).toBe(0)
    expect(result.stdout).toBe(
      `0  -3  ${TEST_URL}/h1/a.txt\n` +
        `1  -2  ${TEST_URL}/h2/b.png\n` +
        `2  -1  ${TEST_URL}/h3/c.png\n`,
    )
  })

  it('prints indices of filtered entries', async () => {
    const result = await h.run('list', '-i', '-F', '\\.png$')
    expect(result.stdout).toBe('1 2\n')
  })

  it('takes negative indices after --', async () => {
    const result = await h.run('list', '-u', '--', '-1')
    expect(result.stdout).toBe(`${TEST_URL}/h3/c.png\n`)
  })

  it('sorts by size and shows the size column', async () => {
    const result = await h.run('list', '-S', '-s', '-f')

    expect(result.stdout).toBe(
      '2  -1    2.00B  c.png\n' + '0  -3    4.00B  a.txt\n' + '1  -2    9.00B  b.png\n',
    )
  })

  it('keeps entries newer than the duration', async () => {
    const result = await h.run('list', '--newer', '150s', '-f')
    expect(result.stdout).toBe('2  -1  c.png\n')
  })

  it('applies --last after reversing', async () => {
    const result = await h.run('list', '-r', '-n', '1', '-i')
    expect(result.stdout).toBe('0\n')
  })

  it('exits 2 on an out-of-range index', async () => {
    const result = await h.run('list', '5')

    expect(result.code).toBe(2)
    expect(result.stderr).toBe('Error: Invalid index specified: 5 (catalog has 3 entries)\n')
  })

  it('exits 2 on a bad duration', async () => {
    const result = await h.run('list', '--older', 'soon')

    expect(result.code).toBe(2)
    expect(result.stderr).toMatch(/^Error: Invalid duration 'soon'/)
  })
})
