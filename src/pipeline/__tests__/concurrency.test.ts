import { describe, expect, it } from '@jest/globals'
import { Deadline, mapWithConcurrency, withRetry } from '../concurrency'
import { CollaboratorError } from '../errors'

describe('mapWithConcurrency', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let inFlight = 0
    let maxInFlight = 0
    const results = await mapWithConcurrency([5, 1, 4, 2, 3], 2, async (n, i) => {
      inFlight++
      maxInFlight = Math.max(maxInFlight, inFlight)
      for (let k = 0; k < n; k++) await Promise.resolve()
      inFlight--
      return `${i}:${n * 10}`
    })
    expect(results).toEqual(['0:50', '1:10', '2:40', '3:20', '4:30'])
    expect(maxInFlight).toBe(2)
  })

  it('returns an empty array for no items', async () => {
    expect(await mapWithConcurrency([], 4, async (n: number) => n)).toEqual([])
  })

  it('rejects with the first error', async () => {
    await expect(mapWithConcurrency([1, 2, 3], 1, async (n) => {
      if (n === 2) throw new Error('second failed')
      return n
    })).rejects.toThrow('second failed')
  })
})

describe('withRetry', () => {
  it('retries transient failures with exponential backoff', async () => {
    const delays: number[] = []
    let calls = 0
    const value = await withRetry('flaky', { retries: 3, baseDelayMs: 10, sleep: async (ms) => { delays.push(ms) } }, async () => {
      calls++
      if (calls < 3) throw new CollaboratorError('busy', { transient: true, status: 503 })
      return 'ok'
    })
    expect(value).toBe('ok')
    expect(calls).toBe(3)
    expect(delays).toEqual([10, 20])
  })

  it('gives up after the configured retries', async () => {
    let calls = 0
    await expect(withRetry('down', { retries: 2, baseDelayMs: 1, sleep: async () => {} }, async () => {
      calls++
      throw new CollaboratorError('still down', { transient: true })
    })).rejects.toThrow('still down')
    expect(calls).toBe(3)
  })

  it('does not retry fatal collaborator errors', async () => {
    let calls = 0
    await expect(withRetry('denied', { retries: 3, baseDelayMs: 1, sleep: async () => {} }, async () => {
      calls++
      throw new CollaboratorError('forbidden', { transient: false, status: 403 })
    })).rejects.toMatchObject({ transient: false, status: 403 })
    expect(calls).toBe(1)
  })

  it('does not retry plain errors', async () => {
    let calls = 0
    await expect(withRetry('bug', { retries: 3, baseDelayMs: 1, sleep: async () => {} }, async () => {
      calls++
      throw new TypeError('bad')
    })).rejects.toThrow(TypeError)
    expect(calls).toBe(1)
  })
})

describe('Deadline', () => {
  it('expires once the clock passes the budget', () => {
    let now = 1000
    const deadline = new Deadline(500, () => now)
    expect(deadline.expired()).toBe(false)
    now = 1499
    expect(deadline.expired()).toBe(false)
    now = 1500
    expect(deadline.expired()).toBe(true)
  })
})
