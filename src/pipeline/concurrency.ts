// ============================================================
// Bounded fan-out, retry with backoff, wall-clock deadline
// ============================================================

import { CollaboratorError, errorMessage } from './errors'

/**
 * Run fn over items with at most `limit` calls in flight.
 * Each task writes only its own slot, so the result keeps input order.
 * Rejects with the first error once every started task has settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length)
  const errors: unknown[] = []
  let next = 0

  const worker = async (): Promise<void> => {
    while (next < items.length && errors.length === 0) {
      const index = next++
      try {
        results[index] = await fn(items[index], index)
      } catch (err) {
        errors.push(err)
      }
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker())
  await Promise.all(workers)
  if (errors.length > 0) throw errors[0]
  return results
}

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms))

export interface RetryPolicy {
  retries: number
  baseDelayMs: number
  sleep?: Sleep
}

/**
 * Retry transient collaborator failures with exponential backoff
 * (base, 2·base, 4·base …). Fatal collaborator errors and anything that is
 * not a CollaboratorError are rethrown at once.
 */
export async function withRetry<T>(label: string, policy: RetryPolicy, fn: () => Promise<T>): Promise<T> {
  const wait = policy.sleep ?? sleep
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (err) {
      const retryable = err instanceof CollaboratorError && err.transient
      if (!retryable || attempt >= policy.retries) throw err
      const delay = policy.baseDelayMs * 2 ** attempt
      console.warn(`[Retry] ${label} failed (attempt ${attempt + 1}/${policy.retries + 1}): ${errorMessage(err)} — retrying in ${delay}ms`)
      await wait(delay)
    }
  }
}

export type Clock = () => number

/** Overall wall-clock budget for a run */
export class Deadline {
  private readonly expiresAt: number

  constructor(budgetMs: number, private readonly clock: Clock = Date.now) {
    this.expiresAt = clock() + budgetMs
  }

  expired(): boolean {
    return this.clock() >= this.expiresAt
  }
}
