// ============================================================
// Capture jobs — submit now, poll for the run record later
// ============================================================
// A run can take up to overall_timeout_s, so the job routes hand back a
// rev_id at once and keep the record in memory. Finished jobs are evicted
// after ttlMs, or sooner when the store is full; running jobs never are.
// ============================================================

import { randomUUID } from 'crypto'
import type { BuildingCaptureRun, TargetLocation } from '../types'
import type { Clock } from '../pipeline/concurrency'
import { errorMessage } from '../pipeline/errors'

export type CaptureJobStatus = 'PENDING' | 'IN_PROGRESS' | 'DONE' | 'FAILED'

export interface CaptureJob {
  rev_id: string
  status: CaptureJobStatus
  input: TargetLocation
  created_at: string
  started_at: string | null
  finished_at: string | null
  /** The run record once finished; also kept for FAILED runs */
  result: BuildingCaptureRun | null
  error: string | null
}

export interface CaptureJobStoreOptions {
  /** How long a finished job stays readable (default 15 min) */
  ttlMs?: number
  /** Most jobs held at once, running or finished (default 100) */
  maxJobs?: number
  clock?: Clock
  newId?: () => string
}

interface Entry {
  job: CaptureJob
  finishedAtMs: number | null
  settled: Promise<void>
}

export class CaptureJobStore {
  private readonly jobs = new Map<string, Entry>()
  private readonly ttlMs: number
  private readonly maxJobs: number
  private readonly clock: Clock
  private readonly newId: () => string

  constructor(opts: CaptureJobStoreOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 15 * 60 * 1000
    this.maxJobs = opts.maxJobs ?? 100
    this.clock = opts.clock ?? Date.now
    this.newId = opts.newId ?? randomUUID
  }

  private now(): string {
    return new Date(this.clock()).toISOString()
  }

  /** Start a run in the background; null when the store is full of running jobs */
  submit(input: TargetLocation, run: () => Promise<BuildingCaptureRun>): CaptureJob | null {
    this.evict()
    if (this.jobs.size >= this.maxJobs) {
      console.warn(`[Jobs] Rejecting job: ${this.jobs.size} job(s) still running`)
      return null
    }

    const job: CaptureJob = {
      rev_id: this.newId(),
      status: 'PENDING',
      input: { latitude: input.latitude, longitude: input.longitude },
      created_at: this.now(),
      started_at: null,
      finished_at: null,
      result: null,
      error: null
    }
    const entry: Entry = { job, finishedAtMs: null, settled: Promise.resolve() }

    const finish = (status: CaptureJobStatus, error: string | null) => {
      job.status = status
      job.error = error
      job.finished_at = this.now()
      entry.finishedAtMs = this.clock()
      console.log(`[Jobs] ${job.rev_id} ${status}`)
    }

    entry.settled = Promise.resolve()
      .then(() => {
        job.status = 'IN_PROGRESS'
        job.started_at = this.now()
        return run()
      })
      .then(
        (result) => {
          job.result = result
          if (result.status === 'error') finish('FAILED', result.failure?.message ?? 'Capture failed')
          else finish('DONE', null)
        },
        (err: unknown) => finish('FAILED', errorMessage(err))
      )

    this.jobs.set(job.rev_id, entry)
    console.log(`[Jobs] ${job.rev_id} submitted for (${input.latitude}, ${input.longitude})`)
    return job
  }

  get(revId: string): CaptureJob | null {
    this.evict()
    return this.jobs.get(revId)?.job ?? null
  }

  /** Resolves once the job has finished (at once for unknown ids) */
  settled(revId: string): Promise<void> {
    return this.jobs.get(revId)?.settled ?? Promise.resolve()
  }

  get size(): number {
    return this.jobs.size
  }

  private evict(): void {
    const now = this.clock()
    const finished: [string, number][] = []
    for (const [id, entry] of this.jobs) {
      if (entry.finishedAtMs === null) continue
      if (now - entry.finishedAtMs >= this.ttlMs) this.jobs.delete(id)
      else finished.push([id, entry.finishedAtMs])
    }
    // Full: drop the oldest finished jobs to make room for one more
    finished.sort((a, b) => a[1] - b[1])
    while (this.jobs.size >= this.maxJobs && finished.length > 0) {
      const oldest = finished.shift()
      if (oldest) this.jobs.delete(oldest[0])
    }
  }
}
