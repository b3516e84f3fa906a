// ============================================================
// Pipeline error taxonomy
// ============================================================
// CaptureError  — a stage failure kind, carried into the run record as data
// CollaboratorError — a mapping/oracle call failed; transient ones are retried
// ============================================================

import type { FailureKind } from '../types'

export class CaptureError extends Error {
  readonly kind: FailureKind
  readonly details: Record<string, unknown>

  constructor(kind: FailureKind, message: string, details: Record<string, unknown> = {}) {
    super(message)
    this.name = 'CaptureError'
    this.kind = kind
    this.details = details
  }
}

export class CollaboratorError extends Error {
  /** Network, rate limit, 5xx, unparseable oracle output */
  readonly transient: boolean
  readonly status: number | null

  constructor(message: string, opts: { transient: boolean; status?: number | null }) {
    super(message)
    this.name = 'CollaboratorError'
    this.transient = opts.transient
    this.status = opts.status ?? null
  }
}

/** 429 and 5xx are worth retrying; 401/403 and other 4xx are not */
export function collaboratorErrorFromStatus(service: string, status: number, body: string): CollaboratorError {
  const transient = status === 429 || status >= 500
  return new CollaboratorError(
    `${service} error ${status}: ${body.substring(0, 200)}`,
    { transient, status }
  )
}

export function isFatalCollaboratorError(err: unknown): err is CollaboratorError {
  return err instanceof CollaboratorError && !err.transient
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
