// ============================================================
// Refinement Loop — pipeline stage 5
// ============================================================
// State machine per primary candidate:
//
//   evaluating ──(needs refinement, budget left)──▶ refining ──▶ evaluating
//       │                                              │
//       ├──(acceptable)──▶ converged                   └──(revisit twice)──▶ converged (oscillation)
//       ├──(iteration cap)──▶ exhausted
//       └──(deadline)──▶ interrupted
//
// Every refined viewpoint goes back through coverage + screening.
// History is append-only; recorded steps are frozen.
// ============================================================

import type {
  CaptureCandidate, CaptureResult, RefinementDelta, RefinementOutcome, RefinementStep,
  RefinementStopReason, ScreeningResult, TargetLocation, Viewpoint
} from '../types'
import { REFINEMENT_STEP_LIMITS, REVISIT_TOLERANCE } from '../config'
import type { MappingCollaborator, VisionOracle } from './collaborators'
import { withRetry, type Deadline, type RetryPolicy } from './concurrency'
import { checkCoverage } from './coverage'
import { errorMessage, isFatalCollaboratorError } from './errors'
import { angularDifference, clamp, destination } from './geometry'
import { framingProblem, screenSingle } from './quality-gate'
import { clampViewpoint } from './viewpoint'

export interface RefinementOptions {
  maxIterations: number
  qualityThreshold: number
  metadataRadiusMeters: number
  retry: RetryPolicy
  deadline?: Deadline
}

export interface RefinementDeps {
  maps: MappingCollaborator
  oracle: VisionOracle
}

/** A covered viewpoint together with its judgment */
interface Evaluation {
  viewpoint: Viewpoint
  image_reference: string
  screening: ScreeningResult
  /** 0 for the seed, otherwise the step that produced it */
  iteration: number
}

// ============================================================
// HELPERS
// ============================================================

/** A view that lost the facade, or that a neighbour or the road dominates, is never acceptable */
export function isAcceptable(screening: ScreeningResult, qualityThreshold: number): boolean {
  if (!screening.is_valid_front_face || framingProblem(screening) !== null) return false
  if (!screening.needs_refinement) return true
  return screening.overall_quality !== null &&
    screening.overall_quality >= qualityThreshold &&
    screening.is_full_view === true
}

/** Clamp an oracle delta to the per-step limits; non-finite components become 0 */
export function boundDelta(delta: RefinementDelta): RefinementDelta {
  const bound = (v: number, limit: number) => Number.isFinite(v) ? clamp(v, -limit, limit) : 0
  return {
    distance_change: bound(delta.distance_change, REFINEMENT_STEP_LIMITS.distance),
    pitch_change: bound(delta.pitch_change, REFINEMENT_STEP_LIMITS.pitch),
    fov_change: bound(delta.fov_change, REFINEMENT_STEP_LIMITS.fov)
  }
}

export function halveDelta(delta: RefinementDelta): RefinementDelta {
  return {
    distance_change: delta.distance_change / 2,
    pitch_change: delta.pitch_change / 2,
    fov_change: delta.fov_change / 2
  }
}

/**
 * Apply a delta and clamp to the absolute bounds. A distance change moves the
 * camera along the reverse heading from the target so it keeps facing it.
 */
export function applyDelta(vp: Viewpoint, delta: RefinementDelta, target: TargetLocation): Viewpoint {
  const next = clampViewpoint({
    ...vp,
    distance_meters: vp.distance_meters + delta.distance_change,
    pitch_degrees: vp.pitch_degrees + delta.pitch_change,
    fov_degrees: vp.fov_degrees + delta.fov_change
  })

  if (next.distance_meters === vp.distance_meters) return next

  const moved = destination(target, next.heading_degrees + 180, next.distance_meters)
  // A moved camera needs a fresh panorama
  const { pano_id: _pano, capture_date: _date, ...rest } = next
  return { ...rest, camera_latitude: moved.latitude, camera_longitude: moved.longitude }
}

export function sameViewpoint(a: Viewpoint, b: Viewpoint): boolean {
  return Math.abs(a.distance_meters - b.distance_meters) < REVISIT_TOLERANCE.distanceMeters &&
    angularDifference(a.heading_degrees, b.heading_degrees) < REVISIT_TOLERANCE.angleDegrees &&
    Math.abs(a.pitch_degrees - b.pitch_degrees) < REVISIT_TOLERANCE.angleDegrees &&
    Math.abs(a.fov_degrees - b.fov_degrees) < REVISIT_TOLERANCE.angleDegrees
}

/** Valid front facades first, then highest confidence */
function compareEvaluations(a: Evaluation, b: Evaluation): number {
  if (a.screening.is_valid_front_face !== b.screening.is_valid_front_face) {
    return a.screening.is_valid_front_face ? 1 : -1
  }
  return a.screening.confidence - b.screening.confidence
}

/** `preferLater` decides ties */
function pickBest(evaluations: readonly Evaluation[], preferLater: boolean): Evaluation {
  return evaluations.reduce((best, e) => {
    const order = compareEvaluations(e, best)
    if (order > 0) return e
    if (order === 0 && preferLater) return e
    return best
  })
}

// ============================================================
// LOOP
// ============================================================

export async function refineCapture(
  primary: ScreeningResult,
  target: TargetLocation,
  deps: RefinementDeps,
  opts: RefinementOptions
): Promise<CaptureResult> {
  const { candidate } = primary
  if (!candidate.image_reference) {
    throw new Error(`Candidate ${candidate.candidate_index} reached refinement without coverage`)
  }
  const tag = `[Refinement #${candidate.candidate_index}]`

  const seed: Evaluation = {
    viewpoint: candidate.viewpoint,
    image_reference: candidate.image_reference,
    screening: primary,
    iteration: 0
  }
  const history: RefinementStep[] = []
  const covered: Evaluation[] = []
  let current = seed
  let state: 'evaluating' | 'refining' = 'evaluating'

  const visited = (): Viewpoint[] => [seed.viewpoint, ...history.map(s => s.resulting_viewpoint)]
  const bestOfSteps = (): Evaluation => {
    if (covered.length === 0) return seed
    const best = pickBest(covered, false)
    // The seed passed the quality gate; a step only replaces it as a valid facade
    return best.screening.is_valid_front_face ? best : seed
  }

  const finish = (outcome: RefinementOutcome, reason: RefinementStopReason, chosen: Evaluation): CaptureResult => {
    console.log(`${tag} ${outcome} (${reason}) after ${history.length} step(s), final confidence ${chosen.screening.confidence}`)
    return {
      candidate_index: candidate.candidate_index,
      group_id: primary.group_id,
      final_viewpoint: chosen.viewpoint,
      final_image_reference: chosen.image_reference,
      final_screening: chosen.screening,
      refinement_history: history,
      total_iterations: history.length,
      outcome,
      stop_reason: reason
    }
  }

  for (;;) {
    if (state === 'evaluating') {
      if (isAcceptable(current.screening, opts.qualityThreshold)) return finish('converged', 'acceptable', current)
      if (history.length >= opts.maxIterations) return finish('exhausted', 'iteration_cap', bestOfSteps())
      if (opts.deadline?.expired()) return finish('interrupted', 'deadline', bestOfSteps())
      state = 'refining'
      continue
    }

    // ── refining ──
    const iteration = history.length + 1
    let proposed: RefinementDelta
    try {
      proposed = await withRetry(`propose refinement ${iteration}`, opts.retry, () =>
        deps.oracle.proposeRefinement({
          target,
          viewpoint: current.viewpoint,
          image_reference: current.image_reference,
          history: [...history]
        }))
    } catch (err) {
      if (isFatalCollaboratorError(err)) throw err
      console.warn(`${tag} No refinement proposal: ${errorMessage(err)}`)
      return finish('exhausted', 'no_proposal', bestOfSteps())
    }

    let applied = boundDelta(proposed)
    let next = applyDelta(current.viewpoint, applied, target)
    if (visited().some(v => sameViewpoint(v, next))) {
      applied = halveDelta(applied)
      next = applyDelta(current.viewpoint, applied, target)
      if (visited().some(v => sameViewpoint(v, next))) {
        console.log(`${tag} Proposed viewpoint already visited, stopping on best seen`)
        return finish('converged', 'oscillation', pickBest([seed, ...covered], true))
      }
    }

    const coverage = await checkCoverage(next, target, deps.maps, {
      metadataRadiusMeters: opts.metadataRadiusMeters,
      retry: opts.retry
    }, `refinement ${candidate.candidate_index}.${iteration}`)

    let screening: ScreeningResult | null = null
    if (coverage.coverage_available && coverage.image_reference) {
      const refinedCandidate: CaptureCandidate = {
        ...candidate,
        viewpoint: coverage.viewpoint,
        image_reference: coverage.image_reference,
        coverage_available: true,
        diagnostic: null
      }
      try {
        const rescreened = await screenSingle(refinedCandidate, target, deps.oracle, opts.retry)
        screening = { ...rescreened, group_id: primary.group_id, is_primary_in_group: primary.is_primary_in_group }
      } catch (err) {
        if (isFatalCollaboratorError(err)) throw err
        console.warn(`${tag} Step ${iteration} not judged: ${errorMessage(err)}`)
      }
    }

    history.push(Object.freeze({
      iteration,
      prior_viewpoint: current.viewpoint,
      proposed_delta: proposed,
      applied_delta: applied,
      resulting_viewpoint: coverage.viewpoint,
      image_reference: coverage.image_reference,
      coverage_available: coverage.coverage_available,
      resulting_screening: screening
    }))

    if (screening && coverage.image_reference) {
      current = { viewpoint: coverage.viewpoint, image_reference: coverage.image_reference, screening, iteration }
      covered.push(current)
      console.log(`${tag} Step ${iteration}: confidence=${screening.confidence}, quality=${screening.overall_quality ?? 'n/a'}, needs_refinement=${screening.needs_refinement}`)
    } else {
      console.warn(`${tag} Step ${iteration}: no usable image at refined viewpoint, continuing from previous one`)
    }
    state = 'evaluating'
  }
}
