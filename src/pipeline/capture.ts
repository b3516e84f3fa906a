// ============================================================
// Building capture pipeline — orchestrator
// ============================================================
// Pipeline:
// 0. Home-center snapping of the input coordinate
// 1. Road discovery (ring sampling + road snapping)
// 2. Viewpoint synthesis
// 3. Coverage validation (Street View metadata)
// 4. Quality gate (vision oracle screening + grouping)
// 5. Refinement loop per primary
// 6. Building analysis on the final images
//
// Never throws: every failure ends up in run.failure, and the wall-clock
// budget turns an unfinished run into status "partial".
// ============================================================

import type {
  BuildingCaptureRun, CaptureCandidate, CaptureResult, Diagnostic,
  PipelineStage, RoadPosition, ScreeningResult, TargetLocation, Viewpoint
} from '../types'
import { PIPELINE_VERSION, resolveCaptureConfig, type CaptureConfig } from '../config'
import type { MappingCollaborator, VisionOracle } from './collaborators'
import { Deadline, mapWithConcurrency, withRetry, type Clock, type RetryPolicy, type Sleep } from './concurrency'
import { validateCoverage, requireCoverage } from './coverage'
import { CaptureError, CollaboratorError, errorMessage, isFatalCollaboratorError } from './errors'
import { assertCoordinate, haversineDistance } from './geometry'
import { refineCapture } from './refinement'
import { findRoads } from './road-finder'
import { screenCandidates } from './quality-gate'
import { synthesizeViewpoint } from './viewpoint'

export interface CaptureDeps {
  maps: MappingCollaborator
  oracle: VisionOracle
  clock?: Clock
  sleep?: Sleep
}

/** Most images handed to the analysis call */
const MAX_ANALYSIS_IMAGES = 5

/** Thrown internally when the budget runs out between stages */
class BudgetExpired extends Error {}

export async function captureBuilding(
  target: TargetLocation,
  configInput: unknown,
  deps: CaptureDeps
): Promise<BuildingCaptureRun> {
  const clock = deps.clock ?? Date.now
  const startedAt = clock()

  const run: BuildingCaptureRun = {
    status: 'success',
    pipeline_version: PIPELINE_VERSION,
    target: { latitude: target.latitude, longitude: target.longitude },
    original_target: { latitude: target.latitude, longitude: target.longitude },
    location_refinement: null,
    road_positions: [],
    viewpoints: [],
    capture_candidates: [],
    screening_results: [],
    captures: [],
    analysis: null,
    failure: null,
    diagnostics: [],
    execution_time_seconds: 0
  }

  let stage: PipelineStage = 'input'
  const note = (level: Diagnostic['level'], message: string) => {
    run.diagnostics.push({ stage, level, message })
  }

  const finish = (): BuildingCaptureRun => {
    run.execution_time_seconds = Math.round((clock() - startedAt) / 10) / 100
    console.log(`[Pipeline] ${run.status} in ${run.execution_time_seconds}s (${run.captures.length} capture(s))`)
    return run
  }

  let config: CaptureConfig
  try {
    config = resolveCaptureConfig(configInput)
    assertCoordinate(target)
  } catch (err) {
    return failRun(run, stage, err, finish)
  }

  const deadline = new Deadline(config.overall_timeout_s * 1000, clock)
  const retry: RetryPolicy = {
    retries: config.collaborator_retries,
    baseDelayMs: config.retry_base_delay_ms,
    sleep: deps.sleep
  }
  const checkpoint = () => {
    if (deadline.expired()) throw new BudgetExpired(`Budget of ${config.overall_timeout_s}s exceeded after ${stage}`)
  }

  console.log(`[Pipeline] Capturing building at (${target.latitude}, ${target.longitude})`)

  try {
    // ── Step 0: home-center snapping ──
    stage = 'location_refinement'
    try {
      const refined = await withRetry('geocode refine', retry, () => deps.maps.geocodeRefine(target))
      assertCoordinate(refined.location)
      const moved = haversineDistance(target, refined.location)
      run.target = { latitude: refined.location.latitude, longitude: refined.location.longitude }
      run.location_refinement = {
        refinement_type: refined.refinement_type,
        distance_moved_meters: Math.round(moved * 10) / 10,
        address: refined.address
      }
      note('info', `Location ${refined.refinement_type}, moved ${moved.toFixed(1)}m`)
    } catch (err) {
      if (isFatalCollaboratorError(err)) throw err
      note('warning', `Location refinement skipped: ${errorMessage(err)}`)
    }
    checkpoint()

    // ── Step 1: roads ──
    stage = 'road_discovery'
    run.road_positions = await findRoads(run.target, deps.maps, {
      radiusMeters: config.road_search_radius_m,
      sampleCount: config.road_sample_count,
      maxFanout: config.max_fanout,
      retry
    })
    note('info', `${run.road_positions.length} road segment(s) found`)
    checkpoint()

    // ── Step 2: viewpoints ──
    stage = 'viewpoint_synthesis'
    const targetNow = run.target
    run.viewpoints = run.road_positions.map((road: RoadPosition): Viewpoint =>
      synthesizeViewpoint(road, targetNow, { defaultPitch: config.default_pitch, defaultFov: config.default_fov }))
    checkpoint()

    // ── Step 3: coverage ──
    stage = 'coverage_validation'
    const coverage = await validateCoverage(run.viewpoints, run.road_positions, targetNow, deps.maps, {
      metadataRadiusMeters: config.metadata_radius_m,
      maxFanout: config.max_fanout,
      retry
    })
    run.capture_candidates = coverage.candidates
    const covered: CaptureCandidate[] = requireCoverage(coverage)
    note('info', `${covered.length}/${coverage.candidates.length} viewpoint(s) covered`)
    checkpoint()

    // ── Step 4: quality gate ──
    stage = 'quality_gate'
    const screening = await screenCandidates(run.capture_candidates, run.target, deps.oracle, {
      maxFanout: config.max_fanout,
      retry
    })
    run.screening_results = screening.results
    const primaries: ScreeningResult[] = screening.primaries.slice(0, config.max_primaries)
    note('info', `${screening.primaries.length} facade group(s), refining ${primaries.length}`)
    checkpoint()

    // ── Step 5: refinement ──
    stage = 'refinement'
    run.captures = await mapWithConcurrency(primaries, config.max_fanout, (primary) =>
      refineCapture(primary, targetNow, deps, {
        maxIterations: config.max_refinement_iterations,
        qualityThreshold: config.refinement_quality_threshold,
        metadataRadiusMeters: config.metadata_radius_m,
        retry,
        deadline
      }))
    for (const c of run.captures) {
      if (c.outcome === 'exhausted') {
        note('warning', `RefinementExhausted: candidate #${c.candidate_index} kept best of ${c.total_iterations} step(s)`)
      } else if (c.outcome === 'interrupted') {
        note('warning', `Refinement of candidate #${c.candidate_index} interrupted by time budget`)
        run.status = 'partial'
      } else if (c.stop_reason === 'oscillation') {
        note('warning', `Oscillation: candidate #${c.candidate_index} converged on best view seen after ${c.total_iterations} step(s)`)
      } else {
        note('info', `Candidate #${c.candidate_index} ${c.outcome} after ${c.total_iterations} step(s)`)
      }
    }
    checkpoint()

    // ── Step 6: analysis ──
    stage = 'analysis'
    const images = rankForAnalysis(run.captures).map(c => c.final_image_reference)
    try {
      const address = run.location_refinement?.address ?? null
      run.analysis = await withRetry('analyze building', retry, () => deps.oracle.analyze(images, address))
      note('info', `Analysis found ${run.analysis.establishments.length} establishment(s)`)
    } catch (err) {
      if (isFatalCollaboratorError(err)) throw err
      note('error', `Building analysis failed: ${errorMessage(err)}`)
      run.status = 'partial'
    }
  } catch (err) {
    if (err instanceof BudgetExpired) {
      note('warning', err.message)
      run.status = 'partial'
      return finish()
    }
    return failRun(run, stage, err, finish)
  }

  return finish()
}

/** Best final judgments first (confidence, then building coverage), capped for the analysis call */
export function rankForAnalysis(captures: readonly CaptureResult[]): CaptureResult[] {
  return [...captures]
    .sort((a, b) =>
      b.final_screening.confidence - a.final_screening.confidence ||
      (b.final_screening.building_coverage_pct ?? 0) - (a.final_screening.building_coverage_pct ?? 0))
    .slice(0, MAX_ANALYSIS_IMAGES)
}

function failRun(
  run: BuildingCaptureRun,
  stage: PipelineStage,
  err: unknown,
  finish: () => BuildingCaptureRun
): BuildingCaptureRun {
  run.status = 'error'
  if (err instanceof CaptureError) {
    run.failure = { kind: err.kind, stage, message: err.message, details: err.details }
  } else if (err instanceof CollaboratorError) {
    run.failure = {
      kind: 'CollaboratorFatalError',
      stage,
      message: err.message,
      details: { status: err.status, transient: err.transient }
    }
  } else {
    run.failure = { kind: 'Unexpected', stage, message: errorMessage(err), details: {} }
  }
  run.diagnostics.push({ stage, level: 'error', message: `${run.failure.kind}: ${run.failure.message}` })
  console.error(`[Pipeline] ${run.failure.kind} during ${stage}: ${run.failure.message}`)
  return finish()
}
