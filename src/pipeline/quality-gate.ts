// ============================================================
// Quality Gate — pipeline stage 4
// ============================================================
// 1. Ask the oracle to judge every covered candidate (batched if it can)
// 2. Keep valid front facades
// 3. Drop shots a neighbour or the road dominates (unless that drops all)
// 4. Group views of the same facade, elect one primary per group
// ============================================================

import type { CaptureCandidate, ScreeningJudgment, ScreeningResult, TargetLocation } from '../types'
import { GROUPING_THRESHOLDS } from '../config'
import type { ScreeningRequest, VisionOracle } from './collaborators'
import { mapWithConcurrency, withRetry, type RetryPolicy } from './concurrency'
import { CaptureError, errorMessage, isFatalCollaboratorError } from './errors'
import { angularDifference, haversineDistance } from './geometry'

export interface ScreeningOptions {
  maxFanout: number
  retry: RetryPolicy
}

const NO_JUDGMENT = 'No judgment returned by the vision oracle'
export const NEIGHBOUR_DOMINATES = 'A neighbouring building dominates the frame'
export const ROAD_DOMINATES = 'Road surface dominates the frame'

function toRequest(candidate: CaptureCandidate, target: TargetLocation): ScreeningRequest {
  if (!candidate.image_reference) {
    throw new Error(`Candidate ${candidate.candidate_index} has no image reference`)
  }
  return {
    candidate_index: candidate.candidate_index,
    image_reference: candidate.image_reference,
    viewpoint: candidate.viewpoint,
    target
  }
}

function toResult(candidate: CaptureCandidate, judgment: ScreeningJudgment | undefined): ScreeningResult {
  if (!judgment) {
    return {
      candidate,
      is_valid_front_face: false,
      confidence: 0,
      clarity: 'poor',
      needs_refinement: false,
      overall_quality: null,
      is_full_view: null,
      suggestions: NO_JUDGMENT,
      is_target_building_primary: null,
      is_road_dominated: null,
      building_coverage_pct: null,
      oracle_group_id: null,
      rejection_reason: NO_JUDGMENT,
      group_id: null,
      is_primary_in_group: false
    }
  }
  return {
    candidate,
    is_valid_front_face: judgment.is_valid_front_face,
    confidence: judgment.confidence,
    clarity: judgment.clarity,
    needs_refinement: judgment.needs_refinement,
    overall_quality: judgment.overall_quality,
    is_full_view: judgment.is_full_view,
    suggestions: judgment.suggestions,
    is_target_building_primary: judgment.is_target_building_primary,
    is_road_dominated: judgment.is_road_dominated,
    building_coverage_pct: judgment.building_coverage_pct,
    oracle_group_id: judgment.group_label,
    rejection_reason: judgment.is_valid_front_face ? null : (judgment.suggestions || 'Not a valid front facade'),
    group_id: null,
    is_primary_in_group: false
  }
}

/** Judge one candidate; used by the refinement loop after every re-render */
export async function screenSingle(
  candidate: CaptureCandidate,
  target: TargetLocation,
  oracle: VisionOracle,
  retry: RetryPolicy
): Promise<ScreeningResult> {
  const judgment = await withRetry(`screen candidate #${candidate.candidate_index}`, retry, () =>
    oracle.screen(toRequest(candidate, target)))
  return toResult(candidate, judgment)
}

async function judgeAll(
  covered: readonly CaptureCandidate[],
  target: TargetLocation,
  oracle: VisionOracle,
  opts: ScreeningOptions
): Promise<Map<number, ScreeningJudgment>> {
  const requests = covered.map(c => toRequest(c, target))

  if (oracle.screenBatch) {
    const batch = oracle.screenBatch.bind(oracle)
    console.log(`[QualityGate] Batch-screening ${requests.length} candidate(s) with ${oracle.name}`)
    try {
      return await withRetry('screen batch', opts.retry, () => batch(requests))
    } catch (err) {
      if (isFatalCollaboratorError(err)) throw err
      console.warn(`[QualityGate] Batch screening failed: ${errorMessage(err)}`)
      return new Map()
    }
  }

  console.log(`[QualityGate] Screening ${requests.length} candidate(s) one by one with ${oracle.name}`)
  const judgments = await mapWithConcurrency(requests, opts.maxFanout, async (req) => {
    try {
      return await withRetry(`screen candidate #${req.candidate_index}`, opts.retry, () => oracle.screen(req))
    } catch (err) {
      if (isFatalCollaboratorError(err)) throw err
      console.warn(`[QualityGate] Candidate #${req.candidate_index} not judged: ${errorMessage(err)}`)
      return undefined
    }
  })

  const byIndex = new Map<number, ScreeningJudgment>()
  judgments.forEach((j, i) => {
    if (j) byIndex.set(requests[i].candidate_index, j)
  })
  return byIndex
}

// ============================================================
// SELECTION
// ============================================================

/** Why a valid facade shot still frames the wrong thing; null when it is fine */
export function framingProblem(result: ScreeningResult): string | null {
  if (result.is_target_building_primary === false) return NEIGHBOUR_DOMINATES
  if (result.is_road_dominated === true) return ROAD_DOMINATES
  return null
}

/**
 * Drop valid facades whose frame a neighbour or the road dominates. When that
 * would leave nothing, every valid facade is kept.
 */
export function selectTargetViews(valid: readonly ScreeningResult[]): ScreeningResult[] {
  const kept = valid.filter(r => framingProblem(r) === null)
  if (kept.length > 0 || valid.length === 0) {
    const dropped = valid.length - kept.length
    if (dropped > 0) console.log(`[QualityGate] Dropped ${dropped} shot(s) dominated by a neighbour or the road`)
    return kept
  }
  console.warn('[QualityGate] Every valid shot is dominated by a neighbour or the road, keeping them all')
  return [...valid]
}

// ============================================================
// GROUPING
// ============================================================

/** Fallback for unlabeled results: headings and road positions close together */
function nearbyGeometry(a: ScreeningResult, b: ScreeningResult): boolean {
  const headingGap = angularDifference(a.candidate.viewpoint.heading_degrees, b.candidate.viewpoint.heading_degrees)
  const roadGap = haversineDistance(a.candidate.road_position, b.candidate.road_position)
  return headingGap < GROUPING_THRESHOLDS.headingDegrees && roadGap < GROUPING_THRESHOLDS.roadDistanceMeters
}

/** Highest confidence, then closest camera, then lowest index */
export function comparePrimary(a: ScreeningResult, b: ScreeningResult): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence
  if (a.candidate.viewpoint.distance_meters !== b.candidate.viewpoint.distance_meters) {
    return a.candidate.viewpoint.distance_meters - b.candidate.viewpoint.distance_meters
  }
  return a.candidate.candidate_index - b.candidate.candidate_index
}

/**
 * Partition survivors into facade groups (union-find) and elect a primary
 * per group. Matching oracle labels join first; geometry then joins pairs
 * where at least one side is unlabeled, but never a group that would end up
 * holding two different labels. Returns new result objects; the input is
 * left untouched.
 */
export function groupSurvivors(survivors: readonly ScreeningResult[]): ScreeningResult[] {
  const parent = survivors.map((_, i) => i)
  const labels = survivors.map(s => new Set(s.oracle_group_id ? [s.oracle_group_id] : []))
  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]]
      i = parent[i]
    }
    return i
  }
  const union = (i: number, j: number): void => {
    const ri = find(i)
    const rj = find(j)
    if (ri === rj) return
    const merged = new Set([...labels[ri], ...labels[rj]])
    if (merged.size > 1) return
    const [root, child] = ri < rj ? [ri, rj] : [rj, ri]
    parent[child] = root
    labels[root] = merged
  }

  for (let i = 0; i < survivors.length; i++) {
    for (let j = i + 1; j < survivors.length; j++) {
      const a = survivors[i].oracle_group_id
      if (a && a === survivors[j].oracle_group_id) union(i, j)
    }
  }

  for (let i = 0; i < survivors.length; i++) {
    for (let j = i + 1; j < survivors.length; j++) {
      if (survivors[i].oracle_group_id && survivors[j].oracle_group_id) continue
      if (nearbyGeometry(survivors[i], survivors[j])) union(i, j)
    }
  }

  // Name groups in order of their lowest candidate index
  const order = survivors
    .map((s, i) => ({ i, index: s.candidate.candidate_index }))
    .sort((a, b) => a.index - b.index)
  const names = new Map<number, string>()
  for (const { i } of order) {
    const root = find(i)
    if (!names.has(root)) names.set(root, `facade-${names.size + 1}`)
  }

  const grouped = survivors.map((s, i) => ({ ...s, group_id: names.get(find(i)) ?? null, is_primary_in_group: false }))

  const members = new Map<string, ScreeningResult[]>()
  for (const r of grouped) {
    const key = r.group_id ?? ''
    members.set(key, [...(members.get(key) ?? []), r])
  }
  for (const group of members.values()) {
    const [primary] = [...group].sort(comparePrimary)
    primary.is_primary_in_group = true
  }

  return grouped
}

// ============================================================
// STAGE ENTRY
// ============================================================

export interface ScreeningReport {
  /** One result per covered candidate, input order */
  results: ScreeningResult[]
  /** Primaries, best first */
  primaries: ScreeningResult[]
}

export async function screenCandidates(
  candidates: readonly CaptureCandidate[],
  target: TargetLocation,
  oracle: VisionOracle,
  opts: ScreeningOptions
): Promise<ScreeningReport> {
  const covered = candidates.filter(c => c.coverage_available && c.image_reference)
  const judgments = await judgeAll(covered, target, oracle, opts)

  const raw = covered.map(c => toResult(c, judgments.get(c.candidate_index)))
  const grouped = groupSurvivors(selectTargetViews(raw.filter(r => r.is_valid_front_face)))
  const byIndex = new Map(grouped.map(r => [r.candidate.candidate_index, r]))
  const results = raw.map(r => byIndex.get(r.candidate.candidate_index) ??
    { ...r, rejection_reason: r.rejection_reason ?? framingProblem(r) })

  if (grouped.length === 0) {
    throw new CaptureError('AllCandidatesRejected', 'No candidate shows a valid front facade', {
      rejections: results.map(r => ({
        candidate_index: r.candidate.candidate_index,
        reason: r.rejection_reason ?? 'Not a valid front facade'
      }))
    })
  }

  const primaries = grouped.filter(r => r.is_primary_in_group).sort(comparePrimary)
  const groups = new Set(grouped.map(r => r.group_id)).size
  console.log(`[QualityGate] ${grouped.length}/${raw.length} valid facade(s) in ${groups} group(s)`)
  return { results, primaries }
}
