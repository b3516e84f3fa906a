// ============================================================
// Coverage Validation — pipeline stage 3
// ============================================================
// One metadata lookup per viewpoint. A viewpoint whose lookup keeps
// failing is marked uncovered; it never takes the batch down with it.
// When the provider reports where its panorama actually sits, the camera
// moves there and is re-aimed at the target before rendering.
// ============================================================

import type { CaptureCandidate, LatLng, RoadPosition, TargetLocation, Viewpoint } from '../types'
import type { ImageryMetadata, MappingCollaborator } from './collaborators'
import { mapWithConcurrency, withRetry, type RetryPolicy } from './concurrency'
import { CaptureError, errorMessage, isFatalCollaboratorError } from './errors'
import { bearing, haversineDistance } from './geometry'
import { clampViewpoint } from './viewpoint'

export interface CoverageOptions {
  metadataRadiusMeters: number
  maxFanout: number
  retry: RetryPolicy
}

export interface CoverageCheck {
  viewpoint: Viewpoint
  image_reference: string | null
  coverage_available: boolean
  diagnostic: string | null
  nearest_coverage_meters: number | null
}

/** Put the camera on the panorama and aim it back at the target */
export function snapToPanorama(viewpoint: Viewpoint, pano: LatLng, target: TargetLocation): Viewpoint {
  return clampViewpoint({
    ...viewpoint,
    camera_latitude: pano.latitude,
    camera_longitude: pano.longitude,
    heading_degrees: bearing(pano, target),
    distance_meters: haversineDistance(pano, target)
  })
}

/**
 * Look up imagery for a single viewpoint. Shared with the refinement loop,
 * which re-enters coverage validation for every adjusted viewpoint.
 */
export async function checkCoverage(
  viewpoint: Viewpoint,
  target: TargetLocation,
  maps: MappingCollaborator,
  opts: Pick<CoverageOptions, 'metadataRadiusMeters' | 'retry'>,
  label: string
): Promise<CoverageCheck> {
  let metadata: ImageryMetadata
  try {
    metadata = await withRetry(`imagery metadata ${label}`, opts.retry, () =>
      maps.getImageryMetadata(viewpoint, opts.metadataRadiusMeters))
  } catch (err) {
    if (isFatalCollaboratorError(err)) throw err
    const diagnostic = `Imagery metadata lookup failed: ${errorMessage(err)}`
    console.warn(`[Coverage] ${label}: ${diagnostic}`)
    return { viewpoint, image_reference: null, coverage_available: false, diagnostic, nearest_coverage_meters: null }
  }

  if (!metadata.available) {
    return {
      viewpoint,
      image_reference: null,
      coverage_available: false,
      diagnostic: 'No Street View imagery at this viewpoint',
      nearest_coverage_meters: metadata.nearest_coverage_meters ?? null
    }
  }

  const covered: Viewpoint = metadata.location
    ? snapToPanorama(viewpoint, metadata.location, target)
    : { ...viewpoint }
  if (metadata.pano_id) covered.pano_id = metadata.pano_id
  if (metadata.capture_date) covered.capture_date = metadata.capture_date

  return {
    viewpoint: covered,
    image_reference: maps.renderImage(covered),
    coverage_available: true,
    diagnostic: null,
    nearest_coverage_meters: null
  }
}

export interface CoverageReport {
  candidates: CaptureCandidate[]
  nearest_coverage_meters: number | null
}

/** One candidate per viewpoint, in input order */
export async function validateCoverage(
  viewpoints: readonly Viewpoint[],
  roads: readonly RoadPosition[],
  target: TargetLocation,
  maps: MappingCollaborator,
  opts: CoverageOptions
): Promise<CoverageReport> {
  const checks = await mapWithConcurrency(viewpoints, opts.maxFanout, (vp, i) =>
    checkCoverage(vp, target, maps, opts, `candidate #${i}`))

  const candidates: CaptureCandidate[] = checks.map((check, i) => ({
    candidate_index: i,
    road_position: roads[i],
    viewpoint: check.viewpoint,
    image_reference: check.image_reference,
    coverage_available: check.coverage_available,
    diagnostic: check.diagnostic
  }))

  const nearest = checks
    .map(c => c.nearest_coverage_meters)
    .filter((d): d is number => d !== null)
  const covered = candidates.filter(c => c.coverage_available).length
  console.log(`[Coverage] ${covered}/${candidates.length} viewpoint(s) have Street View imagery`)

  return {
    candidates,
    nearest_coverage_meters: nearest.length > 0 ? Math.min(...nearest) : null
  }
}

/** NoCoverage when not a single candidate has imagery */
export function requireCoverage(report: CoverageReport): CaptureCandidate[] {
  const covered = report.candidates.filter(c => c.coverage_available)
  if (covered.length === 0) {
    throw new CaptureError('NoCoverage', 'No Street View coverage at any candidate viewpoint', {
      candidates_checked: report.candidates.length,
      nearest_coverage_meters: report.nearest_coverage_meters,
      diagnostics: report.candidates.map(c => ({ candidate_index: c.candidate_index, diagnostic: c.diagnostic }))
    })
  }
  return covered
}
