// ============================================================
// Road Discovery — pipeline stage 1
// ============================================================
// Samples a ring of points around the target, snaps each to the
// nearest drivable road and keeps one position per road segment.
// ============================================================

import type { RoadPosition, TargetLocation } from '../types'
import type { MappingCollaborator } from './collaborators'
import { mapWithConcurrency, withRetry, type RetryPolicy } from './concurrency'
import { CaptureError, errorMessage, isFatalCollaboratorError } from './errors'
import { destination } from './geometry'

export interface RoadSearchOptions {
  radiusMeters: number
  sampleCount: number
  maxFanout: number
  retry: RetryPolicy
}

/** Evenly spaced compass bearings: 0°, 360/n°, … */
export function sampleBearings(sampleCount: number): number[] {
  return Array.from({ length: sampleCount }, (_, i) => (360 / sampleCount) * i)
}

export async function findRoads(
  target: TargetLocation,
  maps: MappingCollaborator,
  opts: RoadSearchOptions
): Promise<RoadPosition[]> {
  const bearings = sampleBearings(opts.sampleCount)
  const samples = bearings.map(b => destination(target, b, opts.radiusMeters))
  console.log(`[Roads] Snapping ${samples.length} ring samples at ${opts.radiusMeters}m around (${target.latitude}, ${target.longitude})`)

  const snaps = await mapWithConcurrency(samples, opts.maxFanout, async (point, i) => {
    try {
      return await withRetry(`snapToRoad #${i}`, opts.retry, () => maps.snapToRoad(point))
    } catch (err) {
      if (isFatalCollaboratorError(err)) throw err
      console.warn(`[Roads] Sample ${i} (${bearings[i]}°) dropped: ${errorMessage(err)}`)
      return null
    }
  })

  // Dedupe by segment id, first occurrence in angular order wins
  const seen = new Set<string>()
  const positions: RoadPosition[] = []
  snaps.forEach((snap, i) => {
    if (!snap || seen.has(snap.segment_id)) return
    seen.add(snap.segment_id)
    positions.push({
      latitude: snap.latitude,
      longitude: snap.longitude,
      segment_id: snap.segment_id,
      sample_bearing: bearings[i]
    })
  })

  if (positions.length === 0) {
    throw new CaptureError('NoRoadsFound', `No roads found within ${opts.radiusMeters}m of target`, {
      radius_meters: opts.radiusMeters,
      sample_count: opts.sampleCount
    })
  }

  console.log(`[Roads] ${positions.length} distinct road segment(s) from ${snaps.filter(Boolean).length} snaps`)
  return positions
}
