// ============================================================
// Viewpoint Synthesis — pipeline stage 2
// ============================================================
// The camera sits on the road position and faces the target.
// ============================================================

import type { RoadPosition, TargetLocation, Viewpoint } from '../types'
import { VIEWPOINT_BOUNDS } from '../config'
import { bearing, clamp, haversineDistance, normalizeHeading } from './geometry'

export interface SynthesisOptions {
  defaultPitch: number
  defaultFov: number
}

/** Pull every camera field back inside VIEWPOINT_BOUNDS */
export function clampViewpoint(vp: Viewpoint): Viewpoint {
  const { pitch, fov, distance } = VIEWPOINT_BOUNDS
  return {
    ...vp,
    heading_degrees: normalizeHeading(vp.heading_degrees),
    pitch_degrees: clamp(vp.pitch_degrees, pitch.min, pitch.max),
    fov_degrees: clamp(vp.fov_degrees, fov.min, fov.max),
    distance_meters: clamp(vp.distance_meters, distance.min, distance.max)
  }
}

export function synthesizeViewpoint(
  road: RoadPosition,
  target: TargetLocation,
  opts: SynthesisOptions
): Viewpoint {
  const from = { latitude: road.latitude, longitude: road.longitude }
  return clampViewpoint({
    camera_latitude: road.latitude,
    camera_longitude: road.longitude,
    heading_degrees: bearing(from, target),
    pitch_degrees: opts.defaultPitch,
    fov_degrees: opts.defaultFov,
    distance_meters: haversineDistance(from, target)
  })
}
