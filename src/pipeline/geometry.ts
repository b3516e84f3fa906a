// ============================================================
// Geometry helpers — bearing, distance, offset on a sphere
// ============================================================
// Pure functions. Angles in degrees, distances in meters.
// ============================================================

import type { LatLng } from '../types'
import { CaptureError } from './errors'

export const EARTH_RADIUS_M = 6371000

const toRad = (deg: number) => deg * Math.PI / 180
const toDeg = (rad: number) => rad * 180 / Math.PI

export function assertCoordinate(point: LatLng): void {
  const { latitude, longitude } = point
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    throw new CaptureError('InvalidCoordinate', 'Coordinates must be finite numbers', { latitude, longitude })
  }
  if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) {
    throw new CaptureError('InvalidCoordinate', `Coordinate out of range: (${latitude}, ${longitude})`, { latitude, longitude })
  }
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value))
}

/** Wrap any angle into [0, 360) */
export function normalizeHeading(deg: number): number {
  const wrapped = ((deg % 360) + 360) % 360
  // -1e-15 % 360 + 360 rounds to exactly 360
  return wrapped >= 360 ? 0 : wrapped
}

/** Shortest arc between two headings, in [0, 180] */
export function angularDifference(a: number, b: number): number {
  const diff = Math.abs(normalizeHeading(a) - normalizeHeading(b))
  return diff > 180 ? 360 - diff : diff
}

/**
 * Initial bearing from a to b, degrees clockwise from north in [0, 360).
 * This is the heading a camera at a needs to face b.
 */
export function bearing(a: LatLng, b: LatLng): number {
  assertCoordinate(a)
  assertCoordinate(b)
  const lat1 = toRad(a.latitude)
  const lat2 = toRad(b.latitude)
  const dLon = toRad(b.longitude - a.longitude)

  const x = Math.sin(dLon) * Math.cos(lat2)
  const y = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLon)
  return normalizeHeading(toDeg(Math.atan2(x, y)))
}

/** Point reached by travelling distanceMeters from point along bearingDeg */
export function destination(point: LatLng, bearingDeg: number, distanceMeters: number): LatLng {
  assertCoordinate(point)
  if (!Number.isFinite(bearingDeg) || !Number.isFinite(distanceMeters)) {
    throw new CaptureError('InvalidCoordinate', 'Bearing and distance must be finite', { bearingDeg, distanceMeters })
  }
  const angular = distanceMeters / EARTH_RADIUS_M
  const brg = toRad(bearingDeg)
  const lat1 = toRad(point.latitude)
  const lon1 = toRad(point.longitude)

  const lat2 = Math.asin(
    Math.sin(lat1) * Math.cos(angular) +
    Math.cos(lat1) * Math.sin(angular) * Math.cos(brg)
  )
  const lon2 = lon1 + Math.atan2(
    Math.sin(brg) * Math.sin(angular) * Math.cos(lat1),
    Math.cos(angular) - Math.sin(lat1) * Math.sin(lat2)
  )

  // Normalize longitude to [-180, 180)
  const longitude = ((toDeg(lon2) + 540) % 360) - 180
  return { latitude: toDeg(lat2), longitude }
}

/** Great-circle distance in meters (haversine) */
export function haversineDistance(a: LatLng, b: LatLng): number {
  assertCoordinate(a)
  assertCoordinate(b)
  const phi1 = toRad(a.latitude)
  const phi2 = toRad(b.latitude)
  const dPhi = toRad(b.latitude - a.latitude)
  const dLambda = toRad(b.longitude - a.longitude)

  const h = Math.sin(dPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2
  return 2 * EARTH_RADIUS_M * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h))
}
