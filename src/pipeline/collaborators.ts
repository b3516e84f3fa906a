// ============================================================
// Collaborator contracts — what the pipeline calls, not how
// ============================================================
// GoogleMapsClient and GeminiOracle are the production implementations;
// StubOracle and the test fakes implement the same shapes.
// ============================================================

import type {
  BuildingAnalysis, LatLng, RefinementDelta, RefinementStep,
  ScreeningJudgment, TargetLocation, Viewpoint
} from '../types'

export interface RoadSnap {
  latitude: number
  longitude: number
  segment_id: string
}

export interface ImageryMetadata {
  available: boolean
  pano_id?: string
  capture_date?: string
  /** Actual panorama location, when the provider reports one */
  location?: LatLng
  /** Distance to the closest imagery the provider knows of, when unavailable */
  nearest_coverage_meters?: number
}

export interface GeocodeRefinement {
  location: TargetLocation
  address: string | null
  refinement_type: 'rooftop' | 'unchanged'
}

export interface MappingCollaborator {
  /** Nearest drivable road, or null when nothing snaps */
  snapToRoad(point: LatLng): Promise<RoadSnap | null>
  getImageryMetadata(viewpoint: Viewpoint, radiusMeters: number): Promise<ImageryMetadata>
  /** Image reference (URL without credentials) for a viewpoint */
  renderImage(viewpoint: Viewpoint): string
  /** Home-center snapping, invoked once before road discovery */
  geocodeRefine(point: LatLng): Promise<GeocodeRefinement>
}

export interface ScreeningRequest {
  candidate_index: number
  image_reference: string
  viewpoint: Viewpoint
  target: TargetLocation
}

export interface RefinementRequest {
  target: TargetLocation
  viewpoint: Viewpoint
  image_reference: string
  history: readonly RefinementStep[]
}

/**
 * Vision-judgment oracle. Fallible and non-deterministic: the pipeline never
 * assumes two identical calls return identical judgments.
 */
export interface VisionOracle {
  readonly name: string
  screen(request: ScreeningRequest): Promise<ScreeningJudgment>
  /**
   * One call for many candidates. Keyed by candidate_index; a missing key
   * means the oracle returned no judgment for that candidate.
   */
  screenBatch?(requests: readonly ScreeningRequest[]): Promise<Map<number, ScreeningJudgment>>
  proposeRefinement(request: RefinementRequest): Promise<RefinementDelta>
  analyze(imageReferences: readonly string[], address: string | null): Promise<BuildingAnalysis>
}
