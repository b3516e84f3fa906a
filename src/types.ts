// ============================================================
// Street-View Building Capture - Core Type Definitions
// ============================================================

/**
 * Environment bindings
 * - Loaded from process.env (.env locally via dotenv)
 * - NEVER echoed back to API callers, only reported as configured/not configured
 */
export type Bindings = {
  GOOGLE_MAPS_API_KEY?: string

  // Gemini credentials - access token takes priority over API key
  GOOGLE_VERTEX_API_KEY?: string
  GOOGLE_CLOUD_ACCESS_TOKEN?: string
  GEMINI_MODEL?: string

  PORT?: string
}

// ============================================================
// GEOMETRY
// ============================================================

export interface LatLng {
  latitude: number
  longitude: number
}

/** Immutable input to one pipeline run */
export type TargetLocation = Readonly<LatLng>

// ============================================================
// PIPELINE DATA MODEL
// ============================================================
// Field names are snake_case: these records are returned as-is by the
// HTTP API and embedded by callers into GeoJSON feature properties.
// ============================================================

/**
 * A point snapped onto a drivable road near the target.
 * Two positions with the same segment_id are the same physical road segment.
 */
export interface RoadPosition {
  latitude: number
  longitude: number
  segment_id: string
  /** Compass bearing (target → ring sample) of the sample that produced this snap */
  sample_bearing: number
}

/**
 * Camera descriptor for a Street View capture.
 * Bounds: heading [0,360), pitch [-15,55], fov [30,90], distance [8,65]
 */
export interface Viewpoint {
  camera_latitude: number
  camera_longitude: number
  heading_degrees: number
  pitch_degrees: number
  fov_degrees: number
  /** Camera → target distance in meters */
  distance_meters: number
  /** Street View panorama id, once imagery metadata confirmed coverage */
  pano_id?: string
  capture_date?: string
}

export interface CaptureCandidate {
  candidate_index: number
  road_position: RoadPosition
  viewpoint: Viewpoint
  /** Street View Static URL without credentials; null when there is no coverage */
  image_reference: string | null
  coverage_available: boolean
  diagnostic: string | null
}

export type Clarity = 'excellent' | 'good' | 'acceptable' | 'poor'

/** What the vision oracle says about one image */
export interface ScreeningJudgment {
  is_valid_front_face: boolean
  confidence: number
  clarity: Clarity
  needs_refinement: boolean
  /** Framing quality 1-10, when the oracle reports one */
  overall_quality: number | null
  /** Roof and ground both visible, when the oracle reports it */
  is_full_view: boolean | null
  suggestions: string
  /** Oracle's own "same facade" label, if it provided one */
  group_label: string | null
  /** false when a neighbouring building dominates the frame; null when not reported */
  is_target_building_primary: boolean | null
  /** Road surface fills the lower part of the frame; null when not reported */
  is_road_dominated: boolean | null
  /** Share of the frame the target building occupies, 0-100 */
  building_coverage_pct: number | null
}

export interface ScreeningResult {
  candidate: CaptureCandidate
  is_valid_front_face: boolean
  confidence: number
  clarity: Clarity
  needs_refinement: boolean
  overall_quality: number | null
  is_full_view: boolean | null
  suggestions: string
  is_target_building_primary: boolean | null
  is_road_dominated: boolean | null
  building_coverage_pct: number | null
  oracle_group_id: string | null
  /** Why the result did not survive the gate; null for survivors */
  rejection_reason: string | null
  /** null for rejected results; a total partition over the surviving ones */
  group_id: string | null
  is_primary_in_group: boolean
}

export interface RefinementDelta {
  distance_change: number
  pitch_change: number
  fov_change: number
}

export interface RefinementStep {
  iteration: number
  prior_viewpoint: Viewpoint
  /** Delta as the oracle proposed it */
  proposed_delta: RefinementDelta
  /** Delta after per-step bounds and any oscillation halving */
  applied_delta: RefinementDelta
  resulting_viewpoint: Viewpoint
  image_reference: string | null
  coverage_available: boolean
  /** null when the refined viewpoint had no imagery */
  resulting_screening: ScreeningResult | null
}

export type RefinementOutcome = 'converged' | 'exhausted' | 'interrupted'

/**
 * Why the loop stopped. `oscillation` is a converged stop: the next proposal
 * only revisited viewpoints, even after halving.
 */
export type RefinementStopReason = 'acceptable' | 'oscillation' | 'iteration_cap' | 'no_proposal' | 'deadline'

export interface CaptureResult {
  candidate_index: number
  group_id: string | null
  final_viewpoint: Viewpoint
  final_image_reference: string
  final_screening: ScreeningResult
  refinement_history: readonly RefinementStep[]
  total_iterations: number
  outcome: RefinementOutcome
  stop_reason: RefinementStopReason
}

// ============================================================
// BUILDING ANALYSIS
// ============================================================

export interface Establishment {
  name: string
  type: string
  description: string
}

export interface BuildingAnalysis {
  building_usage_summary: string
  /** e.g. "Commercial", "Residential", "Mixed use" */
  building_type: string
  architectural_style: string
  condition: string
  visual_description: {
    estimated_floors: string
    style: string
    color: string
  }
  establishments: Establishment[]
  address: string | null
}

// ============================================================
// RUN RECORD
// ============================================================

export type RunStatus = 'success' | 'partial' | 'error'

export type FailureKind =
  | 'InvalidCoordinate'
  | 'InvalidConfig'
  | 'NoRoadsFound'
  | 'NoCoverage'
  | 'AllCandidatesRejected'
  | 'CollaboratorFatalError'
  | 'Unexpected'

export type PipelineStage =
  | 'input'
  | 'location_refinement'
  | 'road_discovery'
  | 'viewpoint_synthesis'
  | 'coverage_validation'
  | 'quality_gate'
  | 'refinement'
  | 'analysis'

export interface RunFailure {
  kind: FailureKind
  stage: PipelineStage
  message: string
  details: Record<string, unknown>
}

export interface Diagnostic {
  stage: PipelineStage
  level: 'info' | 'warning' | 'error'
  message: string
}

export interface LocationRefinement {
  refinement_type: 'rooftop' | 'unchanged'
  distance_moved_meters: number
  address: string | null
}

/**
 * Everything one pipeline invocation produced.
 * Owned by the caller once returned; the core never persists it.
 */
export interface BuildingCaptureRun {
  status: RunStatus
  pipeline_version: string
  target: TargetLocation
  original_target: TargetLocation
  location_refinement: LocationRefinement | null
  road_positions: RoadPosition[]
  viewpoints: Viewpoint[]
  capture_candidates: CaptureCandidate[]
  screening_results: ScreeningResult[]
  captures: CaptureResult[]
  analysis: BuildingAnalysis | null
  failure: RunFailure | null
  diagnostics: Diagnostic[]
  execution_time_seconds: number
}
