// ============================================================
// Stub vision oracle — deterministic, no credentials, no network
// ============================================================
// Used when no Gemini credentials are configured so the pipeline can
// still be exercised end to end (road discovery, coverage, grouping).
// Every covered view counts as a front facade; closer views score higher.
// ============================================================

import type { BuildingAnalysis, RefinementDelta, ScreeningJudgment } from '../types'
import type { RefinementRequest, ScreeningRequest, VisionOracle } from '../pipeline/collaborators'

export class StubOracle implements VisionOracle {
  readonly name = 'stub'

  async screen(request: ScreeningRequest): Promise<ScreeningJudgment> {
    const distance = request.viewpoint.distance_meters
    const confidence = Math.round(Math.max(0.1, 1 - distance / 100) * 100) / 100
    return {
      is_valid_front_face: true,
      confidence,
      clarity: confidence >= 0.75 ? 'good' : 'acceptable',
      needs_refinement: false,
      overall_quality: null,
      is_full_view: null,
      suggestions: 'Stub judgment (no vision model configured)',
      group_label: null,
      is_target_building_primary: null,
      is_road_dominated: null,
      building_coverage_pct: null
    }
  }

  async proposeRefinement(_request: RefinementRequest): Promise<RefinementDelta> {
    return { distance_change: 0, pitch_change: 0, fov_change: 0 }
  }

  async analyze(imageReferences: readonly string[], address: string | null): Promise<BuildingAnalysis> {
    return {
      building_usage_summary: `No vision model configured; ${imageReferences.length} image(s) captured but not analyzed.`,
      building_type: 'Unknown',
      architectural_style: 'Unknown',
      condition: 'Unknown',
      visual_description: { estimated_floors: 'Unknown', style: 'Unknown', color: 'Unknown' },
      establishments: [],
      address
    }
  }
}
