// ============================================================
// Run configuration + environment bindings
// ============================================================

import { z } from 'zod'
import type { Bindings } from './types'
import { CaptureError } from './pipeline/errors'

export const PIPELINE_VERSION = '2.1'

/** Absolute camera bounds — every Viewpoint stays inside these at every stage */
export const VIEWPOINT_BOUNDS = {
  pitch: { min: -15, max: 55 },
  fov: { min: 30, max: 90 },
  distance: { min: 8, max: 65 }
} as const

/** Largest change a single refinement step may make */
export const REFINEMENT_STEP_LIMITS = {
  distance: 10,
  pitch: 15,
  fov: 15
} as const

/** Fallback grouping: same facade when headings and road positions are this close */
export const GROUPING_THRESHOLDS = {
  headingDegrees: 20,
  roadDistanceMeters: 15
} as const

/** Oscillation guard: two viewpoints are "the same" within these tolerances */
export const REVISIT_TOLERANCE = {
  distanceMeters: 1,
  angleDegrees: 2
} as const

export const CaptureConfigSchema = z.object({
  road_search_radius_m: z.number().positive().max(500).default(30),
  road_sample_count: z.number().int().min(1).max(72).default(8),
  max_refinement_iterations: z.number().int().min(0).max(10).default(3),
  refinement_quality_threshold: z.number().min(0).max(10).default(8),
  overall_timeout_s: z.number().positive().default(120),
  max_fanout: z.number().int().min(1).max(32).default(4),
  max_primaries: z.number().int().min(1).max(10).default(3),
  default_pitch: z.number().default(0),
  default_fov: z.number().default(90),
  collaborator_retries: z.number().int().min(0).max(6).default(3),
  retry_base_delay_ms: z.number().min(0).default(250),
  metadata_radius_m: z.number().int().positive().max(1000).default(50)
})

export type CaptureConfig = z.infer<typeof CaptureConfigSchema>
export type CaptureConfigInput = z.input<typeof CaptureConfigSchema>

export const DEFAULT_CAPTURE_CONFIG: CaptureConfig = CaptureConfigSchema.parse({})

/** Parse caller-supplied options, filling defaults. Unknown keys are ignored. */
export function resolveCaptureConfig(input: unknown = {}): CaptureConfig {
  const parsed = CaptureConfigSchema.safeParse(input ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new CaptureError('InvalidConfig', `Invalid capture config: ${issues.join('; ')}`, { issues })
  }
  return parsed.data
}

/** Pick the bindings this service reads out of a process environment */
export function loadBindings(env: NodeJS.ProcessEnv): Bindings {
  return {
    GOOGLE_MAPS_API_KEY: env.GOOGLE_MAPS_API_KEY || undefined,
    GOOGLE_VERTEX_API_KEY: env.GOOGLE_VERTEX_API_KEY || env.GEMINI_API_KEY || undefined,
    GOOGLE_CLOUD_ACCESS_TOKEN: env.GOOGLE_CLOUD_ACCESS_TOKEN || undefined,
    GEMINI_MODEL: env.GEMINI_MODEL || undefined,
    PORT: env.PORT || undefined
  }
}
