// ============================================================
// Vision oracle — Gemini (Generative Language REST API)
// ============================================================
// DUAL AUTH SUPPORT:
// 1. Bearer token (GOOGLE_CLOUD_ACCESS_TOKEN) — tried first
// 2. API key (GOOGLE_VERTEX_API_KEY, AIzaSy... format) — fallback
//
// Images are inlined as base64 parts; JSON output is requested with
// responseMimeType and validated with zod before it reaches the pipeline.
// ============================================================

import { z } from 'zod'
import type { BuildingAnalysis, RefinementDelta, RefinementStep, ScreeningJudgment, Viewpoint } from '../types'
import type { RefinementRequest, ScreeningRequest, VisionOracle } from '../pipeline/collaborators'
import { CollaboratorError, collaboratorErrorFromStatus, errorMessage } from '../pipeline/errors'
import { ANALYSIS_SYSTEM_PROMPT, REFINEMENT_SYSTEM_PROMPT, SCREENING_SYSTEM_PROMPT } from './prompts'
import type { FetchLike } from './google-maps'

const GEMINI_REST_BASE = 'https://generativelanguage.googleapis.com/v1beta/models'
export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash'

export interface InlineImage {
  mimeType: string
  data: string
}

export type ImageLoader = (reference: string) => Promise<InlineImage>

// ============================================================
// Gemini REST caller
// ============================================================

type GeminiPart = { text: string } | { inlineData: InlineImage }

interface GeminiCallOptions {
  apiKey?: string
  accessToken?: string
  model: string
  parts: GeminiPart[]
  systemPrompt: string
  temperature: number
  fetch: FetchLike
}

const GenerateContentResponse = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).optional()
    }).optional()
  })).optional()
})

async function postGenerateContent(url: string, headers: Record<string, string>, body: string, fetchImpl: FetchLike): Promise<string> {
  let response: Response
  try {
    response = await fetchImpl(url, { method: 'POST', headers: { 'Content-Type': 'application/json', ...headers }, body })
  } catch (err) {
    throw new CollaboratorError(`Gemini request failed: ${errorMessage(err)}`, { transient: true })
  }
  if (!response.ok) {
    throw collaboratorErrorFromStatus('Gemini API', response.status, await response.text())
  }
  const parsed = GenerateContentResponse.safeParse(await response.json())
  const text = parsed.success ? parsed.data.candidates?.[0]?.content?.parts?.[0]?.text : undefined
  if (!text) throw new CollaboratorError('Empty response from Gemini', { transient: true })
  return text
}

export async function callGemini(opts: GeminiCallOptions): Promise<string> {
  const body = JSON.stringify({
    contents: [{ role: 'user', parts: opts.parts }],
    systemInstruction: { parts: [{ text: opts.systemPrompt }] },
    generationConfig: { responseMimeType: 'application/json', temperature: opts.temperature }
  })
  const url = `${GEMINI_REST_BASE}/${opts.model}:generateContent`

  // Priority 1: Bearer token
  if (opts.accessToken) {
    try {
      return await postGenerateContent(url, { Authorization: `Bearer ${opts.accessToken}` }, body, opts.fetch)
    } catch (err) {
      if (!opts.apiKey) throw err
      console.warn(`[Gemini] Bearer auth failed, falling back to API key: ${errorMessage(err)}`)
    }
  }

  // Priority 2: API key
  if (opts.apiKey) {
    return postGenerateContent(`${url}?key=${opts.apiKey}`, {}, body, opts.fetch)
  }

  throw new CollaboratorError('No Gemini credentials available (need access token or API key)', { transient: false })
}

/** Parse model text as JSON and validate; bad output is retried like a transient error */
export function parseModelJson<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    throw new CollaboratorError(`Gemini returned invalid JSON for ${what}: ${text.substring(0, 200)}`, { transient: true })
  }
  // Gemini sometimes wraps a single object in an array — unwrap it
  if (Array.isArray(raw) && raw.length === 1) raw = raw[0]
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new CollaboratorError(`Gemini ${what} did not match the expected shape: ${parsed.error.message}`, { transient: true })
  }
  return parsed.data
}

// ============================================================
// RESPONSE SCHEMAS
// ============================================================

const ClaritySchema = z.preprocess(
  v => typeof v === 'string' ? v.toLowerCase().trim() : v,
  z.enum(['excellent', 'good', 'acceptable', 'poor']).catch('poor')
)

const FaceSchema = z.object({
  candidate_index: z.coerce.number().int(),
  is_valid_front_face: z.boolean().default(false),
  confidence: z.coerce.number().catch(0).transform(v => Math.max(0, Math.min(1, v))),
  clarity: ClaritySchema,
  needs_refinement: z.boolean().default(false),
  overall_quality: z.coerce.number().min(0).max(10).nullable().catch(null).default(null),
  is_full_view: z.boolean().nullable().catch(null).default(null),
  group_id: z.union([z.string(), z.number()]).transform(String).nullable().catch(null).default(null),
  is_target_building_primary: z.boolean().nullable().catch(null).default(null),
  is_road_dominated: z.boolean().nullable().catch(null).default(null),
  building_coverage_pct: z.coerce.number().min(0).max(100).nullable().catch(null).default(null),
  suggestions: z.string().catch('').default('')
})

export const ScreeningResponseSchema = z.object({ faces: z.array(FaceSchema) })

export const RefinementResponseSchema = z.object({
  distance_change: z.coerce.number().catch(0).default(0),
  pitch_change: z.coerce.number().catch(0).default(0),
  fov_change: z.coerce.number().catch(0).default(0),
  reasoning: z.string().optional()
})

export const AnalysisResponseSchema = z.object({
  building_usage_summary: z.string().default('Unable to determine building usage.'),
  building_type: z.string().default('Unknown'),
  architectural_style: z.string().default('Unknown'),
  condition: z.string().default('Unknown'),
  visual_description: z.object({
    estimated_floors: z.coerce.string().default('Unknown'),
    style: z.string().default('Unknown'),
    color: z.string().default('Unknown')
  }).default({}),
  establishments: z.array(z.object({
    name: z.string().default('Unknown'),
    type: z.string().default('Unknown'),
    description: z.string().default('')
  })).default([])
})

type Face = z.infer<typeof FaceSchema>

function toJudgment(face: Face): ScreeningJudgment {
  return {
    is_valid_front_face: face.is_valid_front_face,
    confidence: face.confidence,
    clarity: face.clarity,
    needs_refinement: face.needs_refinement,
    overall_quality: face.overall_quality,
    is_full_view: face.is_full_view,
    suggestions: face.suggestions,
    group_label: face.group_id,
    is_target_building_primary: face.is_target_building_primary,
    is_road_dominated: face.is_road_dominated,
    building_coverage_pct: face.building_coverage_pct
  }
}

function describeViewpoint(vp: Viewpoint): string {
  return `heading=${vp.heading_degrees.toFixed(1)}° pitch=${vp.pitch_degrees.toFixed(1)}° fov=${vp.fov_degrees.toFixed(1)}° distance=${vp.distance_meters.toFixed(1)}m`
}

function describeHistory(history: readonly RefinementStep[]): string {
  if (history.length === 0) return 'HISTORY: no previous attempts.'
  const lines = history.map(step => {
    const vp = step.resulting_viewpoint
    const result = step.resulting_screening
      ? `quality=${step.resulting_screening.overall_quality ?? 'n/a'}, full_view=${step.resulting_screening.is_full_view ?? 'n/a'}`
      : 'no imagery'
    return `- Attempt ${step.iteration}: distance=${vp.distance_meters.toFixed(1)}m pitch=${vp.pitch_degrees.toFixed(1)}° fov=${vp.fov_degrees.toFixed(1)}° -> ${result}`
  })
  return ['HISTORY OF PREVIOUS ATTEMPTS:', ...lines].join('\n')
}

// ============================================================
// GeminiOracle
// ============================================================

export interface GeminiOracleOptions {
  apiKey?: string
  accessToken?: string
  model?: string
  loadImage: ImageLoader
  fetch?: FetchLike
}

export class GeminiOracle implements VisionOracle {
  readonly name: string
  private readonly opts: GeminiOracleOptions
  private readonly fetchImpl: FetchLike

  constructor(opts: GeminiOracleOptions) {
    if (!opts.apiKey && !opts.accessToken) {
      throw new Error('GeminiOracle needs an API key or an access token')
    }
    this.opts = opts
    this.name = `gemini:${opts.model ?? DEFAULT_GEMINI_MODEL}`
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init))
  }

  private call(systemPrompt: string, parts: GeminiPart[], temperature: number): Promise<string> {
    return callGemini({
      apiKey: this.opts.apiKey,
      accessToken: this.opts.accessToken,
      model: this.opts.model ?? DEFAULT_GEMINI_MODEL,
      parts,
      systemPrompt,
      temperature,
      fetch: this.fetchImpl
    })
  }

  async screen(request: ScreeningRequest): Promise<ScreeningJudgment> {
    const judgments = await this.screenBatch([request])
    const judgment = judgments.get(request.candidate_index)
    if (!judgment) {
      throw new CollaboratorError(`Gemini returned no judgment for candidate ${request.candidate_index}`, { transient: true })
    }
    return judgment
  }

  async screenBatch(requests: readonly ScreeningRequest[]): Promise<Map<number, ScreeningJudgment>> {
    const parts: GeminiPart[] = [{ text: `Target building at (${requests[0]?.target.latitude}, ${requests[0]?.target.longitude}). Judge each candidate image.` }]
    for (const req of requests) {
      parts.push({ text: `candidate_index ${req.candidate_index}: ${describeViewpoint(req.viewpoint)}` })
      parts.push({ inlineData: await this.opts.loadImage(req.image_reference) })
    }

    const text = await this.call(SCREENING_SYSTEM_PROMPT, parts, 0.1)
    const { faces } = parseModelJson(text, ScreeningResponseSchema, 'screening')

    const known = new Set(requests.map(r => r.candidate_index))
    const judgments = new Map<number, ScreeningJudgment>()
    for (const face of faces) {
      if (known.has(face.candidate_index)) judgments.set(face.candidate_index, toJudgment(face))
    }
    console.log(`[Gemini] Screened ${judgments.size}/${requests.length} candidate(s)`)
    return judgments
  }

  async proposeRefinement(request: RefinementRequest): Promise<RefinementDelta> {
    const parts: GeminiPart[] = [
      { text: `Current camera: ${describeViewpoint(request.viewpoint)}\n\n${describeHistory(request.history)}` },
      { inlineData: await this.opts.loadImage(request.image_reference) }
    ]
    const text = await this.call(REFINEMENT_SYSTEM_PROMPT, parts, 0.1)
    const delta = parseModelJson(text, RefinementResponseSchema, 'refinement')
    if (delta.reasoning) console.log(`[Gemini] Refinement: ${delta.reasoning}`)
    return { distance_change: delta.distance_change, pitch_change: delta.pitch_change, fov_change: delta.fov_change }
  }

  async analyze(imageReferences: readonly string[], address: string | null): Promise<BuildingAnalysis> {
    const parts: GeminiPart[] = [{
      text: `Analyze these ${imageReferences.length} image(s) of the same building together.${address ? ` Reported address: ${address}.` : ''}`
    }]
    for (const ref of imageReferences) {
      parts.push({ inlineData: await this.opts.loadImage(ref) })
    }
    const text = await this.call(ANALYSIS_SYSTEM_PROMPT, parts, 0.2)
    const analysis = parseModelJson(text, AnalysisResponseSchema, 'analysis')
    console.log(`[Gemini] Analysis: ${analysis.building_type}, ${analysis.establishments.length} establishment(s)`)
    return { ...analysis, address }
  }
}
