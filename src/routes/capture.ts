import { Hono } from 'hono'
import type { Context } from 'hono'
import { z } from 'zod'
import type { MappingCollaborator, VisionOracle } from '../pipeline/collaborators'
import type { Clock, Sleep } from '../pipeline/concurrency'
import { captureBuilding } from '../pipeline/capture'
import { CaptureError } from '../pipeline/errors'
import { assertCoordinate } from '../pipeline/geometry'
import { resolveCaptureConfig } from '../config'
import { CaptureJobStore } from '../services/capture-jobs'

export interface CaptureRouteDeps {
  /** null when GOOGLE_MAPS_API_KEY is not configured */
  maps: MappingCollaborator | null
  oracle: VisionOracle
  clock?: Clock
  sleep?: Sleep
  /** Background runs for the job routes; one per router when omitted */
  jobs?: CaptureJobStore
}

const CaptureRequestSchema = z.object({
  lat: z.number(),
  lon: z.number(),
  config: z.record(z.unknown()).optional()
})

type CaptureRequest = z.infer<typeof CaptureRequestSchema>

type ParsedRequest = { ok: true; request: CaptureRequest } | { ok: false; response: Response }

async function parseCaptureRequest(c: Context): Promise<ParsedRequest> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return { ok: false, response: c.json({ error: 'Request body must be JSON' }, 400) }
  }

  const parsed = CaptureRequestSchema.safeParse(body)
  if (!parsed.success) {
    return {
      ok: false,
      response: c.json({
        error: 'Body must be {lat: number, lon: number, config?: object}',
        issues: parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      }, 400)
    }
  }
  return { ok: true, request: parsed.data }
}

export function captureRoutes(deps: CaptureRouteDeps) {
  const routes = new Hono()
  const jobs = deps.jobs ?? new CaptureJobStore({ clock: deps.clock })

  const run = (maps: MappingCollaborator, { lat, lon, config }: CaptureRequest) =>
    captureBuilding({ latitude: lat, longitude: lon }, config ?? {}, {
      maps,
      oracle: deps.oracle,
      clock: deps.clock,
      sleep: deps.sleep
    })

  // ============================================================
  // POST / — Run the capture pipeline for one coordinate
  // ============================================================
  routes.post('/', async (c) => {
    const parsed = await parseCaptureRequest(c)
    if (!parsed.ok) return parsed.response
    if (!deps.maps) return c.json({ error: 'Google Maps API key is not configured' }, 503)

    const { lat, lon } = parsed.request
    console.log(`[Capture] Request for (${lat}, ${lon}) using oracle ${deps.oracle.name}`)

    const result = await run(deps.maps, parsed.request)
    const kind = result.failure?.kind
    const status = kind === 'InvalidConfig' || kind === 'InvalidCoordinate' ? 400 : 200
    return c.json(result, status)
  })

  // ============================================================
  // POST /jobs — Submit a run, answer with its rev_id at once
  // ============================================================
  routes.post('/jobs', async (c) => {
    const parsed = await parseCaptureRequest(c)
    if (!parsed.ok) return parsed.response
    const { maps } = deps
    if (!maps) return c.json({ error: 'Google Maps API key is not configured' }, 503)

    const { lat, lon, config } = parsed.request
    try {
      resolveCaptureConfig(config ?? {})
      assertCoordinate({ latitude: lat, longitude: lon })
    } catch (err) {
      if (err instanceof CaptureError) return c.json({ error: err.message, kind: err.kind }, 400)
      throw err
    }

    const job = jobs.submit({ latitude: lat, longitude: lon }, () => run(maps, parsed.request))
    if (!job) return c.json({ error: 'Too many capture jobs in flight, try again later' }, 429)

    return c.json({
      rev_id: job.rev_id,
      status: job.status,
      message: `Use GET /api/capture/jobs/${job.rev_id} to check progress`
    }, 202)
  })

  // ============================================================
  // GET /jobs/:rev_id — Job status, with the run record once finished
  // ============================================================
  routes.get('/jobs/:rev_id', (c) => {
    const job = jobs.get(c.req.param('rev_id'))
    if (!job) return c.json({ error: 'Unknown or expired rev_id' }, 404)
    return c.json(job)
  })

  return routes
}
