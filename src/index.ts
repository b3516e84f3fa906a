import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { PIPELINE_VERSION } from './config'
import { captureRoutes, type CaptureRouteDeps } from './routes/capture'
import { DEFAULT_GEMINI_MODEL, GeminiOracle } from './services/gemini'
import { GoogleMapsClient } from './services/google-maps'
import { StubOracle } from './services/stub-oracle'
import type { Bindings } from './types'

export interface AppDeps extends CaptureRouteDeps {
  bindings: Bindings
}

/**
 * Production collaborators for the configured credentials.
 * Gemini: access token → API key → stub oracle (no credentials).
 */
export function collaboratorsFromBindings(bindings: Bindings): Pick<CaptureRouteDeps, 'maps' | 'oracle'> {
  const maps = bindings.GOOGLE_MAPS_API_KEY
    ? new GoogleMapsClient({ apiKey: bindings.GOOGLE_MAPS_API_KEY })
    : null

  if (maps && (bindings.GOOGLE_CLOUD_ACCESS_TOKEN || bindings.GOOGLE_VERTEX_API_KEY)) {
    const oracle = new GeminiOracle({
      accessToken: bindings.GOOGLE_CLOUD_ACCESS_TOKEN,
      apiKey: bindings.GOOGLE_VERTEX_API_KEY,
      model: bindings.GEMINI_MODEL,
      loadImage: (ref) => maps.loadImage(ref)
    })
    return { maps, oracle }
  }

  if (!maps) console.warn('[App] GOOGLE_MAPS_API_KEY not set — /api/capture will answer 503')
  else console.warn('[App] No Gemini credentials — using the stub vision oracle')
  return { maps, oracle: new StubOracle() }
}

export function createApp(deps: AppDeps) {
  const app = new Hono()

  // CORS for API routes
  app.use('/api/*', cors())

  // Mount API routes
  app.route('/api/capture', captureRoutes(deps))

  // Health check
  app.get('/api/health', (c) => {
    // Report which env vars are configured (true/false only — never expose values)
    const { bindings } = deps
    return c.json({
      status: 'ok',
      service: 'Street View Building Capture',
      pipeline_version: PIPELINE_VERSION,
      timestamp: new Date().toISOString(),
      oracle: deps.oracle.name,
      env_configured: {
        GOOGLE_MAPS_API_KEY: !!bindings.GOOGLE_MAPS_API_KEY,
        GOOGLE_VERTEX_API_KEY: !!bindings.GOOGLE_VERTEX_API_KEY,
        GOOGLE_CLOUD_ACCESS_TOKEN: !!bindings.GOOGLE_CLOUD_ACCESS_TOKEN
      },
      gemini: {
        mode: bindings.GOOGLE_CLOUD_ACCESS_TOKEN ? 'access_token' :
              (bindings.GOOGLE_VERTEX_API_KEY ? 'api_key' : 'not_configured'),
        model: bindings.GEMINI_MODEL || DEFAULT_GEMINI_MODEL
      }
    })
  })

  app.notFound((c) => c.json({ error: 'Not found' }, 404))

  app.onError((err, c) => {
    console.error(`[App] Unhandled error: ${err.message}`)
    return c.json({ error: 'Internal server error' }, 500)
  })

  return app
}
