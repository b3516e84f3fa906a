import { describe, expect, it } from '@jest/globals'
import { collaboratorsFromBindings, createApp } from '../../index'
import { FakeMaps, FakeOracle, noSleep } from '../../pipeline/__tests__/fakes'
import { CaptureJobStore } from '../../services/capture-jobs'
import type { Bindings } from '../../types'

const bindings: Bindings = { GOOGLE_MAPS_API_KEY: 'test-secret' }

function appWith(overrides: { maps?: FakeMaps | null, jobs?: CaptureJobStore } = {}) {
  const maps = overrides.maps === undefined ? new FakeMaps() : overrides.maps
  return createApp({ bindings, maps, oracle: new FakeOracle(), sleep: noSleep, jobs: overrides.jobs })
}

function post(body: string) {
  return { method: 'POST', headers: { 'Content-Type': 'application/json' }, body }
}

describe('POST /api/capture', () => {
  it('runs the pipeline and returns the run record', async () => {
    const res = await appWith().request('/api/capture', post(JSON.stringify({ lat: 17.408, lon: 78.451, config: { collaborator_retries: 0 } })))

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      status: 'success',
      failure: null,
      target: { latitude: 17.408, longitude: 78.451 },
      captures: [{ candidate_index: 0, outcome: 'converged' }]
    })
  })

  it('answers 200 with the failure for a pipeline error', async () => {
    const app = appWith({ maps: new FakeMaps({ snap: () => null }) })
    const res = await app.request('/api/capture', post(JSON.stringify({ lat: 17.408, lon: 78.451 })))

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ status: 'error', failure: { kind: 'NoRoadsFound' } })
  })

  it('rejects a body that is not JSON', async () => {
    const res = await appWith().request('/api/capture', post('lat=1&lon=2'))
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Request body must be JSON' })
  })

  it('rejects a body without numeric coordinates', async () => {
    const res = await appWith().request('/api/capture', post(JSON.stringify({ lat: '17.4' })))
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: 'Body must be {lat: number, lon: number, config?: object}' })
  })

  it('answers 400 for an out-of-range coordinate', async () => {
    const res = await appWith().request('/api/capture', post(JSON.stringify({ lat: 95, lon: 0 })))
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ status: 'error', failure: { kind: 'InvalidCoordinate', stage: 'input' } })
  })

  it('answers 400 for an invalid config', async () => {
    const res = await appWith().request('/api/capture', post(JSON.stringify({ lat: 17.408, lon: 78.451, config: { max_fanout: 0 } })))
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ failure: { kind: 'InvalidConfig' } })
  })

  it('answers 503 without a Maps key', async () => {
    const res = await appWith({ maps: null }).request('/api/capture', post(JSON.stringify({ lat: 17.408, lon: 78.451 })))
    expect(res.status).toBe(503)
  })
})

describe('capture jobs', () => {
  const storeWithIds = (...ids: string[]) => new CaptureJobStore({ newId: () => ids.shift() ?? 'rev-x' })

  it('answers 202 with a rev_id and serves the finished run', async () => {
    const jobs = storeWithIds('rev-1')
    const app = appWith({ jobs })
    const res = await app.request('/api/capture/jobs', post(JSON.stringify({ lat: 17.408, lon: 78.451, config: { collaborator_retries: 0 } })))

    expect(res.status).toBe(202)
    expect(await res.json()).toEqual({
      rev_id: 'rev-1',
      status: 'PENDING',
      message: 'Use GET /api/capture/jobs/rev-1 to check progress'
    })

    await jobs.settled('rev-1')
    const poll = await app.request('/api/capture/jobs/rev-1')
    expect(poll.status).toBe(200)
    expect(await poll.json()).toMatchObject({
      rev_id: 'rev-1',
      status: 'DONE',
      input: { latitude: 17.408, longitude: 78.451 },
      error: null,
      result: { status: 'success', captures: [{ candidate_index: 0, outcome: 'converged' }] }
    })
  })

  it('marks a run that ended in error as FAILED', async () => {
    const jobs = storeWithIds('rev-2')
    const app = appWith({ maps: new FakeMaps({ snap: () => null }), jobs })
    await app.request('/api/capture/jobs', post(JSON.stringify({ lat: 17.408, lon: 78.451, config: { collaborator_retries: 0 } })))
    await jobs.settled('rev-2')

    const body: unknown = await (await app.request('/api/capture/jobs/rev-2')).json()
    expect(body).toMatchObject({ status: 'FAILED', result: { failure: { kind: 'NoRoadsFound' } } })
  })

  it('rejects an invalid config before starting a job', async () => {
    const jobs = storeWithIds('rev-3')
    const res = await appWith({ jobs }).request('/api/capture/jobs', post(JSON.stringify({ lat: 17.408, lon: 78.451, config: { max_fanout: 0 } })))

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ kind: 'InvalidConfig' })
    expect(jobs.size).toBe(0)
  })

  it('answers 404 for an unknown rev_id', async () => {
    const res = await appWith().request('/api/capture/jobs/missing')
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Unknown or expired rev_id' })
  })
})

describe('GET /api/health', () => {
  it('reports configured credentials as booleans only', async () => {
    const res = await appWith().request('/api/health')
    const body: unknown = await res.json()

    expect(res.status).toBe(200)
    expect(body).toMatchObject({
      status: 'ok',
      pipeline_version: '2.1',
      oracle: 'fake',
      env_configured: { GOOGLE_MAPS_API_KEY: true, GOOGLE_VERTEX_API_KEY: false, GOOGLE_CLOUD_ACCESS_TOKEN: false },
      gemini: { mode: 'not_configured', model: 'gemini-2.0-flash' }
    })
    expect(JSON.stringify(body)).not.toContain('test-secret')
  })

  it('answers 404 for unknown routes', async () => {
    const res = await appWith().request('/api/nope')
    expect(res.status).toBe(404)
  })
})

describe('collaboratorsFromBindings', () => {
  it('uses the stub oracle without Gemini credentials', () => {
    const { maps, oracle } = collaboratorsFromBindings({ GOOGLE_MAPS_API_KEY: 'test-secret' })
    expect(maps).not.toBeNull()
    expect(oracle.name).toBe('stub')
  })

  it('uses Gemini when a key is configured', () => {
    const { oracle } = collaboratorsFromBindings({ GOOGLE_MAPS_API_KEY: 'test-secret', GOOGLE_VERTEX_API_KEY: 'test-secret', GEMINI_MODEL: 'gemini-test' })
    expect(oracle.name).toBe('gemini:gemini-test')
  })

  it('has no maps client without a Maps key', () => {
    expect(collaboratorsFromBindings({}).maps).toBeNull()
  })
})
