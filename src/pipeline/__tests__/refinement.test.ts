import { describe, expect, it } from '@jest/globals'
import { applyDelta, boundDelta, isAcceptable, refineCapture, sameViewpoint } from '../refinement'
import { Deadline } from '../concurrency'
import { CollaboratorError } from '../errors'
import { haversineDistance } from '../geometry'
import { VIEWPOINT_BOUNDS } from '../../config'
import type { ScreeningJudgment, ScreeningResult } from '../../types'
import { FakeMaps, FakeOracle, TARGET, fastRetry, judgment, makeCandidate, makeResult, makeViewpoint } from './fakes'

const needsWork: Partial<ScreeningJudgment> = { needs_refinement: true, overall_quality: 5, is_full_view: false }

function seedPrimary(overrides: Partial<ScreeningJudgment> = needsWork): ScreeningResult {
  const candidate = makeCandidate(0, {
    viewpoint: makeViewpoint({ pano_id: 'pano-1' }),
    image_reference: 'fake://image/0'
  })
  return makeResult(candidate, { confidence: 0.5, ...overrides }, { group_id: 'facade-1', is_primary_in_group: true })
}

const options = { maxIterations: 3, qualityThreshold: 8, metadataRadiusMeters: 50, retry: fastRetry() }

describe('isAcceptable', () => {
  it('accepts views that need no refinement', () => {
    expect(isAcceptable(seedPrimary({ needs_refinement: false }), 8)).toBe(true)
  })

  it('accepts a full view at or above the quality threshold', () => {
    expect(isAcceptable(seedPrimary({ needs_refinement: true, overall_quality: 8, is_full_view: true }), 8)).toBe(true)
    expect(isAcceptable(seedPrimary({ needs_refinement: true, overall_quality: 7, is_full_view: true }), 8)).toBe(false)
    expect(isAcceptable(seedPrimary({ needs_refinement: true, overall_quality: 9, is_full_view: null }), 8)).toBe(false)
  })

  it('never accepts a view that lost the facade or frames the wrong thing', () => {
    expect(isAcceptable(seedPrimary({ is_valid_front_face: false, needs_refinement: false }), 8)).toBe(false)
    expect(isAcceptable(seedPrimary({ is_road_dominated: true, needs_refinement: false }), 8)).toBe(false)
    expect(isAcceptable(seedPrimary({ is_target_building_primary: false, needs_refinement: false }), 8)).toBe(false)
    expect(isAcceptable(seedPrimary({ is_target_building_primary: null, is_road_dominated: null, needs_refinement: false }), 8)).toBe(true)
  })
})

describe('boundDelta', () => {
  it('limits each component per step and zeroes non-finite values', () => {
    expect(boundDelta({ distance_change: 40, pitch_change: -90, fov_change: Number.NaN }))
      .toEqual({ distance_change: 10, pitch_change: -15, fov_change: 0 })
  })
})

describe('applyDelta', () => {
  it('keeps the panorama when only pitch and fov change', () => {
    const vp = applyDelta(makeViewpoint({ pano_id: 'pano-1' }), { distance_change: 0, pitch_change: 10, fov_change: -20 }, TARGET)
    expect(vp).toMatchObject({ pitch_degrees: 10, fov_degrees: 70, pano_id: 'pano-1' })
  })

  it('moves the camera along the reverse heading when distance changes', () => {
    const start = makeViewpoint({ heading_degrees: 0, distance_meters: 20, pano_id: 'pano-1', capture_date: '2024-05' })
    const vp = applyDelta(start, { distance_change: 10, pitch_change: 0, fov_change: 0 }, TARGET)

    expect(vp.distance_meters).toBe(30)
    expect(vp.pano_id).toBeUndefined()
    expect(vp.capture_date).toBeUndefined()
    expect(haversineDistance(TARGET, { latitude: vp.camera_latitude, longitude: vp.camera_longitude })).toBeCloseTo(30, 6)
    expect(vp.camera_latitude).toBeLessThan(TARGET.latitude)
  })
})

describe('sameViewpoint', () => {
  it('matches within tolerance', () => {
    expect(sameViewpoint(makeViewpoint(), makeViewpoint({ pitch_degrees: 1.5, distance_meters: 20.5 }))).toBe(true)
    expect(sameViewpoint(makeViewpoint(), makeViewpoint({ pitch_degrees: 2 }))).toBe(false)
    expect(sameViewpoint(makeViewpoint({ heading_degrees: 359.5 }), makeViewpoint({ heading_degrees: 0.5 }))).toBe(true)
  })
})

describe('refineCapture', () => {
  it('converges without refining a view that is already acceptable', async () => {
    const primary = seedPrimary({ needs_refinement: false, confidence: 0.9 })
    const oracle = new FakeOracle()
    const result = await refineCapture(primary, TARGET, { maps: new FakeMaps(), oracle }, options)

    expect(result).toMatchObject({
      candidate_index: 0,
      group_id: 'facade-1',
      outcome: 'converged',
      total_iterations: 0,
      final_image_reference: 'fake://image/0'
    })
    expect(result.refinement_history).toEqual([])
    expect(result.final_screening).toBe(primary)
    expect(oracle.proposeCalls).toHaveLength(0)
  })

  it('keeps the best step when the iteration cap is reached', async () => {
    const confidenceByPitch: Record<number, number> = { 5: 0.6, 10: 0.9, 15: 0.7 }
    const oracle = new FakeOracle({
      propose: () => ({ distance_change: 0, pitch_change: 5, fov_change: 0 }),
      screen: (req) => judgment({ ...needsWork, confidence: confidenceByPitch[req.viewpoint.pitch_degrees] ?? 0 })
    })
    const result = await refineCapture(seedPrimary(), TARGET, { maps: new FakeMaps(), oracle }, options)

    expect(result.outcome).toBe('exhausted')
    expect(result.total_iterations).toBe(3)
    expect(result.refinement_history.map(s => s.iteration)).toEqual([1, 2, 3])
    expect(result.refinement_history.map(s => s.resulting_viewpoint.pitch_degrees)).toEqual([5, 10, 15])
    expect(result.final_viewpoint.pitch_degrees).toBe(10)
    expect(result.final_screening.confidence).toBe(0.9)
    expect(result.final_screening.group_id).toBe('facade-1')
    expect(result.final_image_reference).toBe('fake://streetview?pano=pano-1&heading=0.0&pitch=10.0&fov=90.0&distance=20.0')
    expect(Object.isFrozen(result.refinement_history[0])).toBe(true)
  })

  it('prefers a valid facade over a more confident invalid step when exhausted', async () => {
    const byPitch: Record<number, Partial<ScreeningJudgment>> = {
      5: { confidence: 0.6 },
      10: { confidence: 0.95, is_valid_front_face: false },
      15: { confidence: 0.7 }
    }
    const oracle = new FakeOracle({
      propose: () => ({ distance_change: 0, pitch_change: 5, fov_change: 0 }),
      screen: (req) => judgment({ ...needsWork, ...byPitch[req.viewpoint.pitch_degrees] })
    })
    const result = await refineCapture(seedPrimary(), TARGET, { maps: new FakeMaps(), oracle }, options)

    expect(result.outcome).toBe('exhausted')
    expect(result.stop_reason).toBe('iteration_cap')
    expect(result.final_viewpoint.pitch_degrees).toBe(15)
    expect(result.final_screening.confidence).toBe(0.7)
  })

  it('falls back to the seed when every refined step lost the facade', async () => {
    const oracle = new FakeOracle({
      propose: () => ({ distance_change: 0, pitch_change: 5, fov_change: 0 }),
      screen: () => judgment({ ...needsWork, confidence: 0.99, is_valid_front_face: false })
    })
    const primary = seedPrimary()
    const result = await refineCapture(primary, TARGET, { maps: new FakeMaps(), oracle }, options)

    expect(result.outcome).toBe('exhausted')
    expect(result.total_iterations).toBe(3)
    expect(result.final_screening).toBe(primary)
  })

  it('passes the growing history to the oracle', async () => {
    const oracle = new FakeOracle({
      propose: () => ({ distance_change: 0, pitch_change: 5, fov_change: 0 }),
      screen: () => judgment(needsWork)
    })
    await refineCapture(seedPrimary(), TARGET, { maps: new FakeMaps(), oracle }, options)
    expect(oracle.proposeCalls.map(c => c.history.length)).toEqual([0, 1, 2])
  })

  it('converges as soon as a refined view is acceptable', async () => {
    const oracle = new FakeOracle({
      propose: () => ({ distance_change: 0, pitch_change: 10, fov_change: 0 }),
      screen: () => judgment({ needs_refinement: false, confidence: 0.85 })
    })
    const result = await refineCapture(seedPrimary(), TARGET, { maps: new FakeMaps(), oracle }, options)

    expect(result.outcome).toBe('converged')
    expect(result.total_iterations).toBe(1)
    expect(result.final_viewpoint.pitch_degrees).toBe(10)
  })

  it('bounds adversarial proposals and stays inside the camera limits', async () => {
    const oracle = new FakeOracle({
      propose: () => ({ distance_change: 1000, pitch_change: 1000, fov_change: -1000 }),
      screen: () => judgment(needsWork)
    })
    const result = await refineCapture(seedPrimary(), TARGET, { maps: new FakeMaps(), oracle }, options)

    expect(result.refinement_history).toHaveLength(3)
    expect(result.refinement_history[0].proposed_delta).toEqual({ distance_change: 1000, pitch_change: 1000, fov_change: -1000 })
    expect(result.refinement_history[0].applied_delta).toEqual({ distance_change: 10, pitch_change: 15, fov_change: -15 })
    expect(result.refinement_history.map(s => [
      s.resulting_viewpoint.distance_meters, s.resulting_viewpoint.pitch_degrees, s.resulting_viewpoint.fov_degrees
    ])).toEqual([[30, 15, 75], [40, 30, 60], [50, 45, 45]])

    const { pitch, fov, distance } = VIEWPOINT_BOUNDS
    for (const step of result.refinement_history) {
      const vp = step.resulting_viewpoint
      expect(vp.pitch_degrees).toBeGreaterThanOrEqual(pitch.min)
      expect(vp.pitch_degrees).toBeLessThanOrEqual(pitch.max)
      expect(vp.fov_degrees).toBeGreaterThanOrEqual(fov.min)
      expect(vp.fov_degrees).toBeLessThanOrEqual(fov.max)
      expect(vp.distance_meters).toBeGreaterThanOrEqual(distance.min)
      expect(vp.distance_meters).toBeLessThanOrEqual(distance.max)
    }
  })

  it('stops at once when the iteration cap is zero', async () => {
    const oracle = new FakeOracle()
    const result = await refineCapture(seedPrimary(), TARGET, { maps: new FakeMaps(), oracle }, { ...options, maxIterations: 0 })

    expect(result.outcome).toBe('exhausted')
    expect(result.total_iterations).toBe(0)
    expect(oracle.proposeCalls).toHaveLength(0)
  })

  it('converges on the best view seen when a proposal only revisits the current view', async () => {
    const primary = seedPrimary()
    const result = await refineCapture(primary, TARGET, { maps: new FakeMaps(), oracle: new FakeOracle() }, options)

    expect(result.outcome).toBe('converged')
    expect(result.stop_reason).toBe('oscillation')
    expect(result.total_iterations).toBe(0)
    expect(result.final_viewpoint).toEqual(primary.candidate.viewpoint)
    expect(result.final_screening).toBe(primary)
  })

  it('halves a step that would land on a visited view', async () => {
    let calls = 0
    const oracle = new FakeOracle({
      propose: () => ({ distance_change: 0, pitch_change: calls++ === 0 ? 10 : -10, fov_change: 0 }),
      screen: () => judgment(needsWork)
    })
    const result = await refineCapture(seedPrimary(), TARGET, { maps: new FakeMaps(), oracle }, { ...options, maxIterations: 2 })

    const second = result.refinement_history[1]
    expect(second.proposed_delta.pitch_change).toBe(-10)
    expect(second.applied_delta.pitch_change).toBe(-5)
    expect(second.resulting_viewpoint.pitch_degrees).toBe(5)
    expect(result.outcome).toBe('exhausted')
  })

  it('records a step without imagery and continues from the previous view', async () => {
    const maps = new FakeMaps({
      metadata: (vp) => vp.pitch_degrees === 0 ? { available: true, pano_id: 'pano-1' } : { available: false }
    })
    const oracle = new FakeOracle({ propose: () => ({ distance_change: 0, pitch_change: 10, fov_change: 0 }) })
    const primary = seedPrimary()
    const result = await refineCapture(primary, TARGET, { maps, oracle }, { ...options, maxIterations: 1 })

    expect(result.refinement_history).toHaveLength(1)
    expect(result.refinement_history[0]).toMatchObject({
      coverage_available: false,
      image_reference: null,
      resulting_screening: null
    })
    expect(oracle.screenCalls).toHaveLength(0)
    expect(result.outcome).toBe('exhausted')
    expect(result.final_screening).toBe(primary)
  })

  it('ends as exhausted when the oracle cannot propose a change', async () => {
    const oracle = new FakeOracle({
      propose: () => { throw new CollaboratorError('Gemini API error 429: quota', { transient: true, status: 429 }) }
    })
    const result = await refineCapture(seedPrimary(), TARGET, { maps: new FakeMaps(), oracle }, { ...options, retry: fastRetry(1) })

    expect(result.outcome).toBe('exhausted')
    expect(result.total_iterations).toBe(0)
    expect(oracle.proposeCalls).toHaveLength(2)
  })

  it('propagates fatal proposal errors', async () => {
    const oracle = new FakeOracle({
      propose: () => { throw new CollaboratorError('Gemini API error 403: denied', { transient: false, status: 403 }) }
    })
    await expect(refineCapture(seedPrimary(), TARGET, { maps: new FakeMaps(), oracle }, options))
      .rejects.toMatchObject({ status: 403 })
  })

  it('is interrupted when the deadline has passed', async () => {
    const oracle = new FakeOracle()
    const deadline = new Deadline(0, () => 0)
    const result = await refineCapture(seedPrimary(), TARGET, { maps: new FakeMaps(), oracle }, { ...options, deadline })

    expect(result.outcome).toBe('interrupted')
    expect(result.stop_reason).toBe('deadline')
    expect(oracle.proposeCalls).toHaveLength(0)
  })
})
