// ============================================================
// Google Maps Platform client — Roads, Street View, Geocoding
// ============================================================
// REST over fetch:
//   Roads API        GET https://roads.googleapis.com/v1/nearestRoads
//   Street View      GET https://maps.googleapis.com/maps/api/streetview/metadata
//   Street View      GET https://maps.googleapis.com/maps/api/streetview (static image)
//   Geocoding        GET https://maps.googleapis.com/maps/api/geocode/json (reverse)
//
// Image references handed to the pipeline never carry the API key;
// loadImage() adds it when the bytes are actually fetched.
// ============================================================

import { z } from 'zod'
import type { LatLng, Viewpoint } from '../types'
import type { GeocodeRefinement, ImageryMetadata, MappingCollaborator, RoadSnap } from '../pipeline/collaborators'
import { CollaboratorError, collaboratorErrorFromStatus, errorMessage } from '../pipeline/errors'
import { haversineDistance } from '../pipeline/geometry'

const ROADS_URL = 'https://roads.googleapis.com/v1/nearestRoads'
const STREETVIEW_URL = 'https://maps.googleapis.com/maps/api/streetview'
const STREETVIEW_METADATA_URL = `${STREETVIEW_URL}/metadata`
const GEOCODING_URL = 'https://maps.googleapis.com/maps/api/geocode/json'

const DEFAULT_IMAGE_SIZE = '640x640'

/** Reverse-geocode result types that denote a specific building */
const BUILDING_RESULT_TYPES = ['street_address', 'premise', 'subpremise']

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

// ============================================================
// RESPONSE SCHEMAS
// ============================================================

const NearestRoadsResponse = z.object({
  snappedPoints: z.array(z.object({
    location: z.object({ latitude: z.number(), longitude: z.number() }),
    originalIndex: z.number().optional(),
    placeId: z.string()
  })).optional()
})

const StreetViewMetadataResponse = z.object({
  status: z.string(),
  pano_id: z.string().optional(),
  date: z.string().optional(),
  location: z.object({ lat: z.number(), lng: z.number() }).optional(),
  error_message: z.string().optional()
})

const GeocodeResponse = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z.array(z.object({
    formatted_address: z.string(),
    types: z.array(z.string()),
    geometry: z.object({
      location: z.object({ lat: z.number(), lng: z.number() }),
      location_type: z.string()
    })
  })).default([])
})

/**
 * Google web-service status codes. OK/ZERO_RESULTS are answers;
 * OVER_QUERY_LIMIT/UNKNOWN_ERROR are worth retrying; the rest are fatal.
 */
function statusError(service: string, status: string, message?: string): CollaboratorError {
  const transient = status === 'OVER_QUERY_LIMIT' || status === 'UNKNOWN_ERROR'
  return new CollaboratorError(`${service} returned ${status}${message ? `: ${message}` : ''}`, { transient })
}

export interface GoogleMapsClientOptions {
  apiKey: string
  imageSize?: string
  fetch?: FetchLike
}

export class GoogleMapsClient implements MappingCollaborator {
  private readonly apiKey: string
  private readonly imageSize: string
  private readonly fetchImpl: FetchLike

  constructor(opts: GoogleMapsClientOptions) {
    if (!opts.apiKey) throw new Error('Google Maps API key is required')
    this.apiKey = opts.apiKey
    this.imageSize = opts.imageSize ?? DEFAULT_IMAGE_SIZE
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init))
  }

  // ── transport ──
  private async getJson(service: string, url: string): Promise<unknown> {
    let response: Response
    try {
      response = await this.fetchImpl(url)
    } catch (err) {
      throw new CollaboratorError(`${service} request failed: ${errorMessage(err)}`, { transient: true })
    }
    if (!response.ok) {
      throw collaboratorErrorFromStatus(service, response.status, await response.text())
    }
    return response.json()
  }

  private parse<T>(service: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      throw new CollaboratorError(`${service} returned an unexpected payload: ${parsed.error.message}`, { transient: false })
    }
    return parsed.data
  }

  // ============================================================
  // MappingCollaborator
  // ============================================================

  async snapToRoad(point: LatLng): Promise<RoadSnap | null> {
    const params = new URLSearchParams({ points: `${point.latitude},${point.longitude}`, key: this.apiKey })
    const data = this.parse('Roads API', NearestRoadsResponse, await this.getJson('Roads API', `${ROADS_URL}?${params}`))
    const snapped = data.snappedPoints?.[0]
    if (!snapped) return null
    return {
      latitude: snapped.location.latitude,
      longitude: snapped.location.longitude,
      segment_id: snapped.placeId
    }
  }

  async getImageryMetadata(viewpoint: Viewpoint, radiusMeters: number): Promise<ImageryMetadata> {
    const params = new URLSearchParams({
      location: `${viewpoint.camera_latitude},${viewpoint.camera_longitude}`,
      radius: String(radiusMeters),
      source: 'outdoor',
      key: this.apiKey
    })
    const data = this.parse('Street View metadata', StreetViewMetadataResponse,
      await this.getJson('Street View metadata', `${STREETVIEW_METADATA_URL}?${params}`))

    if (data.status === 'ZERO_RESULTS' || data.status === 'NOT_FOUND') return { available: false }
    if (data.status !== 'OK') throw statusError('Street View metadata', data.status, data.error_message)

    const metadata: ImageryMetadata = { available: true }
    if (data.pano_id) metadata.pano_id = data.pano_id
    if (data.date) metadata.capture_date = data.date
    if (data.location) metadata.location = { latitude: data.location.lat, longitude: data.location.lng }
    return metadata
  }

  renderImage(viewpoint: Viewpoint): string {
    const params = new URLSearchParams({
      size: this.imageSize,
      heading: viewpoint.heading_degrees.toFixed(1),
      pitch: viewpoint.pitch_degrees.toFixed(1),
      fov: viewpoint.fov_degrees.toFixed(1),
      source: 'outdoor'
    })
    // Pinning the panorama keeps re-renders on the same imagery
    if (viewpoint.pano_id) {
      params.set('pano', viewpoint.pano_id)
    } else {
      params.set('location', `${viewpoint.camera_latitude},${viewpoint.camera_longitude}`)
    }
    return `${STREETVIEW_URL}?${params}`
  }

  /**
   * Snap a clicked point to the building it sits on: the first reverse-geocode
   * result that is a street address/premise with ROOFTOP accuracy. Otherwise the
   * point is kept and only the closest address is attached.
   */
  async geocodeRefine(point: LatLng): Promise<GeocodeRefinement> {
    const params = new URLSearchParams({ latlng: `${point.latitude},${point.longitude}`, key: this.apiKey })
    const data = this.parse('Geocoding API', GeocodeResponse, await this.getJson('Geocoding API', `${GEOCODING_URL}?${params}`))

    if (data.status === 'ZERO_RESULTS') {
      return { location: point, address: null, refinement_type: 'unchanged' }
    }
    if (data.status !== 'OK') throw statusError('Geocoding API', data.status, data.error_message)

    const rooftop = data.results.find(r =>
      r.geometry.location_type === 'ROOFTOP' && r.types.some(t => BUILDING_RESULT_TYPES.includes(t)))
    if (rooftop) {
      const location = { latitude: rooftop.geometry.location.lat, longitude: rooftop.geometry.location.lng }
      console.log(`[Maps] Rooftop match "${rooftop.formatted_address}" ${haversineDistance(point, location).toFixed(1)}m from input`)
      return { location, address: rooftop.formatted_address, refinement_type: 'rooftop' }
    }

    return { location: point, address: data.results[0]?.formatted_address ?? null, refinement_type: 'unchanged' }
  }

  // ============================================================
  // Image bytes for the vision oracle
  // ============================================================

  /** Fetch a rendered Street View image as base64 (key added here, never stored) */
  async loadImage(reference: string): Promise<{ mimeType: string; data: string }> {
    const url = new URL(reference)
    url.searchParams.set('key', this.apiKey)
    let response: Response
    try {
      response = await this.fetchImpl(url.toString())
    } catch (err) {
      throw new CollaboratorError(`Street View image request failed: ${errorMessage(err)}`, { transient: true })
    }
    if (!response.ok) {
      throw collaboratorErrorFromStatus('Street View image', response.status, await response.text())
    }
    const buffer = Buffer.from(await response.arrayBuffer())
    return {
      mimeType: response.headers.get('content-type') ?? 'image/jpeg',
      data: buffer.toString('base64')
    }
  }
}
