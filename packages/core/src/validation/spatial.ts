/**
 * Spatial descriptor classification for dct:spatial values
 */

import { isAbsoluteUrl, presentValue } from './field-validators.js'

export type SpatialKind = 'geojson' | 'wkt' | 'bbox' | 'uri' | 'place'

export type SpatialClassification =
  | { kind: 'absent' }
  | { kind: 'malformed'; reason: string }
  | { kind: SpatialKind; value: string }

const GEOMETRY_TYPES = new Set([
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
])

const WKT_KEYWORD =
  /^(?:SRID=\d+;\s*)?(POINT|LINESTRING|POLYGON|MULTIPOINT|MULTILINESTRING|MULTIPOLYGON|GEOMETRYCOLLECTION)\s*(?:ZM|Z|M)?\s*\(/i

const WKT_BODY = /^[\d\s.,()+\-eE]*$/

const NUMERIC_ONLY = /^[\d\s.,;+-]+$/

const PLACE_NAME = /^[\p{L}][\p{L}\p{M}\p{N} .,'’()/&-]*$/u

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isGeoJson(value: unknown): boolean {
  if (!isRecord(value) || typeof value['type'] !== 'string') return false

  const type = value['type']
  if (GEOMETRY_TYPES.has(type)) {
    const coordinates = value['coordinates']
    return Array.isArray(coordinates) && coordinates.length > 0
  }
  if (type === 'GeometryCollection') {
    const geometries = value['geometries']
    return Array.isArray(geometries) && geometries.length > 0 && geometries.every(isGeoJson)
  }
  if (type === 'Feature') {
    return isGeoJson(value['geometry'])
  }
  if (type === 'FeatureCollection') {
    const features = value['features']
    return Array.isArray(features) && features.length > 0 && features.every(isGeoJson)
  }
  return false
}

function hasBalancedParentheses(value: string): boolean {
  let depth = 0
  for (const char of value) {
    if (char === '(') depth++
    if (char === ')') depth--
    if (depth < 0) return false
  }
  return depth === 0
}

function isWellFormedWkt(value: string): boolean {
  const trimmed = value.trim()
  if (!trimmed.endsWith(')') || !hasBalancedParentheses(trimmed)) return false

  const body = trimmed
    .replace(/^SRID=\d+;/i, '')
    .replace(
      /\b(GEOMETRYCOLLECTION|MULTIPOLYGON|MULTILINESTRING|MULTIPOINT|POLYGON|LINESTRING|POINT)\s*(ZM|Z|M)?\b/gi,
      ''
    )
  return WKT_BODY.test(body) && /\d/.test(body)
}

function parseBoundingBox(value: string): boolean {
  const parts = value
    .split(/[\s,;]+/)
    .filter((part) => part !== '')
    .map(Number)
  if (parts.length !== 4 || !parts.every(Number.isFinite)) return false

  const [minX = NaN, minY = NaN, maxX = NaN, maxY = NaN] = parts
  return minX <= maxX && minY <= maxY
}

function countLetters(value: string): number {
  return value.match(/\p{L}/gu)?.length ?? 0
}

/**
 * Classify a spatial descriptor as absent, malformed, or one of the
 * recognized kinds.
 */
export function classifySpatial(raw: string | undefined): SpatialClassification {
  const value = presentValue(raw)
  if (value === undefined) return { kind: 'absent' }

  if (value.startsWith('{')) {
    let parsed: unknown
    try {
      parsed = JSON.parse(value)
    } catch {
      return { kind: 'malformed', reason: 'looks like GeoJSON but is not valid JSON' }
    }
    return isGeoJson(parsed)
      ? { kind: 'geojson', value }
      : { kind: 'malformed', reason: 'JSON value is not a GeoJSON geometry or feature' }
  }

  if (value.startsWith('[')) {
    return { kind: 'malformed', reason: 'bare coordinate array without a geometry type' }
  }

  if (WKT_KEYWORD.test(value)) {
    return isWellFormedWkt(value)
      ? { kind: 'wkt', value }
      : { kind: 'malformed', reason: 'WKT geometry is incomplete or contains invalid tokens' }
  }

  if (NUMERIC_ONLY.test(value)) {
    return parseBoundingBox(value)
      ? { kind: 'bbox', value }
      : { kind: 'malformed', reason: 'numeric value is not a minX,minY,maxX,maxY bounding box' }
  }

  if (isAbsoluteUrl(value)) {
    return { kind: 'uri', value }
  }

  if (PLACE_NAME.test(value) && countLetters(value) >= 2) {
    return { kind: 'place', value }
  }

  return { kind: 'malformed', reason: 'not a recognizable geometry or place name' }
}
