/**
 * Spatial descriptor classification tests
 */

import { describe, it, expect } from 'vitest'
import { classifySpatial } from '../src/validation/spatial.js'

describe('classifySpatial', () => {
  it('should report absent values', () => {
    expect(classifySpatial(undefined)).toEqual({ kind: 'absent' })
    expect(classifySpatial('keine Angabe')).toEqual({ kind: 'absent' })
  })

  describe('GeoJSON', () => {
    it('should accept geometries and features', () => {
      expect(classifySpatial('{"type":"Point","coordinates":[13.4,52.5]}').kind).toBe('geojson')
      expect(
        classifySpatial(
          '{"type":"Feature","geometry":{"type":"Polygon","coordinates":[[[13,52],[14,52],[14,53],[13,52]]]}}'
        ).kind
      ).toBe('geojson')
    })

    it('should reject invalid JSON', () => {
      expect(classifySpatial('{"type":"Point",')).toEqual({
        kind: 'malformed',
        reason: 'looks like GeoJSON but is not valid JSON',
      })
    })

    it('should reject JSON that is not a geometry', () => {
      expect(classifySpatial('{"type":"Point","coordinates":[]}')).toEqual({
        kind: 'malformed',
        reason: 'JSON value is not a GeoJSON geometry or feature',
      })
      expect(classifySpatial('{"name":"Berlin"}')).toEqual({
        kind: 'malformed',
        reason: 'JSON value is not a GeoJSON geometry or feature',
      })
    })

    it('should reject bare coordinate arrays', () => {
      expect(classifySpatial('[13.4, 52.5]')).toEqual({
        kind: 'malformed',
        reason: 'bare coordinate array without a geometry type',
      })
    })
  })

  describe('WKT', () => {
    it('should accept complete geometries', () => {
      expect(classifySpatial('POINT(13.4 52.5)')).toEqual({ kind: 'wkt', value: 'POINT(13.4 52.5)' })
      expect(classifySpatial('SRID=4326;POLYGON((13 52, 14 52, 14 53, 13 52))').kind).toBe('wkt')
    })

    it('should reject incomplete geometries', () => {
      expect(classifySpatial('POLYGON((13 52, 14 52')).toEqual({
        kind: 'malformed',
        reason: 'WKT geometry is incomplete or contains invalid tokens',
      })
      expect(classifySpatial('POINT(east north)').kind).toBe('malformed')
    })
  })

  describe('bounding boxes', () => {
    it('should accept minX,minY,maxX,maxY boxes', () => {
      expect(classifySpatial('13.0,52.3,13.8,52.7')).toEqual({
        kind: 'bbox',
        value: '13.0,52.3,13.8,52.7',
      })
      expect(classifySpatial('13.0 52.3 13.8 52.7').kind).toBe('bbox')
    })

    it('should reject inverted boxes and wrong arity', () => {
      const reason = 'numeric value is not a minX,minY,maxX,maxY bounding box'
      expect(classifySpatial('13.8,52.3,13.0,52.7')).toEqual({ kind: 'malformed', reason })
      expect(classifySpatial('13.0,52.3,13.8')).toEqual({ kind: 'malformed', reason })
    })
  })

  it('should accept absolute URIs', () => {
    expect(classifySpatial('http://dcat-ap.de/def/politicalGeocoding/stateKey/11')).toEqual({
      kind: 'uri',
      value: 'http://dcat-ap.de/def/politicalGeocoding/stateKey/11',
    })
  })

  it('should accept place names', () => {
    expect(classifySpatial('Berlin')).toEqual({ kind: 'place', value: 'Berlin' })
    expect(classifySpatial('Friedrichshain-Kreuzberg').kind).toBe('place')
    expect(classifySpatial('Baden-Württemberg').kind).toBe('place')
  })

  it('should reject noise that is neither geometry nor place', () => {
    expect(classifySpatial('#?!')).toEqual({
      kind: 'malformed',
      reason: 'not a recognizable geometry or place name',
    })
    expect(classifySpatial('X').kind).toBe('malformed')
  })
})
