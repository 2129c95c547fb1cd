/**
 * Findability indicators (100 points)
 */

import { parseMetadataPeriod, presentValue, presentValues } from '../../validation/field-validators.js'
import { classifySpatial, type SpatialKind } from '../../validation/spatial.js'
import { award, deny, type RecordIndicator } from '../types.js'

const SPATIAL_LABELS: Record<SpatialKind, string> = {
  geojson: 'GeoJSON geometry',
  wkt: 'WKT geometry',
  bbox: 'bounding box',
  uri: 'URI',
  place: 'place name',
}

function plural(count: number, singular: string, pluralForm: string): string {
  return `${count} ${count === 1 ? singular : pluralForm}`
}

export const keywords: RecordIndicator = {
  id: 'keywords',
  name: 'Keywords',
  field: 'dcat:keyword',
  maxPoints: 30,
  scope: 'record',
  evaluate({ record }, maxPoints) {
    const tags = presentValues(record.tags)
    return tags.length > 0
      ? award(maxPoints, `${plural(tags.length, 'keyword', 'keywords')} present`)
      : deny('No keywords')
  },
}

export const categories: RecordIndicator = {
  id: 'categories',
  name: 'Categories',
  field: 'dcat:theme',
  maxPoints: 30,
  scope: 'record',
  evaluate({ record }, maxPoints) {
    const themes = presentValues(record.themes)
    return themes.length > 0
      ? award(maxPoints, `${plural(themes.length, 'category', 'categories')} present`)
      : deny('No categories')
  },
}

export const spatialCoverage: RecordIndicator = {
  id: 'spatial-coverage',
  name: 'Spatial coverage',
  field: 'dct:spatial',
  maxPoints: 20,
  scope: 'record',
  evaluate({ record }, maxPoints) {
    const spatial = classifySpatial(record.spatial)
    switch (spatial.kind) {
      case 'absent':
        return deny('No spatial coverage')
      case 'malformed':
        return deny(`Malformed spatial coverage: ${spatial.reason}`)
      default:
        return award(maxPoints, `Spatial coverage given as ${SPATIAL_LABELS[spatial.kind]}`)
    }
  },
}

export const temporalCoverage: RecordIndicator = {
  id: 'temporal-coverage',
  name: 'Temporal coverage',
  field: 'dct:temporal',
  maxPoints: 20,
  scope: 'record',
  evaluate({ record }, maxPoints) {
    const start = presentValue(record.temporal?.start)
    const end = presentValue(record.temporal?.end)
    if (start === undefined && end === undefined) {
      return deny('No temporal coverage')
    }

    const startPeriod = start === undefined ? undefined : parseMetadataPeriod(start)
    if (start !== undefined && startPeriod === undefined) {
      return deny(`Unparseable temporal start "${start}"`)
    }
    const endPeriod = end === undefined ? undefined : parseMetadataPeriod(end)
    if (end !== undefined && endPeriod === undefined) {
      return deny(`Unparseable temporal end "${end}"`)
    }

    // each bound covers its whole year, month or day
    if (startPeriod !== undefined && endPeriod !== undefined && startPeriod.start > endPeriod.end) {
      return deny('Temporal coverage ends before it starts')
    }
    return award(maxPoints, 'Temporal coverage valid')
  },
}

export const FINDABILITY_INDICATORS = [keywords, categories, spatialCoverage, temporalCoverage]
