/**
 * Interoperability indicators (110 points)
 */

import { isAbsoluteUrl, normalizeMediaType, presentValue } from '../../validation/field-validators.js'
import {
  MACHINE_READABLE_FORMATS,
  OPEN_FORMATS,
  PROPRIETARY_FORMATS,
  canonicalFormat,
  classifyProfile,
  formatForMediaType,
} from '../../vocabularies/index.js'
import type { Distribution } from '../../types/record.js'
import {
  award,
  deny,
  partial,
  type DistributionIndicator,
  type RecordIndicator,
} from '../types.js'

/**
 * Canonical format of a distribution: a recognized format label first,
 * otherwise the format its media type implies
 */
export function resolveFormat(distribution: Distribution): string | undefined {
  const format = canonicalFormat(distribution.format)
  if (format?.recognized) return format.code
  return formatForMediaType(distribution.mediaType)
}

export const format: DistributionIndicator = {
  id: 'format',
  name: 'Format',
  field: 'dct:format',
  maxPoints: 20,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const resolved = canonicalFormat(distribution.format)
    if (resolved === undefined) return deny('No format')
    return resolved.recognized
      ? award(maxPoints, `Recognized format ${resolved.code.toUpperCase()}`)
      : partial(maxPoints, `Unrecognized format "${presentValue(distribution.format) ?? ''}"`)
  },
}

export const mediaType: DistributionIndicator = {
  id: 'media-type',
  name: 'Media type',
  field: 'dcat:mediaType',
  maxPoints: 10,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const raw = presentValue(distribution.mediaType)
    if (raw === undefined) return deny('No media type')
    const normalized = normalizeMediaType(raw)
    return normalized === undefined
      ? deny(`Invalid media type "${raw}"`)
      : award(maxPoints, `Valid media type ${normalized}`)
  },
}

export const formatVocabulary: DistributionIndicator = {
  id: 'format-vocabulary',
  name: 'Format or media type from vocabulary',
  field: 'dct:format',
  maxPoints: 10,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const resolved = canonicalFormat(distribution.format)
    const implied = formatForMediaType(distribution.mediaType)

    if (resolved !== undefined && implied !== undefined && resolved.code !== implied) {
      return deny(
        `Format ${resolved.code.toUpperCase()} contradicts media type (${implied.toUpperCase()})`
      )
    }
    if (resolved?.fromVocabulary) {
      return award(maxPoints, 'Format drawn from the file-type vocabulary')
    }
    if (implied !== undefined) {
      return award(maxPoints, 'Media type drawn from the media-type vocabulary')
    }
    if (resolved === undefined && presentValue(distribution.mediaType) === undefined) {
      return deny('No format or media type')
    }
    return deny('Neither format nor media type is a vocabulary entry')
  },
}

export const nonProprietary: DistributionIndicator = {
  id: 'non-proprietary',
  name: 'Non-proprietary format',
  field: 'dct:format',
  maxPoints: 20,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const code = resolveFormat(distribution)
    if (code === undefined) return deny('Format unknown')
    const label = code.toUpperCase()
    if (OPEN_FORMATS.has(code)) return award(maxPoints, `${label} is an open format`)
    if (PROPRIETARY_FORMATS.has(code)) return deny(`${label} is a proprietary format`)
    return deny(`${label} is not on the open-format list`)
  },
}

export const machineReadable: DistributionIndicator = {
  id: 'machine-readable',
  name: 'Machine-readable format',
  field: 'dct:format',
  maxPoints: 20,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const code = resolveFormat(distribution)
    if (code === undefined) return deny('Format unknown')
    const label = code.toUpperCase()
    return MACHINE_READABLE_FORMATS.has(code)
      ? award(maxPoints, `${label} is machine-readable`)
      : deny(`${label} is not machine-readable`)
  },
}

export const dcatApDeConformity: RecordIndicator = {
  id: 'dcat-ap-de-conformity',
  name: 'DCAT-AP.de conformity',
  field: 'dct:conformsTo',
  maxPoints: 30,
  scope: 'record',
  evaluate({ record }, maxPoints) {
    const profile = presentValue(record.conformsTo)
    if (profile === undefined) return deny('No conformance profile declared')
    if (!isAbsoluteUrl(profile)) return deny(`Malformed conformance profile "${profile}"`)

    switch (classifyProfile(profile)) {
      case 'dcat-ap-de':
        return award(maxPoints, 'Conforms to DCAT-AP.de')
      case 'dcat-ap':
        return partial(maxPoints, 'Conforms to DCAT-AP, not the DCAT-AP.de profile')
      case 'other':
        return deny(`Profile ${profile} is not DCAT-AP.de`)
    }
  },
}

export const INTEROPERABILITY_INDICATORS = [
  format,
  mediaType,
  formatVocabulary,
  nonProprietary,
  machineReadable,
  dcatApDeConformity,
]
