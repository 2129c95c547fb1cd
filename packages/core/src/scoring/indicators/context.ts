/**
 * Context indicators (20 points)
 */

import { parseMetadataDate, presentValue } from '../../validation/field-validators.js'
import { award, deny, type DistributionIndicator, type RecordIndicator, type Verdict } from '../types.js'

function dateVerdict(raw: string | undefined, label: string, maxPoints: number): Verdict {
  const value = presentValue(raw)
  if (value === undefined) return deny(`No ${label}`)
  return parseMetadataDate(value) === undefined
    ? deny(`Unparseable ${label} "${value}"`)
    : award(maxPoints, `Valid ${label}`)
}

export const usageTerms: RecordIndicator = {
  id: 'usage-terms',
  name: 'Usage terms',
  field: 'dct:rights',
  maxPoints: 5,
  scope: 'record',
  evaluate({ record }, maxPoints) {
    return presentValue(record.usageTerms) === undefined
      ? deny('No usage terms')
      : award(maxPoints, 'Usage terms present')
  },
}

export const byteSize: DistributionIndicator = {
  id: 'byte-size',
  name: 'Byte size',
  field: 'dcat:byteSize',
  maxPoints: 5,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const size = distribution.byteSize
    if (size === undefined) return deny('No byte size')
    return Number.isInteger(size) && size >= 0
      ? award(maxPoints, `${size} bytes`)
      : deny(`Byte size ${size} is not a non-negative integer`)
  },
}

export const releaseDate: RecordIndicator = {
  id: 'release-date',
  name: 'Release date',
  field: 'dct:issued',
  maxPoints: 5,
  scope: 'record',
  evaluate({ record }, maxPoints) {
    return dateVerdict(record.releaseDate, 'release date', maxPoints)
  },
}

export const modificationDate: RecordIndicator = {
  id: 'modification-date',
  name: 'Modification date',
  field: 'dct:modified',
  maxPoints: 5,
  scope: 'record',
  evaluate({ record }, maxPoints) {
    return dateVerdict(record.modificationDate, 'modification date', maxPoints)
  },
}

export const CONTEXT_INDICATORS = [usageTerms, byteSize, releaseDate, modificationDate]
