/**
 * Accessibility indicators (100 points)
 *
 * All three are distribution-scoped. The access URL is checked for syntax
 * only; reachability is probed for download URLs alone.
 */

import { isAbsoluteUrl, presentValue } from '../../validation/field-validators.js'
import type { Distribution } from '../../types/record.js'
import { award, deny, type DistributionIndicator } from '../types.js'

/**
 * The distribution's download URL when present and syntactically valid
 */
export function validDownloadUrl(distribution: Distribution): string | undefined {
  const url = presentValue(distribution.downloadUrl)
  return url !== undefined && isAbsoluteUrl(url) ? url : undefined
}

export const accessUrl: DistributionIndicator = {
  id: 'access-url',
  name: 'Access URL',
  field: 'dcat:accessURL',
  maxPoints: 50,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const url = presentValue(distribution.accessUrl)
    if (url === undefined) return deny('No access URL')
    return isAbsoluteUrl(url)
      ? award(maxPoints, 'Valid access URL')
      : deny('Access URL is not a valid absolute URL')
  },
}

export const downloadUrl: DistributionIndicator = {
  id: 'download-url',
  name: 'Download URL',
  field: 'dcat:downloadURL',
  maxPoints: 20,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const url = presentValue(distribution.downloadUrl)
    if (url === undefined) return deny('No download URL')
    return isAbsoluteUrl(url)
      ? award(maxPoints, 'Valid download URL')
      : deny('Download URL is not a valid absolute URL')
  },
}

export const downloadUrlReachable: DistributionIndicator = {
  id: 'download-url-reachable',
  name: 'Download URL reachable',
  field: 'dcat:downloadURL',
  maxPoints: 30,
  scope: 'distribution',
  evaluate(distribution, context, maxPoints) {
    const url = validDownloadUrl(distribution)
    if (url === undefined) return deny('No valid download URL to check')
    if (!context.reachabilityEnabled) return deny('Reachability checks disabled')

    const observation = context.reachability.get(url)
    if (observation === undefined) return deny('Download URL was not probed')
    if (observation.reachable) {
      return award(
        maxPoints,
        observation.status === undefined
          ? 'Download URL reachable'
          : `Download URL reachable (HTTP ${observation.status})`
      )
    }
    return deny(`Download URL unreachable: ${observation.error ?? 'no response'}`)
  },
}

export const ACCESSIBILITY_INDICATORS = [accessUrl, downloadUrl, downloadUrlReachable]
