/**
 * License, access-right and application profile vocabularies
 */

import { presentValue } from '../validation/field-validators.js'

/**
 * License identifiers of the DCAT-AP.de license vocabulary, lower-cased.
 * `other-closed` is not an open license but is a valid identifier.
 */
export const DCAT_AP_DE_LICENSES: ReadonlySet<string> = new Set([
  'cc-zero',
  'cc-by',
  'cc-by-sa',
  'cc-by/4.0',
  'cc-by-4.0',
  'cc-by-sa-4.0',
  'cc-nc',
  'cc by 3.0 de',
  'dl-de-zero-2.0',
  'dl-de-by-2.0',
  'odc-odbl',
  'other-closed',
])

const LICENSE_URI = /^https?:\/\/dcat-ap\.de\/def\/licenses\/(.+?)\/?$/i

/**
 * License id or `http://dcat-ap.de/def/licenses/<id>` URI from the
 * DCAT-AP.de license vocabulary
 */
export function isVocabularyLicense(raw: string | undefined): boolean {
  const value = presentValue(raw)
  if (value === undefined) return false
  const uri = LICENSE_URI.exec(value)
  const id = (uri?.[1] ?? value).toLowerCase()
  return DCAT_AP_DE_LICENSES.has(id)
}

export const ACCESS_RIGHTS: ReadonlySet<string> = new Set(['PUBLIC', 'RESTRICTED', 'NON_PUBLIC'])

const ACCESS_RIGHT_URI =
  /^https?:\/\/publications\.europa\.eu\/resource\/authority\/access-right\/([A-Z_]+)\/?$/i

/**
 * Access-right code or EU access-right authority URI
 */
export function isVocabularyAccessRight(raw: string | undefined): boolean {
  const value = presentValue(raw)
  if (value === undefined) return false
  const uri = ACCESS_RIGHT_URI.exec(value)
  const code = (uri?.[1] ?? value).toUpperCase()
  return ACCESS_RIGHTS.has(code)
}

export type ProfileConformance = 'dcat-ap-de' | 'dcat-ap' | 'other'

const DCAT_AP_DE_PROFILE = 'http://dcat-ap.de/def/dcatde'
const DCAT_AP_PROFILES = ['http://data.europa.eu/r5r', 'http://semiceu.github.io/dcat-ap']

function normalizeProfileUri(uri: string): string {
  return uri
    .trim()
    .toLowerCase()
    .replace(/^https:/, 'http:')
    .replace(/\/+$/, '')
}

/**
 * Which application profile a conformsTo URI names. Versioned variants
 * (`.../dcatde/2.0`) count as the profile they extend.
 */
export function classifyProfile(uri: string): ProfileConformance {
  const normalized = normalizeProfileUri(uri)
  const matches = (base: string): boolean =>
    normalized === base || normalized.startsWith(`${base}/`)

  if (matches(DCAT_AP_DE_PROFILE)) return 'dcat-ap-de'
  if (DCAT_AP_PROFILES.some(matches)) return 'dcat-ap'
  return 'other'
}
