/**
 * Format and media type vocabularies
 *
 * Format codes are canonical lower-case identifiers. Membership lists follow
 * the EU file-type authority table and the formats common on DCAT-AP.de
 * portals (WFS/WMS services, Excel exports, shapefiles).
 */

import { normalizeMediaType, presentValue } from '../validation/field-validators.js'

/**
 * Formats recognized by the format indicator
 */
export const KNOWN_FORMATS: ReadonlySet<string> = new Set([
  'csv',
  'tsv',
  'json',
  'geojson',
  'jsonld',
  'xml',
  'gml',
  'kml',
  'kmz',
  'gpkg',
  'shp',
  'wfs',
  'wms',
  'wmts',
  'pdf',
  'zip',
  'xls',
  'xlsx',
  'ods',
  'doc',
  'docx',
  'odt',
  'html',
  'txt',
  'md',
  'rdf',
  'ttl',
  'n3',
  'nt',
  'trig',
  'atom',
  'rss',
  'png',
  'jpeg',
  'tiff',
])

/**
 * Open (non-proprietary) formats
 */
export const OPEN_FORMATS: ReadonlySet<string> = new Set([
  'csv',
  'tsv',
  'json',
  'geojson',
  'jsonld',
  'xml',
  'gml',
  'kml',
  'gpkg',
  'wfs',
  'wms',
  'wmts',
  'zip',
  'ods',
  'odt',
  'html',
  'txt',
  'md',
  'rdf',
  'ttl',
  'n3',
  'nt',
  'trig',
])

/**
 * Formats tied to a single vendor
 */
export const PROPRIETARY_FORMATS: ReadonlySet<string> = new Set([
  'xls',
  'xlsx',
  'doc',
  'docx',
  'shp',
])

/**
 * Machine-readable formats. Deliberately independent of openness:
 * Excel workbooks are proprietary yet machine-readable.
 */
export const MACHINE_READABLE_FORMATS: ReadonlySet<string> = new Set([
  'csv',
  'tsv',
  'json',
  'geojson',
  'jsonld',
  'xml',
  'gml',
  'kml',
  'gpkg',
  'wfs',
  'xls',
  'xlsx',
  'ods',
  'rdf',
  'ttl',
  'n3',
  'nt',
  'trig',
])

/**
 * EU file-type codes that differ from the canonical code
 */
const FILE_TYPE_CODES: ReadonlyMap<string, string> = new Map([
  ['json_ld', 'jsonld'],
  ['rdf_turtle', 'ttl'],
  ['rdf_xml', 'rdf'],
  ['rdf_n_triples', 'nt'],
  ['wfs_srvc', 'wfs'],
  ['wms_srvc', 'wms'],
  ['gzip', 'zip'],
])

/**
 * Free-text spellings seen in catalogs, mapped to canonical codes
 */
const FORMAT_ALIASES: ReadonlyMap<string, string> = new Map([
  ['excel', 'xls'],
  ['shape', 'shp'],
  ['shapefile', 'shp'],
  ['geopackage', 'gpkg'],
  ['text', 'txt'],
  ['markdown', 'md'],
  ['htm', 'html'],
  ['jpg', 'jpeg'],
  ['tif', 'tiff'],
  ['turtle', 'ttl'],
  ['json-ld', 'jsonld'],
  ['rdf/xml', 'rdf'],
])

/**
 * Media types accepted as drawn from the IANA vocabulary
 */
export const MEDIA_TYPE_FORMATS: ReadonlyMap<string, string> = new Map([
  ['text/csv', 'csv'],
  ['text/tab-separated-values', 'tsv'],
  ['application/json', 'json'],
  ['application/geo+json', 'geojson'],
  ['application/ld+json', 'jsonld'],
  ['application/xml', 'xml'],
  ['text/xml', 'xml'],
  ['application/gml+xml', 'gml'],
  ['application/vnd.google-earth.kml+xml', 'kml'],
  ['application/vnd.google-earth.kmz', 'kmz'],
  ['application/geopackage+sqlite3', 'gpkg'],
  ['application/pdf', 'pdf'],
  ['application/zip', 'zip'],
  ['application/vnd.ms-excel', 'xls'],
  ['application/vnd.openxmlformats-officedocument.spreadsheetml.sheet', 'xlsx'],
  ['application/vnd.oasis.opendocument.spreadsheet', 'ods'],
  ['application/msword', 'doc'],
  ['application/vnd.openxmlformats-officedocument.wordprocessingml.document', 'docx'],
  ['application/vnd.oasis.opendocument.text', 'odt'],
  ['text/html', 'html'],
  ['text/plain', 'txt'],
  ['text/markdown', 'md'],
  ['application/rdf+xml', 'rdf'],
  ['text/turtle', 'ttl'],
  ['text/n3', 'n3'],
  ['application/n-triples', 'nt'],
  ['application/trig', 'trig'],
  ['application/atom+xml', 'atom'],
  ['application/rss+xml', 'rss'],
  ['image/png', 'png'],
  ['image/jpeg', 'jpeg'],
  ['image/tiff', 'tiff'],
])

const FILE_TYPE_AUTHORITY = /^https?:\/\/publications\.europa\.eu\/resource\/authority\/file-type\//i

export interface CanonicalFormat {
  /** Canonical lower-case code, or the cleaned raw value when unrecognized */
  code: string
  /** The code is in KNOWN_FORMATS */
  recognized: boolean
  /**
   * The raw value was itself a vocabulary entry (exact code or file-type
   * URI) rather than an alias or a free-text label containing one
   */
  fromVocabulary: boolean
}

function lookupCode(candidate: string): { code: string; vocabulary: boolean } | undefined {
  if (KNOWN_FORMATS.has(candidate)) return { code: candidate, vocabulary: true }
  const fileType = FILE_TYPE_CODES.get(candidate)
  if (fileType !== undefined) return { code: fileType, vocabulary: true }
  const alias = FORMAT_ALIASES.get(candidate)
  return alias === undefined ? undefined : { code: alias, vocabulary: false }
}

/**
 * Resolve a format label to its canonical code.
 *
 * Exact codes and EU file-type codes or URIs resolve as vocabulary entries.
 * Media types (`text/csv`), aliases (`Excel`) and free-text labels
 * (`CSV-Datei`, resolved through their first known token) are recognized
 * but do not count as file-type vocabulary use. Undefined when blank.
 */
export function canonicalFormat(raw: string | undefined): CanonicalFormat | undefined {
  const value = presentValue(raw)
  if (value === undefined) return undefined

  const isAuthorityUri = FILE_TYPE_AUTHORITY.test(value)
  const cleaned = value.replace(FILE_TYPE_AUTHORITY, '').toLowerCase().replace(/^\./, '')

  const exact = lookupCode(cleaned)
  if (exact !== undefined) {
    return { code: exact.code, recognized: true, fromVocabulary: exact.vocabulary }
  }

  if (!isAuthorityUri) {
    const mediaType = normalizeMediaType(value)
    const implied = mediaType === undefined ? undefined : MEDIA_TYPE_FORMATS.get(mediaType)
    if (implied !== undefined) {
      return { code: implied, recognized: true, fromVocabulary: false }
    }

    for (const token of cleaned.split(/[^a-z0-9]+/)) {
      const match = token === '' ? undefined : lookupCode(token)
      if (match !== undefined) {
        return { code: match.code, recognized: true, fromVocabulary: false }
      }
    }
  }

  return { code: cleaned, recognized: false, fromVocabulary: isAuthorityUri }
}

/**
 * Canonical format implied by a media type, if it is in the vocabulary
 */
export function formatForMediaType(raw: string | undefined): string | undefined {
  const value = presentValue(raw)
  if (value === undefined) return undefined
  const mediaType = normalizeMediaType(value)
  return mediaType === undefined ? undefined : MEDIA_TYPE_FORMATS.get(mediaType)
}
