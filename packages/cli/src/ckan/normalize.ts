/**
 * CKAN package normalization
 *
 * Maps CKAN/DCAT-AP.de package fields onto MetadataRecord and passes the
 * result through the engine's input boundary. Packages that cannot become
 * records are returned as rejections with a reason, never scored.
 */

import {
  ValidationError,
  presentValue,
  safeParseMetadataRecord,
  type Distribution,
  type MetadataRecord,
} from '@opendata-mqa/core'
import {
  CkanEnvelopeSchema,
  CkanPackageSchema,
  type CkanPackage,
  type CkanResource,
} from './schema.js'

export interface RejectedPackage {
  /** Position in the catalog payload */
  index: number
  /** CKAN name or id, when the package had one */
  packageName?: string
  reason: string
}

export type NormalizeResult =
  | { ok: true; record: MetadataRecord }
  | { ok: false; rejection: RejectedPackage }

export interface NormalizedCatalog {
  records: MetadataRecord[]
  rejected: RejectedPackage[]
}

/** Extras keys that carry dct:conformsTo */
const CONFORMS_TO_KEYS = new Set(['conforms_to', 'conformsTo', 'dct:conformsTo'])

function firstPresent(...values: (string | undefined)[]): string | undefined {
  for (const value of values) {
    const present = presentValue(value)
    if (present !== undefined) return present
  }
  return undefined
}

function toDistribution(resource: CkanResource, packageLicense: string | undefined): Distribution {
  return {
    id: resource.id,
    accessUrl: firstPresent(resource.access_url, resource.url),
    downloadUrl: firstPresent(resource.download_url, resource.url),
    format: resource.format,
    mediaType: resource.mimetype,
    ...(resource.size === undefined ? {} : { byteSize: toByteSize(resource.size) }),
    license: firstPresent(resource.license, resource.license_id, packageLicense),
    accessRights: resource.access_rights,
  }
}

function toByteSize(size: string | number): number | undefined {
  if (typeof size === 'number') return size
  const trimmed = size.trim()
  return trimmed === '' ? undefined : Number(trimmed)
}

function conformsTo(pkg: CkanPackage): string | undefined {
  const extra = pkg.extras?.find((entry) => entry.key !== undefined && CONFORMS_TO_KEYS.has(entry.key))
  return firstPresent(pkg.conforms_to, extra?.value)
}

/**
 * Map a validated CKAN package onto the record shape
 */
export function toMetadataRecord(pkg: CkanPackage & { id: string }): MetadataRecord {
  const tags = (pkg.tags ?? []).flatMap((tag) => (tag.name === undefined ? [] : [tag.name]))
  const themes = (pkg.groups ?? []).flatMap((group) => {
    const theme = firstPresent(group.name, group.title)
    return theme === undefined ? [] : [theme]
  })

  return {
    id: pkg.id,
    title: pkg.title,
    tags,
    themes,
    spatial: firstPresent(pkg.geographical_coverage, pkg.spatial),
    temporal: { start: pkg.temporal_coverage_from, end: pkg.temporal_coverage_to },
    distributions: (pkg.resources ?? []).map((resource) => toDistribution(resource, pkg.license_id)),
    publisher: {
      name: firstPresent(pkg.author, pkg.organization?.title),
      identifier: pkg.organization?.name,
    },
    contactPoint: { name: pkg.maintainer, email: pkg.maintainer_email },
    usageTerms: pkg.license_title,
    releaseDate: firstPresent(pkg.date_released, pkg.issued),
    modificationDate: firstPresent(pkg.date_updated, pkg.modified),
    conformsTo: conformsTo(pkg),
    landingPage: pkg.url,
  }
}

/**
 * Normalize one raw CKAN package
 *
 * @param raw - Package as parsed from JSON
 * @param index - Position in the payload, carried into rejections
 */
export function normalizeCkanPackage(raw: unknown, index = 0): NormalizeResult {
  const parsed = CkanPackageSchema.safeParse(raw)
  if (!parsed.success) {
    return { ok: false, rejection: { index, reason: 'Package is not a JSON object' } }
  }

  const pkg = parsed.data
  const id = presentValue(pkg.id)
  const packageName = presentValue(pkg.name) ?? id
  if (id === undefined) {
    return {
      ok: false,
      rejection: { index, ...(packageName ? { packageName } : {}), reason: 'Package has no id' },
    }
  }

  const record = safeParseMetadataRecord(toMetadataRecord({ ...pkg, id }))
  if (!record.success) {
    return {
      ok: false,
      rejection: { index, packageName: packageName ?? id, reason: record.error.message },
    }
  }
  return { ok: true, record: record.data }
}

/**
 * Extract the package list from a catalog payload: a bare array or an
 * action API envelope
 *
 * @throws ValidationError when the payload has neither shape
 */
export function extractPackages(payload: unknown): unknown[] {
  if (Array.isArray(payload)) return payload
  const envelope = CkanEnvelopeSchema.safeParse(payload)
  if (envelope.success) return envelope.data.result
  throw new ValidationError('Catalog payload is neither a package array nor a CKAN API response', {
    cause: envelope.error,
  })
}

/**
 * Normalize every package of a catalog payload
 */
export function normalizeCatalog(payload: unknown): NormalizedCatalog {
  const records: MetadataRecord[] = []
  const rejected: RejectedPackage[] = []

  extractPackages(payload).forEach((raw, index) => {
    const result = normalizeCkanPackage(raw, index)
    if (result.ok) {
      records.push(result.record)
    } else {
      rejected.push(result.rejection)
    }
  })

  return { records, rejected }
}
