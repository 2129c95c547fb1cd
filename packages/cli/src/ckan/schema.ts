/**
 * Zod schemas for CKAN package payloads
 * @module ckan/schema
 *
 * Portals are inconsistent about types (numbers for ids, strings for
 * sizes, tags as strings or objects), so every field is lenient: a value
 * of the wrong shape becomes absent instead of rejecting the package.
 */

import { z } from 'zod'

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .catch(undefined)
  .transform((value) => (value === null || value === undefined ? undefined : String(value)))

const sizeValue = z
  .union([z.number(), z.string()])
  .nullish()
  .catch(undefined)
  .transform((value) => value ?? undefined)

const namedEntity = z.object({ name: text, title: text })

export const CkanTagSchema = z.union([
  z.string().transform((name) => ({ name, title: undefined })),
  namedEntity,
])

export const CkanResourceSchema = z.object({
  id: text,
  url: text,
  access_url: text,
  download_url: text,
  format: text,
  mimetype: text,
  size: sizeValue,
  license: text,
  license_id: text,
  access_rights: text,
})

export const CkanExtraSchema = z.object({ key: text, value: text })

export const CkanPackageSchema = z.object({
  id: text,
  name: text,
  title: text,
  url: text,
  tags: z.array(CkanTagSchema).nullish().catch(undefined),
  groups: z.array(namedEntity).nullish().catch(undefined),
  geographical_coverage: text,
  spatial: text,
  temporal_coverage_from: text,
  temporal_coverage_to: text,
  resources: z.array(CkanResourceSchema).nullish().catch(undefined),
  author: text,
  organization: namedEntity.nullish().catch(undefined),
  maintainer: text,
  maintainer_email: text,
  license_id: text,
  license_title: text,
  date_released: text,
  issued: text,
  date_updated: text,
  modified: text,
  conforms_to: text,
  extras: z.array(CkanExtraSchema).nullish().catch(undefined),
})

export type CkanPackage = z.infer<typeof CkanPackageSchema>
export type CkanResource = z.infer<typeof CkanResourceSchema>

/**
 * Action API envelope: `{ success, result }`, where `result` is the package
 * list or a package_search page `{ count, results }`
 */
export const CkanEnvelopeSchema = z.object({
  success: z.boolean().optional(),
  result: z.union([
    z.array(z.unknown()),
    z.object({ results: z.array(z.unknown()) }).transform((page) => page.results),
  ]),
})
