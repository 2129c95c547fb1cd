/**
 * Input boundary for metadata records
 * @module records/schema
 *
 * Untyped values (parsed JSON, loader output) are validated once here.
 * Nulls become absent fields; only structural problems are rejected.
 * Malformed field content is left for the indicators to judge.
 */

import { z } from 'zod'
import { ValidationError } from '../errors/index.js'
import type { MetadataRecord } from '../types/record.js'

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined)

const optionalFlag = z
  .boolean()
  .nullish()
  .transform((value) => value ?? undefined)

const optionalTextList = z
  .array(z.string().nullable())
  .nullish()
  .transform((values) => values?.filter((value): value is string => value !== null))

/**
 * Byte size as number; numeric strings are coerced, blank strings are
 * absent and anything else becomes NaN for the indicator to reject
 */
const optionalByteSize = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return undefined
    if (typeof value === 'number') return value
    const trimmed = value.trim()
    return trimmed === '' ? undefined : Number(trimmed)
  })

export const DistributionSchema = z.object({
  id: optionalText,
  accessUrl: optionalText,
  downloadUrl: optionalText,
  format: optionalText,
  mediaType: optionalText,
  byteSize: optionalByteSize,
  license: optionalText,
  licenseFromVocabulary: optionalFlag,
  accessRights: optionalText,
  accessRightsFromVocabulary: optionalFlag,
})

export const MetadataRecordSchema = z.object({
  id: z
    .union([z.string(), z.number()])
    .transform((value) => String(value).trim())
    .pipe(z.string().min(1, 'Record id must not be empty')),
  title: optionalText,
  tags: optionalTextList,
  themes: optionalTextList,
  spatial: optionalText,
  temporal: z
    .object({ start: optionalText, end: optionalText })
    .nullish()
    .transform((value) => value ?? undefined),
  distributions: z
    .array(DistributionSchema)
    .nullish()
    .transform((value) => value ?? undefined),
  publisher: z
    .object({ name: optionalText, identifier: optionalText })
    .nullish()
    .transform((value) => value ?? undefined),
  contactPoint: z
    .object({ name: optionalText, email: optionalText })
    .nullish()
    .transform((value) => value ?? undefined),
  usageTerms: optionalText,
  releaseDate: optionalText,
  modificationDate: optionalText,
  conformsTo: optionalText,
  landingPage: optionalText,
})

export type SafeParseRecordResult =
  | { success: true; data: MetadataRecord }
  | { success: false; error: ValidationError }

function toValidationError(error: z.ZodError): ValidationError {
  const [issue] = error.issues
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined
  const detail = issue ? issue.message : 'Invalid metadata record'
  return new ValidationError(
    field ? `Invalid metadata record at ${field}: ${detail}` : `Invalid metadata record: ${detail}`,
    { field, cause: error, context: { issues: error.issues.length } }
  )
}

/**
 * Validate an untyped value as a metadata record without throwing
 */
export function safeParseMetadataRecord(input: unknown): SafeParseRecordResult {
  const parsed = MetadataRecordSchema.safeParse(input)
  if (parsed.success) {
    return { success: true, data: parsed.data }
  }
  return { success: false, error: toValidationError(parsed.error) }
}

/**
 * Validate an untyped value as a metadata record
 *
 * @throws ValidationError naming the first offending path
 */
export function parseMetadataRecord(input: unknown): MetadataRecord {
  const result = safeParseMetadataRecord(input)
  if (!result.success) throw result.error
  return result.data
}
