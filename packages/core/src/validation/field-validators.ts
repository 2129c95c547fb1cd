/**
 * Field Validators
 *
 * Presence and syntax checks shared by the indicator evaluators. None of
 * these throw: malformed values are reported as `false`/`undefined`.
 */

import { z } from 'zod'

/**
 * Placeholder strings catalogs use instead of leaving a field empty
 */
export const HIDDEN_NULLS: ReadonlySet<string> = new Set([
  '',
  'null',
  '[]',
  '{}',
  'nan',
  'none',
  'ohne angabe',
  'keine angabe',
  'nichts',
  'n/a',
])

/**
 * Trimmed value, or undefined when missing, whitespace, or a hidden null
 */
export function presentValue(value: string | null | undefined): string | undefined {
  if (value === undefined || value === null) return undefined
  const trimmed = value.trim()
  return HIDDEN_NULLS.has(trimmed.toLowerCase()) ? undefined : trimmed
}

export function isBlank(value: string | null | undefined): boolean {
  return presentValue(value) === undefined
}

/**
 * Non-blank entries of a string collection
 */
export function presentValues(values: readonly string[] | undefined): string[] {
  if (!values) return []
  const present: string[] = []
  for (const value of values) {
    const trimmed = presentValue(value)
    if (trimmed !== undefined) present.push(trimmed)
  }
  return present
}

const ALLOWED_URL_PROTOCOLS = new Set(['http:', 'https:', 'ftp:'])

/**
 * Syntactically valid absolute http(s)/ftp URL with a host
 */
export function isAbsoluteUrl(value: string): boolean {
  const trimmed = value.trim()
  if (trimmed === '' || /\s/.test(trimmed)) return false

  let parsed: URL
  try {
    parsed = new URL(trimmed)
  } catch {
    return false
  }

  return ALLOWED_URL_PROTOCOLS.has(parsed.protocol) && parsed.hostname !== ''
}

const emailSchema = z.string().email()

/**
 * Valid email address; a leading `mailto:` is accepted
 */
export function isValidEmail(value: string): boolean {
  const address = value.trim().replace(/^mailto:/i, '')
  return emailSchema.safeParse(address).success
}

const IANA_MEDIA_TYPE_PREFIX = /^https?:\/\/www\.iana\.org\/assignments\/media-types\//i

const MEDIA_TYPE_PATTERN =
  /^(application|audio|font|image|message|model|multipart|text|video)\/[a-z0-9][a-z0-9!#$&^_.+-]*(\s*;\s*[a-z0-9!#$&^_.+-]+=[^;\s]+)*$/

/**
 * Lower-cased `type/subtype` without parameters; IANA registry URIs are
 * reduced to the media type they name. Undefined when not a valid MIME type.
 */
export function normalizeMediaType(value: string): string | undefined {
  const candidate = value.trim().toLowerCase().replace(IANA_MEDIA_TYPE_PREFIX, '')
  if (!MEDIA_TYPE_PATTERN.test(candidate)) return undefined
  const [essence] = candidate.split(';')
  return essence?.trim()
}

const ISO_DATE = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/
const GERMAN_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/

function calendarDate(year: number, month: number, day: number): number | undefined {
  const time = Date.UTC(year, month - 1, day)
  const date = new Date(time)
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined
  }
  return time
}

const DAY_MS = 86_400_000

/** First and last instant a metadata date covers, in epoch milliseconds */
export interface MetadataPeriod {
  start: number
  end: number
}

/**
 * Parse a metadata date into the period it covers.
 *
 * Accepts `YYYY`, `YYYY-MM`, `YYYY-MM-DD`, ISO date-times and `DD.MM.YYYY`.
 * A partial date covers its whole year, month or day; a date-time covers a
 * single instant. Date-times without an offset are read as UTC. Returns
 * undefined for anything else, including impossible calendar dates.
 */
export function parseMetadataPeriod(value: string): MetadataPeriod | undefined {
  const trimmed = value.trim()

  const iso = ISO_DATE.exec(trimmed)
  if (iso) {
    const [, yearText, monthText, dayText] = iso
    const year = Number(yearText)
    const month = monthText ? Number(monthText) : 1
    const start = calendarDate(year, month, dayText ? Number(dayText) : 1)
    if (start === undefined) return undefined
    if (dayText) return { start, end: start + DAY_MS - 1 }
    if (monthText) return { start, end: Date.UTC(year, month, 1) - 1 }
    return { start, end: Date.UTC(year + 1, 0, 1) - 1 }
  }

  const dateTime = ISO_DATE_TIME.exec(trimmed)
  if (dateTime) {
    const datePart = trimmed.slice(0, 10).split('-').map(Number)
    const [year = NaN, month = NaN, day = NaN] = datePart
    if (calendarDate(year, month, day) === undefined) return undefined
    const zoned = dateTime[3] === undefined ? `${trimmed}Z` : trimmed
    const time = Date.parse(zoned.replace(' ', 'T'))
    return Number.isFinite(time) ? { start: time, end: time } : undefined
  }

  const german = GERMAN_DATE.exec(trimmed)
  if (german) {
    const [, day, month, year] = german
    const start = calendarDate(Number(year), Number(month), Number(day))
    return start === undefined ? undefined : { start, end: start + DAY_MS - 1 }
  }

  return undefined
}

/**
 * Parse a metadata date into epoch milliseconds.
 *
 * Partial dates resolve to their first instant.
 */
export function parseMetadataDate(value: string): number | undefined {
  return parseMetadataPeriod(value)?.start
}
