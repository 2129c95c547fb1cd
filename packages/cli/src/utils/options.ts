/**
 * Commander option parsers
 */

import { InvalidArgumentError } from 'commander'

export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

export function parseLocale(value: string): 'en' | 'de' {
  if (value === 'en' || value === 'de') return value
  throw new InvalidArgumentError('Expected "en" or "de".')
}
