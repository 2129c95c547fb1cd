/**
 * Vocabulary lookup tests
 */

import { describe, it, expect } from 'vitest'
import {
  canonicalFormat,
  classifyProfile,
  formatForMediaType,
  isVocabularyAccessRight,
  isVocabularyLicense,
} from '../src/vocabularies/index.js'

describe('canonicalFormat', () => {
  it('should resolve exact codes as vocabulary entries', () => {
    expect(canonicalFormat('CSV')).toEqual({ code: 'csv', recognized: true, fromVocabulary: true })
    expect(canonicalFormat('.geojson')).toEqual({
      code: 'geojson',
      recognized: true,
      fromVocabulary: true,
    })
  })

  it('should resolve EU file-type codes and URIs as vocabulary entries', () => {
    expect(canonicalFormat('WFS_SRVC')).toEqual({ code: 'wfs', recognized: true, fromVocabulary: true })
    expect(
      canonicalFormat('http://publications.europa.eu/resource/authority/file-type/JSON')
    ).toEqual({ code: 'json', recognized: true, fromVocabulary: true })
  })

  it('should recognize aliases and free-text labels without vocabulary credit', () => {
    expect(canonicalFormat('Excel')).toEqual({ code: 'xls', recognized: true, fromVocabulary: false })
    expect(canonicalFormat('CSV-Datei')).toEqual({
      code: 'csv',
      recognized: true,
      fromVocabulary: false,
    })
  })

  it('should keep unknown labels as unrecognized', () => {
    expect(canonicalFormat('Fancy Export')).toEqual({
      code: 'fancy export',
      recognized: false,
      fromVocabulary: false,
    })
  })

  it('should resolve media types written into the format field', () => {
    expect(canonicalFormat('text/csv')).toEqual({ code: 'csv', recognized: true, fromVocabulary: false })
    expect(canonicalFormat('text/xml')).toEqual({ code: 'xml', recognized: true, fromVocabulary: false })
    expect(canonicalFormat('text/html; charset=utf-8')).toEqual({
      code: 'html',
      recognized: true,
      fromVocabulary: false,
    })
  })

  it('should return undefined for blank values', () => {
    expect(canonicalFormat('  ')).toBeUndefined()
    expect(canonicalFormat(undefined)).toBeUndefined()
  })
})

describe('formatForMediaType', () => {
  it('should map vocabulary media types to formats', () => {
    expect(formatForMediaType('text/csv; charset=utf-8')).toBe('csv')
    expect(formatForMediaType('application/vnd.ms-excel')).toBe('xls')
  })

  it('should return undefined for unknown or invalid media types', () => {
    expect(formatForMediaType('application/x-custom')).toBeUndefined()
    expect(formatForMediaType('csv')).toBeUndefined()
  })
})

describe('isVocabularyLicense', () => {
  it('should accept DCAT-AP.de ids case-insensitively', () => {
    expect(isVocabularyLicense('dl-de-by-2.0')).toBe(true)
    expect(isVocabularyLicense('CC-BY')).toBe(true)
    expect(isVocabularyLicense('CC BY 3.0 DE')).toBe(true)
  })

  it('should accept license URIs', () => {
    expect(isVocabularyLicense('http://dcat-ap.de/def/licenses/cc-by/4.0')).toBe(true)
    expect(isVocabularyLicense('https://dcat-ap.de/def/licenses/dl-de-zero-2.0/')).toBe(true)
  })

  it('should reject other licenses', () => {
    expect(isVocabularyLicense('MIT')).toBe(false)
    expect(isVocabularyLicense(undefined)).toBe(false)
  })
})

describe('isVocabularyAccessRight', () => {
  it('should accept codes and authority URIs', () => {
    expect(isVocabularyAccessRight('PUBLIC')).toBe(true)
    expect(isVocabularyAccessRight('non_public')).toBe(true)
    expect(
      isVocabularyAccessRight('http://publications.europa.eu/resource/authority/access-right/RESTRICTED')
    ).toBe(true)
  })

  it('should reject free text', () => {
    expect(isVocabularyAccessRight('open to everyone')).toBe(false)
  })
})

describe('classifyProfile', () => {
  it('should identify DCAT-AP.de and its versions', () => {
    expect(classifyProfile('http://dcat-ap.de/def/dcatde/')).toBe('dcat-ap-de')
    expect(classifyProfile('https://dcat-ap.de/def/dcatde/2.0')).toBe('dcat-ap-de')
  })

  it('should identify the parent DCAT-AP profile', () => {
    expect(classifyProfile('http://data.europa.eu/r5r/')).toBe('dcat-ap')
    expect(classifyProfile('https://semiceu.github.io/DCAT-AP/releases/3.0.0')).toBe('dcat-ap')
  })

  it('should not match prefixes that only share leading characters', () => {
    expect(classifyProfile('http://dcat-ap.de/def/dcatdeX')).toBe('other')
    expect(classifyProfile('https://example.org/profile')).toBe('other')
  })
})
