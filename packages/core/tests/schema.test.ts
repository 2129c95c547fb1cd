/**
 * Metadata record schema tests
 */

import { describe, it, expect } from 'vitest'
import { ValidationError } from '../src/errors/index.js'
import { parseMetadataRecord, safeParseMetadataRecord } from '../src/records/schema.js'

describe('parseMetadataRecord', () => {
  it('should turn nulls into absent fields', () => {
    const record = parseMetadataRecord({
      id: 42,
      title: null,
      tags: ['trees', null],
      temporal: null,
      distributions: [{ format: null, byteSize: '1024' }],
    })

    expect(record.id).toBe('42')
    expect(record.title).toBeUndefined()
    expect(record.tags).toEqual(['trees'])
    expect(record.temporal).toBeUndefined()
    expect(record.distributions?.[0]?.format).toBeUndefined()
    expect(record.distributions?.[0]?.byteSize).toBe(1024)
  })

  it('should leave malformed byte sizes for the indicator', () => {
    const record = parseMetadataRecord({ id: 'r1', distributions: [{ byteSize: 'large' }] })
    expect(record.distributions?.[0]?.byteSize).toBeNaN()

    const blank = parseMetadataRecord({ id: 'r1', distributions: [{ byteSize: '  ' }] })
    expect(blank.distributions?.[0]?.byteSize).toBeUndefined()
  })

  it('should reject blank ids', () => {
    expect(() => parseMetadataRecord({ id: '  ' })).toThrow(
      'Invalid metadata record at id: Record id must not be empty'
    )
  })

  it('should throw ValidationError for non-objects', () => {
    expect(() => parseMetadataRecord('record')).toThrow(ValidationError)
    expect(() => parseMetadataRecord('record')).toThrow(
      'Invalid metadata record: Expected object, received string'
    )
  })
})

describe('safeParseMetadataRecord', () => {
  it('should name the offending field', () => {
    const result = safeParseMetadataRecord({ id: 'r1', distributions: 'none given' })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.field).toBe('distributions')
      expect(result.error.message).toBe(
        'Invalid metadata record at distributions: Expected array, received string'
      )
      expect(result.error.code).toBe('VALIDATION_ERROR')
    }
  })

  it('should report a missing id', () => {
    const result = safeParseMetadataRecord({ title: 'No id' })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.field).toBe('id')
    }
  })

  it('should return the parsed record', () => {
    const result = safeParseMetadataRecord({ id: 'r1', conformsTo: 'http://dcat-ap.de/def/dcatde/' })

    expect(result).toEqual({
      success: true,
      data: { id: 'r1', conformsTo: 'http://dcat-ap.de/def/dcatde/' },
    })
  })
})
