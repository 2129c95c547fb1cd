/**
 * Metadata record shape consumed by the assessment engine.
 *
 * Loaders normalize catalog payloads into this shape once, at the input
 * boundary; evaluators never probe untyped keys.
 */

/**
 * Temporal coverage bounds as date strings
 */
export interface TemporalCoverage {
  start?: string
  end?: string
}

export interface ContactPoint {
  name?: string
  email?: string
}

export interface Publisher {
  name?: string
  identifier?: string
}

/**
 * One accessible or downloadable representation of a dataset
 */
export interface Distribution {
  id?: string
  accessUrl?: string
  downloadUrl?: string
  /** Format code or EU file-type URI, e.g. `CSV` */
  format?: string
  mediaType?: string
  byteSize?: number
  license?: string
  /** Loader asserts the license was drawn from the DCAT-AP.de license vocabulary */
  licenseFromVocabulary?: boolean
  accessRights?: string
  /** Loader asserts the access rights were drawn from the EU access-right vocabulary */
  accessRightsFromVocabulary?: boolean
}

/**
 * Dataset metadata record
 */
export interface MetadataRecord {
  id: string
  title?: string
  tags?: readonly string[]
  themes?: readonly string[]
  spatial?: string
  temporal?: TemporalCoverage
  distributions?: readonly Distribution[]
  publisher?: Publisher
  contactPoint?: ContactPoint
  usageTerms?: string
  releaseDate?: string
  modificationDate?: string
  /** Application profile the record declares conformance to */
  conformsTo?: string
  /** Carried through for reports; not scored */
  landingPage?: string
}
