/**
 * Reusability indicators (75 points)
 */

import { isValidEmail, presentValue } from '../../validation/field-validators.js'
import { isVocabularyAccessRight, isVocabularyLicense } from '../../vocabularies/index.js'
import { award, deny, type DistributionIndicator, type RecordIndicator } from '../types.js'

export const license: DistributionIndicator = {
  id: 'license',
  name: 'License',
  field: 'dct:license',
  maxPoints: 20,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const value = presentValue(distribution.license)
    return value === undefined ? deny('No license') : award(maxPoints, `License ${value}`)
  },
}

export const licenseVocabulary: DistributionIndicator = {
  id: 'license-vocabulary',
  name: 'License from vocabulary',
  field: 'dct:license',
  maxPoints: 10,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const value = presentValue(distribution.license)
    if (value === undefined) return deny('No license')
    if (distribution.licenseFromVocabulary === true) {
      return award(maxPoints, 'License declared as a vocabulary entry')
    }
    return isVocabularyLicense(value)
      ? award(maxPoints, `${value} is in the DCAT-AP.de license vocabulary`)
      : deny(`${value} is not in the DCAT-AP.de license vocabulary`)
  },
}

export const accessRights: DistributionIndicator = {
  id: 'access-rights',
  name: 'Access rights',
  field: 'dct:accessRights',
  maxPoints: 10,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const value = presentValue(distribution.accessRights)
    return value === undefined
      ? deny('No access rights')
      : award(maxPoints, `Access rights ${value}`)
  },
}

export const accessRightsVocabulary: DistributionIndicator = {
  id: 'access-rights-vocabulary',
  name: 'Access rights from vocabulary',
  field: 'dct:accessRights',
  maxPoints: 5,
  scope: 'distribution',
  evaluate(distribution, _context, maxPoints) {
    const value = presentValue(distribution.accessRights)
    if (value === undefined) return deny('No access rights')
    if (distribution.accessRightsFromVocabulary === true) {
      return award(maxPoints, 'Access rights declared as a vocabulary entry')
    }
    return isVocabularyAccessRight(value)
      ? award(maxPoints, `${value} is an EU access-right code`)
      : deny(`${value} is not an EU access-right code`)
  },
}

export const contactPoint: RecordIndicator = {
  id: 'contact-point',
  name: 'Contact point',
  field: 'dcat:contactPoint',
  maxPoints: 20,
  scope: 'record',
  evaluate({ record }, maxPoints) {
    const name = presentValue(record.contactPoint?.name)
    const email = presentValue(record.contactPoint?.email)
    if (name === undefined && email === undefined) return deny('No contact point')
    if (email !== undefined && !isValidEmail(email)) {
      return deny(`Invalid contact email "${email}"`)
    }
    return award(maxPoints, 'Contact point present')
  },
}

export const publisher: RecordIndicator = {
  id: 'publisher',
  name: 'Publisher',
  field: 'dct:publisher',
  maxPoints: 10,
  scope: 'record',
  evaluate({ record }, maxPoints) {
    const name =
      presentValue(record.publisher?.name) ?? presentValue(record.publisher?.identifier)
    return name === undefined ? deny('No publisher') : award(maxPoints, `Publisher ${name}`)
  },
}

export const REUSABILITY_INDICATORS = [
  license,
  licenseVocabulary,
  accessRights,
  accessRightsVocabulary,
  contactPoint,
  publisher,
]
