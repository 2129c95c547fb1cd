export {
  KNOWN_FORMATS,
  OPEN_FORMATS,
  PROPRIETARY_FORMATS,
  MACHINE_READABLE_FORMATS,
  MEDIA_TYPE_FORMATS,
  canonicalFormat,
  formatForMediaType,
  type CanonicalFormat,
} from './formats.js'

export {
  DCAT_AP_DE_LICENSES,
  ACCESS_RIGHTS,
  isVocabularyLicense,
  isVocabularyAccessRight,
  classifyProfile,
  type ProfileConformance,
} from './rights.js'
