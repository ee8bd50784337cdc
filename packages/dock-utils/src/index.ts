export {
  ATOM_RECORD_LAYOUT,
  readField,
  readNumericField,
  readCoordinate,
  isCoordinateRecord,
  scanCoordinates
} from './recordLayout.js'
export type { FieldRange, CoordinateScan } from './recordLayout.js'

export {
  DEFAULT_BOX,
  DEFAULT_BOX_PARAMS,
  clampSize,
  computeBoundingBox,
  defaultBoxResult,
  manualBoxFor,
  boxFromReceptorText,
  formatBox
} from './boundingBox.js'

export {
  VINA_RESULT_PREFIX,
  parseBindingAffinity,
  parseModeTable,
  extractAffinity,
  scoreOf,
  formatAffinity
} from './resultParser.js'

export {
  PAIR_DELIMITER,
  POSE_SUFFIX,
  ARTIFACT_EXTENSIONS,
  InvalidIdentifierError,
  validateIdentifier,
  isValidIdentifier,
  pairStem,
  splitPairStem,
  artifactFileName,
  stemOf
} from './artifactNames.js'

export { noopLogger } from './logger.js'
