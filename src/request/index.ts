/**
 * Calibration exposure requests: parsing, serialization, keyword encoding
 * and semantic validation.
 *
 * @packageDocumentation
 */

export {
  ParseError,
  parseExposureRequest,
  parseBooleanToken,
  isNdFilterLabel,
  TRUE_TOKENS,
  FALSE_TOKENS,
} from './parser.js';
export type { ParseErrorDetails, ParseOptions } from './parser.js';
export { formatExposureRequest } from './serializer.js';
export type { FormatOptions } from './serializer.js';
export {
  EXPTIME_TOLERANCE,
  SOURCE_SELECT_SHUTTERS,
  TIMED_SHUTTERS,
  TRIGGERED_DETECTORS,
  encodeSourceSelectShutters,
  encodeTimedShutters,
  encodeTriggeredDetectors,
  formatMismatch,
  keywordName,
  toKeywordWrites,
  verifyKeywordReadback,
} from './keywords.js';
export type {
  KeywordService,
  KeywordSnapshot,
  KeywordWrite,
  ReadbackMismatch,
} from './keywords.js';
export {
  RequestValidationError,
  assertRequestValid,
  validateRequestAgainstInstrument,
} from './validator.js';
export { loadExposureRequest, loadExposureRequests } from './loader.js';
export type { LoadRequestOptions } from './loader.js';
export {
  BOOLEAN_FIELDS,
  CANONICAL_FIELD_ORDER,
  OCTAGON_SOURCES,
  REQUIRED_FIELDS,
  SOURCE_SELECT_SHUTTER_FIELDS,
  TIMED_SHUTTER_FIELDS,
  TRIGGER_FIELDS,
  isOctagonSource,
  isRequestField,
} from './types.js';
export type {
  BooleanField,
  ExposureRequest,
  LoadedRequest,
  NdFilterLabel,
  OctagonSource,
  RequestField,
  SourceSelectShutterField,
  TimedShutterField,
  TriggerField,
} from './types.js';
