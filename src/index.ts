/**
 * calseq
 *
 * Loader, validator and dry-run planner for spectrograph calibration
 * exposure requests.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './request/index.js';
export * from './sequence/index.js';
export {
  ConfigParseError,
  ConfigValidationError,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  EnvCoercionError,
  applyEnvOverrides,
  assertConfigValid,
  getDefaultConfig,
  getEnvVarDocumentation,
  loadConfig,
  parseConfig,
  readEnvOverrides,
  validateConfig,
} from './config/index.js';
export type {
  Config,
  EnvRecord,
  LoadConfigOptions,
  PartialConfig,
  ValidationError,
  ValidationResult,
} from './config/index.js';
export { Logger, logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
