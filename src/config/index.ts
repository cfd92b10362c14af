/**
 * Configuration module for calseq.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  Config,
  FilterConfig,
  LampConfig,
  LimitsConfig,
  LoggingConfig,
  PartialConfig,
  SequenceConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_FILTERS,
  DEFAULT_LAMPS,
  DEFAULT_LIMITS,
  DEFAULT_LOGGING,
  DEFAULT_SEQUENCE,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvRecord } from './env.js';
export { DEFAULT_CONFIG_FILE, loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
