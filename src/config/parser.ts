/**
 * TOML configuration parser for calseq.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_FILTERS,
  DEFAULT_LAMPS,
  DEFAULT_LIMITS,
  DEFAULT_LOGGING,
  DEFAULT_SEQUENCE,
} from './defaults.js';
import type {
  Config,
  FilterConfig,
  LampConfig,
  LimitsConfig,
  LoggingConfig,
  SequenceConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/**
 * Reads an optional sub-table.
 *
 * @param value - Raw value of the section.
 * @param fieldPath - Path to the section for error messages.
 * @returns The table, or undefined if the section is absent.
 * @throws ConfigParseError if the section is present but not a table.
 */
function validateTable(value: unknown, fieldPath: string): Table | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected table`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated strings.
 * @throws ConfigParseError if value is not an array or holds a non-string.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) =>
    validateString(item, `${fieldPath}[${String(index)}]`)
  );
}

/**
 * Parses sequence defaults from raw TOML data.
 *
 * @param raw - Raw TOML object for the sequence section.
 * @returns Validated sequence configuration merged with defaults.
 */
function parseSequence(raw: Table | undefined): SequenceConfig {
  if (raw === undefined) {
    return { ...DEFAULT_SEQUENCE };
  }

  const result: SequenceConfig = { ...DEFAULT_SEQUENCE };

  if ('repeat_count' in raw) {
    result.repeat_count = validateNumber(raw.repeat_count, 'sequence.repeat_count');
  }
  if ('lamps_off' in raw) {
    result.lamps_off = validateBoolean(raw.lamps_off, 'sequence.lamps_off');
  }
  if ('no_exposure' in raw) {
    result.no_exposure = validateBoolean(raw.no_exposure, 'sequence.no_exposure');
  }

  return result;
}

/**
 * Parses limits from raw TOML data.
 *
 * @param raw - Raw TOML object for the limits section.
 * @returns Validated limits merged with defaults.
 */
function parseLimits(raw: Table | undefined): LimitsConfig {
  if (raw === undefined) {
    return { ...DEFAULT_LIMITS };
  }

  const result: LimitsConfig = { ...DEFAULT_LIMITS };

  if ('max_warm_up' in raw) {
    result.max_warm_up = validateNumber(raw.max_warm_up, 'limits.max_warm_up');
  }
  if ('max_exptime' in raw) {
    result.max_exptime = validateNumber(raw.max_exptime, 'limits.max_exptime');
  }

  return result;
}

function parseFilters(raw: Table | undefined): FilterConfig {
  if (raw === undefined) {
    return { ...DEFAULT_FILTERS };
  }

  const result: FilterConfig = { ...DEFAULT_FILTERS };

  if ('nd1_positions' in raw) {
    result.nd1_positions = validateStringArray(raw.nd1_positions, 'filters.nd1_positions');
  }
  if ('nd2_positions' in raw) {
    result.nd2_positions = validateStringArray(raw.nd2_positions, 'filters.nd2_positions');
  }

  return result;
}

/**
 * Parses lamp outlets from raw TOML data.
 *
 * A `[lamps.outlets]` table replaces the default outlet map as a whole, so
 * that a lamp can be removed by leaving it out.
 *
 * @param raw - Raw TOML object for the lamps section.
 * @returns Validated lamp configuration.
 */
function parseLamps(raw: Table | undefined): LampConfig {
  if (raw === undefined) {
    return { outlets: { ...DEFAULT_LAMPS.outlets } };
  }

  const outletsRaw = validateTable(raw.outlets, 'lamps.outlets');
  if (outletsRaw === undefined) {
    return { outlets: { ...DEFAULT_LAMPS.outlets } };
  }

  const outlets: Record<string, string> = {};
  for (const [lamp, outlet] of Object.entries(outletsRaw)) {
    outlets[lamp] = validateString(outlet, `lamps.outlets.${lamp}`);
  }
  return { outlets };
}

function parseLogging(raw: Table | undefined): LoggingConfig {
  if (raw === undefined) {
    return { ...DEFAULT_LOGGING };
  }

  const result: LoggingConfig = { ...DEFAULT_LOGGING };

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * import { parseConfig } from './config/parser.js';
 *
 * const config = parseConfig(`
 * [sequence]
 * repeat_count = 3
 * lamps_off = true
 * `);
 * console.log(config.sequence.repeat_count); // 3
 * console.log(config.limits.max_exptime); // 3600
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Table;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    sequence: parseSequence(validateTable(parsed.sequence, 'sequence')),
    limits: parseLimits(validateTable(parsed.limits, 'limits')),
    filters: parseFilters(validateTable(parsed.filters, 'filters')),
    lamps: parseLamps(validateTable(parsed.lamps, 'lamps')),
    logging: parseLogging(validateTable(parsed.logging, 'logging')),
  };
}

/**
 * Returns a copy of the default configuration.
 *
 * @returns Default configuration object.
 */
export function getDefaultConfig(): Config {
  return parseConfig('');
}
