/**
 * Environment variable overrides for configuration.
 *
 * Provides support for CALSEQ_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type ScalarSection = 'sequence' | 'limits' | 'logging';

interface EnvMapping {
  readonly section: ScalarSection;
  readonly field: string;
  readonly type: 'number' | 'boolean';
  readonly description: string;
}

/**
 * Mapping from environment variable names to config paths.
 *
 * Format: CALSEQ_<SECTION>_<FIELD> maps to config.<section>.<field>.
 * CALSEQ_DEBUG is a shortcut for CALSEQ_LOGGING_DEBUG.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  CALSEQ_SEQUENCE_REPEAT_COUNT: {
    section: 'sequence',
    field: 'repeat_count',
    type: 'number',
    description: 'Override how many times the request files are repeated',
  },
  CALSEQ_SEQUENCE_LAMPS_OFF: {
    section: 'sequence',
    field: 'lamps_off',
    type: 'boolean',
    description: 'Power lamps off at the end of the sequence (true/false)',
  },
  CALSEQ_SEQUENCE_NO_EXPOSURE: {
    section: 'sequence',
    field: 'no_exposure',
    type: 'boolean',
    description: 'Leave out exposure start and readout steps (true/false)',
  },
  CALSEQ_LIMITS_MAX_WARM_UP: {
    section: 'limits',
    field: 'max_warm_up',
    type: 'number',
    description: 'Override the longest accepted warm-up in seconds',
  },
  CALSEQ_LIMITS_MAX_EXPTIME: {
    section: 'limits',
    field: 'max_exptime',
    type: 'number',
    description: 'Override the longest accepted exposure time in seconds',
  },
  CALSEQ_LOGGING_DEBUG: {
    section: 'logging',
    field: 'debug',
    type: 'boolean',
    description: 'Enable debug log entries (true/false)',
  },
  CALSEQ_DEBUG: {
    section: 'logging',
    field: 'debug',
    type: 'boolean',
    description: 'Enable debug log entries (shortcut for CALSEQ_LOGGING_DEBUG)',
  },
};

/**
 * Coerces a string value to a number.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Writes a coerced value into the partial config section it belongs to.
 */
function assignOverride(overrides: PartialConfig, mapping: EnvMapping, value: number | boolean): void {
  const section: Record<string, unknown> = { ...overrides[mapping.section] };
  section[mapping.field] = value;
  Object.assign(overrides, { [mapping.section]: section });
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Scans for CALSEQ_* environment variables and returns a partial
 * configuration object with the values to override. Where a shortcut and
 * its full name are both set, the one listed later wins.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @returns Partial configuration holding the overridden values.
 * @throws EnvCoercionError if a variable cannot be coerced to its type.
 *
 * @example
 * ```typescript
 * const overrides = readEnvOverrides({ CALSEQ_SEQUENCE_REPEAT_COUNT: '3' });
 * overrides.sequence?.repeat_count; // 3
 * ```
 */
export function readEnvOverrides(env: EnvRecord = process.env): PartialConfig {
  const overrides: PartialConfig = {};

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    const coerced =
      mapping.type === 'number' ? coerceToNumber(value, envVar) : coerceToBoolean(value, envVar);
    assignOverride(overrides, mapping, coerced);
  }

  return overrides;
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    sequence: {
      ...base.sequence,
      ...partial.sequence,
    },
    limits: {
      ...base.limits,
      ...partial.limits,
    },
    filters: {
      ...base.filters,
      ...partial.filters,
    },
    lamps: {
      ...base.lamps,
      ...partial.lamps,
    },
    logging: {
      ...base.logging,
      ...partial.logging,
    },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  return mergeConfig(config, readEnvOverrides(env));
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
