/**
 * Semantic validation for configuration values.
 *
 * Validates that configuration values are semantically correct beyond just type checking:
 * - The repeat count is a positive integer
 * - Limits are positive and finite
 * - ND wheel positions are well-formed filter labels
 * - Lamp outlets belong to known octagon sources
 *
 * @packageDocumentation
 */

import { isNdFilterLabel } from '../request/parser.js';
import { isOctagonSource } from '../request/types.js';
import type { Config, LimitsConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Validates that a value is a positive integer.
 *
 * @param value - The value to validate.
 * @param fieldPath - The field path for error reporting.
 * @param errors - Array to accumulate errors into.
 */
function validatePositiveInteger(
  value: number,
  fieldPath: string,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a positive integer, got ${String(value)}`,
    });
  }
}

/**
 * Validates that a value is a finite number greater than zero.
 *
 * @param value - The value to validate.
 * @param fieldPath - The field path for error reporting.
 * @param errors - Array to accumulate errors into.
 */
function validatePositiveFinite(value: number, fieldPath: string, errors: ValidationError[]): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a finite positive number, got ${String(value)}`,
    });
  }
}

function validateLimits(limits: LimitsConfig, errors: ValidationError[]): void {
  validatePositiveFinite(limits.max_warm_up, 'limits.max_warm_up', errors);
  validatePositiveFinite(limits.max_exptime, 'limits.max_exptime', errors);
}

/**
 * Validates ND wheel position labels.
 *
 * @param positions - Labels installed in one wheel.
 * @param fieldPath - The field path for error reporting.
 * @param errors - Array to accumulate errors into.
 */
function validatePositions(
  positions: readonly string[],
  fieldPath: string,
  errors: ValidationError[]
): void {
  positions.forEach((label, index) => {
    if (!isNdFilterLabel(label)) {
      errors.push({
        field: `${fieldPath}[${String(index)}]`,
        value: label,
        message: `Invalid filter label '${label}': expected a label like 'OD 0.1'`,
      });
    }
  });
}

function validateOutlets(outlets: Readonly<Record<string, string>>, errors: ValidationError[]): void {
  for (const [lamp, outlet] of Object.entries(outlets)) {
    if (!isOctagonSource(lamp)) {
      errors.push({
        field: `lamps.outlets.${lamp}`,
        value: lamp,
        message: `Unknown octagon source '${lamp}'`,
      });
    }
    if (outlet.trim().length === 0) {
      errors.push({
        field: `lamps.outlets.${lamp}`,
        value: outlet,
        message: `Outlet for '${lamp}' must not be empty`,
      });
    }
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validatePositiveInteger(config.sequence.repeat_count, 'sequence.repeat_count', errors);
  validateLimits(config.limits, errors);
  validatePositions(config.filters.nd1_positions, 'filters.nd1_positions', errors);
  validatePositions(config.filters.nd2_positions, 'filters.nd2_positions', errors);
  validateOutlets(config.lamps.outlets, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
