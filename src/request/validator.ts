/**
 * Semantic validation of exposure requests against the instrument setup.
 *
 * The parser guarantees a request is well-typed and in-domain. These checks
 * go further and compare it with the configured installation: which ND
 * filters are actually mounted, and how long a warm-up or exposure may be.
 *
 * @packageDocumentation
 */

import type { Config } from '../config/types.js';
import type { ValidationError, ValidationResult } from '../config/validator.js';
import type { ExposureRequest } from './types.js';

/**
 * Error thrown when a request fails semantic validation.
 */
export class RequestValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];
  /** File path or label of the request, if known. */
  public readonly source: string | undefined;

  /**
   * Creates a new RequestValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   * @param source - File path or label of the request.
   */
  constructor(message: string, errors: ValidationError[], source?: string) {
    super(message);
    this.name = 'RequestValidationError';
    this.errors = errors;
    this.source = source;
  }
}

function checkFilterInstalled(
  label: string,
  field: 'ND1' | 'ND2',
  positions: readonly string[],
  errors: ValidationError[]
): void {
  if (positions.length > 0 && !positions.includes(label)) {
    errors.push({
      field,
      value: label,
      message: `Filter '${label}' is not installed in the ${field} wheel. Installed: ${positions.join(', ')}`,
    });
  }
}

/**
 * Validates a request against the instrument configuration.
 *
 * @param request - A parsed exposure request.
 * @param config - The tool configuration.
 * @returns Validation result with any errors. Never throws.
 */
export function validateRequestAgainstInstrument(
  request: ExposureRequest,
  config: Config
): ValidationResult {
  const errors: ValidationError[] = [];

  checkFilterInstalled(request.ND1, 'ND1', config.filters.nd1_positions, errors);
  checkFilterInstalled(request.ND2, 'ND2', config.filters.nd2_positions, errors);

  if (request.WarmUp > config.limits.max_warm_up) {
    errors.push({
      field: 'WarmUp',
      value: request.WarmUp,
      message: `'WarmUp' exceeds the configured maximum of ${String(config.limits.max_warm_up)} s`,
    });
  }

  if (request.Exptime > config.limits.max_exptime) {
    errors.push({
      field: 'Exptime',
      value: request.Exptime,
      message: `'Exptime' exceeds the configured maximum of ${String(config.limits.max_exptime)} s`,
    });
  }

  if (!request.TriggerRed && !request.TriggerGreen && !request.TriggerCaHK) {
    errors.push({
      field: 'Trigger',
      value: false,
      message: 'No detector is triggered; exposures would record nothing',
    });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validates a request and throws if invalid.
 *
 * @param request - A parsed exposure request.
 * @param config - The tool configuration.
 * @param source - File path or label used in the error message.
 * @throws RequestValidationError if validation fails.
 */
export function assertRequestValid(
  request: ExposureRequest,
  config: Config,
  source?: string
): void {
  const result = validateRequestAgainstInstrument(request, config);

  if (!result.valid) {
    const prefix = source === undefined ? 'Request' : `Request ${source}`;
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new RequestValidationError(
      `${prefix} failed validation with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors,
      source
    );
  }
}
