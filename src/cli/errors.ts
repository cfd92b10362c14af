/**
 * Error suggestion system for the calseq CLI.
 *
 * Provides contextual suggestions based on error types to help users
 * resolve issues quickly.
 *
 * @packageDocumentation
 */

import { ConfigParseError } from '../config/parser.js';
import { ConfigValidationError } from '../config/validator.js';
import { EnvCoercionError } from '../config/env.js';
import { ParseError } from '../request/parser.js';
import { RequestValidationError } from '../request/validator.js';
import { PlanError } from '../sequence/plan.js';

/**
 * Error types the CLI distinguishes when suggesting a fix.
 */
export type ErrorType =
  | 'request_parse'
  | 'request_rejected'
  | 'config'
  | 'environment'
  | 'plan'
  | 'usage'
  | 'unknown';

/**
 * Error thrown for malformed command lines.
 */
export class UsageError extends Error {
  /** Command whose arguments were rejected, if known. */
  public readonly command: string | undefined;

  /**
   * Creates a new UsageError.
   *
   * @param message - What is wrong with the arguments.
   * @param command - The command being run.
   */
  constructor(message: string, command?: string) {
    super(message);
    this.name = 'UsageError';
    this.command = command;
  }
}

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Display options for error output.
 */
export interface DisplayOptions {
  /** Whether ANSI colors are written. */
  colors: boolean;
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  request_parse: [
    { text: 'Check the key and value on the line named in the message' },
    {
      text: 'Booleans must be spelled true, True, TRUE, false, False or FALSE',
    },
    {
      text: 'Compare with a canonical request file',
      action: 'calseq format <known-good-file>',
    },
  ],

  request_rejected: [
    { text: 'Check the installed ND filters and limits in calseq.toml' },
    {
      text: 'Run without --strict to see these as warnings only',
      action: 'calseq validate <file...>',
    },
  ],

  config: [
    { text: 'Check calseq.toml for typos and wrong value types' },
    {
      text: 'Point at a different configuration file',
      action: 'calseq <command> --config <path>',
    },
  ],

  environment: [
    { text: 'Check the CALSEQ_* environment variables' },
    { text: 'Booleans accept true/1/yes/on and false/0/no/off' },
  ],

  plan: [{ text: 'Pass at least one request file and a repeat count of 1 or more' }],

  usage: [{ text: 'Show usage information', action: 'calseq help <command>' }],

  unknown: [
    {
      text: 'Run again with debug logging enabled',
      action: 'CALSEQ_DEBUG=true calseq <command>',
    },
  ],
};

/**
 * Classifies an error for suggestion lookup.
 *
 * @param error - The thrown value.
 * @returns The identified error type.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof ParseError) {
    return 'request_parse';
  }
  if (error instanceof RequestValidationError) {
    return 'request_rejected';
  }
  if (error instanceof ConfigParseError || error instanceof ConfigValidationError) {
    return 'config';
  }
  if (error instanceof EnvCoercionError) {
    return 'environment';
  }
  if (error instanceof PlanError) {
    return 'plan';
  }
  if (error instanceof UsageError) {
    return 'usage';
  }
  return 'unknown';
}

/**
 * Gets suggestions for a given error type.
 *
 * @param errorType - The type of error.
 * @returns Array of suggestions.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText =
    suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats an error with contextual suggestions.
 *
 * The first line is always `Error: <message>`.
 *
 * @param error - The thrown value.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  error: unknown,
  options: DisplayOptions = { colors: false }
): string {
  const message = error instanceof Error ? error.message : String(error);
  const suggestions = getSuggestions(classifyError(error));

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';

  let result = `${redCode}Error:${resetCode} ${message}`;

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}
