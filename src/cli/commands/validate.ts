/**
 * Validate command handler for the calseq CLI.
 *
 * Parses each request file and checks it against the configured
 * instrument setup.
 */

import { ParseError } from '../../request/parser.js';
import { loadExposureRequest } from '../../request/loader.js';
import {
  RequestValidationError,
  assertRequestValid,
  validateRequestAgainstInstrument,
} from '../../request/validator.js';
import type { ExposureRequest } from '../../request/types.js';
import { UsageError } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Parsed arguments of the validate command.
 */
export interface ValidateArgs {
  files: string[];
  /** Treat instrument warnings as failures. */
  strict: boolean;
}

/**
 * Parses command-line arguments for the validate command.
 *
 * @param args - Command-line arguments.
 * @returns Parsed options.
 * @throws UsageError for unknown options or when no file is given.
 */
export function parseValidateArgs(args: readonly string[]): ValidateArgs {
  const files: string[] = [];
  let strict = false;

  for (const arg of args) {
    if (arg === '--strict') {
      strict = true;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option for validate: ${arg}`, 'validate');
    } else {
      files.push(arg);
    }
  }

  if (files.length === 0) {
    throw new UsageError('validate needs at least one request file', 'validate');
  }

  return { files, strict };
}

/**
 * Handles the validate command.
 *
 * Every file is checked even after a failure. Output has one `OK` or
 * `FAIL` line per file, `WARN` lines for instrument warnings outside
 * strict mode, and a closing summary.
 *
 * @param context - The CLI context.
 * @returns Exit code 1 if any file failed.
 */
export async function handleValidateCommand(context: CliContext): Promise<CliCommandResult> {
  const { files, strict } = parseValidateArgs(context.args);
  const logger = context.logger.child('RequestLoader');
  const lines: string[] = [];
  let passed = 0;

  for (const file of files) {
    let request: ExposureRequest;
    try {
      request = await loadExposureRequest(file, { logger });
    } catch (error) {
      if (error instanceof ParseError) {
        lines.push(`FAIL ${error.message}`);
        continue;
      }
      throw error;
    }

    if (strict) {
      try {
        assertRequestValid(request, context.config, file);
      } catch (error) {
        if (error instanceof RequestValidationError) {
          lines.push(`FAIL ${error.message}`);
          continue;
        }
        throw error;
      }
    } else {
      const result = validateRequestAgainstInstrument(request, context.config);
      for (const warning of result.errors) {
        lines.push(`WARN ${file}: ${warning.field}: ${warning.message}`);
      }
    }

    lines.push(`OK   ${file}`);
    passed++;
  }

  lines.push(`${String(passed)} of ${String(files.length)} request file(s) valid`);

  return { exitCode: passed === files.length ? 0 : 1, message: lines.join('\n') };
}
