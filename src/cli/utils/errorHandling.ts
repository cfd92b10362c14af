/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper function that standardizes error handling
 * across command handlers, reducing code duplication.
 */

import { formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult } from '../types.js';

/**
 * Runs a command handler and converts a thrown error into a failed result.
 *
 * The error and its suggestions are printed to stderr.
 *
 * @param fn - The function to run (sync or async).
 * @returns The handler's result, or exit code 1 if it threw.
 */
export async function runCommand(
  fn: () => CliCommandResult | Promise<CliCommandResult>
): Promise<CliCommandResult> {
  try {
    return await fn();
  } catch (error) {
    console.error(formatErrorWithSuggestions(error, { colors: process.stderr.isTTY === true }));
    return { exitCode: 1 };
  }
}

/**
 * Wraps a command handler with standard error handling.
 *
 * Executes the provided function (sync or async) and exits with its exit
 * code, or with 1 after printing the error if it throws.
 *
 * @param fn - The function to wrap (sync or async).
 */
export function withErrorHandling(fn: () => CliCommandResult | Promise<CliCommandResult>): void {
  void runCommand(fn).then((result) => {
    if (result.message !== undefined) {
      console.log(result.message);
    }
    process.exit(result.exitCode);
  });
}
