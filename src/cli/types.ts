/**
 * CLI types and interfaces for the calseq command line.
 */

import type { Config } from '../config/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command arguments, without the command name and global options.
   */
  args: string[];

  /**
   * Tool configuration (defaults, calseq.toml and CALSEQ_* overrides).
   */
  config: Config;

  /**
   * Logger for structured diagnostics on stderr.
   */
  logger: Logger;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
