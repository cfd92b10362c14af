/**
 * CLI application context for calseq.
 */

import { loadConfig } from '../config/loader.js';
import type { EnvRecord } from '../config/env.js';
import { Logger } from '../utils/logger.js';
import { UsageError } from './errors.js';
import type { CliContext } from './types.js';

/**
 * Options for {@link createCliApp}.
 */
export interface CliAppOptions {
  /** Explicit calseq.toml path (from `--config`). */
  configPath?: string | undefined;
  /** Environment used for CALSEQ_* overrides. */
  env?: EnvRecord | undefined;
  /** Command being run, reported with usage errors. */
  command?: string | undefined;
}

/**
 * Splits the global `--config <path>` option from command arguments.
 *
 * @param args - Raw command arguments.
 * @param command - Command being run, for error reporting.
 * @returns The remaining arguments and the config path, if given.
 * @throws UsageError if `--config` has no value.
 */
export function extractConfigPath(
  args: readonly string[],
  command?: string
): {
  args: string[];
  configPath: string | undefined;
} {
  const rest: string[] = [];
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (arg === '--config' || arg === '-c') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new UsageError(`Option '${arg}' requires a file path`, command);
      }
      configPath = value;
      i++;
    } else if (arg.startsWith('--config=')) {
      configPath = arg.slice('--config='.length);
    } else {
      rest.push(arg);
    }
  }

  return { args: rest, configPath };
}

/**
 * Creates and initializes CLI application context.
 *
 * @param args - Command arguments, possibly including `--config <path>`.
 * @param options - Config path and environment overrides.
 * @returns A promise resolving to CLI context.
 */
export async function createCliApp(
  args: readonly string[],
  options: CliAppOptions = {}
): Promise<CliContext> {
  const extracted = extractConfigPath(args, options.command);
  const config = await loadConfig({
    path: extracted.configPath ?? options.configPath,
    env: options.env,
  });
  const logger = new Logger({ component: 'calseq', debugMode: config.logging.debug });
  logger.debug('config_loaded', {
    path: extracted.configPath ?? options.configPath ?? null,
    repeatCount: config.sequence.repeat_count,
  });

  return { args: extracted.args, config, logger };
}
