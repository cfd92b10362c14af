/**
 * Loads calseq.toml from disk and applies environment overrides.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/** File name looked up in the working directory when no path is given. */
export const DEFAULT_CONFIG_FILE = 'calseq.toml';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /**
   * Explicit config file path. When given, the file must exist; otherwise
   * {@link DEFAULT_CONFIG_FILE} is used if present.
   */
  path?: string | undefined;
  /** Environment to read overrides from (defaults to process.env). */
  env?: EnvRecord | undefined;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Loads, merges and validates the tool configuration.
 *
 * Precedence: env > config file > defaults.
 *
 * @param options - Where to read the config from.
 * @returns The validated configuration.
 * @throws ConfigParseError if the file cannot be read or parsed.
 * @throws ConfigValidationError if the merged values are invalid.
 * @throws EnvCoercionError if an environment override is malformed.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const filePath = options.path ?? DEFAULT_CONFIG_FILE;
  let base: Config;

  try {
    const content = await readFile(filePath, 'utf-8');
    base = parseConfig(content);
  } catch (error) {
    if (options.path === undefined && isMissingFile(error)) {
      base = getDefaultConfig();
    } else if (error instanceof ConfigParseError) {
      throw new ConfigParseError(`${filePath}: ${error.message}`, error);
    } else {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConfigParseError(`Cannot read config file '${filePath}': ${cause.message}`, cause);
    }
  }

  const config = applyEnvOverrides(base, options.env ?? process.env);
  assertConfigValid(config);
  return config;
}
