/**
 * Reads exposure request files from disk.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import type { Logger } from '../utils/logger.js';
import { ParseError, parseExposureRequest } from './parser.js';
import type { ExposureRequest, LoadedRequest } from './types.js';

/**
 * Options for the request loaders.
 */
export interface LoadRequestOptions {
  /** Logger for load events. Nothing is logged when omitted. */
  logger?: Logger | undefined;
}

/**
 * Reads and parses a single request file.
 *
 * A file that cannot be read is reported as a {@link ParseError} naming
 * the file, so callers handle one error type for every unusable request.
 *
 * @param filePath - Path of the request file.
 * @param options - Loader options.
 * @returns The validated request.
 * @throws ParseError if the file is missing, unreadable or invalid.
 */
export async function loadExposureRequest(
  filePath: string,
  options: LoadRequestOptions = {}
): Promise<ExposureRequest> {
  const { logger } = options;
  let text: string;

  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    logger?.error('request_unreadable', { source: filePath, error: cause.message });
    throw new ParseError(`Cannot read request file: ${cause.message}`, {
      source: filePath,
      cause,
    });
  }

  try {
    const request = parseExposureRequest(text, { source: filePath });
    logger?.debug('request_loaded', {
      source: filePath,
      octagonSource: request.OctagonSource,
      exptime: request.Exptime,
      nExp: request.nExp,
    });
    return request;
  } catch (error) {
    if (error instanceof ParseError) {
      logger?.error('request_rejected', {
        source: filePath,
        field: error.field,
        line: error.line,
        reason: error.reason,
      });
    }
    throw error;
  }
}

/**
 * Reads and parses several request files, in order.
 *
 * Loading stops at the first invalid file: a sequence is never run with
 * part of its requests.
 *
 * @param filePaths - Paths of the request files.
 * @param options - Loader options.
 * @returns The requests paired with their file paths.
 * @throws ParseError for the first missing, unreadable or invalid file.
 */
export async function loadExposureRequests(
  filePaths: readonly string[],
  options: LoadRequestOptions = {}
): Promise<LoadedRequest[]> {
  const loaded: LoadedRequest[] = [];
  for (const source of filePaths) {
    loaded.push({ source, request: await loadExposureRequest(source, options) });
  }
  options.logger?.info('requests_loaded', { count: loaded.length });
  return loaded;
}
