/**
 * Canonical text form of an exposure request.
 *
 * @packageDocumentation
 */

import * as yaml from 'js-yaml';
import { CANONICAL_FIELD_ORDER, type ExposureRequest } from './types.js';

/**
 * Options for {@link formatExposureRequest}.
 */
export interface FormatOptions {
  /** Comment written as the first line, without the leading `#`. */
  header?: string | undefined;
}

/**
 * Serializes a request as `Key: value` lines in canonical field order.
 *
 * Every field is written, including false flags, so the output is a
 * complete request on its own. Parsing the output yields a record equal
 * to the input.
 *
 * @param request - The request to serialize.
 * @param options - Formatting options.
 * @returns The request file text, ending with a newline.
 */
export function formatExposureRequest(
  request: ExposureRequest,
  options: FormatOptions = {}
): string {
  const ordered = Object.fromEntries(
    CANONICAL_FIELD_ORDER.map((field) => [field, request[field]])
  );

  const body = yaml.dump(ordered, {
    schema: yaml.DEFAULT_SCHEMA,
    sortKeys: false,
    lineWidth: -1,
    noRefs: true,
  });

  if (options.header === undefined) {
    return body;
  }
  const header = options.header
    .split(/\r?\n/)
    .map((line) => (line.length > 0 ? `# ${line}` : '#'))
    .join('\n');
  return `${header}\n${body}`;
}
