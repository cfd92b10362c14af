/**
 * Format command handler for the calseq CLI.
 *
 * Prints a request file in canonical form.
 */

import { loadExposureRequest } from '../../request/loader.js';
import { formatExposureRequest } from '../../request/serializer.js';
import { UsageError } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Handles the format command.
 *
 * @param context - The CLI context.
 * @returns The canonical request text as the result message.
 * @throws UsageError unless exactly one file is given.
 */
export async function handleFormatCommand(context: CliContext): Promise<CliCommandResult> {
  const options = context.args.filter((arg) => arg.startsWith('-'));
  const files = context.args.filter((arg) => !arg.startsWith('-'));
  if (options[0] !== undefined) {
    throw new UsageError(`Unknown option for format: ${options[0]}`, 'format');
  }
  const file = files[0];
  if (file === undefined || files.length > 1) {
    throw new UsageError('format needs exactly one request file', 'format');
  }

  const request = await loadExposureRequest(file, {
    logger: context.logger.child('RequestLoader'),
  });
  const text = formatExposureRequest(request);

  return { exitCode: 0, message: text.endsWith('\n') ? text.slice(0, -1) : text };
}
