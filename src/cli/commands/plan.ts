/**
 * Plan command handler for the calseq CLI.
 *
 * Loads request files and prints the dry-run sequence that would run them.
 */

import { loadExposureRequests } from '../../request/loader.js';
import { validateRequestAgainstInstrument } from '../../request/validator.js';
import { buildSequencePlan, formatPlan, type PlanOptions } from '../../sequence/plan.js';
import { UsageError } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Parsed arguments of the plan command. Unset values fall back to the
 * `[sequence]` configuration.
 */
export interface PlanArgs {
  files: string[];
  repeatCount: number | undefined;
  lampsOff: boolean;
  noExposure: boolean;
  json: boolean;
}

function parseCount(value: string | undefined, option: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new UsageError(`Option '${option}' requires a whole number`, 'plan');
  }
  return Number.parseInt(value, 10);
}

/**
 * Parses command-line arguments for the plan command.
 *
 * @param args - Command-line arguments.
 * @returns Parsed options.
 * @throws UsageError for unknown or incomplete options, or when no file is given.
 */
export function parsePlanArgs(args: readonly string[]): PlanArgs {
  const files: string[] = [];
  let repeatCount: number | undefined;
  let lampsOff = false;
  let noExposure = false;
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (arg === '-n' || arg === '--repeat') {
      repeatCount = parseCount(args[i + 1], arg);
      i++;
    } else if (arg === '--lampsoff' || arg === '--off') {
      lampsOff = true;
    } else if (arg === '--noexp') {
      noExposure = true;
    } else if (arg === '--json') {
      json = true;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option for plan: ${arg}`, 'plan');
    } else {
      files.push(arg);
    }
  }

  if (files.length === 0) {
    throw new UsageError('plan needs at least one request file', 'plan');
  }

  return { files, repeatCount, lampsOff, noExposure, json };
}

/**
 * Handles the plan command.
 *
 * Instrument warnings are logged and do not stop the plan.
 *
 * @param context - The CLI context.
 * @returns The rendered plan as the result message.
 */
export async function handlePlanCommand(context: CliContext): Promise<CliCommandResult> {
  const args = parsePlanArgs(context.args);
  const { config } = context;
  const logger = context.logger.child('SequencePlanner');

  const entries = await loadExposureRequests(args.files, {
    logger: context.logger.child('RequestLoader'),
  });

  for (const { source, request } of entries) {
    for (const warning of validateRequestAgainstInstrument(request, config).errors) {
      logger.warn('request_warning', { source, field: warning.field, message: warning.message });
    }
  }

  const options: PlanOptions = {
    repeatCount: args.repeatCount ?? config.sequence.repeat_count,
    lampsOff: args.lampsOff || config.sequence.lamps_off,
    noExposure: args.noExposure || config.sequence.no_exposure,
    outlets: config.lamps.outlets,
  };
  const plan = buildSequencePlan(entries, options);
  logger.info('plan_built', {
    requests: entries.length,
    steps: plan.steps.length,
    exposures: plan.exposureCount,
  });

  if (args.json) {
    return { exitCode: 0, message: JSON.stringify(plan, null, 2) };
  }

  const lamps = plan.lamps.length > 0 ? plan.lamps.join(', ') : 'none';
  const summary = `${String(plan.steps.length)} steps, ${String(plan.exposureCount)} exposure(s), lamps: ${lamps}`;
  return { exitCode: 0, message: [...formatPlan(plan), summary].join('\n') };
}
