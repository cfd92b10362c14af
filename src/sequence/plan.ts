/**
 * Dry-run calibration sequence plans.
 *
 * A plan lists, in order, every action the sequencer would take to run a set
 * of exposure requests: lamp power, warm-up, keyword writes and exposure
 * triggers. Building a plan has no side effects and touches no hardware.
 *
 * @packageDocumentation
 */

import { keywordName, toKeywordWrites, type KeywordWrite } from '../request/keywords.js';
import type { LoadedRequest } from '../request/types.js';

/**
 * Error raised when a plan cannot be built from the given inputs.
 */
export class PlanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlanError';
  }
}

/**
 * A single step of a sequence plan.
 */
export type PlanStep =
  | { readonly kind: 'power_on'; readonly lamp: string; readonly outlet: string }
  | { readonly kind: 'warm_up'; readonly seconds: number }
  | {
      readonly kind: 'select_request';
      readonly source: string;
      readonly repeat: number;
      readonly repeatCount: number;
      readonly index: number;
      readonly total: number;
    }
  | ({ readonly kind: 'keyword_write' } & KeywordWrite)
  | { readonly kind: 'wait_ready' }
  | { readonly kind: 'start_exposure'; readonly exposure: number; readonly total: number }
  | { readonly kind: 'wait_readout' }
  | { readonly kind: 'power_off'; readonly lamp: string; readonly outlet: string };

/**
 * Options for {@link buildSequencePlan}.
 */
export interface PlanOptions {
  /** Number of passes over the whole set of requests. */
  repeatCount: number;
  /** Whether lamps are powered off after the last pass. */
  lampsOff: boolean;
  /** Leave out exposure start and readout steps. */
  noExposure: boolean;
  /** Power outlet for each lamp with a switched supply. */
  outlets: Readonly<Record<string, string>>;
}

/**
 * A complete dry-run sequence plan.
 */
export interface SequencePlan {
  /** Lamps that are powered, in the order they are switched on. */
  readonly lamps: readonly string[];
  /** Longest warm-up among the requests, in seconds. */
  readonly warmUpSeconds: number;
  /** Total exposures triggered across all passes (0 with noExposure). */
  readonly exposureCount: number;
  readonly steps: readonly PlanStep[];
}

function poweredLamps(
  entries: readonly LoadedRequest[],
  outlets: Readonly<Record<string, string>>
): { lamp: string; outlet: string }[] {
  const seen = new Set<string>();
  const lamps: { lamp: string; outlet: string }[] = [];
  for (const { request } of entries) {
    const lamp = request.OctagonSource;
    const outlet = outlets[lamp];
    if (outlet !== undefined && !seen.has(lamp)) {
      seen.add(lamp);
      lamps.push({ lamp, outlet });
    }
  }
  return lamps;
}

/**
 * Builds the ordered plan for running a set of requests.
 *
 * Each distinct lamp with an outlet is powered on once up front and the
 * plan waits for the longest warm-up among all requests. Every pass then
 * applies each request's keywords, arms the triggered detectors once the
 * detectors are ready, and takes `nExp` exposures.
 *
 * @param entries - Requests in the order they run.
 * @param options - Plan options.
 * @returns The plan.
 * @throws PlanError if there are no requests or the repeat count is not a positive integer.
 */
export function buildSequencePlan(
  entries: readonly LoadedRequest[],
  options: PlanOptions
): SequencePlan {
  if (entries.length === 0) {
    throw new PlanError('At least one request is required to build a plan');
  }
  if (!Number.isInteger(options.repeatCount) || options.repeatCount < 1) {
    throw new PlanError(
      `Repeat count must be a positive integer, got ${String(options.repeatCount)}`
    );
  }

  const steps: PlanStep[] = [];
  const lamps = poweredLamps(entries, options.outlets);
  const warmUpSeconds = Math.max(...entries.map(({ request }) => request.WarmUp));
  let exposureCount = 0;

  for (const { lamp, outlet } of lamps) {
    steps.push({ kind: 'power_on', lamp, outlet });
  }
  steps.push({ kind: 'warm_up', seconds: warmUpSeconds });

  for (let repeat = 1; repeat <= options.repeatCount; repeat++) {
    entries.forEach(({ source, request }, index) => {
      steps.push({
        kind: 'select_request',
        source,
        repeat,
        repeatCount: options.repeatCount,
        index: index + 1,
        total: entries.length,
      });

      const writes = toKeywordWrites(request);
      const trigger = writes.filter((write) => write.keyword === 'TRIG_TARG');
      for (const write of writes.filter((w) => w.keyword !== 'TRIG_TARG')) {
        steps.push({ kind: 'keyword_write', ...write });
      }
      steps.push({ kind: 'wait_ready' });
      for (const write of trigger) {
        steps.push({ kind: 'keyword_write', ...write });
      }

      for (let exposure = 1; exposure <= request.nExp; exposure++) {
        steps.push({ kind: 'wait_ready' });
        if (!options.noExposure) {
          steps.push({ kind: 'start_exposure', exposure, total: request.nExp });
          steps.push({ kind: 'wait_readout' });
          exposureCount++;
        }
      }
    });
  }

  if (options.lampsOff) {
    for (const { lamp, outlet } of lamps) {
      steps.push({ kind: 'power_off', lamp, outlet });
    }
  }
  steps.push({ kind: 'wait_ready' });

  return {
    lamps: lamps.map(({ lamp }) => lamp),
    warmUpSeconds,
    exposureCount,
    steps,
  };
}

/**
 * Describes a plan step as one line of text.
 *
 * @param step - The step to describe.
 * @returns Human-readable description.
 */
export function describeStep(step: PlanStep): string {
  switch (step.kind) {
    case 'power_on':
      return `Power on ${step.lamp} (kpfpower.${step.outlet})`;
    case 'warm_up':
      return `Wait ${String(step.seconds)} s for lamps to warm up`;
    case 'select_request':
      return `Repeat ${String(step.repeat)}/${String(step.repeatCount)}: request ${String(step.index)}/${String(step.total)} (${step.source})`;
    case 'keyword_write':
      return `Set ${keywordName(step)} = '${String(step.value)}'`;
    case 'wait_ready':
      return 'Wait for detectors to be ready';
    case 'start_exposure':
      return `Start exposure ${String(step.exposure)}/${String(step.total)}`;
    case 'wait_readout':
      return 'Wait for readout to begin';
    case 'power_off':
      return `Power off ${step.lamp} (kpfpower.${step.outlet})`;
  }
}

/**
 * Renders a plan as numbered lines.
 *
 * @param plan - The plan to render.
 * @returns One line per step, numbered from 1.
 */
export function formatPlan(plan: SequencePlan): string[] {
  const width = String(plan.steps.length).length;
  return plan.steps.map(
    (step, index) => `${String(index + 1).padStart(width, ' ')}. ${describeStep(step)}`
  );
}
