/**
 * Dry-run calibration sequence planning.
 *
 * @packageDocumentation
 */

export { PlanError, buildSequencePlan, describeStep, formatPlan } from './plan.js';
export type { PlanOptions, PlanStep, SequencePlan } from './plan.js';
