/**
 * Instrument keyword encoding of exposure requests.
 *
 * The instrument-control system is driven through named keywords grouped by
 * service (`kpfmot.OCTAGON`, `kpfexpose.SRC_SHUTTERS`, ...). This module
 * computes the keyword values that apply a request and compares values read
 * back from the instrument against it. Nothing here talks to hardware.
 *
 * @packageDocumentation
 */

import type {
  ExposureRequest,
  SourceSelectShutterField,
  TimedShutterField,
  TriggerField,
} from './types.js';

/**
 * Keyword service names.
 */
export type KeywordService = 'kpfmot' | 'kpfexpose' | 'kpfpower';

/**
 * A single keyword write.
 */
export interface KeywordWrite {
  readonly service: KeywordService;
  readonly keyword: string;
  readonly value: string | number;
}

/**
 * Keyword values read back from the instrument, keyed by `service.KEYWORD`.
 */
export type KeywordSnapshot = Readonly<Record<string, string | number | undefined>>;

/**
 * A disagreement between a request and the instrument state.
 */
export interface ReadbackMismatch {
  /** `service.KEYWORD` that disagreed. */
  readonly keyword: string;
  /** What the mismatch concerns, e.g. `Sky select shutter`. */
  readonly subject: string;
  readonly expected: string | number | boolean;
  readonly actual: string | number | boolean;
}

/** Tolerance in seconds when comparing exposure times. */
export const EXPTIME_TOLERANCE = 0.1;

interface ListMember<F extends string> {
  readonly field: F;
  readonly token: string;
  readonly subject: string;
}

/**
 * Source select shutters, in the order they are listed in `SRC_SHUTTERS`.
 */
export const SOURCE_SELECT_SHUTTERS: readonly ListMember<SourceSelectShutterField>[] = [
  { field: 'SSS_Science', token: 'SciSelect', subject: 'Science select shutter' },
  { field: 'SSS_Sky', token: 'SkySelect', subject: 'Sky select shutter' },
  { field: 'SSS_SoCalSci', token: 'SoCalSci', subject: 'SoCalSci select shutter' },
  { field: 'SSS_SoCalCal', token: 'SoCalCal', subject: 'SoCalCal select shutter' },
  { field: 'SSS_CalSciSky', token: 'Cal_SciSky', subject: 'Cal_SciSky select shutter' },
];

/**
 * Timed shutters, in the order they are listed in `TIMED_SHUTTERS`.
 */
export const TIMED_SHUTTERS: readonly ListMember<TimedShutterField>[] = [
  { field: 'TS_Scrambler', token: 'Scrambler', subject: 'Scrambler timed shutter' },
  { field: 'TS_SimulCal', token: 'SimulCal', subject: 'SimulCal timed shutter' },
  { field: 'TS_FF_Fiber', token: 'FF_Fiber', subject: 'FF_Fiber timed shutter' },
  { field: 'TS_CaHK', token: 'Ca_HK', subject: 'Ca_HK timed shutter' },
];

/**
 * Detectors, in the order they are listed in `TRIG_TARG`.
 */
export const TRIGGERED_DETECTORS: readonly ListMember<TriggerField>[] = [
  { field: 'TriggerRed', token: 'Red', subject: 'Red detector trigger' },
  { field: 'TriggerGreen', token: 'Green', subject: 'Green detector trigger' },
  { field: 'TriggerCaHK', token: 'Ca_HK', subject: 'Ca HK detector trigger' },
];

function encodeList<F extends keyof ExposureRequest>(
  request: ExposureRequest,
  members: readonly ListMember<F>[]
): string {
  return members
    .filter((member) => request[member.field] === true)
    .map((member) => member.token)
    .join(',');
}

/**
 * Encodes the `SRC_SHUTTERS` value for a request.
 */
export function encodeSourceSelectShutters(request: ExposureRequest): string {
  return encodeList(request, SOURCE_SELECT_SHUTTERS);
}

/**
 * Encodes the `TIMED_SHUTTERS` value for a request.
 */
export function encodeTimedShutters(request: ExposureRequest): string {
  return encodeList(request, TIMED_SHUTTERS);
}

/**
 * Encodes the `TRIG_TARG` value for a request.
 */
export function encodeTriggeredDetectors(request: ExposureRequest): string {
  return encodeList(request, TRIGGERED_DETECTORS);
}

/**
 * Computes the keyword writes that apply a request, in the order the
 * sequencer issues them.
 *
 * The detector trigger list comes last: it is written only once the
 * detectors are ready for the next exposure.
 *
 * @param request - A validated exposure request.
 * @returns Ordered keyword writes.
 */
export function toKeywordWrites(request: ExposureRequest): KeywordWrite[] {
  return [
    { service: 'kpfmot', keyword: 'OCTAGON', value: request.OctagonSource },
    {
      service: 'kpfexpose',
      keyword: 'SRC_SHUTTERS',
      value: encodeSourceSelectShutters(request),
    },
    { service: 'kpfexpose', keyword: 'TIMED_SHUTTERS', value: encodeTimedShutters(request) },
    { service: 'kpfmot', keyword: 'ND1POS', value: request.ND1 },
    { service: 'kpfmot', keyword: 'ND2POS', value: request.ND2 },
    { service: 'kpfexpose', keyword: 'EXPOSURE', value: request.Exptime },
    { service: 'kpfexpose', keyword: 'TRIG_TARG', value: encodeTriggeredDetectors(request) },
  ];
}

/**
 * Formats a write as `service.KEYWORD`.
 */
export function keywordName(write: Pick<KeywordWrite, 'service' | 'keyword'>): string {
  return `${write.service}.${write.keyword}`;
}

function compareList<F extends keyof ExposureRequest>(
  request: ExposureRequest,
  members: readonly ListMember<F>[],
  keyword: string,
  raw: string | number | undefined,
  mismatches: ReadbackMismatch[]
): void {
  if (raw === undefined) {
    return;
  }
  const present = new Set(
    String(raw)
      .split(',')
      .map((token) => token.trim())
      .filter((token) => token.length > 0)
  );
  for (const member of members) {
    const expected = request[member.field] === true;
    const actual = present.has(member.token);
    if (expected !== actual) {
      mismatches.push({ keyword, subject: member.subject, expected, actual });
    }
  }
}

function compareValue(
  keyword: string,
  subject: string,
  expected: string,
  raw: string | number | undefined,
  mismatches: ReadbackMismatch[]
): void {
  if (raw === undefined) {
    return;
  }
  const actual = String(raw);
  if (actual !== expected) {
    mismatches.push({ keyword, subject, expected, actual });
  }
}

/**
 * Compares keyword values read back from the instrument against a request.
 *
 * Keywords missing from the snapshot are not checked. Exposure time is
 * compared within {@link EXPTIME_TOLERANCE}.
 *
 * @param request - The request that was applied.
 * @param snapshot - Keyword values keyed by `service.KEYWORD`.
 * @returns One entry per disagreeing field; empty when the state matches.
 */
export function verifyKeywordReadback(
  request: ExposureRequest,
  snapshot: KeywordSnapshot
): ReadbackMismatch[] {
  const mismatches: ReadbackMismatch[] = [];

  compareValue(
    'kpfmot.OCTAGON',
    'Octagon position',
    request.OctagonSource,
    snapshot['kpfmot.OCTAGON'],
    mismatches
  );
  compareList(
    request,
    SOURCE_SELECT_SHUTTERS,
    'kpfexpose.SRC_SHUTTERS',
    snapshot['kpfexpose.SRC_SHUTTERS'],
    mismatches
  );
  compareList(
    request,
    TIMED_SHUTTERS,
    'kpfexpose.TIMED_SHUTTERS',
    snapshot['kpfexpose.TIMED_SHUTTERS'],
    mismatches
  );
  compareValue('kpfmot.ND1POS', 'ND1 position', request.ND1, snapshot['kpfmot.ND1POS'], mismatches);
  compareValue('kpfmot.ND2POS', 'ND2 position', request.ND2, snapshot['kpfmot.ND2POS'], mismatches);

  const exposure = snapshot['kpfexpose.EXPOSURE'];
  if (exposure !== undefined) {
    const actual = Number(exposure);
    if (!Number.isFinite(actual) || Math.abs(actual - request.Exptime) > EXPTIME_TOLERANCE) {
      mismatches.push({
        keyword: 'kpfexpose.EXPOSURE',
        subject: 'Exposure time',
        expected: request.Exptime,
        actual: exposure,
      });
    }
  }

  compareList(
    request,
    TRIGGERED_DETECTORS,
    'kpfexpose.TRIG_TARG',
    snapshot['kpfexpose.TRIG_TARG'],
    mismatches
  );

  return mismatches;
}

/**
 * Formats a mismatch as a one-line message.
 */
export function formatMismatch(mismatch: ReadbackMismatch): string {
  return `Final ${mismatch.subject} mismatch (${mismatch.keyword}): ${String(mismatch.actual)} != ${String(mismatch.expected)}`;
}
