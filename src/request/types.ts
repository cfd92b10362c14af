/**
 * Types for calibration exposure request files.
 *
 * An exposure request is a flat `Key: value` file describing one step of a
 * calibration sequence: octagon source, lamp warm-up, detector triggers,
 * exposure time and count, shutter states and ND filter positions.
 *
 * @packageDocumentation
 */

/**
 * Sources the octagon mirror can feed into the calibration bench.
 */
export const OCTAGON_SOURCES = [
  'Home',
  'EtalonFiber',
  'BrdbandFiber',
  'U_gold',
  'U_daily',
  'Th_daily',
  'Th_gold',
  'SoCal-CalFib',
  'LFCFiber',
] as const;

/**
 * A valid octagon source name.
 */
export type OctagonSource = (typeof OCTAGON_SOURCES)[number];

/**
 * Detector trigger flags.
 */
export const TRIGGER_FIELDS = ['TriggerRed', 'TriggerGreen', 'TriggerCaHK'] as const;

/**
 * Source select shutter flags.
 */
export const SOURCE_SELECT_SHUTTER_FIELDS = [
  'SSS_Science',
  'SSS_Sky',
  'SSS_CalSciSky',
  'SSS_SoCalSci',
  'SSS_SoCalCal',
] as const;

/**
 * Timed shutter flags.
 */
export const TIMED_SHUTTER_FIELDS = [
  'TS_Scrambler',
  'TS_SimulCal',
  'TS_FF_Fiber',
  'TS_CaHK',
] as const;

export type TriggerField = (typeof TRIGGER_FIELDS)[number];
export type SourceSelectShutterField = (typeof SOURCE_SELECT_SHUTTER_FIELDS)[number];
export type TimedShutterField = (typeof TIMED_SHUTTER_FIELDS)[number];

/**
 * Every boolean field of an exposure request.
 */
export type BooleanField = TriggerField | SourceSelectShutterField | TimedShutterField;

/**
 * Boolean fields in canonical order. All are optional and default to false.
 */
export const BOOLEAN_FIELDS: readonly BooleanField[] = [
  ...TRIGGER_FIELDS,
  ...SOURCE_SELECT_SHUTTER_FIELDS,
  ...TIMED_SHUTTER_FIELDS,
];

/**
 * An optical-density label for an ND filter wheel position, e.g. `OD 0.1`.
 */
export type NdFilterLabel = `OD ${string}`;

/**
 * A validated calibration exposure request.
 *
 * Instances produced by the parser are frozen.
 */
export interface ExposureRequest {
  /** Source selected by the octagon mirror. */
  readonly OctagonSource: OctagonSource;
  /** Seconds to wait for the lamp to warm up if it was off. */
  readonly WarmUp: number;
  readonly TriggerRed: boolean;
  readonly TriggerGreen: boolean;
  readonly TriggerCaHK: boolean;
  /** Exposure time in seconds. */
  readonly Exptime: number;
  /** Number of exposures to take. */
  readonly nExp: number;
  readonly SSS_Science: boolean;
  readonly SSS_Sky: boolean;
  readonly SSS_CalSciSky: boolean;
  readonly SSS_SoCalSci: boolean;
  readonly SSS_SoCalCal: boolean;
  readonly TS_Scrambler: boolean;
  readonly TS_SimulCal: boolean;
  readonly TS_FF_Fiber: boolean;
  readonly TS_CaHK: boolean;
  /** ND filter at the octagon output. */
  readonly ND1: NdFilterLabel;
  readonly ND2: NdFilterLabel;
}

/**
 * Name of any exposure request field.
 */
export type RequestField = keyof ExposureRequest;

/**
 * Fields that must be present in every request file.
 */
export const REQUIRED_FIELDS = [
  'OctagonSource',
  'WarmUp',
  'Exptime',
  'nExp',
  'ND1',
  'ND2',
] as const satisfies readonly RequestField[];

/**
 * All fields in the order the serializer writes them.
 */
export const CANONICAL_FIELD_ORDER: readonly RequestField[] = [
  'OctagonSource',
  'WarmUp',
  'TriggerRed',
  'TriggerGreen',
  'TriggerCaHK',
  'Exptime',
  'nExp',
  'SSS_Science',
  'SSS_Sky',
  'SSS_CalSciSky',
  'SSS_SoCalSci',
  'SSS_SoCalCal',
  'TS_Scrambler',
  'TS_SimulCal',
  'TS_FF_Fiber',
  'TS_CaHK',
  'ND1',
  'ND2',
];

/**
 * Checks whether a string is a known request field.
 *
 * @param key - Candidate key.
 * @returns True if the key names an exposure request field.
 */
export function isRequestField(key: string): key is RequestField {
  return CANONICAL_FIELD_ORDER.some((field) => field === key);
}

/**
 * Checks whether a string is a known octagon source.
 *
 * @param value - Candidate source name.
 * @returns True if the value is one of {@link OCTAGON_SOURCES}.
 */
export function isOctagonSource(value: string): value is OctagonSource {
  return OCTAGON_SOURCES.some((source) => source === value);
}

/**
 * A request together with the file it was loaded from.
 */
export interface LoadedRequest {
  /** File path, or a label such as `<stdin>`. */
  readonly source: string;
  readonly request: ExposureRequest;
}
