/**
 * Parser for calibration exposure request files.
 *
 * Request files are flat `Key: value  # comment` lines. Values are kept as
 * raw strings until each field converts its own token, so no token is ever
 * given a type other than the one its key declares.
 *
 * @packageDocumentation
 */

import {
  REQUIRED_FIELDS,
  isOctagonSource,
  isRequestField,
  OCTAGON_SOURCES,
  type BooleanField,
  type ExposureRequest,
  type NdFilterLabel,
  type OctagonSource,
  type RequestField,
} from './types.js';

/**
 * Location details attached to a {@link ParseError}.
 */
export interface ParseErrorDetails {
  /** Request field the error concerns, if any. */
  field?: RequestField | string | undefined;
  /** 1-based line number in the request text, if known. */
  line?: number | undefined;
  /** File path or label of the request text, if known. */
  source?: string | undefined;
  /** Underlying error, if any. */
  cause?: Error | undefined;
}

/**
 * Error raised for any malformed exposure request.
 *
 * A request that fails to parse must never be used, in whole or in part.
 */
export class ParseError extends Error {
  /** The field the error concerns, if any. */
  public readonly field: string | undefined;
  /** 1-based line number, if known. */
  public readonly line: number | undefined;
  /** File path or label of the request text, if known. */
  public readonly source: string | undefined;
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;
  /** The message without the location prefix. */
  public readonly reason: string;

  /**
   * Creates a new ParseError.
   *
   * @param reason - Description of the failure, without location.
   * @param details - Field, line and source of the failure.
   */
  constructor(reason: string, details: ParseErrorDetails = {}) {
    super(formatLocation(details.source, details.line) + reason);
    this.name = 'ParseError';
    this.reason = reason;
    this.field = details.field;
    this.line = details.line;
    this.source = details.source;
    this.cause = details.cause;
  }
}

function formatLocation(source: string | undefined, line: number | undefined): string {
  if (source !== undefined && line !== undefined) {
    return `${source}:${String(line)}: `;
  }
  if (source !== undefined) {
    return `${source}: `;
  }
  if (line !== undefined) {
    return `line ${String(line)}: `;
  }
  return '';
}

/**
 * Options for {@link parseExposureRequest}.
 */
export interface ParseOptions {
  /** File path or label used in error messages. */
  source?: string | undefined;
}

/** Accepted spellings of true. */
export const TRUE_TOKENS: readonly string[] = ['true', 'True', 'TRUE'];

/** Accepted spellings of false. */
export const FALSE_TOKENS: readonly string[] = ['false', 'False', 'FALSE'];

const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const ND_LABEL_PATTERN = /^OD (?:\d+\.?\d*|\.\d+)$/;

interface RawEntry {
  readonly raw: string;
  readonly line: number;
}

/**
 * Parsing context shared by the field converters.
 */
class FieldReader {
  constructor(
    private readonly entries: ReadonlyMap<RequestField, RawEntry>,
    private readonly source: string | undefined
  ) {}

  error(field: RequestField, reason: string): ParseError {
    return new ParseError(reason, {
      field,
      line: this.entries.get(field)?.line,
      source: this.source,
    });
  }

  required(field: RequestField): string {
    const entry = this.entries.get(field);
    if (entry === undefined) {
      throw new ParseError(`Missing required key '${field}'`, { field, source: this.source });
    }
    return entry.raw;
  }

  octagonSource(field: 'OctagonSource'): OctagonSource {
    const value = this.required(field);
    if (!isOctagonSource(value)) {
      throw this.error(
        field,
        `Invalid value for '${field}': expected one of ${OCTAGON_SOURCES.join(', ')}, got '${value}'`
      );
    }
    return value;
  }

  integer(field: RequestField, min: number): number {
    const token = this.required(field);
    if (!INTEGER_PATTERN.test(token)) {
      throw this.error(field, `Invalid type for '${field}': expected integer, got '${token}'`);
    }
    const value = Number(token);
    if (!Number.isSafeInteger(value)) {
      throw this.error(field, `Invalid value for '${field}': integer out of range, got '${token}'`);
    }
    if (value < min) {
      throw this.error(
        field,
        `Invalid value for '${field}': must be at least ${String(min)}, got ${String(value)}`
      );
    }
    // -0 passes the range check; store it as 0
    return value === 0 ? 0 : value;
  }

  positiveNumber(field: RequestField): number {
    const token = this.required(field);
    if (!NUMBER_PATTERN.test(token)) {
      throw this.error(field, `Invalid type for '${field}': expected number, got '${token}'`);
    }
    const value = Number(token);
    if (!Number.isFinite(value)) {
      throw this.error(field, `Invalid value for '${field}': must be finite, got '${token}'`);
    }
    if (value <= 0) {
      throw this.error(
        field,
        `Invalid value for '${field}': must be greater than 0, got ${String(value)}`
      );
    }
    return value;
  }

  ndLabel(field: 'ND1' | 'ND2'): NdFilterLabel {
    const value = this.required(field);
    if (!isNdFilterLabel(value)) {
      throw this.error(
        field,
        `Invalid value for '${field}': expected a filter label like 'OD 0.1', got '${value}'`
      );
    }
    return value;
  }

  flag(field: BooleanField): boolean {
    const entry = this.entries.get(field);
    if (entry === undefined) {
      return false;
    }
    const parsed = parseBooleanToken(entry.raw);
    if (parsed === undefined) {
      throw this.error(
        field,
        `Invalid boolean for '${field}': expected one of ${[...TRUE_TOKENS, ...FALSE_TOKENS].join(', ')}, got '${entry.raw}'`
      );
    }
    return parsed;
  }
}

/**
 * Converts a boolean token.
 *
 * @param token - Raw value text.
 * @returns The boolean, or undefined if the token is not recognized.
 */
export function parseBooleanToken(token: string): boolean | undefined {
  if (TRUE_TOKENS.includes(token)) {
    return true;
  }
  if (FALSE_TOKENS.includes(token)) {
    return false;
  }
  return undefined;
}

/**
 * Checks whether a string is a well-formed ND filter label.
 *
 * @param value - Candidate label.
 * @returns True for labels such as `OD 0.1` or `OD 4`.
 */
export function isNdFilterLabel(value: string): value is NdFilterLabel {
  return ND_LABEL_PATTERN.test(value);
}

interface RequestLine {
  readonly key: string;
  readonly value: string;
  readonly line: number;
}

/**
 * Splits request text into key-value lines.
 *
 * On each line everything from `#` on is dropped and the rest is trimmed.
 * Blank lines are skipped; any other line is split on its first colon.
 *
 * @param text - Raw request text.
 * @param source - File path or label for error messages.
 * @returns One entry per non-blank line, in file order.
 * @throws ParseError for a line without a colon or without a key.
 */
function splitRequestLines(text: string, source: string | undefined): RequestLine[] {
  const result: RequestLine[] = [];

  text.split(/\r?\n/).forEach((content, index) => {
    const line = index + 1;
    const commentStart = content.indexOf('#');
    const stripped = (commentStart === -1 ? content : content.slice(0, commentStart)).trim();
    if (stripped.length === 0) {
      return;
    }

    const colon = stripped.indexOf(':');
    const key = colon === -1 ? '' : stripped.slice(0, colon).trim();
    if (key.length === 0) {
      throw new ParseError("Malformed line: expected 'Key: value'", { line, source });
    }
    result.push({ key, value: stripped.slice(colon + 1).trim(), line });
  });

  return result;
}

/**
 * Parses and validates an exposure request.
 *
 * Boolean fields that are absent default to false. Every other field is
 * required. Any unknown key, duplicate key, unrecognized token or
 * out-of-domain value is fatal.
 *
 * @param text - Raw request file contents.
 * @param options - Parse options.
 * @returns A frozen, validated exposure request.
 * @throws ParseError on any malformed or invalid input.
 *
 * @example
 * ```typescript
 * const request = parseExposureRequest(`
 * OctagonSource: BrdbandFiber
 * WarmUp: 3
 * TriggerGreen: True
 * Exptime: 5
 * nExp: 1
 * ND1: OD 0.1
 * ND2: OD 0.8
 * `);
 * request.TriggerGreen; // true
 * request.TriggerRed;   // false
 * ```
 */
export function parseExposureRequest(text: string, options: ParseOptions = {}): ExposureRequest {
  const { source } = options;
  const lines = splitRequestLines(text, source);
  if (lines.length === 0) {
    throw new ParseError('Request is empty', { source });
  }

  const entries = new Map<RequestField, RawEntry>();
  for (const { key, value, line } of lines) {
    if (!isRequestField(key)) {
      throw new ParseError(`Unknown key '${key}'`, { field: key, line, source });
    }
    if (entries.has(key)) {
      throw new ParseError(`Duplicate key '${key}'`, { field: key, line, source });
    }
    if (value.length === 0) {
      throw new ParseError(`Missing value for '${key}'`, { field: key, line, source });
    }
    entries.set(key, { raw: value, line });
  }

  for (const field of REQUIRED_FIELDS) {
    if (!entries.has(field)) {
      throw new ParseError(`Missing required key '${field}'`, { field, source });
    }
  }

  const reader = new FieldReader(entries, source);
  const request: ExposureRequest = {
    OctagonSource: reader.octagonSource('OctagonSource'),
    WarmUp: reader.integer('WarmUp', 0),
    TriggerRed: reader.flag('TriggerRed'),
    TriggerGreen: reader.flag('TriggerGreen'),
    TriggerCaHK: reader.flag('TriggerCaHK'),
    Exptime: reader.positiveNumber('Exptime'),
    nExp: reader.integer('nExp', 1),
    SSS_Science: reader.flag('SSS_Science'),
    SSS_Sky: reader.flag('SSS_Sky'),
    SSS_CalSciSky: reader.flag('SSS_CalSciSky'),
    SSS_SoCalSci: reader.flag('SSS_SoCalSci'),
    SSS_SoCalCal: reader.flag('SSS_SoCalCal'),
    TS_Scrambler: reader.flag('TS_Scrambler'),
    TS_SimulCal: reader.flag('TS_SimulCal'),
    TS_FF_Fiber: reader.flag('TS_FF_Fiber'),
    TS_CaHK: reader.flag('TS_CaHK'),
    ND1: reader.ndLabel('ND1'),
    ND2: reader.ndLabel('ND2'),
  };

  return Object.freeze(request);
}
