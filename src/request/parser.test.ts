import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import {
  FALSE_TOKENS,
  ParseError,
  TRUE_TOKENS,
  isNdFilterLabel,
  parseBooleanToken,
  parseExposureRequest,
} from './parser.js';
import type { ExposureRequest } from './types.js';

const EXAMPLE_LINES = [
  '# Broadband flat',
  'OctagonSource: BrdbandFiber  # lamp',
  'WarmUp: 3',
  'TriggerRed: False',
  'TriggerGreen: True',
  'TriggerCaHK: False',
  'Exptime: 5',
  'nExp: 1',
  'SSS_Science: False',
  'SSS_Sky: True',
  'SSS_CalSciSky: True',
  'TS_Scrambler: True',
  'ND1: OD 0.1',
  'ND2: OD 0.8',
];

const EXAMPLE_REQUEST: ExposureRequest = {
  OctagonSource: 'BrdbandFiber',
  WarmUp: 3,
  TriggerRed: false,
  TriggerGreen: true,
  TriggerCaHK: false,
  Exptime: 5,
  nExp: 1,
  SSS_Science: false,
  SSS_Sky: true,
  SSS_CalSciSky: true,
  SSS_SoCalSci: false,
  SSS_SoCalCal: false,
  TS_Scrambler: true,
  TS_SimulCal: false,
  TS_FF_Fiber: false,
  TS_CaHK: false,
  ND1: 'OD 0.1',
  ND2: 'OD 0.8',
};

const MINIMAL_LINES = [
  'OctagonSource: U_daily',
  'WarmUp: 10',
  'Exptime: 1.5',
  'nExp: 2',
  'ND1: OD 1.0',
  'ND2: OD 0.1',
];

/**
 * Replaces (or appends) the line for a key in a request text.
 */
function withLine(lines: readonly string[], key: string, line: string | undefined): string {
  const kept = lines.filter((l) => !l.startsWith(`${key}:`));
  return (line === undefined ? kept : [...kept, line]).join('\n');
}

function catchParseError(text: string, source?: string): ParseError {
  try {
    parseExposureRequest(text, { source });
  } catch (error) {
    if (error instanceof ParseError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ParseError');
}

describe('parseExposureRequest', () => {
  describe('valid requests', () => {
    it('should parse the broadband example', () => {
      expect(parseExposureRequest(EXAMPLE_LINES.join('\n'))).toEqual(EXAMPLE_REQUEST);
    });

    it('should default absent boolean fields to false', () => {
      const request = parseExposureRequest(MINIMAL_LINES.join('\n'));

      expect(request.OctagonSource).toBe('U_daily');
      expect(request.WarmUp).toBe(10);
      expect(request.Exptime).toBe(1.5);
      expect(request.nExp).toBe(2);
      expect(request.TriggerRed).toBe(false);
      expect(request.SSS_SoCalCal).toBe(false);
      expect(request.TS_CaHK).toBe(false);
    });

    it('should not depend on line order', () => {
      const reversed = [...EXAMPLE_LINES].reverse().join('\n');
      expect(parseExposureRequest(reversed)).toEqual(EXAMPLE_REQUEST);
    });

    it('should return a frozen record', () => {
      const request = parseExposureRequest(EXAMPLE_LINES.join('\n'));
      expect(Object.isFrozen(request)).toBe(true);
    });

    it('should accept WarmUp of zero', () => {
      const request = parseExposureRequest(withLine(MINIMAL_LINES, 'WarmUp', 'WarmUp: 0'));
      expect(request.WarmUp).toBe(0);
    });

    it('should accept exponent notation for Exptime', () => {
      const request = parseExposureRequest(withLine(MINIMAL_LINES, 'Exptime', 'Exptime: 2.5e-1'));
      expect(request.Exptime).toBe(0.25);
    });

    it('should split on the first colon without needing a space', () => {
      const compact = EXAMPLE_LINES.map((line) => line.replace(': ', ':')).join('\n');
      expect(parseExposureRequest(compact)).toEqual(EXAMPLE_REQUEST);
    });

    it('should trim indented lines', () => {
      const lines = [...EXAMPLE_LINES];
      lines[2] = '   WarmUp: 3';
      lines[3] = '\tTriggerRed: False   ';
      expect(parseExposureRequest(lines.join('\n'))).toEqual(EXAMPLE_REQUEST);
    });

    it('should strip a comment that follows the value directly', () => {
      const request = parseExposureRequest(withLine(MINIMAL_LINES, 'nExp', 'nExp: 1#c'));
      expect(request.nExp).toBe(1);
    });

    it('should read CRLF line endings', () => {
      expect(parseExposureRequest(EXAMPLE_LINES.join('\r\n'))).toEqual(EXAMPLE_REQUEST);
    });

    it('should store a signed zero warm-up as zero', () => {
      const request = parseExposureRequest(withLine(MINIMAL_LINES, 'WarmUp', 'WarmUp: -0'));
      expect(Object.is(request.WarmUp, 0)).toBe(true);
    });

    it('should accept every octagon source', () => {
      const request = parseExposureRequest(
        withLine(MINIMAL_LINES, 'OctagonSource', 'OctagonSource: SoCal-CalFib')
      );
      expect(request.OctagonSource).toBe('SoCal-CalFib');
    });
  });

  describe('missing and unknown keys', () => {
    it('should name the missing Exptime key', () => {
      const error = catchParseError(withLine(MINIMAL_LINES, 'Exptime', undefined));

      expect(error.field).toBe('Exptime');
      expect(error.message).toBe("Missing required key 'Exptime'");
    });

    it('should reject every missing required key', () => {
      for (const key of ['OctagonSource', 'WarmUp', 'Exptime', 'nExp', 'ND1', 'ND2']) {
        const error = catchParseError(withLine(MINIMAL_LINES, key, undefined));
        expect(error.field).toBe(key);
      }
    });

    it('should reject an unknown key with its line number', () => {
      const error = catchParseError(
        withLine(MINIMAL_LINES, 'Exposure', 'Exposure: 5'),
        'cals/flat.yaml'
      );

      expect(error.field).toBe('Exposure');
      expect(error.line).toBe(7);
      expect(error.source).toBe('cals/flat.yaml');
      expect(error.message).toBe("cals/flat.yaml:7: Unknown key 'Exposure'");
    });

    it('should reject a key that differs only in case', () => {
      const error = catchParseError(withLine(MINIMAL_LINES, 'nexp', 'nexp: 2'));
      expect(error.reason).toBe("Unknown key 'nexp'");
    });

    it('should reject a duplicated key', () => {
      const text = [...MINIMAL_LINES, 'nExp: 3'].join('\n');
      const error = catchParseError(text, 'cals/flat.yaml');

      expect(error.field).toBe('nExp');
      expect(error.line).toBe(7);
      expect(error.message).toBe("cals/flat.yaml:7: Duplicate key 'nExp'");
    });

    it('should reject a key without a value', () => {
      const error = catchParseError(withLine(MINIMAL_LINES, 'ND2', 'ND2:  # none'));
      expect(error.field).toBe('ND2');
      expect(error.line).toBe(6);
      expect(error.reason).toBe("Missing value for 'ND2'");
    });
  });

  describe('malformed input', () => {
    it('should reject an empty request', () => {
      expect(catchParseError('').reason).toBe('Request is empty');
      expect(catchParseError('# only a comment\n').reason).toBe('Request is empty');
    });

    it('should reject a line that is not a key-value pair', () => {
      const error = catchParseError(['# header', 'just some text'].join('\n'));
      expect(error.line).toBe(2);
      expect(error.message).toBe("line 2: Malformed line: expected 'Key: value'");
    });

    it('should reject a line with no key before the colon', () => {
      const error = catchParseError([...MINIMAL_LINES, ': 5'].join('\n'));
      expect(error.line).toBe(7);
      expect(error.reason).toBe("Malformed line: expected 'Key: value'");
    });

    it('should keep bracketed values as plain text', () => {
      const error = catchParseError(withLine(MINIMAL_LINES, 'ND1', 'ND1: [OD 0.1, OD 1.0]'));
      expect(error.reason).toBe(
        "Invalid value for 'ND1': expected a filter label like 'OD 0.1', got '[OD 0.1, OD 1.0]'"
      );
    });

    it('should prefix the source when no line is known', () => {
      const error = catchParseError('', 'cals/empty.yaml');
      expect(error.message).toBe('cals/empty.yaml: Request is empty');
    });
  });

  describe('field values', () => {
    it('should reject an unknown octagon source', () => {
      const error = catchParseError(
        withLine(MINIMAL_LINES, 'OctagonSource', 'OctagonSource: Moon')
      );

      expect(error.field).toBe('OctagonSource');
      expect(error.line).toBe(6);
      expect(error.reason).toBe(
        "Invalid value for 'OctagonSource': expected one of Home, EtalonFiber, BrdbandFiber, U_gold, U_daily, Th_daily, Th_gold, SoCal-CalFib, LFCFiber, got 'Moon'"
      );
    });

    it('should reject a fractional exposure count', () => {
      const error = catchParseError(withLine(MINIMAL_LINES, 'nExp', 'nExp: 2.5'));
      expect(error.reason).toBe("Invalid type for 'nExp': expected integer, got '2.5'");
    });

    it('should reject a negative warm-up', () => {
      const error = catchParseError(withLine(MINIMAL_LINES, 'WarmUp', 'WarmUp: -1'));
      expect(error.reason).toBe("Invalid value for 'WarmUp': must be at least 0, got -1");
    });

    it('should reject a non-numeric exposure time', () => {
      const error = catchParseError(withLine(MINIMAL_LINES, 'Exptime', 'Exptime: five'));
      expect(error.reason).toBe("Invalid type for 'Exptime': expected number, got 'five'");
    });

    it('should reject a malformed ND label', () => {
      const error = catchParseError(withLine(MINIMAL_LINES, 'ND2', 'ND2: 0.8'));
      expect(error.reason).toBe(
        "Invalid value for 'ND2': expected a filter label like 'OD 0.1', got '0.8'"
      );
    });

    it('should reject Exptime of zero or less (property-based)', () => {
      fc.assert(
        fc.property(fc.integer({ min: -100000, max: 0 }), (exptime) => {
          const error = catchParseError(
            withLine(MINIMAL_LINES, 'Exptime', `Exptime: ${String(exptime)}`)
          );
          expect(error.field).toBe('Exptime');
          expect(error.reason).toBe(
            `Invalid value for 'Exptime': must be greater than 0, got ${String(exptime)}`
          );
        })
      );
    });

    it('should reject nExp below one (property-based)', () => {
      fc.assert(
        fc.property(fc.integer({ min: -100000, max: 0 }), (count) => {
          const error = catchParseError(withLine(MINIMAL_LINES, 'nExp', `nExp: ${String(count)}`));
          expect(error.field).toBe('nExp');
          expect(error.reason).toBe(
            `Invalid value for 'nExp': must be at least 1, got ${String(count)}`
          );
        })
      );
    });
  });

  describe('boolean tokens', () => {
    it('should parse every recognized token (property-based)', () => {
      fc.assert(
        fc.property(fc.constantFrom(...TRUE_TOKENS, ...FALSE_TOKENS), (token) => {
          const request = parseExposureRequest(
            withLine(MINIMAL_LINES, 'TS_FF_Fiber', `TS_FF_Fiber: ${token}`)
          );
          expect(request.TS_FF_Fiber).toBe(TRUE_TOKENS.includes(token));
        })
      );
    });

    it('should reject any other token (property-based)', () => {
      const unrecognized = fc
        .stringMatching(/^[A-Za-z0-9_]{1,12}$/)
        .filter((token) => !TRUE_TOKENS.includes(token) && !FALSE_TOKENS.includes(token));

      fc.assert(
        fc.property(unrecognized, (token) => {
          const error = catchParseError(
            withLine(MINIMAL_LINES, 'TriggerRed', `TriggerRed: ${token}`)
          );
          expect(error.field).toBe('TriggerRed');
          expect(error.reason).toBe(
            `Invalid boolean for 'TriggerRed': expected one of true, True, TRUE, false, False, FALSE, got '${token}'`
          );
        })
      );
    });

    it('should reject yes, on and 1', () => {
      for (const token of ['yes', 'on', '1', 'tRUE']) {
        expect(() =>
          parseExposureRequest(withLine(MINIMAL_LINES, 'SSS_Sky', `SSS_Sky: ${token}`))
        ).toThrow(ParseError);
      }
    });
  });
});

describe('parseBooleanToken', () => {
  it('should map tokens to booleans', () => {
    expect(parseBooleanToken('True')).toBe(true);
    expect(parseBooleanToken('FALSE')).toBe(false);
    expect(parseBooleanToken('Yes')).toBeUndefined();
  });
});

describe('isNdFilterLabel', () => {
  it('should accept labels with an optical density', () => {
    expect(isNdFilterLabel('OD 0.1')).toBe(true);
    expect(isNdFilterLabel('OD 4')).toBe(true);
    expect(isNdFilterLabel('OD .5')).toBe(true);
  });

  it('should reject other strings', () => {
    expect(isNdFilterLabel('0.1')).toBe(false);
    expect(isNdFilterLabel('OD')).toBe(false);
    expect(isNdFilterLabel('od 0.1')).toBe(false);
    expect(isNdFilterLabel('OD -1')).toBe(false);
  });
});
