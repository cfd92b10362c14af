import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { ConfigParseError, DEFAULT_CONFIG, getDefaultConfig, parseConfig } from './index.js';

function parseErrorMessage(toml: string): string {
  try {
    parseConfig(toml);
  } catch (error) {
    if (error instanceof ConfigParseError) {
      return error.message;
    }
    throw error;
  }
  throw new Error('Expected a ConfigParseError');
}

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const toml = `
[sequence]
repeat_count = 3
lamps_off = true
no_exposure = true

[limits]
max_warm_up = 900
max_exptime = 120.5

[filters]
nd1_positions = ["OD 0.1", "OD 2.0"]
nd2_positions = ["OD 0.3"]

[lamps.outlets]
U_gold = "OUTLET_CAL1_1"
Th_gold = "OUTLET_CAL1_2"

[logging]
debug = true
`;
        const config = parseConfig(toml);

        expect(config).toEqual({
          sequence: { repeat_count: 3, lamps_off: true, no_exposure: true },
          limits: { max_warm_up: 900, max_exptime: 120.5 },
          filters: { nd1_positions: ['OD 0.1', 'OD 2.0'], nd2_positions: ['OD 0.3'] },
          lamps: { outlets: { U_gold: 'OUTLET_CAL1_1', Th_gold: 'OUTLET_CAL1_2' } },
          logging: { debug: true },
        });
      });

      it('should merge partial sections with defaults', () => {
        const config = parseConfig(`
[sequence]
lamps_off = true

[limits]
max_exptime = 60
`);

        expect(config.sequence).toEqual({ repeat_count: 1, lamps_off: true, no_exposure: false });
        expect(config.limits).toEqual({ max_warm_up: 3600, max_exptime: 60 });
        expect(config.filters).toEqual(DEFAULT_CONFIG.filters);
      });

      it('should keep default outlets when the lamps section has no outlet table', () => {
        const config = parseConfig('[lamps]\n');
        expect(config.lamps.outlets).toEqual(DEFAULT_CONFIG.lamps.outlets);
      });

      it('should replace the whole outlet map with a lamps.outlets table', () => {
        const config = parseConfig('[lamps.outlets]\nBrdbandFiber = "OUTLET_A"\n');
        expect(config.lamps.outlets).toEqual({ BrdbandFiber: 'OUTLET_A' });
      });

      it('should accept empty filter lists', () => {
        const config = parseConfig('[filters]\nnd1_positions = []\n');
        expect(config.filters.nd1_positions).toEqual([]);
        expect(config.filters.nd2_positions).toEqual(DEFAULT_CONFIG.filters.nd2_positions);
      });

      it('should ignore unknown sections', () => {
        const config = parseConfig('[display]\ncolors = false\n');
        expect(config).toEqual(DEFAULT_CONFIG);
      });
    });

    describe('invalid TOML', () => {
      it('should throw ConfigParseError for invalid syntax', () => {
        const message = parseErrorMessage('[sequence\nrepeat_count = 1');
        expect(message).toMatch(/^Invalid TOML syntax: /);
      });

      it('should keep the underlying TOML error as cause', () => {
        try {
          parseConfig('repeat_count = = 1');
          expect.unreachable();
        } catch (error) {
          expect(error).toBeInstanceOf(ConfigParseError);
          if (error instanceof ConfigParseError) {
            expect(error.cause).toBeInstanceOf(Error);
          }
        }
      });
    });

    describe('type checking', () => {
      it('should reject a section that is not a table', () => {
        expect(parseErrorMessage('sequence = 5\n')).toBe(
          "Invalid type for 'sequence': expected table"
        );
      });

      it('should reject a string repeat count', () => {
        expect(parseErrorMessage('[sequence]\nrepeat_count = "three"\n')).toBe(
          "Invalid type for 'sequence.repeat_count': expected number, got string"
        );
      });

      it('should reject a non-boolean flag', () => {
        expect(parseErrorMessage('[sequence]\nlamps_off = "yes"\n')).toBe(
          "Invalid type for 'sequence.lamps_off': expected boolean, got string"
        );
        expect(parseErrorMessage('[logging]\ndebug = 1\n')).toBe(
          "Invalid type for 'logging.debug': expected boolean, got number"
        );
      });

      it('should reject a date where a number is expected', () => {
        expect(parseErrorMessage('[limits]\nmax_warm_up = 1979-05-27\n')).toBe(
          "Invalid type for 'limits.max_warm_up': expected number, got object"
        );
      });

      it('should name the offending filter list element', () => {
        expect(parseErrorMessage('[filters]\nnd1_positions = [1, 2]\n')).toBe(
          "Invalid type for 'filters.nd1_positions[0]': expected string, got number"
        );
      });

      it('should reject a filter list that is not an array', () => {
        expect(parseErrorMessage('[filters]\nnd2_positions = "OD 0.1"\n')).toBe(
          "Invalid type for 'filters.nd2_positions': expected array of strings, got string"
        );
      });

      it('should reject a non-string outlet', () => {
        expect(parseErrorMessage('[lamps.outlets]\nU_gold = 7\n')).toBe(
          "Invalid type for 'lamps.outlets.U_gold': expected string, got number"
        );
      });
    });

    it('should read any integer repeat count (property-based)', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 1000000 }), (count) => {
          const config = parseConfig(`[sequence]\nrepeat_count = ${String(count)}\n`);
          expect(config.sequence.repeat_count).toBe(count);
        })
      );
    });
  });

  describe('getDefaultConfig', () => {
    it('should return a fresh copy of the defaults', () => {
      const first = getDefaultConfig();
      const second = getDefaultConfig();

      expect(first).toEqual(DEFAULT_CONFIG);
      expect(first).not.toBe(second);
      expect(first.sequence).not.toBe(DEFAULT_CONFIG.sequence);
    });
  });
});
