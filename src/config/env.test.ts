import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
} from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    describe('CALSEQ_* env vars override corresponding config values', () => {
      it('should read CALSEQ_SEQUENCE_REPEAT_COUNT with number coercion', () => {
        const overrides = readEnvOverrides({ CALSEQ_SEQUENCE_REPEAT_COUNT: '3' });

        expect(overrides).toEqual({ sequence: { repeat_count: 3 } });
      });

      it('should read limit env vars', () => {
        const overrides = readEnvOverrides({
          CALSEQ_LIMITS_MAX_WARM_UP: '120',
          CALSEQ_LIMITS_MAX_EXPTIME: ' 7.5 ',
        });

        expect(overrides.limits).toEqual({ max_warm_up: 120, max_exptime: 7.5 });
      });

      it('should read sequence flags with boolean coercion', () => {
        const overrides = readEnvOverrides({
          CALSEQ_SEQUENCE_LAMPS_OFF: 'yes',
          CALSEQ_SEQUENCE_NO_EXPOSURE: 'OFF',
        });

        expect(overrides.sequence).toEqual({ lamps_off: true, no_exposure: false });
      });

      it('should let CALSEQ_DEBUG win over CALSEQ_LOGGING_DEBUG', () => {
        const overrides = readEnvOverrides({
          CALSEQ_LOGGING_DEBUG: 'false',
          CALSEQ_DEBUG: 'true',
        });

        expect(overrides).toEqual({ logging: { debug: true } });
      });

      it('should ignore unset, empty and unrelated variables', () => {
        const overrides = readEnvOverrides({
          CALSEQ_SEQUENCE_REPEAT_COUNT: '',
          CALSEQ_LIMITS_MAX_EXPTIME: undefined,
          CALSEQ_UNKNOWN: '5',
          HOME: '/home/observer',
        });

        expect(overrides).toEqual({});
      });

      it('should accept every boolean spelling in any case (property-based)', () => {
        const spellings = fc.constantFrom('true', '1', 'yes', 'on', 'false', '0', 'no', 'off');
        fc.assert(
          fc.property(spellings, fc.boolean(), (spelling, upper) => {
            const value = upper ? spelling.toUpperCase() : spelling;
            const overrides = readEnvOverrides({ CALSEQ_SEQUENCE_LAMPS_OFF: value });
            expect(overrides.sequence?.lamps_off).toBe(
              ['true', '1', 'yes', 'on'].includes(spelling)
            );
          })
        );
      });
    });

    describe('coercion errors', () => {
      it('should throw for a non-numeric value', () => {
        expect(() => readEnvOverrides({ CALSEQ_SEQUENCE_REPEAT_COUNT: 'abc' })).toThrow(
          new EnvCoercionError('CALSEQ_SEQUENCE_REPEAT_COUNT', 'abc', 'number')
        );
      });

      it('should describe the default coercion message', () => {
        const error = new EnvCoercionError('CALSEQ_LIMITS_MAX_EXPTIME', 'abc', 'number');
        expect(error.message).toBe(
          "Cannot coerce environment variable 'CALSEQ_LIMITS_MAX_EXPTIME' value 'abc' to number"
        );
        expect(error.name).toBe('EnvCoercionError');
      });

      it('should throw for a whitespace-only number', () => {
        expect(() => readEnvOverrides({ CALSEQ_LIMITS_MAX_WARM_UP: '   ' })).toThrow(
          "Empty value for 'CALSEQ_LIMITS_MAX_WARM_UP'"
        );
      });

      it('should throw for a bad shortcut even when other variables are valid', () => {
        expect(() =>
          readEnvOverrides({
            CALSEQ_SEQUENCE_LAMPS_OFF: 'true',
            CALSEQ_DEBUG: 'sometimes',
          })
        ).toThrow("Cannot coerce 'CALSEQ_DEBUG' value 'sometimes' to boolean.");
      });

      it('should list accepted spellings for an invalid boolean', () => {
        expect(() => readEnvOverrides({ CALSEQ_SEQUENCE_LAMPS_OFF: 'maybe' })).toThrow(
          "Cannot coerce 'CALSEQ_SEQUENCE_LAMPS_OFF' value 'maybe' to boolean. Expected one of: true, 1, yes, on, false, 0, no, off"
        );
      });
    });
  });

  describe('applyEnvOverrides', () => {
    it('should override file values and keep the rest', () => {
      const fileConfig = parseConfig('[sequence]\nrepeat_count = 2\nlamps_off = true\n');

      const config = applyEnvOverrides(fileConfig, { CALSEQ_SEQUENCE_REPEAT_COUNT: '5' });

      expect(config.sequence).toEqual({ repeat_count: 5, lamps_off: true, no_exposure: false });
      expect(config.limits).toEqual(DEFAULT_CONFIG.limits);
      expect(config.lamps).toEqual(DEFAULT_CONFIG.lamps);
    });

    it('should return an equal config when no variable is set', () => {
      expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('mergeConfig', () => {
    it('should not modify the base config', () => {
      const base = parseConfig('');
      const merged = mergeConfig(base, { logging: { debug: true } });

      expect(merged.logging.debug).toBe(true);
      expect(base.logging.debug).toBe(false);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      const docs = getEnvVarDocumentation();

      expect(Object.keys(docs)).toEqual([
        'CALSEQ_SEQUENCE_REPEAT_COUNT',
        'CALSEQ_SEQUENCE_LAMPS_OFF',
        'CALSEQ_SEQUENCE_NO_EXPOSURE',
        'CALSEQ_LIMITS_MAX_WARM_UP',
        'CALSEQ_LIMITS_MAX_EXPTIME',
        'CALSEQ_LOGGING_DEBUG',
        'CALSEQ_DEBUG',
      ]);
      expect(docs.CALSEQ_LIMITS_MAX_EXPTIME).toEqual({
        description: 'Override the longest accepted exposure time in seconds',
        type: 'number',
      });
    });
  });
});
