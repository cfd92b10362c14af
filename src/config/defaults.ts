/**
 * Default configuration values for calseq.toml.
 *
 * @packageDocumentation
 */

import type {
  Config,
  FilterConfig,
  LampConfig,
  LimitsConfig,
  LoggingConfig,
  SequenceConfig,
} from './types.js';

/**
 * Default sequence options: one pass, lamps left on, exposures taken.
 */
export const DEFAULT_SEQUENCE: SequenceConfig = {
  repeat_count: 1,
  lamps_off: false,
  no_exposure: false,
};

/**
 * Default limits (one hour for both warm-up and exposure time).
 */
export const DEFAULT_LIMITS: LimitsConfig = {
  max_warm_up: 3600,
  max_exptime: 3600,
};

/**
 * Filters installed in the two ND wheels.
 */
export const DEFAULT_FILTERS: FilterConfig = {
  nd1_positions: ['OD 0.1', 'OD 1.0', 'OD 1.3', 'OD 2.0', 'OD 3.0', 'OD 4.0'],
  nd2_positions: ['OD 0.1', 'OD 0.3', 'OD 0.5', 'OD 0.8', 'OD 1.0', 'OD 4.0'],
};

/**
 * Switched outlets of the calibration lamps.
 * EtalonFiber, SoCal-CalFib and LFCFiber are fed from sources that are not
 * switched here.
 */
export const DEFAULT_LAMPS: LampConfig = {
  outlets: {
    BrdbandFiber: 'OUTLET_CAL2_2',
    Th_gold: 'OUTLET_CAL2_5',
    Th_daily: 'OUTLET_CAL2_6',
    U_gold: 'OUTLET_CAL2_7',
    U_daily: 'OUTLET_CAL2_8',
  },
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  sequence: DEFAULT_SEQUENCE,
  limits: DEFAULT_LIMITS,
  filters: DEFAULT_FILTERS,
  lamps: DEFAULT_LAMPS,
  logging: DEFAULT_LOGGING,
};
