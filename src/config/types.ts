/**
 * Configuration types for calseq.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Defaults for the `plan` command.
 */
export interface SequenceConfig {
  /** Number of times the whole set of request files is repeated. */
  repeat_count: number;
  /** Whether lamps are powered off at the end of the sequence. */
  lamps_off: boolean;
  /** Whether exposure start and readout steps are left out (test runs). */
  no_exposure: boolean;
}

/**
 * Upper bounds applied by semantic request validation.
 */
export interface LimitsConfig {
  /** Longest accepted lamp warm-up in seconds. */
  max_warm_up: number;
  /** Longest accepted exposure time in seconds. */
  max_exptime: number;
}

/**
 * Installed ND filter wheel positions.
 * An empty list disables the position check for that wheel.
 */
export interface FilterConfig {
  nd1_positions: readonly string[];
  nd2_positions: readonly string[];
}

/**
 * Lamp power configuration.
 */
export interface LampConfig {
  /**
   * Power outlet keyword for each octagon source that has a switched lamp.
   * Sources without an entry are never powered on or off.
   */
  outlets: Readonly<Record<string, string>>;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Whether debug-level log entries are written. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from calseq.toml.
 */
export interface Config {
  sequence: SequenceConfig;
  limits: LimitsConfig;
  filters: FilterConfig;
  lamps: LampConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  sequence?: Partial<SequenceConfig>;
  limits?: Partial<LimitsConfig>;
  filters?: Partial<FilterConfig>;
  lamps?: Partial<LampConfig>;
  logging?: Partial<LoggingConfig>;
}
