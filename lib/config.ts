/**
 * Runtime configuration
 *
 * Defaults can be overridden through environment variables:
 *   SCPI_VERBOSITY             - none | few | all (default: few)
 *   SCPI_BAUD_RATE             - serial baud rate (default: 115200)
 *   SCPI_TIMEOUT_MS            - query timeout (default: 2000)
 *   SCPI_COMMAND_DELAY_MS      - pause after each serial command (default: 50)
 *   SCPI_READBACK_TOLERANCE    - relative readback tolerance (default: 0.01)
 *   SCPI_RANGE_BAND_LOW        - range readback band, lower factor (default: 1.05)
 *   SCPI_RANGE_BAND_HIGH       - range readback band, upper factor (default: 9.6)
 *   SCPI_ERROR_QUEUE_MAX_READS - reads per error-queue drain (default: 10)
 *   LASER_PORT / ROTARY_PORT   - serial port paths for the hardware harness
 */

import type { Verbosity } from './devices/types.js';

export interface ScpiConfig {
  verbosity: Verbosity;
  baudRate: number;
  timeoutMs: number;
  commandDelayMs: number;
  readbackTolerance: number;
  rangeBandLow: number;
  rangeBandHigh: number;
  errorQueueMaxReads: number;
  laserPort?: string;
  rotaryPort?: string;
}

export const DEFAULT_CONFIG: ScpiConfig = {
  verbosity: 'few',
  baudRate: 115200,
  timeoutMs: 2000,
  commandDelayMs: 50,
  readbackTolerance: 0.01,
  rangeBandLow: 1.05,
  rangeBandHigh: 9.6,
  errorQueueMaxReads: 10,
};

const VERBOSITY_LEVELS: readonly Verbosity[] = ['none', 'few', 'all'];

export function parseVerbosity(value: string | undefined, defaultVal: Verbosity): Verbosity {
  if (!value) return defaultVal;
  const lower = value.trim().toLowerCase();
  return VERBOSITY_LEVELS.find(level => level === lower) ?? defaultVal;
}

/**
 * Load configuration from environment variables with defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ScpiConfig {
  const parseFloat = (envVar: string | undefined, defaultVal: number): number => {
    if (!envVar) return defaultVal;
    const parsed = Number.parseFloat(envVar);
    return Number.isNaN(parsed) ? defaultVal : parsed;
  };

  const parseCount = (envVar: string | undefined, defaultVal: number): number => {
    const parsed = Math.round(parseFloat(envVar, defaultVal));
    return parsed >= 1 ? parsed : defaultVal;
  };

  return {
    verbosity: parseVerbosity(env.SCPI_VERBOSITY, DEFAULT_CONFIG.verbosity),
    baudRate: parseCount(env.SCPI_BAUD_RATE, DEFAULT_CONFIG.baudRate),
    timeoutMs: parseFloat(env.SCPI_TIMEOUT_MS, DEFAULT_CONFIG.timeoutMs),
    commandDelayMs: parseFloat(env.SCPI_COMMAND_DELAY_MS, DEFAULT_CONFIG.commandDelayMs),
    readbackTolerance: parseFloat(env.SCPI_READBACK_TOLERANCE, DEFAULT_CONFIG.readbackTolerance),
    rangeBandLow: parseFloat(env.SCPI_RANGE_BAND_LOW, DEFAULT_CONFIG.rangeBandLow),
    rangeBandHigh: parseFloat(env.SCPI_RANGE_BAND_HIGH, DEFAULT_CONFIG.rangeBandHigh),
    errorQueueMaxReads: parseCount(env.SCPI_ERROR_QUEUE_MAX_READS, DEFAULT_CONFIG.errorQueueMaxReads),
    laserPort: env.LASER_PORT || undefined,
    rotaryPort: env.ROTARY_PORT || undefined,
  };
}
