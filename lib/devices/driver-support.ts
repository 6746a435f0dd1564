/**
 * Pieces every instrument driver composes: option resolution and the
 * numeric set-then-verify step.
 */

import type { DeviceMetadata, Verbosity } from './types.js';
import type { ScpiConfig } from '../config.js';
import { loadConfigFromEnv } from '../config.js';
import type { Messages } from './messages.js';
import { createMessages } from './messages.js';
import type { Tolerances, ReadbackStep } from './readback.js';
import { verifyRelative } from './readback.js';
import type { BuiltCommand, CommandTemplate } from './command-builder.js';
import { toCallerUnits } from './command-builder.js';
import { ScpiParser } from './scpi-parser.js';

export interface DriverOptions {
  verbosity?: Verbosity;
  tolerances?: Partial<Tolerances>;
  errorQueueMaxReads?: number;
  metadata?: Partial<DeviceMetadata>;
  /** Base configuration; read from the environment when omitted */
  config?: ScpiConfig;
}

export interface DriverContext {
  messages: Messages;
  tolerances: Tolerances;
  maxReads: number;
  metadata: DeviceMetadata;
}

export function resolveDriverOptions(defaults: DeviceMetadata, options: DriverOptions = {}): DriverContext {
  const config = options.config ?? loadConfigFromEnv();
  const metadata = { ...defaults, ...options.metadata };

  return {
    messages: createMessages(metadata.name, options.verbosity ?? config.verbosity),
    tolerances: {
      relative: config.readbackTolerance,
      rangeLow: config.rangeBandLow,
      rangeHigh: config.rangeBandHigh,
      ...options.tolerances,
    },
    maxReads: options.errorQueueMaxReads ?? config.errorQueueMaxReads,
    metadata,
  };
}

/** A numeric setting with a readback query */
export type NumericSetting = CommandTemplate & { query: string };

/**
 * Numeric value of a validated parameter; null when absent or not a finite number.
 */
export function paramNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = ScpiParser.parseNumber(value);
  return parsed.ok && Number.isFinite(parsed.value) ? parsed.value : null;
}

/**
 * Readback step for a numeric setting, compared in caller units.
 */
export function numericReadback(
  setting: NumericSetting,
  built: BuiltCommand,
  matches: (requested: number, actual: number) => boolean
): ReadbackStep<number> {
  return {
    label: setting.name,
    command: built.command,
    query: setting.query,
    parse: response => toCallerUnits(setting, ScpiParser.parseNumberOr(response, NaN)),
    failed: NaN,
    matches: actual => matches(built.value, actual),
    wanted: String(built.value),
    show: String,
  };
}

export function relativeMatch(tolerance: number): (requested: number, actual: number) => boolean {
  return (requested, actual) => verifyRelative(requested, actual, tolerance);
}

export const delay = (ms: number) => new Promise(r => setTimeout(r, ms));
