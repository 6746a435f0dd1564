/**
 * Readback Verifier
 *
 * After a setter writes a value, the same setting is queried once and
 * compared with what was requested. A disagreement is reported as
 * SetStatus.Mismatch, never thrown.
 */

import type { Transport } from './types.js';
import { SetStatus } from '../../shared/types.js';
import type { Messages } from './messages.js';

export interface Tolerances {
  /** Relative tolerance for continuous values */
  relative: number;
  /** Range readback band: accept when low * actual >= requested and actual <= high * requested */
  rangeLow: number;
  rangeHigh: number;
}

export const DEFAULT_TOLERANCES: Tolerances = {
  relative: 0.01,
  rangeLow: 1.05,
  rangeHigh: 9.6,
};

export function verifyExact<T>(requested: T, actual: T | null): boolean {
  return actual !== null && actual === requested;
}

/** Case-insensitive token comparison */
export function verifyToken(requested: string, actual: string): boolean {
  return actual.trim().toUpperCase() === requested.trim().toUpperCase();
}

/**
 * |actual - requested| <= tolerance * |requested|; NaN never verifies.
 */
export function verifyRelative(requested: number, actual: number, tolerance: number): boolean {
  if (Number.isNaN(actual) || Number.isNaN(requested)) return false;
  return Math.abs(actual - requested) <= tolerance * Math.abs(requested);
}

/**
 * Hardware ranges are discrete steps: the device picks the smallest range
 * that covers the request, so the readback may be larger than requested.
 */
export function verifyRange(
  requested: number,
  actual: number,
  tolerances: Pick<Tolerances, 'rangeLow' | 'rangeHigh'>
): boolean {
  if (Number.isNaN(actual) || Number.isNaN(requested)) return false;
  return tolerances.rangeLow * actual >= requested && actual <= tolerances.rangeHigh * requested;
}

export interface ReadbackStep<T> {
  /** Setting name used in diagnostics */
  label: string;
  command: string;
  query: string;
  parse(response: string): T;
  /** Value returned when the query itself fails */
  failed: T;
  matches(actual: T): boolean;
  /** Display form of the requested value */
  wanted: string;
  show(actual: T): string;
}

export interface ReadbackOutcome<T> {
  status: SetStatus;
  actual: T;
}

/**
 * Write a command, read the setting back once and compare.
 */
export async function writeAndVerify<T>(
  transport: Transport,
  step: ReadbackStep<T>,
  messages: Messages
): Promise<ReadbackOutcome<T>> {
  messages.all(`> ${step.command}`);
  const writeResult = await transport.write(step.command);
  if (!writeResult.ok) {
    messages.warn(`write failed for ${step.label}: ${writeResult.error.message}`);
  }

  const response = await transport.query(step.query);
  const actual = response.ok ? step.parse(response.value) : step.failed;
  if (response.ok) {
    messages.all(`< ${response.value}`);
  } else {
    messages.warn(`readback failed for ${step.label}: ${response.error.message}`);
  }

  if (step.matches(actual)) {
    return { status: SetStatus.Verified, actual };
  }

  messages.few(`parameter value for ${step.label} was not set properly.`);
  messages.few(`  wanted value      : ${step.wanted}`);
  messages.few(`  actually set value: ${step.show(actual)}`);
  return { status: SetStatus.Mismatch, actual };
}
