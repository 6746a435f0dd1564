// Shared types for drivers, transports and simulators

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (transport layer wrapping external libs).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============ Protocol Types ============

/**
 * Outcome of every setter.
 * - Verified: written and confirmed by readback
 * - NotSent: nothing was written (no usable value supplied)
 * - Mismatch: written, but the readback disagrees
 */
export const SetStatus = {
  Verified: 0,
  NotSent: 1,
  Mismatch: 2,
} as const;

export type SetStatus = (typeof SetStatus)[keyof typeof SetStatus];

/** How much human-readable progress text a driver prints */
export type Verbosity = 'none' | 'few' | 'all';

export type Severity = 'Error' | 'Warning' | 'Info' | 'Unknown';

export interface ErrorLogEntry {
  timestamp: Date | null;
  code: number | null;
  severity: Severity;
  description: string;
  /** Original reply, kept for entries that could not be parsed */
  raw?: string;
}

/** Injected at construction instead of static version constants */
export interface DeviceMetadata {
  name: string;
  version: string;
  date: string;
}

export type LaserMode = 'CurrentMode' | 'PowerMode';

export interface DeviceStatus {
  outputEnabled: boolean;
  mode: LaserMode | null;
  lastError?: string;
}

/** Outcome of a multi-parameter configure call */
export interface ConfigureReport<F extends string = string> {
  statuses: Partial<Record<F, SetStatus>>;
  diagnostics: string[];
}
