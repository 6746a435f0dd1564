/**
 * Verbosity-gated console output
 *
 * - none: silent
 * - few:  operations, warnings and readback mismatches
 * - all:  additionally every command and response
 */

import type { Verbosity } from './types.js';

export interface Messages {
  readonly level: Verbosity;
  few(line: string): void;
  all(line: string): void;
  warn(line: string): void;
}

export function createMessages(deviceName: string, level: Verbosity): Messages {
  const prefix = `[${deviceName}]`;

  return {
    level,

    few(line: string): void {
      if (level !== 'none') console.log(`${prefix} ${line}`);
    },

    all(line: string): void {
      if (level === 'all') console.log(`${prefix} ${line}`);
    },

    warn(line: string): void {
      if (level !== 'none') console.warn(`${prefix} Warning - ${line}`);
    },
  };
}
