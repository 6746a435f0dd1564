/**
 * SCPI Response Parser
 *
 * Turns raw reply lines into typed values, independent of the transport.
 *
 * Failure sentinels:
 * - numbers:  NaN
 * - booleans: false (a safety condition is never assumed to hold)
 * - keywords: UNEXPECTED_RESPONSE for unknown tokens, '' when nothing arrived
 */

import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';

/** Marker for a reply that does not match any known token */
export const UNEXPECTED_RESPONSE = 'unexpected response';

// Instruments answer 9.9E37 for "no valid reading"
const OVERFLOW = 9e36;

const ON_TOKENS = new Set(['1', 'ON', 'CLOSED']);
const OFF_TOKENS = new Set(['0', 'OFF']);

const normalize = (reply: string) => reply.trim().toUpperCase();

// Decimal NR1/NR2/NR3 only; rejects 0x10, 0b101, Infinity
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseNumber(response: string): Result<number, string> {
  const text = response.trim();
  if (text === '') return Err('empty response');

  if (!DECIMAL.test(text)) return Err(`non-numeric response: "${text}"`);
  const value = Number(text);
  if (Math.abs(value) > OVERFLOW) return Err('overflow (9.9E37)');
  return Ok(value);
}

function parseNumberOr(response: string, fallback: number): number {
  const parsed = parseNumber(response);
  return parsed.ok ? parsed.value : fallback;
}

/** Strict on/off: null when the reply is neither */
function parseState(response: string): boolean | null {
  const token = normalize(response);
  if (ON_TOKENS.has(token)) return true;
  return OFF_TOKENS.has(token) ? false : null;
}

// Keys compare case-insensitively against the reply
function parseEnum<T>(response: string, map: Record<string, T>): Result<T, string> {
  const token = normalize(response);
  const hit = Object.entries(map).find(([key]) => key.toUpperCase() === token);
  if (hit) return Ok(hit[1]);
  return Err(`unknown value "${token}", expected one of: ${Object.keys(map).join(', ')}`);
}

export const ScpiParser = {
  parseNumber,
  parseNumberOr,

  /** NaN on transport failure or a non-numeric reply */
  parseNumberResult(result: Result<string, Error>): number {
    return result.ok ? parseNumberOr(result.value, NaN) : NaN;
  },

  /** "1", "ON" and "CLOSED" in any case; anything else is false */
  parseBool(response: string): boolean {
    return parseState(response) === true;
  },

  parseBoolResult(result: Result<string, Error>): boolean {
    return result.ok && parseState(result.value) === true;
  },

  parseState,
  parseEnum,

  /**
   * Map an abbreviated keyword reply to its long form.
   *
   * @param map - Device abbreviation to canonical name, e.g. { CURR: 'CurrentMode' }
   * @returns the canonical name, UNEXPECTED_RESPONSE, or '' on transport failure
   */
  parseKeyword<T extends string>(
    result: Result<string, Error>,
    map: Record<string, T>
  ): T | typeof UNEXPECTED_RESPONSE | '' {
    if (!result.ok) return '';
    const parsed = parseEnum(result.value, map);
    return parsed.ok ? parsed.value : UNEXPECTED_RESPONSE;
  },
};
