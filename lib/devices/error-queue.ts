/**
 * Error-Queue Accumulator
 *
 * Drains a device's error/event queue into a session log. Reading the device
 * queue is destructive, so the log is the only record of past entries; it
 * grows until clear() is called.
 *
 * Dialects:
 * - scpi:     "next error" query repeated until code 0 / "no error"
 * - eventlog: count query followed by one "next event" query per entry
 */

import type { Transport } from './types.js';
import type { ErrorLogEntry, Result, Severity } from '../../shared/types.js';
import { Ok } from '../../shared/types.js';
import { ScpiParser, UNEXPECTED_RESPONSE } from './scpi-parser.js';
import type { Messages } from './messages.js';

export type ErrorQueueDialect =
  | { kind: 'scpi'; query: string; clearCommand: string }
  | { kind: 'eventlog'; countQuery: string; nextQuery: string; clearCommand: string };

export interface ErrorQueueOptions {
  /** Upper bound on reads per drain (default: 10) */
  maxReads?: number;
  /** Clock for entries without a device timestamp */
  now?: () => Date;
}

export interface ErrorQueue {
  /** Drain the device queue; returns only the entries read by this call */
  read(): Promise<ErrorLogEntry[]>;
  /** Every entry read in this session */
  history(): readonly ErrorLogEntry[];
  /** Clear the device queue, then the local log (only if the device accepted) */
  clear(): Promise<Result<void, Error>>;
}

export const QUEUE_READ_FAILED = 'ERROR: could not read error queue';
export const EVENT_LOG_READ_FAILED = 'ERROR: could not read event log';

const SCPI_ENTRY = /^([+-]?\d+)\s*,\s*(.*)$/;
const EVENT_ENTRY = /^(-?\d+),"(.*);(\d);([^;]*)"$/;
const EVENT_TIME = /^(\d{4})\/(\d{2})\/(\d{2}) (\d{2}):(\d{2}):(\d{2})\.(\d{3})$/;
const NO_ERROR = /no error/i;

const EVENT_SEVERITY: Record<string, Severity> = {
  '1': 'Error',
  '2': 'Warning',
  '4': 'Info',
};

function unquote(text: string): string {
  const trimmed = text.trim();
  return trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')
    ? trimmed.slice(1, -1)
    : trimmed;
}

/**
 * Parse a SYST:ERR? reply.
 *
 * @returns 'empty' for code 0 / "no error", otherwise a log entry
 */
export function parseScpiError(response: string, now: Date): ErrorLogEntry | 'empty' {
  const trimmed = response.trim();
  const match = SCPI_ENTRY.exec(trimmed);

  if (match) {
    const code = Number(match[1]);
    if (code === 0) return 'empty';
    return { timestamp: now, code, severity: 'Error', description: unquote(match[2]) };
  }
  if (NO_ERROR.test(trimmed)) return 'empty';

  return { timestamp: null, code: null, severity: 'Unknown', description: UNEXPECTED_RESPONSE, raw: trimmed };
}

/** "2025/03/14 09:26:53.589" in device local time */
export function parseEventTime(text: string): Date | null {
  const match = EVENT_TIME.exec(text.trim());
  if (!match) return null;
  const [year, month, day, hour, minute, second, ms] = match.slice(1).map(Number);
  return new Date(year, month - 1, day, hour, minute, second, ms);
}

/**
 * Parse an event-log entry: Code,"Description;Type;yyyy/MM/dd HH:mm:ss.SSS"
 */
export function parseEventEntry(response: string): ErrorLogEntry {
  const trimmed = response.trim();
  const match = EVENT_ENTRY.exec(trimmed);
  if (!match) {
    return { timestamp: null, code: null, severity: 'Unknown', description: UNEXPECTED_RESPONSE, raw: trimmed };
  }
  const [, code, description, type, time] = match;
  return {
    timestamp: parseEventTime(time),
    code: Number(code),
    severity: EVENT_SEVERITY[type] ?? 'Unknown',
    description,
  };
}

export function createErrorQueue(
  transport: Transport,
  dialect: ErrorQueueDialect,
  messages: Messages,
  options: ErrorQueueOptions = {}
): ErrorQueue {
  const { maxReads = 10, now = () => new Date() } = options;
  const log: ErrorLogEntry[] = [];

  function failure(description: string): ErrorLogEntry {
    return { timestamp: now(), code: null, severity: 'Unknown', description };
  }

  async function drainScpi(query: string): Promise<ErrorLogEntry[]> {
    const entries: ErrorLogEntry[] = [];

    for (let i = 0; i < maxReads; i++) {
      const result = await transport.query(query);
      if (!result.ok || result.value.trim() === '') {
        entries.push(failure(QUEUE_READ_FAILED));
        return entries;
      }
      const entry = parseScpiError(result.value, now());
      if (entry === 'empty') return entries;
      entries.push(entry);
    }

    messages.warn(`error queue not empty after ${maxReads} reads`);
    return entries;
  }

  async function drainEventLog(countQuery: string, nextQuery: string): Promise<ErrorLogEntry[]> {
    const count = ScpiParser.parseNumberResult(await transport.query(countQuery));
    if (Number.isNaN(count) || count < 0) {
      return [failure(EVENT_LOG_READ_FAILED)];
    }

    const reads = Math.min(Math.round(count), maxReads);
    if (reads < count) {
      messages.warn(`${count} events pending, reading ${reads}`);
    }

    const entries: ErrorLogEntry[] = [];
    for (let i = 0; i < reads; i++) {
      const result = await transport.query(nextQuery);
      entries.push(result.ok ? parseEventEntry(result.value) : failure(EVENT_LOG_READ_FAILED));
    }
    return entries;
  }

  return {
    async read(): Promise<ErrorLogEntry[]> {
      const entries = dialect.kind === 'scpi'
        ? await drainScpi(dialect.query)
        : await drainEventLog(dialect.countQuery, dialect.nextQuery);

      log.push(...entries);

      if (entries.length === 0) {
        messages.few('No new messages in error queue.');
      } else {
        messages.few('Error queue (new messages):');
        for (const entry of entries) {
          messages.few(`  ${entry.code ?? '-'} ${entry.severity}: ${entry.description}`);
        }
      }
      return entries;
    },

    history(): readonly ErrorLogEntry[] {
      return [...log];
    },

    async clear(): Promise<Result<void, Error>> {
      const result = await transport.write(dialect.clearCommand);
      if (!result.ok) {
        messages.warn(`clearing error queue failed: ${result.error.message}`);
        return result;
      }
      log.length = 0;
      return Ok(undefined);
    },
  };
}
