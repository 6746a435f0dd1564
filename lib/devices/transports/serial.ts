/**
 * Serial Transport
 * Line-oriented SCPI over a serial port (USB CDC or RS-232)
 *
 * Some firmware echoes every command before answering. With `echo` set,
 * query() discards a first line equal to the sent command and returns the
 * line after it; write() discards the echo if it arrives.
 */

import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import type { LineTransport, LineTerminator } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { createCommandLock } from './command-lock.js';

export interface SerialConfig {
  path: string;
  baudRate: number;
  terminator?: LineTerminator;  // line terminator (default: '\n')
  echo?: boolean;               // device echoes commands (default: false)
  commandDelay?: number;        // ms delay between commands (default: 50)
  timeout?: number;             // query timeout in ms (default: 2000)
}

type PortState =
  | { kind: 'closed' }
  | { kind: 'open'; port: SerialPort; parser: ReadlineParser }
  | { kind: 'lost'; port: SerialPort; parser: ReadlineParser; error: Error };

/** True when a received line is the device repeating the command */
export function isEchoOf(line: string, cmd: string): boolean {
  return line.trim() === cmd.trim();
}

const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));
const pause = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

// Received lines, handed to at most one waiting reader
function createInbox() {
  const lines: string[] = [];
  let reader: ((line: string) => void) | null = null;

  return {
    deliver(line: string): void {
      if (reader) {
        const take = reader;
        reader = null;
        take(line);
      } else {
        lines.push(line);
      }
    },

    clear(): void {
      lines.length = 0;
    },

    /** Drops the oldest line when it matches */
    dropIf(match: (line: string) => boolean): void {
      if (lines.length > 0 && match(lines[0])) lines.shift();
    },

    next(timeoutMs: number, context: string): Promise<Result<string, Error>> {
      const buffered = lines.shift();
      if (buffered !== undefined) return Promise.resolve(Ok(buffered));

      return new Promise(resolve => {
        const timer = setTimeout(() => {
          reader = null;
          resolve(Err(new Error(`Timeout waiting for response to: ${context}`)));
        }, timeoutMs);
        reader = line => {
          clearTimeout(timer);
          resolve(Ok(line));
        };
      });
    },
  };
}

export function createSerialTransport(config: SerialConfig): LineTransport {
  const { path, baudRate, terminator = '\n', echo = false, commandDelay = 50, timeout = 2000 } = config;

  const exclusive = createCommandLock();
  const inbox = createInbox();
  let state: PortState = { kind: 'closed' };

  function lose(error: Error): void {
    if (state.kind === 'open') state = { ...state, kind: 'lost', error };
  }

  function openPort(): Result<SerialPort, Error> {
    if (state.kind === 'open') return Ok(state.port);
    return Err(state.kind === 'lost' ? state.error : new Error('Port not opened'));
  }

  function send(port: SerialPort, line: string): Promise<Result<void, Error>> {
    return new Promise(resolve => {
      port.write(line + terminator, err => resolve(err ? Err(toError(err)) : Ok(undefined)));
    });
  }

  // Runs one exchange on the open port, under the lock
  function onPort<T>(exchange: (port: SerialPort) => Promise<Result<T, Error>>): Promise<Result<T, Error>> {
    return exclusive(async () => {
      const port = openPort();
      return port.ok ? exchange(port.value) : port;
    });
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (state.kind === 'open') return Ok(undefined);

      const port = new SerialPort({ path, baudRate, autoOpen: false });
      const parser = port.pipe(new ReadlineParser({ delimiter: terminator }));
      parser.on('data', (data: string) => inbox.deliver(data.trim()));
      port.on('close', () => lose(new Error('SERIAL_PORT_DISCONNECTED: Port closed')));
      port.on('error', (err: Error) => lose(new Error(`SERIAL_PORT_ERROR: ${err.message}`)));

      const opened = await new Promise<Result<void, Error>>(resolve => {
        port.open(err => resolve(err ? Err(toError(err)) : Ok(undefined)));
      });
      if (!opened.ok) {
        port.removeAllListeners();
        parser.removeAllListeners();
        return opened;
      }

      inbox.clear();
      state = { kind: 'open', port, parser };
      return Ok(undefined);
    },

    async close(): Promise<Result<void, Error>> {
      if (state.kind === 'closed') return Ok(undefined);

      // Waits for an in-flight exchange
      return exclusive(async () => {
        if (state.kind === 'closed') return Ok(undefined);
        const { port, parser } = state;
        const stillOpen = state.kind === 'open';
        state = { kind: 'closed' };

        parser.removeAllListeners();
        port.removeAllListeners();
        if (stillOpen) {
          await new Promise<void>(resolve => port.close(() => resolve()));
        }
        inbox.clear();
        return Ok(undefined);
      });
    },

    query(cmd: string): Promise<Result<string, Error>> {
      return onPort(async port => {
        // Stale lines belong to an earlier, timed-out exchange
        inbox.clear();

        const sent = await send(port, cmd);
        if (!sent.ok) return sent;

        let reply = await inbox.next(timeout, cmd);
        if (echo && reply.ok && isEchoOf(reply.value, cmd)) {
          reply = await inbox.next(timeout, cmd);
        }

        await pause(commandDelay);
        return reply;
      });
    },

    write(cmd: string): Promise<Result<void, Error>> {
      return onPort(async port => {
        inbox.clear();
        const sent = await send(port, cmd);
        if (!sent.ok) return sent;

        await pause(commandDelay);
        if (echo) inbox.dropIf(line => isEchoOf(line, cmd));
        return Ok(undefined);
      });
    },

    writeLine(line: string): Promise<Result<void, Error>> {
      return onPort(port => send(port, line));
    },

    readLine(timeoutMs: number = timeout): Promise<Result<string, Error>> {
      return onPort(() => inbox.next(timeoutMs, 'readLine'));
    },

    isOpen(): boolean {
      return state.kind === 'open';
    },
  };
}
