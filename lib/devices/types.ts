// Re-export shared types
export * from '../../shared/types.js';

import type { Result } from '../../shared/types.js';

// Driver-side types

export interface Transport {
  open(): Promise<Result<void, Error>>;
  close(): Promise<Result<void, Error>>;
  query(cmd: string): Promise<Result<string, Error>>;
  write(cmd: string): Promise<Result<void, Error>>;
  isOpen(): boolean;
}

/**
 * Transport with raw line access, for devices whose protocol needs more
 * than one read per command (e.g. firmware that echoes what it receives).
 */
export interface LineTransport extends Transport {
  writeLine(line: string): Promise<Result<void, Error>>;
  readLine(timeoutMs?: number): Promise<Result<string, Error>>;
}

export type LineTerminator = '\n' | '\r\n';
