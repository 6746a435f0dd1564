/**
 * Simulated Transport
 * Hands each command to an in-process instrument model, after a delay
 * shaped like a real bus round trip.
 */

import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { createCommandLock } from '../transports/command-lock.js';

export interface SimulatedTransportConfig {
  /** Base latency in ms (default: 20) */
  latencyMs?: number;
  /** Random jitter range in ms (default: 10) */
  jitterMs?: number;
}

/** Reply text for a query, null when the command produces none */
export type CommandHandler = (cmd: string) => string | null;

export function createSimulatedTransport(
  handler: CommandHandler,
  config: SimulatedTransportConfig = {}
): Transport {
  const { latencyMs = 20, jitterMs = 10 } = config;
  const exclusive = createCommandLock();
  let open = false;

  const roundTrip = (): Promise<void> => {
    const ms = latencyMs + Math.random() * jitterMs;
    return ms > 0 ? new Promise(r => setTimeout(r, ms)) : Promise.resolve();
  };

  // Both directions go through the model; a write just drops the reply
  function exchange(cmd: string): Promise<Result<string, Error>> {
    return exclusive(async () => {
      if (!open) return Err(new Error('Transport not open'));
      await roundTrip();
      return Ok(handler(cmd) ?? '');
    });
  }

  return {
    async open() {
      open = true;
      return Ok(undefined);
    },

    async close() {
      open = false;
      return Ok(undefined);
    },

    query: exchange,

    async write(cmd: string): Promise<Result<void, Error>> {
      const sent = await exchange(cmd);
      return sent.ok ? Ok(undefined) : sent;
    },

    isOpen: () => open,
  };
}
