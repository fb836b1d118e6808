/**
 * Simulated Transport
 * Implements Transport interface for simulated instruments
 *
 * Routes command text to a simulator and returns its answers, with optional
 * latency. Commands are serialized like on a real serial line.
 */

import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';

export interface SimulatedTransportConfig {
  /** Base latency in ms (default: 0) */
  latencyMs?: number;
  /** Random jitter range in ms (default: 0) */
  jitterMs?: number;
}

export type CommandHandler = (cmd: string) => string | null;

export function createSimulatedTransport(
  handler: CommandHandler,
  config: SimulatedTransportConfig = {}
): Transport {
  const { latencyMs = 0, jitterMs = 0 } = config;

  let opened = false;

  // Chain of pending commands; each waits for the one before it
  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = commandLock.then(fn);
    commandLock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async function delay(): Promise<void> {
    const total = latencyMs + Math.random() * jitterMs;
    if (total <= 0) return;
    await new Promise(r => setTimeout(r, total));
  }

  return {
    async open(): Promise<Result<void, Error>> {
      opened = true;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      opened = false;
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      if (!opened) return Err(new Error('Transport not opened'));
      return withLock(async () => {
        await delay();
        return Ok(handler(cmd) ?? '');
      });
    },

    async write(cmd: string): Promise<Result<void, Error>> {
      if (!opened) return Err(new Error('Transport not opened'));
      return withLock(async () => {
        await delay();
        handler(cmd);
        return Ok();
      });
    },

    isOpen(): boolean {
      return opened;
    },
  };
}
