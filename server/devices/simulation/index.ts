/**
 * Simulation Module
 * Creates simulated QDAC-IIs using the real driver over a simulated transport
 *
 * Usage:
 *   const { qdac, simulator } = await createSimulatedQdac({ name: 'dac1' });
 *
 * Configuration via environment variables:
 *   SIM_LATENCY_MS  - Command latency (default: 0)
 *   SIM_LEAKAGE_OHM - Channel-to-ground resistance (default: 1e9)
 */

import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { loadConfigFromEnv } from '../../config.js';
import { createQdac2, type Qdac2, type Qdac2Options } from '../drivers/qdac2.js';
import type { Transport } from '../types.js';
import { createDacSimulator, type DacSimulator } from './dac-simulator.js';
import { createSimulatedTransport } from './simulated-transport.js';

export interface SimulatedQdacConfig extends Qdac2Options {
  latencyMs?: number;
  leakageOhm?: number;
  serial?: string;
  firmware?: string;
}

export interface SimulatedQdac {
  qdac: Qdac2;
  simulator: DacSimulator;
  transport: Transport;
}

/**
 * Create a simulated QDAC-II, connect it and check its identity the same way
 * a real one is checked.
 */
export async function createSimulatedQdac(config: SimulatedQdacConfig): Promise<Result<SimulatedQdac, Error>> {
  const env = loadConfigFromEnv();
  const { latencyMs, leakageOhm, serial, firmware, ...options } = config;

  const simulator = createDacSimulator({
    serial,
    firmware,
    channelCount: options.channelCount ?? env.channelCount,
    leakageOhm: leakageOhm ?? env.simLeakageOhm,
  });
  const transport = createSimulatedTransport(
    cmd => simulator.handleCommand(cmd),
    { latencyMs: latencyMs ?? env.simLatencyMs }
  );
  const qdac = createQdac2(transport, options);

  const connected = await qdac.connect();
  if (!connected.ok) return connected;
  const probed = await qdac.probe();
  if (!probed.ok) return Err(new Error(`${probed.error.reason}: ${probed.error.message}`));

  return Ok({ qdac, simulator, transport });
}

export type { DacSimulator, DacSimulatorConfig } from './dac-simulator.js';
export { createDacSimulator } from './dac-simulator.js';
export { createSimulatedTransport, type SimulatedTransportConfig } from './simulated-transport.js';
