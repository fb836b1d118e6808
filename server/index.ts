/**
 * gatebench
 * Virtual gates, sweeps and leakage measurements on QDAC-II instruments
 *
 *   const transport = createSerialTransport({ path: '/dev/ttyACM0' });
 *   const qdac = createQdac2(transport, { name: 'dac1' });
 *   await qdac.connect();
 *   const gates = await createArrangement(qdac, { contacts: { plunger: 3, barrier: 4 } });
 */

export * from '../shared/types.js';
export * from '../shared/sweep.js';

export { loadConfigFromEnv, type GatebenchConfig } from './config.js';

export type {
  Transport,
  InternalTrigger,
  CommandSink,
  ProbeError,
  InstrumentInfo,
  SerialOptions,
} from './devices/types.js';
export {
  command,
  query,
  source,
  channels,
  node,
  formatG,
  renderCommand,
  type ScpiCommand,
  type ScpiArg,
  type ScpiNode,
  type ChannelList,
} from './devices/scpi-command.js';
export { ScpiParser, type Identity, type ScpiErrorEntry } from './devices/scpi-parser.js';

export {
  createQdac2,
  QDAC2_MODEL,
  MIN_FIRMWARE,
  EXTERNAL_INPUTS,
  EXTERNAL_OUTPUTS,
  type Qdac2,
  type Qdac2Options,
} from './devices/drivers/qdac2.js';
export {
  createQdac2Channel,
  validateList,
  isValidRepetitions,
  MAX_LIST_POINTS,
  VOLTAGE_LIMIT_V,
  type Qdac2Channel,
  type PeriodicMarker,
  type PeriodicMarkerOptions,
} from './devices/drivers/qdac2-channel.js';

export { createSerialTransport, findSerialPort, type SerialConfig } from './devices/transports/serial.js';
export * from './devices/simulation/index.js';

export { createTriggerPool, withTrigger, type TriggerPool, type TriggerLease } from './gates/TriggerPool.js';
export {
  createArrangement,
  withArrangement,
  type Arrangement,
  type ArrangementOptions,
  type ContactList,
} from './gates/Arrangement.js';
export {
  runSweepPlan,
  withSweep,
  sweep1d,
  sweep2d,
  sweepDetune,
  type VirtualSweep,
  type SweepHost,
  type SweepPlan,
  type FanOut,
} from './gates/VirtualSweep.js';
export { measureCurrents, measureLeakage, leakageResistanceOhm } from './gates/Leakage.js';
export {
  createInstrumentArray,
  type InstrumentArray,
  type ArrayArrangement,
  type ArrayArrangementOptions,
} from './gates/InstrumentArray.js';
