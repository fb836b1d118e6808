/**
 * QDAC-II Driver
 * 24-channel DC voltage source with list generators and internal triggers
 *
 * The instrument object owns the command stream (one transport, commands
 * strictly in order), the channel proxies and the pool of internal triggers.
 * It is passed explicitly to arrangements and instrument arrays; there is
 * no registry of instruments.
 */

import type {
  CommandSink,
  InstrumentInfo,
  InternalTrigger,
  ProbeError,
  Transport,
} from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err, ResourceExhaustedError, ValidationError } from '../../../shared/types.js';
import { command, node, query, renderCommand, type ScpiCommand } from '../scpi-command.js';
import { ScpiParser, type ScpiErrorEntry } from '../scpi-parser.js';
import { createQdac2Channel, type Qdac2Channel } from './qdac2-channel.js';
import { createTriggerPool, type TriggerLease, type TriggerPool } from '../../gates/TriggerPool.js';
import { loadConfigFromEnv } from '../../config.js';

export const QDAC2_MODEL = 'QDAC-II';
export const MIN_FIRMWARE = [0, 17, 5];

/** Physical trigger connectors on the back panel */
export const EXTERNAL_INPUTS = 4;
export const EXTERNAL_OUTPUTS = 5;

export interface Qdac2Options {
  /** Unique name used to tell instruments apart */
  name: string;
  channelCount?: number;
  triggerCount?: number;
  /** Mains frequency, sets the current integration wait (default: 50) */
  lineFrequencyHz?: number;
  /** Round physical voltages of arrangements to this many decimals */
  roundOffDecimals?: number | null;
  /** Log every command sent */
  trace?: boolean;
}

export interface Qdac2 extends CommandSink {
  readonly info: InstrumentInfo;
  readonly channelCount: number;
  readonly lineFrequencyHz: number;
  readonly roundOffDecimals: number | null;
  readonly triggers: TriggerPool;

  probe(): Promise<Result<InstrumentInfo, ProbeError>>;
  connect(): Promise<Result<void, Error>>;
  disconnect(): Promise<Result<void, Error>>;

  channel(number: number): Result<Qdac2Channel, ValidationError>;

  allocateTrigger(): Result<TriggerLease, ResourceExhaustedError>;
  /** Forget every trigger allocation (driver side only) */
  freeAllTriggers(): void;
  /** Assert an internal trigger (`tint`) */
  fire(trigger: InternalTrigger): Promise<Result<void, Error>>;
  /** Route an internal trigger to an external output connector */
  connectExternalTrigger(port: number, trigger: InternalTrigger, widthS?: number): Promise<Result<void, Error>>;

  /** Bus trigger (*TRG): starts every generator waiting on the bus */
  startAll(): Promise<Result<void, Error>>;
  abortAll(): Promise<Result<void, Error>>;
  reset(): Promise<Result<void, Error>>;

  /** Retrieve and clear every queued error */
  errors(): Promise<Result<ScpiErrorEntry[], Error>>;
  /** Retrieve the oldest queued error, null when the queue is empty */
  nextError(): Promise<Result<ScpiErrorEntry | null, Error>>;
  errorCount(): Promise<Result<number, Error>>;
}

export function createQdac2(transport: Transport, options: Qdac2Options): Qdac2 {
  const env = loadConfigFromEnv();
  const name = options.name;
  const channelCount = options.channelCount ?? env.channelCount;
  const lineFrequencyHz = options.lineFrequencyHz ?? env.lineFrequencyHz;
  const roundOffDecimals = options.roundOffDecimals ?? null;
  const trace = options.trace ?? env.trace;
  const triggers = createTriggerPool(options.triggerCount ?? env.triggerCount, name);

  const info: InstrumentInfo = {
    name,
    manufacturer: 'QDevil',
    model: QDAC2_MODEL,
  };

  async function send(...commands: ScpiCommand[]): Promise<Result<void, Error>> {
    for (const cmd of commands) {
      const text = renderCommand(cmd);
      if (trace) console.log(`[Qdac2] ${name} << ${text}`);
      const result = await transport.write(text);
      if (!result.ok) return result;
    }
    return Ok();
  }

  async function ask(cmd: ScpiCommand): Promise<Result<string, Error>> {
    const text = renderCommand(cmd);
    if (trace) console.log(`[Qdac2] ${name} << ${text}`);
    const result = await transport.query(text);
    if (trace && result.ok) console.log(`[Qdac2] ${name} >> ${result.value.trim()}`);
    return result;
  }

  const sink: CommandSink = { name, send, ask };

  // Channel proxies are stateless; build them once
  const channels = new Map<number, Qdac2Channel>();
  for (let n = 1; n <= channelCount; n++) {
    channels.set(n, createQdac2Channel(sink, n));
  }

  return {
    name,
    info,
    channelCount,
    lineFrequencyHz,
    roundOffDecimals,
    triggers,
    send,
    ask,

    async probe(): Promise<Result<InstrumentInfo, ProbeError>> {
      const result = await ask(query(['*IDN']));
      if (!result.ok) {
        return Err({ reason: 'timeout', message: result.error.message });
      }

      const idn = ScpiParser.parseIdn(result.value);
      if (!idn.ok) {
        return Err({ reason: 'parse_error', message: idn.error });
      }

      const { manufacturer, model, serial, firmware } = idn.value;
      if (model !== QDAC2_MODEL) {
        return Err({
          reason: 'wrong_device',
          message: `Unknown model ${model}. Are you using the right driver for your instrument?`,
        });
      }

      const version = ScpiParser.parseFirmwareVersion(firmware);
      if (!version.ok) {
        return Err({ reason: 'parse_error', message: version.error });
      }
      if (ScpiParser.compareVersions(version.value, MIN_FIRMWARE) < 0) {
        return Err({
          reason: 'incompatible_firmware',
          message: `Incompatible firmware ${version.value.join('.')}. You need at least ${MIN_FIRMWARE.join('.')}`,
        });
      }

      info.manufacturer = manufacturer;
      info.serial = serial;
      info.firmware = firmware;
      return Ok(info);
    },

    async connect(): Promise<Result<void, Error>> {
      const result = await transport.open();
      if (result.ok) console.log(`[Qdac2] ${name} connected`);
      return result;
    },

    async disconnect(): Promise<Result<void, Error>> {
      const result = await transport.close();
      if (result.ok) console.log(`[Qdac2] ${name} disconnected`);
      return result;
    },

    channel(number: number): Result<Qdac2Channel, ValidationError> {
      const channel = channels.get(number);
      if (!channel) {
        return Err(new ValidationError(`${name} has no channel ${number} (1..${channelCount})`));
      }
      return Ok(channel);
    },

    allocateTrigger(): Result<TriggerLease, ResourceExhaustedError> {
      return triggers.allocate();
    },

    freeAllTriggers(): void {
      triggers.reset();
    },

    async fire(trigger: InternalTrigger): Promise<Result<void, Error>> {
      return send(command(['tint'], trigger.value));
    },

    async connectExternalTrigger(port: number, trigger: InternalTrigger, widthS = 1e-6): Promise<Result<void, Error>> {
      if (!Number.isInteger(port) || port < 1 || port > EXTERNAL_OUTPUTS) {
        return Err(new ValidationError(`${name} has no external output trigger ${port} (1..${EXTERNAL_OUTPUTS})`));
      }
      const out = node('trig', port);
      return send(
        command(['outp', out, 'sour'], `int${trigger.value}`),
        command(['outp', out, 'widt'], widthS)
      );
    },

    async startAll(): Promise<Result<void, Error>> {
      return send(command(['*trg']));
    },

    async abortAll(): Promise<Result<void, Error>> {
      return send(command(['abor']));
    },

    async reset(): Promise<Result<void, Error>> {
      return send(command(['*rst']));
    },

    async errors(): Promise<Result<ScpiErrorEntry[], Error>> {
      const result = await ask(query(['syst', 'err', 'all']));
      if (!result.ok) return result;
      const parsed = ScpiParser.parseErrorQueue(result.value);
      if (!parsed.ok) return Err(new Error(parsed.error));
      return Ok(parsed.value);
    },

    async nextError(): Promise<Result<ScpiErrorEntry | null, Error>> {
      const result = await ask(query(['syst', 'err']));
      if (!result.ok) return result;
      const parsed = ScpiParser.parseErrorQueue(result.value);
      if (!parsed.ok) return Err(new Error(parsed.error));
      return Ok(parsed.value.length > 0 ? parsed.value[0] : null);
    },

    async errorCount(): Promise<Result<number, Error>> {
      const result = await ask(query(['syst', 'err', 'coun']));
      if (!result.ok) return result;
      const parsed = ScpiParser.parseNumber(result.value);
      if (!parsed.ok) return Err(new Error(parsed.error));
      return Ok(parsed.value);
    },
  };
}
