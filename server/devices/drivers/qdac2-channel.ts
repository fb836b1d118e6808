/**
 * QDAC-II output channel
 *
 * Stateless proxy for one output channel. Every method emits commands to the
 * instrument's command sink and returns without waiting for the hardware to
 * act on them.
 *
 * DC list generator lifecycle:
 *   loadList()  - upload values, arm on the bus trigger (nothing moves yet)
 *   startOn()   - fire when an internal trigger is asserted
 *   abort()     - stop and fall back to immediate triggering
 */

import type { CommandSink, InternalTrigger, Result } from '../types.js';
import { Ok, Err, ConfigurationError, ValidationError } from '../types.js';
import type { ListOptions } from '../../../shared/types.js';
import { command, exact, query, source, type ScpiCommand } from '../scpi-command.js';
import { ScpiParser } from '../scpi-parser.js';

/** Hardware list memory per channel */
export const MAX_LIST_POINTS = 65536;

/** Output range of every channel */
export const VOLTAGE_LIMIT_V = 10;

export interface PeriodicMarkerOptions {
  /** Length of one period in seconds */
  periodS: number;
  /** Number of periods, -1 for infinite */
  cycles: number;
}

/**
 * A zero-span sine generator used purely as a clock: it never changes the
 * output voltage but can emit a trigger at the start of each period.
 */
export interface PeriodicMarker {
  startOn(trigger: InternalTrigger): Promise<Result<void, Error>>;
  markPeriodStart(trigger: InternalTrigger): Promise<Result<void, Error>>;
  /** Stop the generator, clear the marker and return to immediate triggering */
  abort(): Promise<Result<void, Error>>;
}

export interface Qdac2Channel {
  readonly number: number;

  setVoltageNow(volts: number): Promise<Result<void, Error>>;
  voltage(): Promise<Result<number, Error>>;

  loadList(values: readonly number[], options?: ListOptions): Promise<Result<void, Error>>;
  appendList(values: readonly number[]): Promise<Result<void, Error>>;
  listValues(): Promise<Result<number[], Error>>;
  listPoints(): Promise<Result<number, Error>>;
  cyclesRemaining(): Promise<Result<number, Error>>;

  startOn(trigger: InternalTrigger): Promise<Result<void, Error>>;
  startOnExternal(input: number): Promise<Result<void, Error>>;
  startImmediate(): Promise<Result<void, Error>>;
  abort(): Promise<Result<void, Error>>;

  /** Emit `trigger` at the start of every list step; null clears the marker */
  markStepStart(trigger: InternalTrigger | null): Promise<Result<void, Error>>;
  periodicMarker(options: PeriodicMarkerOptions): Promise<Result<PeriodicMarker, Error>>;
}

const DEFAULT_LIST_OPTIONS: Required<Omit<ListOptions, 'expectedLength'>> = {
  dwellS: 1e-3,
  repetitions: 1,
  direction: 'up',
  stepped: false,
  delayS: 0,
};

export function isValidRepetitions(repetitions: number): boolean {
  return repetitions === -1 || (Number.isInteger(repetitions) && repetitions >= 1);
}

function checkVoltages(values: readonly number[], channel: number): ConfigurationError | null {
  if (values.length === 0) {
    return new ConfigurationError(`Channel ${channel}: voltage list is empty`);
  }
  if (values.length > MAX_LIST_POINTS) {
    return new ConfigurationError(
      `Channel ${channel}: ${values.length} voltages exceed the list limit of ${MAX_LIST_POINTS}`
    );
  }
  const bad = values.findIndex(v => !Number.isFinite(v) || Math.abs(v) > VOLTAGE_LIMIT_V);
  if (bad >= 0) {
    return new ConfigurationError(
      `Channel ${channel}: voltage ${values[bad]} at index ${bad} is outside ±${VOLTAGE_LIMIT_V} V`
    );
  }
  return null;
}

/**
 * Everything loadList() checks before it writes, so that callers loading
 * several channels can check them all up front.
 */
export function validateList(
  channel: number,
  values: readonly number[],
  options: ListOptions = {}
): ConfigurationError | null {
  const dwellS = options.dwellS ?? DEFAULT_LIST_OPTIONS.dwellS;
  const repetitions = options.repetitions ?? DEFAULT_LIST_OPTIONS.repetitions;
  const delayS = options.delayS ?? DEFAULT_LIST_OPTIONS.delayS;

  const invalid = checkVoltages(values, channel);
  if (invalid) return invalid;
  if (options.expectedLength !== undefined && values.length !== options.expectedLength) {
    return new ConfigurationError(
      `Channel ${channel}: expected ${options.expectedLength} voltages, got ${values.length}`
    );
  }
  if (!Number.isFinite(dwellS) || dwellS <= 0) {
    return new ConfigurationError(`Channel ${channel}: dwell must be positive, got ${dwellS}`);
  }
  if (!Number.isFinite(delayS) || delayS < 0) {
    return new ConfigurationError(`Channel ${channel}: delay must not be negative, got ${delayS}`);
  }
  if (!isValidRepetitions(repetitions)) {
    return new ConfigurationError(
      `Channel ${channel}: repetitions must be a positive integer or -1, got ${repetitions}`
    );
  }
  return null;
}

export function createQdac2Channel(sink: CommandSink, channel: number): Qdac2Channel {
  const sour = source(channel);

  function dcCommand(nodes: string[], ...args: Array<number | string>): ScpiCommand {
    return command([sour, 'dc', ...nodes], ...args);
  }

  function sineCommand(nodes: string[], ...args: Array<number | string>): ScpiCommand {
    return command([sour, 'sine', ...nodes], ...args);
  }

  async function askNumbers(cmd: ScpiCommand): Promise<Result<number[], Error>> {
    const response = await sink.ask(cmd);
    if (!response.ok) return response;
    const parsed = ScpiParser.parseFloats(response.value);
    if (!parsed.ok) return Err(new Error(`Channel ${channel}: ${parsed.error}`));
    return Ok(parsed.value);
  }

  async function askNumber(cmd: ScpiCommand): Promise<Result<number, Error>> {
    const response = await sink.ask(cmd);
    if (!response.ok) return response;
    const parsed = ScpiParser.parseNumber(response.value);
    if (!parsed.ok) return Err(new Error(`Channel ${channel}: ${parsed.error}`));
    return Ok(parsed.value);
  }

  return {
    number: channel,

    async setVoltageNow(volts: number): Promise<Result<void, Error>> {
      if (!Number.isFinite(volts) || Math.abs(volts) > VOLTAGE_LIMIT_V) {
        return Err(new ValidationError(`Channel ${channel}: ${volts} V is outside ±${VOLTAGE_LIMIT_V} V`));
      }
      return sink.send(
        command([sour, 'volt', 'mode'], 'fix'),
        command([sour, 'volt'], exact(volts))
      );
    },

    async voltage(): Promise<Result<number, Error>> {
      return askNumber(query([sour, 'volt']));
    },

    async loadList(values: readonly number[], options: ListOptions = {}): Promise<Result<void, Error>> {
      const dwellS = options.dwellS ?? DEFAULT_LIST_OPTIONS.dwellS;
      const repetitions = options.repetitions ?? DEFAULT_LIST_OPTIONS.repetitions;
      const direction = options.direction ?? DEFAULT_LIST_OPTIONS.direction;
      const stepped = options.stepped ?? DEFAULT_LIST_OPTIONS.stepped;
      const delayS = options.delayS ?? DEFAULT_LIST_OPTIONS.delayS;

      const invalid = validateList(channel, values, options);
      if (invalid) return Err(invalid);

      return sink.send(
        dcCommand(['trig', 'sour'], 'hold'),
        command([sour, 'volt', 'mode'], 'list'),
        command([sour, 'list', 'volt'], values),
        command([sour, 'list', 'tmod'], stepped ? 'step' : 'auto'),
        command([sour, 'list', 'dwel'], dwellS),
        dcCommand(['del'], delayS),
        command([sour, 'list', 'dir'], direction),
        command([sour, 'list', 'coun'], repetitions),
        dcCommand(['trig', 'sour'], 'bus'),
        dcCommand(['init', 'cont'], 'on')
      );
    },

    async appendList(values: readonly number[]): Promise<Result<void, Error>> {
      const invalid = checkVoltages(values, channel);
      if (invalid) return Err(invalid);
      return sink.send(
        command([sour, 'list', 'volt', 'app'], values),
        dcCommand(['init', 'cont'], 'on')
      );
    },

    async listValues(): Promise<Result<number[], Error>> {
      return askNumbers(query([sour, 'list', 'volt']));
    },

    async listPoints(): Promise<Result<number, Error>> {
      return askNumber(query([sour, 'list', 'poin']));
    },

    async cyclesRemaining(): Promise<Result<number, Error>> {
      return askNumber(query([sour, 'list', 'ncl']));
    },

    async startOn(trigger: InternalTrigger): Promise<Result<void, Error>> {
      return sink.send(
        dcCommand(['trig', 'sour'], `int${trigger.value}`),
        dcCommand(['init', 'cont'], 'on')
      );
    },

    async startOnExternal(input: number): Promise<Result<void, Error>> {
      return sink.send(
        dcCommand(['trig', 'sour'], `ext${input}`),
        dcCommand(['init', 'cont'], 'on')
      );
    },

    async startImmediate(): Promise<Result<void, Error>> {
      return sink.send(
        dcCommand(['init', 'cont'], 'off'),
        dcCommand(['trig', 'sour'], 'imm'),
        dcCommand(['init'])
      );
    },

    async abort(): Promise<Result<void, Error>> {
      return sink.send(
        dcCommand(['abor']),
        dcCommand(['trig', 'sour'], 'imm')
      );
    },

    async markStepStart(trigger: InternalTrigger | null): Promise<Result<void, Error>> {
      return sink.send(dcCommand(['mark', 'sst'], trigger ? trigger.value : 0));
    },

    async periodicMarker(options: PeriodicMarkerOptions): Promise<Result<PeriodicMarker, Error>> {
      const { periodS, cycles } = options;
      if (!Number.isFinite(periodS) || periodS <= 0) {
        return Err(new ConfigurationError(`Channel ${channel}: marker period must be positive, got ${periodS}`));
      }
      if (!isValidRepetitions(cycles)) {
        return Err(new ConfigurationError(
          `Channel ${channel}: marker cycles must be a positive integer or -1, got ${cycles}`
        ));
      }

      const armed = await sink.send(
        sineCommand(['trig', 'sour'], 'hold'),
        sineCommand(['per'], periodS),
        sineCommand(['pol'], 'norm'),
        sineCommand(['span'], 0),
        sineCommand(['offs'], 0),
        sineCommand(['slew'], 'inf'),
        sineCommand(['del'], 0),
        sineCommand(['coun'], cycles),
        sineCommand(['trig', 'sour'], 'bus'),
        sineCommand(['init', 'cont'], 'on')
      );
      if (!armed.ok) return armed;

      const marker: PeriodicMarker = {
        startOn: trigger => sink.send(
          sineCommand(['trig', 'sour'], `int${trigger.value}`),
          sineCommand(['init', 'cont'], 'on')
        ),
        markPeriodStart: trigger => sink.send(sineCommand(['mark', 'pstart'], trigger.value)),
        abort: () => sink.send(
          sineCommand(['abor']),
          sineCommand(['mark', 'pstart'], 0),
          sineCommand(['trig', 'sour'], 'imm')
        ),
      };
      return Ok(marker);
    },
  };
}
