/**
 * Arrangement - Virtual gates on one instrument
 *
 * Binds contact names to channels and keeps a vector of virtual voltages v
 * and a correction matrix C. The physical voltage of every channel is C · v;
 * whenever v or C changes through one of the mutators below, the whole
 * physical vector is recomputed and pushed to every channel in contact order.
 *
 * Named internal triggers (and the triggers behind routed output triggers)
 * are allocated at construction and released by close().
 */

import type {
  ContactMap,
  CurrentsOptions,
  LeakageResult,
  OutputTriggerMap,
  Result,
  Sweep2dOptions,
  SweepOptions,
  VirtualPoint,
} from '../../shared/types.js';
import {
  Ok,
  Err,
  ConfigurationError,
  ResourceExhaustedError,
  UnknownContactError,
  UnknownTriggerError,
  ValidationError,
} from '../../shared/types.js';
import { apply, cloneMatrix, identity, multiply, roundTo, type Matrix } from '../../shared/sweep.js';
import type { Qdac2 } from '../devices/drivers/qdac2.js';
import { EXTERNAL_OUTPUTS } from '../devices/drivers/qdac2.js';
import { VOLTAGE_LIMIT_V, type Qdac2Channel } from '../devices/drivers/qdac2-channel.js';
import type { TriggerLease } from './TriggerPool.js';
import { measureCurrents, measureLeakage } from './Leakage.js';
import { sweep1d, sweep2d, sweepDetune, type SweepHost, type VirtualSweep } from './VirtualSweep.js';

export type ContactList = ContactMap | ReadonlyArray<readonly [string, number]>;

export interface ArrangementOptions {
  /**
   * Contact name -> channel; the order given is the vector order. Objects put
   * integer-like keys ("1", "2") first, so such names need the pair-list form.
   */
  contacts: ContactList;
  /** Trigger name -> external output port, routed from a fresh internal trigger */
  outputTriggers?: OutputTriggerMap;
  /** Names of internal triggers to allocate for later use */
  internalTriggers?: readonly string[];
  /** Channel whose spare generator marks outer steps of 2-D sweeps */
  outerTriggerChannel?: number;
}

export interface Arrangement {
  readonly instrument: Qdac2;
  /** Number of contacts */
  readonly shape: number;
  readonly outerTriggerChannel: number | null;

  contactNames(): string[];
  channelNumbers(): number[];
  hasContact(name: string): boolean;
  channel(name: string): Result<Qdac2Channel, UnknownContactError>;

  virtualVoltage(name: string): Result<number, UnknownContactError>;
  /** Physical voltages C · v, one per contact */
  actualVoltages(): number[];
  /**
   * Physical voltages for v with some entries replaced; v itself is not
   * touched. Names of other arrangements' contacts are ignored.
   */
  physicalFor(overrides: VirtualPoint): number[];
  correctionMatrix(): Matrix;

  setVirtualVoltage(name: string, volts: number): Promise<Result<void, Error>>;
  setVirtualVoltages(voltages: VirtualPoint): Promise<Result<void, Error>>;
  /** Replace the correction row of a contact */
  initiateCorrection(name: string, row: readonly number[]): Promise<Result<void, Error>>;
  /** C' = M · C, M being the identity with the contact's row replaced */
  addCorrection(name: string, row: readonly number[]): Promise<Result<void, Error>>;

  getTriggerByName(name: string): Result<TriggerLease, UnknownTriggerError>;
  triggerNames(): string[];

  currentsA(options?: CurrentsOptions): Promise<Result<number[], Error>>;
  leakage(modulationV: number, options?: CurrentsOptions): Promise<Result<LeakageResult, Error>>;

  virtualSweep(contact: string, voltages: readonly number[], options?: SweepOptions): Promise<Result<VirtualSweep, Error>>;
  virtualSweep2d(
    innerContact: string,
    innerVoltages: readonly number[],
    outerContact: string,
    outerVoltages: readonly number[],
    options?: Sweep2dOptions
  ): Promise<Result<VirtualSweep, Error>>;
  virtualDetune(
    contacts: readonly string[],
    startV: readonly number[],
    endV: readonly number[],
    steps: number,
    options?: SweepOptions
  ): Promise<Result<VirtualSweep, Error>>;

  isClosed(): boolean;
  /** Release every trigger this arrangement allocated. Idempotent. */
  close(): void;
}

function isContactPairs(contacts: ContactList): contacts is ReadonlyArray<readonly [string, number]> {
  return Array.isArray(contacts);
}

const INTEGER_KEY = /^(0|[1-9]\d*)$/;

function toPairs(contacts: ContactList): Array<readonly [string, number]> {
  return isContactPairs(contacts) ? [...contacts] : Object.entries(contacts);
}

/**
 * Check everything that can be checked before talking to the instrument.
 */
function validateOptions(
  instrument: Qdac2,
  pairs: ReadonlyArray<readonly [string, number]>,
  options: ArrangementOptions
): ValidationError | ResourceExhaustedError | null {
  if (!isContactPairs(options.contacts)) {
    const reordered = pairs.find(([name]) => INTEGER_KEY.test(name));
    if (reordered) {
      return new ValidationError(
        `Contact name ${reordered[0]} loses its position in an object; pass contacts as [name, channel] pairs`
      );
    }
  }

  const names = new Set<string>();
  const channelOwners = new Map<number, string>();
  for (const [name, channel] of pairs) {
    if (names.has(name)) {
      return new ValidationError(`Contact name ${name} used multiple times`);
    }
    names.add(name);
    if (!instrument.channel(channel).ok) {
      return new ValidationError(`Contact ${name}: ${instrument.name} has no channel ${channel} (1..${instrument.channelCount})`);
    }
    const owner = channelOwners.get(channel);
    if (owner !== undefined) {
      return new ValidationError(`Channel ${channel} is bound to both ${owner} and ${name}`);
    }
    channelOwners.set(channel, name);
  }

  const triggerNames = new Set<string>();
  for (const name of options.internalTriggers ?? []) {
    if (triggerNames.has(name)) {
      return new ValidationError(`Internal trigger name ${name} used multiple times`);
    }
    triggerNames.add(name);
  }

  const ports = new Map<number, string>();
  for (const [name, port] of Object.entries(options.outputTriggers ?? {})) {
    if (triggerNames.has(name)) {
      return new ValidationError(`Trigger name ${name} used for both an internal and an output trigger`);
    }
    triggerNames.add(name);
    if (!Number.isInteger(port) || port < 1 || port > EXTERNAL_OUTPUTS) {
      return new ValidationError(`Output trigger ${name}: no external output ${port} (1..${EXTERNAL_OUTPUTS})`);
    }
    const previous = ports.get(port);
    if (previous !== undefined) {
      return new ValidationError(`External output trigger ${port} assigned to both ${previous} and ${name}`);
    }
    ports.set(port, name);
  }

  if (options.outerTriggerChannel !== undefined && !instrument.channel(options.outerTriggerChannel).ok) {
    return new ValidationError(`Outer trigger channel ${options.outerTriggerChannel} does not exist on ${instrument.name}`);
  }

  const free = instrument.triggers.freeCount();
  if (triggerNames.size > free) {
    return new ResourceExhaustedError(
      `Arrangement needs ${triggerNames.size} internal triggers but only ${free} are free on ${instrument.name}`
    );
  }

  return null;
}

/**
 * Create an arrangement. Fails before any command is sent when the options
 * are inconsistent; on success the output triggers have been routed.
 */
export async function createArrangement(
  instrument: Qdac2,
  options: ArrangementOptions
): Promise<Result<Arrangement, Error>> {
  const pairs = toPairs(options.contacts);
  const invalid = validateOptions(instrument, pairs, options);
  if (invalid) return Err(invalid);

  const names = pairs.map(([name]) => name);
  const indices = new Map(names.map((name, i) => [name, i]));
  const channels: Qdac2Channel[] = [];
  for (const [, number] of pairs) {
    const channel = instrument.channel(number);
    if (!channel.ok) return channel;
    channels.push(channel.value);
  }

  // Allocation cannot fail: free count was checked above
  const triggers = new Map<string, TriggerLease>();
  const releaseAll = () => {
    for (const lease of triggers.values()) lease.release();
    triggers.clear();
  };
  const allocate = (name: string): Result<TriggerLease, ResourceExhaustedError> => {
    const lease = instrument.allocateTrigger();
    if (lease.ok) triggers.set(name, lease.value);
    return lease;
  };

  for (const name of options.internalTriggers ?? []) {
    const lease = allocate(name);
    if (!lease.ok) {
      releaseAll();
      return lease;
    }
  }
  for (const [name, port] of Object.entries(options.outputTriggers ?? {})) {
    const lease = allocate(name);
    if (!lease.ok) {
      releaseAll();
      return lease;
    }
    const routed = await instrument.connectExternalTrigger(port, lease.value);
    if (!routed.ok) {
      releaseAll();
      return routed;
    }
  }

  const shape = names.length;
  let correction: Matrix = identity(shape);
  let virtual: number[] = new Array<number>(shape).fill(0);
  let closed = false;

  function indexOf(name: string): Result<number, UnknownContactError> {
    const index = indices.get(name);
    return index === undefined ? Err(new UnknownContactError(name)) : Ok(index);
  }

  function physical(matrix: Matrix, vector: readonly number[]): number[] {
    const values = apply(matrix, vector);
    const decimals = instrument.roundOffDecimals;
    return decimals === null ? values : values.map(v => roundTo(v, decimals));
  }

  function checkRange(values: readonly number[]): ValidationError | null {
    const bad = values.findIndex(v => !Number.isFinite(v) || Math.abs(v) > VOLTAGE_LIMIT_V);
    if (bad < 0) return null;
    return new ValidationError(
      `Contact ${names[bad]} would get ${values[bad]} V, outside ±${VOLTAGE_LIMIT_V} V`
    );
  }

  /** Commit a new v and C, then push C · v to every channel in contact order */
  async function effectuate(nextVirtual: number[], nextCorrection: Matrix): Promise<Result<void, Error>> {
    const values = physical(nextCorrection, nextVirtual);
    const outOfRange = checkRange(values);
    if (outOfRange) return Err(outOfRange);

    virtual = nextVirtual;
    correction = nextCorrection;
    for (let i = 0; i < shape; i++) {
      const result = await channels[i].setVoltageNow(values[i]);
      if (!result.ok) return result;
    }
    return Ok();
  }

  function checkRow(name: string, row: readonly number[]): Result<number, Error> {
    const index = indexOf(name);
    if (!index.ok) return index;
    if (row.length !== shape) {
      return Err(new ConfigurationError(
        `Correction row for ${name} has ${row.length} factors, expected ${shape}`
      ));
    }
    if (row.some(f => !Number.isFinite(f))) {
      return Err(new ConfigurationError(`Correction row for ${name} contains a non-finite factor`));
    }
    return index;
  }

  const arrangement: Arrangement = {
    instrument,
    shape,
    outerTriggerChannel: options.outerTriggerChannel ?? null,

    contactNames(): string[] {
      return [...names];
    },

    channelNumbers(): number[] {
      return channels.map(c => c.number);
    },

    hasContact(name: string): boolean {
      return indices.has(name);
    },

    channel(name: string): Result<Qdac2Channel, UnknownContactError> {
      const index = indexOf(name);
      if (!index.ok) return index;
      return Ok(channels[index.value]);
    },

    virtualVoltage(name: string): Result<number, UnknownContactError> {
      const index = indexOf(name);
      if (!index.ok) return index;
      return Ok(virtual[index.value]);
    },

    actualVoltages(): number[] {
      return physical(correction, virtual);
    },

    physicalFor(overrides: VirtualPoint): number[] {
      const vector = [...virtual];
      for (const [name, volts] of Object.entries(overrides)) {
        const index = indices.get(name);
        if (index !== undefined) vector[index] = volts;
      }
      return physical(correction, vector);
    },

    correctionMatrix(): Matrix {
      return cloneMatrix(correction);
    },

    async setVirtualVoltage(name: string, volts: number): Promise<Result<void, Error>> {
      return arrangement.setVirtualVoltages({ [name]: volts });
    },

    async setVirtualVoltages(voltages: VirtualPoint): Promise<Result<void, Error>> {
      const next = [...virtual];
      for (const [name, volts] of Object.entries(voltages)) {
        const index = indexOf(name);
        if (!index.ok) return index;
        if (!Number.isFinite(volts)) {
          return Err(new ValidationError(`Virtual voltage for ${name} must be finite, got ${volts}`));
        }
        next[index.value] = volts;
      }
      return effectuate(next, correction);
    },

    async initiateCorrection(name: string, row: readonly number[]): Promise<Result<void, Error>> {
      const index = checkRow(name, row);
      if (!index.ok) return index;
      const next = cloneMatrix(correction);
      next[index.value] = [...row];
      return effectuate(virtual, next);
    },

    async addCorrection(name: string, row: readonly number[]): Promise<Result<void, Error>> {
      const index = checkRow(name, row);
      if (!index.ok) return index;
      const multiplier = identity(shape);
      multiplier[index.value] = [...row];
      return effectuate(virtual, multiply(multiplier, correction));
    },

    getTriggerByName(name: string): Result<TriggerLease, UnknownTriggerError> {
      const lease = triggers.get(name);
      if (!lease) return Err(new UnknownTriggerError(name, [...triggers.keys()]));
      return Ok(lease);
    },

    triggerNames(): string[] {
      return [...triggers.keys()];
    },

    async currentsA(options: CurrentsOptions = {}): Promise<Result<number[], Error>> {
      return measureCurrents([arrangement], options);
    },

    async leakage(modulationV: number, options: CurrentsOptions = {}): Promise<Result<LeakageResult, Error>> {
      return measureLeakage([arrangement], modulationV, options);
    },

    async virtualSweep(contact, voltages, sweepOptions = {}) {
      return sweep1d(singleHost(), contact, voltages, sweepOptions);
    },

    async virtualSweep2d(innerContact, innerVoltages, outerContact, outerVoltages, sweepOptions = {}) {
      return sweep2d(singleHost(), innerContact, innerVoltages, outerContact, outerVoltages, sweepOptions);
    },

    async virtualDetune(contacts, startV, endV, steps, sweepOptions = {}) {
      return sweepDetune(singleHost(), contacts, startV, endV, steps, sweepOptions);
    },

    isClosed(): boolean {
      return closed;
    },

    close(): void {
      if (closed) return;
      closed = true;
      releaseAll();
    },
  };

  function singleHost(): SweepHost {
    return { segments: [arrangement], triggerHome: arrangement, fanOut: null };
  }

  return Ok(arrangement);
}

/**
 * Scoped arrangement: created before `fn` runs, closed after it finishes,
 * whether it returns Ok, Err or throws.
 */
export async function withArrangement<T>(
  instrument: Qdac2,
  options: ArrangementOptions,
  fn: (arrangement: Arrangement) => Promise<Result<T, Error>>
): Promise<Result<T, Error>> {
  const created = await createArrangement(instrument, options);
  if (!created.ok) return created;

  const arrangement = created.value;
  try {
    return await fn(arrangement);
  } finally {
    arrangement.close();
  }
}
