/**
 * InstrumentArray - Several QDAC-IIs driven as one
 *
 * One controller and any number of listeners, wired so that the controller's
 * clock reaches every listener and its external output 4 reaches external
 * input 3 on every instrument (itself included). Triggers are only allocated
 * on the controller; a sweep starts everywhere at once through that cable.
 *
 * Array arrangements have no corrections across instruments; each instrument
 * keeps its own correction matrix.
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
  ArrayConfigurationError,
  ConfigurationError,
  ResourceExhaustedError,
  UnknownContactError,
  ValidationError,
} from '../../shared/types.js';
import type { InternalTrigger } from '../devices/types.js';
import type { Qdac2 } from '../devices/drivers/qdac2.js';
import type { Qdac2Channel } from '../devices/drivers/qdac2-channel.js';
import { command } from '../devices/scpi-command.js';
import type { TriggerLease } from './TriggerPool.js';
import { createArrangement, type Arrangement } from './Arrangement.js';
import { measureCurrents, measureLeakage } from './Leakage.js';
import { sweep1d, sweep2d, sweepDetune, type SweepHost, type VirtualSweep } from './VirtualSweep.js';

/** Controller outputs wired to the listeners */
const RESERVED_OUTPUTS = [4, 5];

export interface ArrayArrangementOptions {
  /** Instrument name -> contact name -> channel */
  contacts: Record<string, ContactMap>;
  /** Instrument name -> trigger name -> external output port */
  outputTriggers?: Record<string, OutputTriggerMap>;
  /** Internal triggers, allocated on the controller */
  internalTriggers?: readonly string[];
  /** Controller channel whose spare generator marks outer sweep steps */
  outerTriggerChannel?: number;
}

export interface ArrayArrangement {
  contactNames(): string[];
  instrumentNames(): string[];
  /** Arrangement of one instrument, for per-instrument corrections */
  arrangementOf(instrument: string): Result<Arrangement, ValidationError>;
  channel(contact: string): Result<Qdac2Channel, UnknownContactError>;

  virtualVoltage(contact: string): Result<number, UnknownContactError>;
  setVirtualVoltage(contact: string, volts: number): Promise<Result<void, Error>>;
  setVirtualVoltages(voltages: VirtualPoint): Promise<Result<void, Error>>;
  getTriggerByName(name: string): Result<TriggerLease, Error>;

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

  close(): void;
}

export interface InstrumentArray {
  readonly controller: Qdac2;
  readonly listeners: readonly Qdac2[];
  /** Controller output fanned out to every instrument */
  readonly triggerOut: number;
  /** External input every instrument starts on */
  readonly commonTriggerIn: number;

  names(): string[];
  /** Make every listener run on the controller's clock */
  sync(): Promise<Result<void, Error>>;

  allocateTrigger(): Result<TriggerLease, ResourceExhaustedError>;
  connectExternalTrigger(port: number, trigger: InternalTrigger, widthS?: number): Promise<Result<void, Error>>;
  fire(trigger: InternalTrigger): Promise<Result<void, Error>>;

  arrange(options: ArrayArrangementOptions): Promise<Result<ArrayArrangement, Error>>;
}

export function createInstrumentArray(
  controller: Qdac2,
  listeners: readonly Qdac2[]
): Result<InstrumentArray, ValidationError> {
  const instruments = [controller, ...listeners];
  const names = instruments.map(i => i.name);
  if (new Set(names).size !== names.length) {
    return Err(new ValidationError(`Instruments need to have unique names: ${names.join(', ')}`));
  }
  const byName = new Map(instruments.map(i => [i.name, i]));
  const triggerOut = 4;
  const commonTriggerIn = 3;

  function validate(options: ArrayArrangementOptions): ValidationError | ConfigurationError | null {
    for (const name of Object.keys(options.contacts)) {
      if (!byName.has(name)) return new ValidationError(`No instrument named "${name}" in the array`);
    }
    for (const name of Object.keys(options.outputTriggers ?? {})) {
      if (!byName.has(name)) return new ValidationError(`No instrument named "${name}" in the array`);
    }
    for (const port of Object.values(options.outputTriggers?.[controller.name] ?? {})) {
      if (RESERVED_OUTPUTS.includes(port)) {
        return new ConfigurationError(`External output trigger ${port} is reserved`);
      }
    }
    const seen = new Set<string>();
    for (const instrument of instruments) {
      for (const contact of Object.keys(options.contacts[instrument.name] ?? {})) {
        if (seen.has(contact)) return new ValidationError(`Contact name ${contact} used multiple times`);
        seen.add(contact);
      }
    }
    return null;
  }

  async function arrange(options: ArrayArrangementOptions): Promise<Result<ArrayArrangement, Error>> {
    const invalid = validate(options);
    if (invalid) return Err(invalid);

    const segments: Arrangement[] = [];
    const closeAll = () => segments.forEach(s => s.close());
    for (const instrument of instruments) {
      const isController = instrument === controller;
      const created = await createArrangement(instrument, {
        contacts: options.contacts[instrument.name] ?? {},
        outputTriggers: options.outputTriggers?.[instrument.name],
        internalTriggers: isController ? options.internalTriggers : undefined,
        outerTriggerChannel: isController ? options.outerTriggerChannel : undefined,
      });
      if (!created.ok) {
        const last = segments.length > 0 ? segments[segments.length - 1].instrument.name : null;
        closeAll();
        return Err(new ArrayConfigurationError(created.error, instrument.name, last));
      }
      segments.push(created.value);
    }

    const [home] = segments;
    const owner = new Map<string, Arrangement>();
    for (const segment of segments) {
      for (const contact of segment.contactNames()) owner.set(contact, segment);
    }

    function segmentFor(contact: string): Result<Arrangement, UnknownContactError> {
      const segment = owner.get(contact);
      return segment ? Ok(segment) : Err(new UnknownContactError(contact));
    }

    const host: SweepHost = {
      segments,
      triggerHome: home,
      fanOut: { outputPort: triggerOut, input: commonTriggerIn },
    };

    const arrangement: ArrayArrangement = {
      contactNames(): string[] {
        return segments.flatMap(s => s.contactNames());
      },

      instrumentNames(): string[] {
        return [...names];
      },

      arrangementOf(instrument: string): Result<Arrangement, ValidationError> {
        const segment = segments.find(s => s.instrument.name === instrument);
        if (!segment) return Err(new ValidationError(`No instrument named "${instrument}" in the array`));
        return Ok(segment);
      },

      channel(contact: string): Result<Qdac2Channel, UnknownContactError> {
        const segment = segmentFor(contact);
        if (!segment.ok) return segment;
        return segment.value.channel(contact);
      },

      virtualVoltage(contact: string): Result<number, UnknownContactError> {
        const segment = segmentFor(contact);
        if (!segment.ok) return segment;
        return segment.value.virtualVoltage(contact);
      },

      async setVirtualVoltage(contact: string, volts: number): Promise<Result<void, Error>> {
        return arrangement.setVirtualVoltages({ [contact]: volts });
      },

      async setVirtualVoltages(voltages: VirtualPoint): Promise<Result<void, Error>> {
        const grouped = new Map<Arrangement, VirtualPoint>();
        for (const [contact, volts] of Object.entries(voltages)) {
          const segment = segmentFor(contact);
          if (!segment.ok) return segment;
          grouped.set(segment.value, { ...grouped.get(segment.value), [contact]: volts });
        }
        for (const segment of segments) {
          const subset = grouped.get(segment);
          if (!subset) continue;
          const result = await segment.setVirtualVoltages(subset);
          if (!result.ok) return result;
        }
        return Ok();
      },

      getTriggerByName(name: string): Result<TriggerLease, Error> {
        return home.getTriggerByName(name);
      },

      async currentsA(currentOptions: CurrentsOptions = {}): Promise<Result<number[], Error>> {
        return measureCurrents(segments, currentOptions);
      },

      async leakage(modulationV: number, currentOptions: CurrentsOptions = {}): Promise<Result<LeakageResult, Error>> {
        return measureLeakage(segments, modulationV, currentOptions);
      },

      async virtualSweep(contact, voltages, sweepOptions = {}) {
        return sweep1d(host, contact, voltages, sweepOptions);
      },

      async virtualSweep2d(innerContact, innerVoltages, outerContact, outerVoltages, sweepOptions = {}) {
        return sweep2d(host, innerContact, innerVoltages, outerContact, outerVoltages, sweepOptions);
      },

      async virtualDetune(contacts, startV, endV, steps, sweepOptions = {}) {
        return sweepDetune(host, contacts, startV, endV, steps, sweepOptions);
      },

      close(): void {
        closeAll();
      },
    };

    console.log(`[InstrumentArray] Arranged ${owner.size} contacts on ${segments.length} instruments`);
    return Ok(arrangement);
  }

  return Ok({
    controller,
    listeners: [...listeners],
    triggerOut,
    commonTriggerIn,

    names(): string[] {
      return [...names];
    },

    async sync(): Promise<Result<void, Error>> {
      if (instruments.length < 2) {
        return Err(new ValidationError('Need at least two instruments to sync'));
      }
      const sending = await controller.send(command(['syst', 'cloc', 'send'], 'on'));
      if (!sending.ok) return sending;
      for (const listener of listeners) {
        const synced = await listener.send(
          command(['syst', 'cloc', 'sour'], 'ext'),
          command(['syst', 'cloc', 'sync'])
        );
        if (!synced.ok) return synced;
      }
      const signalled = await controller.send(
        command(['syst', 'cloc', 'sync']),
        command(['outp', 'sync', 'sign'])
      );
      if (!signalled.ok) return signalled;
      console.log(`[InstrumentArray] ${listeners.length} listeners synced to ${controller.name}`);
      return Ok();
    },

    allocateTrigger(): Result<TriggerLease, ResourceExhaustedError> {
      return controller.allocateTrigger();
    },

    async connectExternalTrigger(port: number, trigger: InternalTrigger, widthS?: number): Promise<Result<void, Error>> {
      return controller.connectExternalTrigger(port, trigger, widthS);
    },

    async fire(trigger: InternalTrigger): Promise<Result<void, Error>> {
      return controller.fire(trigger);
    },

    arrange,
  });
}
