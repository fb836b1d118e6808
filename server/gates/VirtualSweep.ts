/**
 * VirtualSweep - Hardware-timed sweeps through virtual voltage points
 *
 * A sweep turns a list of virtual points into one physical voltage list per
 * contact (C · v for every point), loads the lists into the DC generators and
 * arms them all on a single start trigger. Nothing moves until start().
 *
 * Lifecycle:
 *   sweep1d/sweep2d/sweepDetune  - validate, then configure the hardware
 *   start()                      - assert the start trigger (`tint`)
 *   close()                      - abort generators, clear markers, release
 *
 * The same engine drives single instruments and instrument arrays. On an array
 * the start trigger lives on the controller and is fanned out through one of
 * its external outputs; every channel then starts on a common external input.
 */

import type { Result, SweepOptions, Sweep2dOptions, VirtualPoint } from '../../shared/types.js';
import {
  Ok,
  Err,
  ArrayConfigurationError,
  ConfigurationError,
  UnknownContactError,
  ValidationError,
} from '../../shared/types.js';
import { points1d, points2d, pointsDetune } from '../../shared/sweep.js';
import type { InternalTrigger } from '../devices/types.js';
import { validateList, type PeriodicMarker, type Qdac2Channel } from '../devices/drivers/qdac2-channel.js';
import type { TriggerLease } from './TriggerPool.js';
import type { Arrangement } from './Arrangement.js';

const DEFAULT_STEP_TIME_S = 1e-5;
const DEFAULT_REPETITIONS = 1;

export interface FanOut {
  /** Controller output the start trigger is routed to */
  outputPort: number;
  /** External input every instrument starts on */
  input: number;
}

/**
 * Where a sweep runs: the arrangements holding its contacts, the one whose
 * instrument owns the triggers, and how a start reaches the others.
 */
export interface SweepHost {
  segments: readonly Arrangement[];
  triggerHome: Arrangement;
  fanOut: FanOut | null;
}

interface OuterMarkerPlan {
  trigger: string;
  periodS: number;
  cycles: number;
}

export interface SweepPlan {
  points: readonly VirtualPoint[];
  stepTimeS?: number;
  repetitions?: number;
  startTrigger?: string;
  stepTrigger?: string;
  outer?: OuterMarkerPlan;
}

export interface VirtualSweep {
  readonly startTrigger: InternalTrigger;
  readonly points: readonly VirtualPoint[];

  contactNames(): string[];
  /** The physical list loaded for a contact */
  actualValuesV(contact: string): Result<number[], UnknownContactError>;

  start(): Promise<Result<void, Error>>;
  isClosed(): boolean;
  /** Stop every generator and release the triggers this sweep allocated */
  close(): Promise<Result<void, Error>>;
}

interface LoadedContact {
  segment: Arrangement;
  name: string;
  channel: Qdac2Channel;
  values: number[];
}

function firstChannel(arrangement: Arrangement): Qdac2Channel | null {
  const [name] = arrangement.contactNames();
  if (name === undefined) return null;
  const channel = arrangement.channel(name);
  return channel.ok ? channel.value : null;
}

/**
 * Everything that can go wrong without talking to an instrument.
 */
function planContacts(host: SweepHost, plan: SweepPlan): Result<LoadedContact[], Error> {
  if (plan.points.length === 0) {
    return Err(new ValidationError('A sweep needs at least one point'));
  }
  for (const point of plan.points) {
    for (const name of Object.keys(point)) {
      if (!host.segments.some(segment => segment.hasContact(name))) {
        return Err(new UnknownContactError(name));
      }
    }
  }

  const home = host.triggerHome;
  for (const name of [plan.startTrigger, plan.stepTrigger, plan.outer?.trigger]) {
    if (name === undefined) continue;
    const trigger = home.getTriggerByName(name);
    if (!trigger.ok) return trigger;
  }
  if (plan.stepTrigger !== undefined && firstChannel(home) === null) {
    return Err(new ConfigurationError(`${home.instrument.name} has no contact to mark steps on`));
  }
  if (plan.outer && home.outerTriggerChannel === null) {
    return Err(new ConfigurationError('Outer step trigger requires an outer trigger channel'));
  }

  const contacts: LoadedContact[] = [];
  for (const segment of host.segments) {
    const names = segment.contactNames();
    const sequences: number[][] = names.map(() => []);
    for (const point of plan.points) {
      segment.physicalFor(point).forEach((volts, i) => sequences[i].push(volts));
    }
    for (let i = 0; i < names.length; i++) {
      const channel = segment.channel(names[i]);
      if (!channel.ok) return channel;
      const invalid = validateList(channel.value.number, sequences[i], {
        dwellS: plan.stepTimeS ?? DEFAULT_STEP_TIME_S,
        repetitions: plan.repetitions ?? DEFAULT_REPETITIONS,
      });
      if (invalid) return Err(invalid);
      contacts.push({ segment, name: names[i], channel: channel.value, values: sequences[i] });
    }
  }
  return Ok(contacts);
}

/**
 * Configure the hardware for a sweep. Commands already sent are not undone
 * when a later one fails; close() on a successful sweep is what cleans up.
 */
export async function runSweepPlan(host: SweepHost, plan: SweepPlan): Promise<Result<VirtualSweep, Error>> {
  const planned = planContacts(host, plan);
  if (!planned.ok) return planned;
  const contacts = planned.value;

  const home = host.triggerHome;
  const controller = home.instrument;

  function named(name: string | undefined): TriggerLease | null {
    if (name === undefined) return null;
    const trigger = home.getTriggerByName(name);
    return trigger.ok ? trigger.value : null;
  }

  let owned: TriggerLease | null = null;
  let start: InternalTrigger;
  const namedStart = named(plan.startTrigger);
  if (namedStart) {
    start = namedStart;
  } else {
    const allocated = controller.allocateTrigger();
    if (!allocated.ok) return allocated;
    owned = allocated.value;
    start = owned;
  }

  const stepTrigger = named(plan.stepTrigger);
  const stepChannel = stepTrigger ? firstChannel(home) : null;
  let marker: PeriodicMarker | null = null;
  let lastConfigured: string | null = null;

  const fail = (error: Error, instrument: string): Result<never, Error> => {
    owned?.release();
    if (host.fanOut === null) return Err(error);
    return Err(new ArrayConfigurationError(error, instrument, lastConfigured));
  };

  const fanOut = host.fanOut;
  if (fanOut) {
    const routed = await controller.connectExternalTrigger(fanOut.outputPort, start);
    if (!routed.ok) return fail(routed.error, controller.name);
  }

  for (const segment of host.segments) {
    const loaded = contacts.filter(c => c.segment === segment);
    if (loaded.length === 0) continue;
    for (const contact of loaded) {
      const list = await contact.channel.loadList(contact.values, {
        dwellS: plan.stepTimeS ?? DEFAULT_STEP_TIME_S,
        repetitions: plan.repetitions ?? DEFAULT_REPETITIONS,
      });
      if (!list.ok) return fail(list.error, segment.instrument.name);
      const armed = fanOut
        ? await contact.channel.startOnExternal(fanOut.input)
        : await contact.channel.startOn(start);
      if (!armed.ok) return fail(armed.error, segment.instrument.name);
    }
    lastConfigured = segment.instrument.name;
  }

  if (stepChannel && stepTrigger) {
    const marked = await stepChannel.markStepStart(stepTrigger);
    if (!marked.ok) return fail(marked.error, controller.name);
  }

  const outerTrigger = named(plan.outer?.trigger);
  if (plan.outer && outerTrigger && home.outerTriggerChannel !== null) {
    const channel = controller.channel(home.outerTriggerChannel);
    if (!channel.ok) return fail(channel.error, controller.name);
    const created = await channel.value.periodicMarker({ periodS: plan.outer.periodS, cycles: plan.outer.cycles });
    if (!created.ok) return fail(created.error, controller.name);
    marker = created.value;
    const started = await marker.startOn(start);
    if (!started.ok) return fail(started.error, controller.name);
    const marking = await marker.markPeriodStart(outerTrigger);
    if (!marking.ok) return fail(marking.error, controller.name);
  }

  let closed = false;
  const points = [...plan.points];

  return Ok({
    startTrigger: start,
    points,

    contactNames(): string[] {
      return contacts.map(c => c.name);
    },

    actualValuesV(contact: string): Result<number[], UnknownContactError> {
      const found = contacts.find(c => c.name === contact);
      if (!found) return Err(new UnknownContactError(contact));
      return Ok([...found.values]);
    },

    async start(): Promise<Result<void, Error>> {
      if (closed) return Err(new ConfigurationError('Sweep has been closed'));
      return controller.fire(start);
    },

    isClosed(): boolean {
      return closed;
    },

    async close(): Promise<Result<void, Error>> {
      if (closed) return Ok();
      closed = true;

      // Keep cleaning up after a failure; report the first one
      const failures: Error[] = [];
      const note = (result: Result<void, Error>) => {
        if (result.ok) return;
        console.warn(`[Arrangement] Sweep cleanup failed: ${result.error.message}`);
        failures.push(result.error);
      };

      for (const contact of contacts) {
        note(await contact.channel.abort());
      }
      if (stepChannel) note(await stepChannel.markStepStart(null));
      if (marker) note(await marker.abort());
      owned?.release();

      return failures.length > 0 ? Err(failures[0]) : Ok();
    },
  });
}

/**
 * Scoped sweep: closed after `fn` finishes, whether it returns Ok, Err or throws.
 * The result of `fn` wins; cleanup failures are only logged.
 */
export async function withSweep<T>(
  created: Result<VirtualSweep, Error>,
  fn: (sweep: VirtualSweep) => Promise<Result<T, Error>>
): Promise<Result<T, Error>> {
  if (!created.ok) return created;
  const sweep = created.value;
  try {
    return await fn(sweep);
  } finally {
    await sweep.close();
  }
}

// ============ Builders ============

export async function sweep1d(
  host: SweepHost,
  contact: string,
  voltages: readonly number[],
  options: SweepOptions = {}
): Promise<Result<VirtualSweep, Error>> {
  return runSweepPlan(host, {
    points: points1d(contact, voltages),
    stepTimeS: options.stepTimeS,
    repetitions: options.repetitions,
    startTrigger: options.startTrigger,
    stepTrigger: options.stepTrigger,
  });
}

export async function sweep2d(
  host: SweepHost,
  innerContact: string,
  innerVoltages: readonly number[],
  outerContact: string,
  outerVoltages: readonly number[],
  options: Sweep2dOptions = {}
): Promise<Result<VirtualSweep, Error>> {
  if (innerContact === outerContact) {
    return Err(new ValidationError(`Inner and outer contact must differ, both are ${innerContact}`));
  }
  const innerStepTimeS = options.innerStepTimeS ?? DEFAULT_STEP_TIME_S;
  const repetitions = options.repetitions ?? DEFAULT_REPETITIONS;
  const outer = options.outerStepTrigger === undefined
    ? undefined
    : {
        trigger: options.outerStepTrigger,
        periodS: innerVoltages.length * innerStepTimeS,
        cycles: repetitions === -1 ? -1 : outerVoltages.length * repetitions,
      };

  return runSweepPlan(host, {
    points: points2d(innerContact, innerVoltages, outerContact, outerVoltages),
    stepTimeS: innerStepTimeS,
    repetitions,
    startTrigger: options.startTrigger,
    stepTrigger: options.innerStepTrigger,
    outer,
  });
}

export async function sweepDetune(
  host: SweepHost,
  contacts: readonly string[],
  startV: readonly number[],
  endV: readonly number[],
  steps: number,
  options: SweepOptions = {}
): Promise<Result<VirtualSweep, Error>> {
  const points = pointsDetune(contacts, startV, endV, steps);
  if (!points.ok) return points;
  return runSweepPlan(host, {
    points: points.value,
    stepTimeS: options.stepTimeS,
    repetitions: options.repetitions,
    startTrigger: options.startTrigger,
    stepTrigger: options.stepTrigger,
  });
}
