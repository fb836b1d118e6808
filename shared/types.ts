// Shared types for the gate library and its collaborators

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (transport layer wrapping external libs).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export function Ok(): Result<void, never>;
export function Ok<T>(value: T): Result<T, never>;
export function Ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============ Errors ============

export type GateErrorCode =
  | 'resource_exhausted'
  | 'unknown_contact'
  | 'unknown_trigger'
  | 'configuration'
  | 'validation'
  | 'array_configuration';

/**
 * Base class for every error raised by the gate library.
 * Callers narrow on `code` (or instanceof) after a failed Result.
 */
export class GateError extends Error {
  readonly code: GateErrorCode;

  constructor(code: GateErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The trigger pool of an instrument has no free trigger left */
export class ResourceExhaustedError extends GateError {
  constructor(message: string) {
    super('resource_exhausted', message);
  }
}

export class UnknownContactError extends GateError {
  readonly contact: string;

  constructor(contact: string) {
    super('unknown_contact', `No contact named "${contact}"`);
    this.contact = contact;
  }
}

export class UnknownTriggerError extends GateError {
  readonly trigger: string;

  constructor(trigger: string, known: readonly string[]) {
    const list = known.length > 0 ? known.join(', ') : 'none';
    super('unknown_trigger', `No internal trigger named "${trigger}" (allocated: ${list})`);
    this.trigger = trigger;
  }
}

/** Inconsistent setup: list lengths, missing trigger channel, bad matrix rows */
export class ConfigurationError extends GateError {
  constructor(message: string) {
    super('configuration', message);
  }
}

/** Plain input validation: wrong lengths, out of range numbers */
export class ValidationError extends GateError {
  constructor(message: string) {
    super('validation', message);
  }
}

/**
 * A multi-instrument operation failed part way.
 * Instruments configured before the failure are left as they are.
 */
export class ArrayConfigurationError extends GateError {
  readonly lastConfiguredInstrument: string | null;
  readonly failedInstrument: string;

  constructor(failure: Error, failedInstrument: string, lastConfiguredInstrument: string | null) {
    const after = lastConfiguredInstrument ? ` after configuring ${lastConfiguredInstrument}` : '';
    super('array_configuration', `Instrument ${failedInstrument} failed${after}: ${failure.message}`);
    this.failedInstrument = failedInstrument;
    this.lastConfiguredInstrument = lastConfiguredInstrument;
  }
}

// ============ Gate Types ============

/** Name -> 1-based channel number, in contact order */
export type ContactMap = Record<string, number>;

/** Name -> external output trigger port */
export type OutputTriggerMap = Record<string, number>;

/** One point of a sweep: the virtual voltages that differ from the resting vector */
export type VirtualPoint = Record<string, number>;

export type ListDirection = 'up' | 'down';

export type CurrentRange = 'low' | 'high';

export interface ListOptions {
  /** Seconds between each voltage (default 1ms) */
  dwellS?: number;
  /** Number of passes through the list, -1 for infinite (default 1) */
  repetitions?: number;
  direction?: ListDirection;
  /** Each step waits for a trigger instead of the dwell timer */
  stepped?: boolean;
  /** Seconds of delay after the start trigger (default 0) */
  delayS?: number;
  /** When given, the list must have exactly this many points */
  expectedLength?: number;
}

export interface SweepOptions {
  /** Seconds between each step (default 10us) */
  stepTimeS?: number;
  /** Name of an arrangement trigger to start on instead of a fresh one */
  startTrigger?: string;
  /** Name of an arrangement trigger that marks the start of each step */
  stepTrigger?: string;
  /** Passes through the sweep, -1 for infinite (default 1) */
  repetitions?: number;
}

export interface Sweep2dOptions {
  /** Seconds between each inner step (default 10us) */
  innerStepTimeS?: number;
  startTrigger?: string;
  innerStepTrigger?: string;
  /** Name of an arrangement trigger that marks each outer step */
  outerStepTrigger?: string;
  repetitions?: number;
}

export interface CurrentsOptions {
  /** Integration time in power-line cycles (default 1) */
  nplc?: number;
  currentRange?: CurrentRange;
}

export interface LeakageResult {
  /** Currents before any perturbation, one per contact */
  steadyStateA: number[];
  /** [i][j] = dI_j / dV_i in Siemens */
  conductanceS: number[][];
}
