/**
 * Current measurement and leakage characterization
 *
 * Works on one or more arrangements (an instrument array passes one per
 * instrument). Readings come back in contact order, arrangement by
 * arrangement.
 */

import type { CurrentsOptions, LeakageResult, Result } from '../../shared/types.js';
import { Ok, Err, ValidationError } from '../../shared/types.js';
import { channels, command, query } from '../devices/scpi-command.js';
import { ScpiParser } from '../devices/scpi-parser.js';
import type { Arrangement } from './Arrangement.js';

const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

/**
 * Measure the current of every contact.
 *
 * Ranges are switched on every instrument first, a status query per
 * instrument waits for the relays, then one integration time plus one line
 * cycle passes before all channels are read.
 */
export async function measureCurrents(
  segments: readonly Arrangement[],
  options: CurrentsOptions = {}
): Promise<Result<number[], Error>> {
  const nplc = options.nplc ?? 1;
  const range = options.currentRange ?? 'low';
  if (!Number.isInteger(nplc) || nplc < 1) {
    return Err(new ValidationError(`nplc must be a positive integer, got ${nplc}`));
  }

  const active = segments.filter(segment => segment.shape > 0);
  if (active.length === 0) return Ok([]);

  for (const segment of active) {
    const sent = await segment.instrument.send(
      command(['sens', 'rang'], range, channels(segment.channelNumbers()))
    );
    if (!sent.ok) return sent;
  }

  for (const segment of active) {
    const settled = await segment.instrument.ask(query(['*stb']));
    if (!settled.ok) return settled;
    const sent = await segment.instrument.send(
      command(['sens', 'nplc'], nplc, channels(segment.channelNumbers()))
    );
    if (!sent.ok) return sent;
  }

  const slowestLineHz = Math.min(...active.map(segment => segment.instrument.lineFrequencyHz));
  await delay(((nplc + 1) / slowestLineHz) * 1000);

  const currents: number[] = [];
  for (const segment of active) {
    const response = await segment.instrument.ask(query(['read'], channels(segment.channelNumbers())));
    if (!response.ok) return response;
    const parsed = ScpiParser.parseFloats(response.value);
    if (!parsed.ok) return Err(new Error(`${segment.instrument.name}: ${parsed.error}`));
    if (parsed.value.length !== segment.shape) {
      return Err(new Error(
        `${segment.instrument.name}: expected ${segment.shape} current readings, got ${parsed.value.length}`
      ));
    }
    currents.push(...parsed.value);
  }
  return Ok(currents);
}

/**
 * Modulate each contact in turn by ±modulation/2 around its current virtual
 * voltage and record how every current responds.
 *
 * conductanceS[i][j] is the change in current of contact j per volt on
 * contact i. Each contact gets its virtual voltage back before the next one
 * is modulated, also when a measurement fails; the measurement error is
 * reported before a restore error.
 */
export async function measureLeakage(
  segments: readonly Arrangement[],
  modulationV: number,
  options: CurrentsOptions = {}
): Promise<Result<LeakageResult, Error>> {
  if (!Number.isFinite(modulationV) || modulationV === 0) {
    return Err(new ValidationError(`Modulation must be a non-zero voltage, got ${modulationV}`));
  }
  const measure: CurrentsOptions = { nplc: options.nplc ?? 2, currentRange: options.currentRange ?? 'low' };
  const half = modulationV / 2;

  const baseline = await measureCurrents(segments, measure);
  if (!baseline.ok) return baseline;

  const conductanceS: number[][] = [];
  for (const segment of segments) {
    for (const name of segment.contactNames()) {
      const original = segment.virtualVoltage(name);
      if (!original.ok) return original;

      let row: Result<number[], Error>;
      let restored: Result<void, Error> = Ok();
      try {
        row = await modulatedRow(segments, segment, name, original.value, half, measure);
      } finally {
        restored = await segment.setVirtualVoltage(name, original.value);
        if (!restored.ok) {
          console.warn(`[Arrangement] Could not restore ${name} to ${original.value} V: ${restored.error.message}`);
        }
      }
      if (!row.ok) return row;
      if (!restored.ok) return restored;
      conductanceS.push(row.value.map(delta => delta / modulationV));
    }
  }

  return Ok({ steadyStateA: baseline.value, conductanceS });
}

async function modulatedRow(
  segments: readonly Arrangement[],
  segment: Arrangement,
  name: string,
  originalV: number,
  half: number,
  measure: CurrentsOptions
): Promise<Result<number[], Error>> {
  const up = await segment.setVirtualVoltage(name, originalV + half);
  if (!up.ok) return up;
  const high = await measureCurrents(segments, measure);
  if (!high.ok) return high;

  const down = await segment.setVirtualVoltage(name, originalV - half);
  if (!down.ok) return down;
  const low = await measureCurrents(segments, measure);
  if (!low.ok) return low;

  return Ok(high.value.map((current, j) => current - low.value[j]));
}

/**
 * Contact-to-contact resistance from a conductance matrix: |1/g| per entry,
 * Infinity where no current change was seen.
 */
export function leakageResistanceOhm(conductanceS: readonly (readonly number[])[]): number[][] {
  return conductanceS.map(row => row.map(g => (g === 0 ? Infinity : Math.abs(1 / g))));
}
