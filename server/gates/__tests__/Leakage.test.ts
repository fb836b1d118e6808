import { describe, it, expect } from 'vitest';
import { createArrangement, type Arrangement, type ArrangementOptions } from '../Arrangement.js';
import { leakageResistanceOhm } from '../Leakage.js';
import type { Qdac2 } from '../../devices/drivers/qdac2.js';
import { createSimulatedQdac } from '../../devices/simulation/index.js';
import { connectedQdac } from './fixtures.js';

async function arrange(qdac: Qdac2, options: ArrangementOptions): Promise<Arrangement> {
  const created = await createArrangement(qdac, options);
  if (!created.ok) throw created.error;
  return created.value;
}

describe('currents', () => {
  it('switches range, waits for the relays, integrates and reads', async () => {
    const { qdac, transport } = await connectedQdac({}, { responses: { 'read? (@3,1)': '1e-09,-2.5e-09' } });
    const gates = await arrange(qdac, { contacts: { a: 3, b: 1 } });

    const currents = await gates.currentsA();

    expect(currents).toEqual({ ok: true, value: [1e-9, -2.5e-9] });
    expect(transport.sentCommands).toEqual([
      'sens:rang low,(@3,1)',
      '*stb?',
      'sens:nplc 1,(@3,1)',
      'read? (@3,1)',
    ]);
  });

  it('passes range and integration time through', async () => {
    const { qdac, transport } = await connectedQdac({}, { defaultResponse: '0' });
    const gates = await arrange(qdac, { contacts: { a: 2 } });

    await gates.currentsA({ nplc: 3, currentRange: 'high' });

    expect(transport.sentCommands[0]).toBe('sens:rang high,(@2)');
    expect(transport.sentCommands[2]).toBe('sens:nplc 3,(@2)');
  });

  it('fails when the reading count does not match the contacts', async () => {
    const { qdac } = await connectedQdac({}, { responses: { 'read? (@1,2)': '1e-09' } });
    const gates = await arrange(qdac, { contacts: { a: 1, b: 2 } });

    const currents = await gates.currentsA();

    expect(currents.ok).toBe(false);
    if (!currents.ok) expect(currents.error.message).toBe('dac: expected 2 current readings, got 1');
  });

  it('rejects a non-integer nplc', async () => {
    const { qdac, transport } = await connectedQdac();
    const gates = await arrange(qdac, { contacts: { a: 1 } });

    const currents = await gates.currentsA({ nplc: 0.5 });

    expect(currents.ok).toBe(false);
    expect(transport.sentCommands).toEqual([]);
  });
});

describe('leakage', () => {
  it('measures the coupling between two contacts', async () => {
    const created = await createSimulatedQdac({ name: 'sim', lineFrequencyHz: 1000, leakageOhm: 1e9, latencyMs: 0 });
    if (!created.ok) throw created.error;
    const { qdac, simulator } = created.value;
    simulator.couple(1, 2, 1e6);
    const gates = await arrange(qdac, { contacts: { a: 1, b: 2 } });

    const result = await gates.leakage(0.2);
    if (!result.ok) throw result.error;
    const { steadyStateA, conductanceS } = result.value;

    expect(steadyStateA).toEqual([0, 0]);
    expect(conductanceS[0][0] * 1e6).toBeCloseTo(1.001, 6);
    expect(conductanceS[0][1] * 1e6).toBeCloseTo(-1, 6);
    expect(conductanceS[1][0] * 1e6).toBeCloseTo(-1, 6);
    expect(conductanceS[1][1] * 1e6).toBeCloseTo(1.001, 6);
    expect(leakageResistanceOhm(conductanceS)[0][1]).toBeCloseTo(1e6, 3);
  });

  it('puts every contact back where it was', async () => {
    const created = await createSimulatedQdac({ name: 'sim', lineFrequencyHz: 1000, latencyMs: 0 });
    if (!created.ok) throw created.error;
    const { qdac, simulator } = created.value;
    const gates = await arrange(qdac, { contacts: { a: 1, b: 2 } });
    await gates.setVirtualVoltages({ a: 0.3, b: -0.2 });

    const result = await gates.leakage(0.1);

    expect(result.ok).toBe(true);
    expect(gates.virtualVoltage('a')).toEqual({ ok: true, value: 0.3 });
    expect(gates.virtualVoltage('b')).toEqual({ ok: true, value: -0.2 });
    expect(simulator.voltage(1)).toBe(0.3);
    expect(simulator.voltage(2)).toBe(-0.2);
  });

  it('restores the contact when a measurement fails', async () => {
    const { qdac, transport } = await connectedQdac({}, { defaultResponse: '0,0' });
    const gates = await arrange(qdac, { contacts: { a: 1, b: 2 } });
    transport.failOn('sour1:volt -0.05');

    const result = await gates.leakage(0.1);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('injected failure');
    expect(transport.sentCommands.slice(-4)).toEqual([
      'sour1:volt:mode fix',
      'sour1:volt 0',
      'sour2:volt:mode fix',
      'sour2:volt 0',
    ]);
    expect(gates.virtualVoltage('a')).toEqual({ ok: true, value: 0 });
  });

  it('restores every contact when a current read fails partway through', async () => {
    const { qdac, transport } = await connectedQdac({}, { defaultResponse: '0,0' });
    const gates = await arrange(qdac, { contacts: { a: 1, b: 2 } });
    await gates.setVirtualVoltages({ a: 0.2, b: -0.1 });
    transport.reset();
    transport.failOn('read? (@1,2)', 'read timed out', 1);

    const result = await gates.leakage(0.1);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('read timed out');
    expect(transport.sentCommands.filter(cmd => cmd === 'read? (@1,2)')).toHaveLength(2);
    expect(transport.sentCommands.slice(-4)).toEqual([
      'sour1:volt:mode fix',
      'sour1:volt 0.2',
      'sour2:volt:mode fix',
      'sour2:volt -0.1',
    ]);
    expect(gates.virtualVoltage('a')).toEqual({ ok: true, value: 0.2 });
    expect(gates.virtualVoltage('b')).toEqual({ ok: true, value: -0.1 });
  });

  it('rejects a zero modulation', async () => {
    const { qdac } = await connectedQdac();
    const gates = await arrange(qdac, { contacts: { a: 1 } });

    const result = await gates.leakage(0);

    expect(result.ok).toBe(false);
  });
});

describe('leakageResistanceOhm', () => {
  it('inverts conductances and keeps zero as infinite', () => {
    expect(leakageResistanceOhm([[2, -0.5], [0, 1]])).toEqual([[0.5, 2], [Infinity, 1]]);
  });
});
