import { describe, it, expect, vi } from 'vitest';
import { createDacSimulator } from '../dac-simulator.js';
import { createSimulatedQdac } from '../index.js';
import { createArrangement } from '../../../gates/Arrangement.js';

describe('DAC simulator', () => {
  it('identifies as a QDAC-II', () => {
    const sim = createDacSimulator({ serial: '42', firmware: '3-0.18.0' });

    expect(sim.handleCommand('*IDN?')).toBe('QDevil,QDAC-II,42,3-0.18.0');
  });

  it('holds fixed voltages', () => {
    const sim = createDacSimulator();

    sim.handleCommand('sour2:volt:mode fix');
    sim.handleCommand('sour2:volt -1.25');

    expect(sim.voltage(2)).toBe(-1.25);
    expect(sim.handleCommand('sour2:volt?')).toBe('-1.25');
  });

  it('queues an error for voltages out of range', () => {
    const sim = createDacSimulator();

    sim.handleCommand('sour1:volt 12');

    expect(sim.voltage(1)).toBe(0);
    expect(sim.handleCommand('syst:err:coun?')).toBe('1');
    expect(sim.handleCommand('syst:err:all?')).toBe('-222,"Data out of range"');
    expect(sim.handleCommand('syst:err:all?')).toBe('0,"No error"');
  });

  it('stores and appends lists', () => {
    const sim = createDacSimulator();

    sim.handleCommand('sour3:list:volt 1,2');
    sim.handleCommand('sour3:list:volt:app 3');

    expect(sim.listValues(3)).toEqual([1, 2, 3]);
    expect(sim.handleCommand('sour3:list:poin?')).toBe('3');
    expect(sim.handleCommand('sour3:list:volt?')).toBe('1,2,3');
  });

  it('runs an armed list when its trigger fires', () => {
    const sim = createDacSimulator();
    sim.handleCommand('sour1:volt:mode list');
    sim.handleCommand('sour1:list:volt 0,0.5,1');
    sim.handleCommand('sour1:list:coun 1');
    sim.handleCommand('sour1:dc:trig:sour int3');
    sim.handleCommand('sour1:dc:init:cont on');

    sim.handleCommand('tint 2');
    expect(sim.voltage(1)).toBe(0);

    sim.handleCommand('tint 3');
    expect(sim.voltage(1)).toBe(1);
    expect(sim.handleCommand('sour1:list:ncl?')).toBe('0');
    expect(sim.firedTriggers()).toEqual([2, 3]);
  });

  it('sources current through ground and couplings', () => {
    const sim = createDacSimulator({ leakageOhm: 1e6 });
    sim.couple(1, 2, 1e3);
    sim.handleCommand('sour1:volt 1');

    expect(sim.handleCommand('read? (@1,2)')).toBe('1.001000e-3,-1.000000e-3');
  });

  it('follows an external clock after sync', () => {
    const sim = createDacSimulator();

    sim.handleCommand('syst:cloc:sour ext');

    expect(sim.clockSource()).toBe('ext');
  });

  it('warns about commands it does not know', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const sim = createDacSimulator();

    expect(sim.handleCommand('bogus:cmd')).toBeNull();
    expect(sim.handleCommand('bogus?')).toBe('');

    expect(warn).toHaveBeenCalledWith('[DacSimulator] Unknown command: bogus:cmd');
    expect(sim.handleCommand('syst:err?')).toBe('-113,"Undefined header"');
    warn.mockRestore();
  });
});

describe('simulated QDAC-II', () => {
  it('runs a sweep end to end', async () => {
    const created = await createSimulatedQdac({ name: 'sim', latencyMs: 0 });
    if (!created.ok) throw created.error;
    const { qdac, simulator } = created.value;
    const arrangement = await createArrangement(qdac, { contacts: { gate: 6 } });
    if (!arrangement.ok) throw arrangement.error;

    const sweep = await arrangement.value.virtualSweep('gate', [-0.5, 0, 0.5]);
    if (!sweep.ok) throw sweep.error;
    expect(simulator.triggerSource(6)).toBe('int1');
    expect(simulator.voltage(6)).toBe(0);

    await sweep.value.start();
    expect(simulator.voltage(6)).toBe(0.5);

    await sweep.value.close();
    expect(simulator.triggerSource(6)).toBe('imm');
    expect(await qdac.errors()).toEqual({ ok: true, value: [] });
  });

  it('fails to start when the firmware is too old', async () => {
    const created = await createSimulatedQdac({ name: 'old', latencyMs: 0, firmware: '3-0.17.4' });

    expect(created.ok).toBe(false);
    if (!created.ok) {
      expect(created.error.message).toBe('incompatible_firmware: Incompatible firmware 0.17.4. You need at least 0.17.5');
    }
  });
});
