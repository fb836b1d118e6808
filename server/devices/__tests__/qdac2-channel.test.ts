import { describe, it, expect, beforeEach } from 'vitest';
import { createQdac2, type Qdac2 } from '../drivers/qdac2.js';
import { validateList, type Qdac2Channel } from '../drivers/qdac2-channel.js';
import { createMockTransport, type MockTransport } from './mock-transport.js';

describe('QDAC-II channel', () => {
  let transport: MockTransport;
  let qdac: Qdac2;
  let ch3: Qdac2Channel;

  beforeEach(async () => {
    transport = createMockTransport();
    qdac = createQdac2(transport, { name: 'dac', channelCount: 24, triggerCount: 16, trace: false });
    await qdac.connect();
    const channel = qdac.channel(3);
    if (!channel.ok) throw channel.error;
    ch3 = channel.value;
  });

  describe('fixed voltage', () => {
    it('switches to fixed mode and sets the level', async () => {
      const result = await ch3.setVoltageNow(0.25);

      expect(result.ok).toBe(true);
      expect(transport.sentCommands).toEqual(['sour3:volt:mode fix', 'sour3:volt 0.25']);
    });

    it('sends the level with every digit', async () => {
      await ch3.setVoltageNow(1.2345678);

      expect(transport.sentCommands[1]).toBe('sour3:volt 1.2345678');
    });

    it('rejects voltages outside the output range without writing', async () => {
      const result = await ch3.setVoltageNow(10.5);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Channel 3: 10.5 V is outside ±10 V');
      expect(transport.sentCommands).toEqual([]);
    });

    it('reads back the voltage', async () => {
      transport.responses['sour3:volt?'] = '-1.5\n';

      const result = await ch3.voltage();

      expect(result).toEqual({ ok: true, value: -1.5 });
    });
  });

  describe('list generator', () => {
    it('loads and arms a list with defaults', async () => {
      const result = await ch3.loadList([-1, 0, 1]);

      expect(result.ok).toBe(true);
      expect(transport.sentCommands).toEqual([
        'sour3:dc:trig:sour hold',
        'sour3:volt:mode list',
        'sour3:list:volt -1,0,1',
        'sour3:list:tmod auto',
        'sour3:list:dwel 0.001',
        'sour3:dc:del 0',
        'sour3:list:dir up',
        'sour3:list:coun 1',
        'sour3:dc:trig:sour bus',
        'sour3:dc:init:cont on',
      ]);
    });

    it('renders options', async () => {
      await ch3.loadList([0.5], { dwellS: 2e-6, repetitions: -1, direction: 'down', stepped: true, delayS: 0.01 });

      expect(transport.sentCommands).toContain('sour3:list:tmod step');
      expect(transport.sentCommands).toContain('sour3:list:dwel 2e-06');
      expect(transport.sentCommands).toContain('sour3:dc:del 0.01');
      expect(transport.sentCommands).toContain('sour3:list:dir down');
      expect(transport.sentCommands).toContain('sour3:list:coun -1');
    });

    it('keeps defaults when options are explicitly undefined', async () => {
      await ch3.loadList([1], { dwellS: undefined });

      expect(transport.sentCommands[4]).toBe('sour3:list:dwel 0.001');
    });

    it('validates before writing anything', async () => {
      const result = await ch3.loadList([1, 2], { expectedLength: 3 });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.name).toBe('ConfigurationError');
        expect(result.error.message).toBe('Channel 3: expected 3 voltages, got 2');
      }
      expect(transport.sentCommands).toEqual([]);
    });

    it('stops at the first failing command', async () => {
      transport.failOn('sour3:list:volt -1,1');

      const result = await ch3.loadList([-1, 1]);

      expect(result.ok).toBe(false);
      expect(transport.sentCommands).toEqual([
        'sour3:dc:trig:sour hold',
        'sour3:volt:mode list',
        'sour3:list:volt -1,1',
      ]);
    });

    it('appends values and re-arms', async () => {
      await ch3.appendList([2, 3]);

      expect(transport.sentCommands).toEqual(['sour3:list:volt:app 2,3', 'sour3:dc:init:cont on']);
    });

    it('reads the loaded list and counters', async () => {
      transport.responses['sour3:list:volt?'] = '-1, 0, 1';
      transport.responses['sour3:list:poin?'] = '3';
      transport.responses['sour3:list:ncl?'] = '2';

      expect(await ch3.listValues()).toEqual({ ok: true, value: [-1, 0, 1] });
      expect(await ch3.listPoints()).toEqual({ ok: true, value: 3 });
      expect(await ch3.cyclesRemaining()).toEqual({ ok: true, value: 2 });
    });
  });

  describe('triggering', () => {
    it('starts on an internal trigger', async () => {
      await ch3.startOn({ value: 7 });

      expect(transport.sentCommands).toEqual(['sour3:dc:trig:sour int7', 'sour3:dc:init:cont on']);
    });

    it('starts on an external input', async () => {
      await ch3.startOnExternal(3);

      expect(transport.sentCommands).toEqual(['sour3:dc:trig:sour ext3', 'sour3:dc:init:cont on']);
    });

    it('starts immediately', async () => {
      await ch3.startImmediate();

      expect(transport.sentCommands).toEqual([
        'sour3:dc:init:cont off',
        'sour3:dc:trig:sour imm',
        'sour3:dc:init',
      ]);
    });

    it('aborts back to immediate triggering', async () => {
      await ch3.abort();

      expect(transport.sentCommands).toEqual(['sour3:dc:abor', 'sour3:dc:trig:sour imm']);
    });

    it('sets and clears the step marker', async () => {
      await ch3.markStepStart({ value: 2 });
      await ch3.markStepStart(null);

      expect(transport.sentCommands).toEqual(['sour3:dc:mark:sst 2', 'sour3:dc:mark:sst 0']);
    });
  });

  describe('periodic marker', () => {
    it('arms a zero-span sine generator', async () => {
      const marker = await ch3.periodicMarker({ periodS: 0.003, cycles: 4 });

      expect(marker.ok).toBe(true);
      expect(transport.sentCommands).toEqual([
        'sour3:sine:trig:sour hold',
        'sour3:sine:per 0.003',
        'sour3:sine:pol norm',
        'sour3:sine:span 0',
        'sour3:sine:offs 0',
        'sour3:sine:slew inf',
        'sour3:sine:del 0',
        'sour3:sine:coun 4',
        'sour3:sine:trig:sour bus',
        'sour3:sine:init:cont on',
      ]);
    });

    it('starts, marks and aborts', async () => {
      const marker = await ch3.periodicMarker({ periodS: 1, cycles: -1 });
      if (!marker.ok) throw marker.error;
      transport.reset();

      await marker.value.startOn({ value: 1 });
      await marker.value.markPeriodStart({ value: 2 });
      await marker.value.abort();

      expect(transport.sentCommands).toEqual([
        'sour3:sine:trig:sour int1',
        'sour3:sine:init:cont on',
        'sour3:sine:mark:pstart 2',
        'sour3:sine:abor',
        'sour3:sine:mark:pstart 0',
        'sour3:sine:trig:sour imm',
      ]);
    });

    it('rejects a non-positive period', async () => {
      const marker = await ch3.periodicMarker({ periodS: 0, cycles: 1 });

      expect(marker.ok).toBe(false);
      expect(transport.sentCommands).toEqual([]);
    });
  });
});

describe('validateList', () => {
  it('accepts a plain list', () => {
    expect(validateList(1, [0, 1, -1])).toBeNull();
  });

  it('rejects an empty list', () => {
    expect(validateList(1, [])?.message).toBe('Channel 1: voltage list is empty');
  });

  it('rejects values outside the output range', () => {
    expect(validateList(2, [0, -11])?.message).toBe('Channel 2: voltage -11 at index 1 is outside ±10 V');
  });

  it('rejects non-finite values', () => {
    expect(validateList(2, [Number.NaN])?.message).toBe('Channel 2: voltage NaN at index 0 is outside ±10 V');
  });

  it('rejects lists longer than the hardware memory', () => {
    const values = new Array<number>(65537).fill(0);
    expect(validateList(4, values)?.message).toBe('Channel 4: 65537 voltages exceed the list limit of 65536');
  });

  it('rejects bad dwell, delay and repetitions', () => {
    expect(validateList(1, [0], { dwellS: 0 })?.message).toBe('Channel 1: dwell must be positive, got 0');
    expect(validateList(1, [0], { delayS: -1 })?.message).toBe('Channel 1: delay must not be negative, got -1');
    expect(validateList(1, [0], { repetitions: 0 })?.message).toBe(
      'Channel 1: repetitions must be a positive integer or -1, got 0'
    );
  });
});
