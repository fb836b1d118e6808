/**
 * QDAC-II Simulator
 * Answers the subset of the QDAC-II command set the driver uses
 *
 * Electrical model: every channel leaks to ground through `leakageOhm`, and
 * optional couplings put a resistor between two channels. The current a
 * channel sources is
 *
 *   I_j = V_j / R_ground + sum_k (V_j - V_k) / R_jk
 *
 * List generators are modelled only as far as triggering goes: asserting the
 * internal trigger a list waits on runs it to its last value at once.
 */

import { formatG } from '../scpi-command.js';

export interface DacSimulatorConfig {
  serial?: string;
  firmware?: string;
  channelCount?: number;
  /** Resistance from every channel to ground (default: 1e9) */
  leakageOhm?: number;
}

export interface DacSimulator {
  handleCommand(cmd: string): string | null;

  /** Put a resistor between two channels */
  couple(a: number, b: number, ohm: number): void;

  // Inspection
  voltage(channel: number): number;
  listValues(channel: number): number[];
  triggerSource(channel: number): string;
  firedTriggers(): number[];
  clockSource(): string;
}

interface ChannelState {
  mode: 'fix' | 'list';
  voltage: number;
  list: number[];
  count: number;
  cyclesLeft: number;
  triggerSource: string;
  continuous: boolean;
}

function freshChannel(): ChannelState {
  return {
    mode: 'fix',
    voltage: 0,
    list: [],
    count: 1,
    cyclesLeft: 0,
    triggerSource: 'imm',
    continuous: false,
  };
}

// Commands accepted without a modelled effect
const ACCEPTED = [
  /^abor$/,
  /^\*trg$/,
  /^outp:trig\d:(sour|widt) \S+$/,
  /^outp:sync:sign$/,
  /^syst:cloc:(send on|sync)$/,
  /^sens:(rang (low|high)|nplc \d+),\(@[\d,]+\)$/,
];

const SOURCE_PATTERN = /^sour(\d+):(.+)$/;
const CHANNEL_LIST_PATTERN = /\(@([\d,]+)\)/;

export function createDacSimulator(config: DacSimulatorConfig = {}): DacSimulator {
  const serial = config.serial ?? '00000';
  const firmware = config.firmware ?? '13-1.2.0';
  const channelCount = config.channelCount ?? 24;
  const leakageOhm = config.leakageOhm ?? 1e9;

  const channels = new Map<number, ChannelState>();
  const couplings = new Map<string, number>();
  const errors: Array<{ code: number; message: string }> = [];
  const fired: number[] = [];
  let clock = 'int';

  function reset(): void {
    channels.clear();
    for (let n = 1; n <= channelCount; n++) channels.set(n, freshChannel());
  }
  reset();

  function pushError(code: number, message: string): void {
    errors.push({ code, message });
  }

  function channelState(n: number): ChannelState | null {
    return channels.get(n) ?? null;
  }

  function couplingKey(a: number, b: number): string {
    return a < b ? `${a}-${b}` : `${b}-${a}`;
  }

  function current(n: number): number {
    const self = channelState(n);
    if (!self) return 0;
    let amps = self.voltage / leakageOhm;
    for (const [other, state] of channels) {
      if (other === n) continue;
      const ohm = couplings.get(couplingKey(n, other));
      if (ohm !== undefined) amps += (self.voltage - state.voltage) / ohm;
    }
    return amps;
  }

  function parseNumbers(text: string): number[] | null {
    const values = text.split(',').map(part => Number(part.trim()));
    return values.some(v => Number.isNaN(v)) ? null : values;
  }

  function fire(trigger: number): void {
    fired.push(trigger);
    for (const state of channels.values()) {
      if (state.mode !== 'list' || !state.continuous || state.triggerSource !== `int${trigger}`) continue;
      if (state.list.length === 0) continue;
      state.voltage = state.list[state.list.length - 1];
      state.cyclesLeft = 0;
    }
  }

  function formatErrors(list: Array<{ code: number; message: string }>): string {
    if (list.length === 0) return '0,"No error"';
    return list.map(e => `${e.code},"${e.message}"`).join(',');
  }

  function handleSource(n: number, rest: string): string | null | undefined {
    const state = channelState(n);
    if (!state) {
      pushError(-114, 'Header suffix out of range');
      return null;
    }

    if (rest === 'volt?') return formatG(state.voltage);
    if (rest === 'list:volt?') return state.list.map(formatG).join(',');
    if (rest === 'list:poin?') return String(state.list.length);
    if (rest === 'list:ncl?') return String(state.cyclesLeft);

    const [header, argument = ''] = rest.split(' ', 2);
    switch (header) {
      case 'volt:mode':
        if (argument !== 'fix' && argument !== 'list') return undefined;
        state.mode = argument;
        return null;
      case 'volt': {
        const value = Number(argument);
        if (Number.isNaN(value) || Math.abs(value) > 10) {
          pushError(-222, 'Data out of range');
        } else {
          state.voltage = value;
        }
        return null;
      }
      case 'list:volt':
      case 'list:volt:app': {
        const values = parseNumbers(argument);
        if (!values) {
          pushError(-104, 'Data type error');
          return null;
        }
        state.list = header === 'list:volt' ? values : [...state.list, ...values];
        return null;
      }
      case 'list:coun':
        state.count = Number(argument);
        state.cyclesLeft = state.count;
        return null;
      case 'dc:trig:sour':
        state.triggerSource = argument;
        return null;
      case 'dc:init:cont':
        state.continuous = argument === 'on';
        return null;
      case 'dc:init':
        if (state.mode === 'list' && state.list.length > 0) state.voltage = state.list[state.list.length - 1];
        return null;
      case 'dc:abor':
        state.continuous = false;
        return null;
      case 'list:tmod':
      case 'list:dwel':
      case 'list:dir':
      case 'dc:del':
      case 'dc:mark:sst':
        return null;
      default:
        return header.startsWith('sine:') ? null : undefined;
    }
  }

  function handleCommand(cmd: string): string | null {
    const trimmed = cmd.trim();

    if (trimmed === '*IDN?') return `QDevil,QDAC-II,${serial},${firmware}`;
    if (trimmed === '*stb?') return '0';
    if (trimmed === '*rst') {
      reset();
      return null;
    }
    if (trimmed === 'syst:err:all?') {
      const all = errors.splice(0, errors.length);
      return formatErrors(all);
    }
    if (trimmed === 'syst:err?') {
      const next = errors.shift();
      return formatErrors(next ? [next] : []);
    }
    if (trimmed === 'syst:err:coun?') return String(errors.length);
    if (trimmed === 'syst:cloc:sour ext') {
      clock = 'ext';
      return null;
    }

    if (trimmed.startsWith('tint ')) {
      fire(Number(trimmed.slice(5)));
      return null;
    }

    if (trimmed.startsWith('read? ')) {
      const match = CHANNEL_LIST_PATTERN.exec(trimmed);
      if (!match) {
        pushError(-104, 'Data type error');
        return '';
      }
      return match[1].split(',').map(n => current(Number(n)).toExponential(6)).join(',');
    }

    const source = SOURCE_PATTERN.exec(trimmed);
    if (source) {
      const handled = handleSource(Number(source[1]), source[2]);
      if (handled !== undefined) return handled;
    } else if (ACCEPTED.some(pattern => pattern.test(trimmed))) {
      return null;
    }

    console.warn(`[DacSimulator] Unknown command: ${trimmed}`);
    pushError(-113, 'Undefined header');
    return trimmed.includes('?') ? '' : null;
  }

  return {
    handleCommand,

    couple(a: number, b: number, ohm: number): void {
      couplings.set(couplingKey(a, b), ohm);
    },

    voltage(channel: number): number {
      return channelState(channel)?.voltage ?? 0;
    },

    listValues(channel: number): number[] {
      return [...(channelState(channel)?.list ?? [])];
    },

    triggerSource(channel: number): string {
      return channelState(channel)?.triggerSource ?? 'imm';
    },

    firedTriggers(): number[] {
      return [...fired];
    },

    clockSource(): string {
      return clock;
    },
  };
}
