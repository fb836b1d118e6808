/**
 * Typed SCPI requests
 *
 * Drivers build commands as a list of header nodes plus typed arguments and
 * only turn them into text at the transport boundary:
 *
 *   renderCommand(command([source(3), 'list', 'volt'], [-1, 0, 1]))
 *     => 'sour3:list:volt -1,0,1'
 *
 * Numbers are rendered like printf's %g (six significant digits, exponent
 * form below 1e-4 and from 1e6 up). Wrap a number in exact() to send it
 * with every digit.
 */

export interface ScpiNode {
  readonly name: string;
  /** Numeric suffix glued to the mnemonic, e.g. the 3 of "sour3" */
  readonly suffix?: number;
}

/** Channel list argument, rendered as "(@1,2,3)" */
export interface ChannelList {
  readonly kind: 'channels';
  readonly channels: readonly number[];
}

/** Number rendered at full precision instead of %g */
export interface ExactNumber {
  readonly kind: 'exact';
  readonly value: number;
}

export type ScpiArg = number | string | readonly number[] | ChannelList | ExactNumber;

export interface ScpiCommand {
  readonly nodes: readonly ScpiNode[];
  readonly query: boolean;
  readonly args: readonly ScpiArg[];
}

type NodeLike = ScpiNode | string;

function toNode(node: NodeLike): ScpiNode {
  return typeof node === 'string' ? { name: node } : node;
}

export function node(name: string, suffix?: number): ScpiNode {
  return suffix === undefined ? { name } : { name, suffix };
}

/** Source subsystem of one channel */
export function source(channel: number): ScpiNode {
  return node('sour', channel);
}

export function channels(list: readonly number[]): ChannelList {
  return { kind: 'channels', channels: list };
}

export function exact(value: number): ExactNumber {
  return { kind: 'exact', value };
}

export function command(nodes: readonly NodeLike[], ...args: ScpiArg[]): ScpiCommand {
  return { nodes: nodes.map(toNode), query: false, args };
}

export function query(nodes: readonly NodeLike[], ...args: ScpiArg[]): ScpiCommand {
  return { nodes: nodes.map(toNode), query: true, args };
}

// ============ Rendering ============

function stripTrailingZeros(text: string): string {
  if (!text.includes('.')) return text;
  return text.replace(/0+$/, '').replace(/\.$/, '');
}

/** printf("%g") for one number */
export function formatG(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  if (value === 0) return '0';

  const [mantissa, exponentText] = value.toExponential(5).split('e');
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= 6) {
    const magnitude = Math.abs(exponent);
    const sign = exponent < 0 ? '-' : '+';
    const digits = magnitude < 10 ? `0${magnitude}` : `${magnitude}`;
    return `${stripTrailingZeros(mantissa)}e${sign}${digits}`;
  }

  return stripTrailingZeros(value.toFixed(5 - exponent));
}

function renderArg(arg: ScpiArg): string {
  if (typeof arg === 'number') return formatG(arg);
  if (typeof arg === 'string') return arg;
  if ('kind' in arg) {
    return arg.kind === 'exact' ? String(arg.value) : `(@${arg.channels.join(',')})`;
  }
  return arg.map(formatG).join(',');
}

export function renderCommand(cmd: ScpiCommand): string {
  const header = cmd.nodes
    .map(n => (n.suffix === undefined ? n.name : `${n.name}${n.suffix}`))
    .join(':');
  const mark = cmd.query ? '?' : '';
  if (cmd.args.length === 0) return `${header}${mark}`;
  return `${header}${mark} ${cmd.args.map(renderArg).join(',')}`;
}
