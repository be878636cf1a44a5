import { SIGNAL_KINDS } from '@radarscope/shared';
import type { RadarCommand, SignalKind } from '@radarscope/shared';

type SimpleCommand = Exclude<RadarCommand, { type: 'toggle_filter' }>['type'];

const SIMPLE_COMMANDS: readonly SimpleCommand[] = [
  'toggle_pause', 'speed_up', 'slow_down', 'reset', 'toggle_all_filters',
  'select_next', 'select_previous', 'clear_selection',
  'toggle_trails', 'toggle_names', 'toggle_info', 'toggle_real_data',
];

/** Keyboard equivalents, for clients that forward raw keys. */
export const KEY_BINDINGS: Readonly<Record<string, RadarCommand>> = {
  ' ': { type: 'toggle_pause' },
  '+': { type: 'speed_up' },
  '=': { type: 'speed_up' },
  '-': { type: 'slow_down' },
  r: { type: 'reset' },
  '1': { type: 'toggle_filter', kind: 'WiFi' },
  '2': { type: 'toggle_filter', kind: 'Bluetooth' },
  '3': { type: 'toggle_filter', kind: 'Cellular' },
  '4': { type: 'toggle_filter', kind: 'Radio' },
  '5': { type: 'toggle_filter', kind: 'IoT' },
  '6': { type: 'toggle_filter', kind: 'Satellite' },
  '7': { type: 'toggle_filter', kind: 'Network' },
  '0': { type: 'toggle_all_filters' },
  n: { type: 'select_next' },
  p: { type: 'select_previous' },
  c: { type: 'clear_selection' },
  t: { type: 'toggle_trails' },
  l: { type: 'toggle_names' },
  i: { type: 'toggle_info' },
  d: { type: 'toggle_real_data' },
};

export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

function isSimpleCommand(type: string): type is SimpleCommand {
  return SIMPLE_COMMANDS.some((c) => c === type);
}

function isSignalKind(value: unknown): value is SignalKind {
  return typeof value === 'string' && SIGNAL_KINDS.some((k) => k === value);
}

/** Validates an untrusted `{ type, kind? }` or `{ key }` payload. */
export function parseCommand(input: unknown): RadarCommand {
  if (typeof input !== 'object' || input === null) throw new CommandError('Command must be an object');

  if ('key' in input && typeof input.key === 'string') {
    const bound = KEY_BINDINGS[input.key];
    if (!bound) throw new CommandError(`No command bound to key "${input.key}"`);
    return bound;
  }

  if (!('type' in input) || typeof input.type !== 'string') throw new CommandError('Command type is required');
  const { type } = input;
  if (type === 'toggle_filter') {
    const kind = 'kind' in input ? input.kind : undefined;
    if (!isSignalKind(kind)) throw new CommandError(`Unknown signal kind: ${String(kind)}`);
    return { type, kind };
  }
  if (isSimpleCommand(type)) return { type };
  throw new CommandError(`Unknown command: ${type}`);
}
