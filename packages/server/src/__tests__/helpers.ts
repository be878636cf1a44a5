import type { DetectedSignal, ScanConfig } from '@radarscope/shared';
import type { Scanner } from '../scanner/types.js';
import { Signal, DEFAULT_SIGNAL_LIMITS, type SignalInit } from '../signal/model.js';

export const SCAN_CONFIG: ScanConfig = Object.freeze({
  scanInterval: 8_000,
  maxSignals: 8,
  maxScanRange: 10,
  useRealData: true,
  enableConsent: false,
});

let ids = 0;

export function makeSignal(overrides: Partial<SignalInit> = {}): Signal {
  return new Signal({
    id: overrides.id ?? `test-${++ids}`,
    kind: 'WiFi',
    name: 'TestNet',
    origin: 'simulated',
    strength: 70,
    distance: 3,
    angle: 0,
    createdAt: 0,
    ...overrides,
  }, DEFAULT_SIGNAL_LIMITS);
}

export function detection(name: string, overrides: Partial<DetectedSignal> = {}): DetectedSignal {
  return { kind: 'WiFi', name, strength: 60, distance: 2, ...overrides };
}

/** Random source that replays `values` in order, then repeats the last one. */
export function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)];
}

type ScanBehaviour = (signal: AbortSignal) => Promise<DetectedSignal[]>;

export class FakeScanner implements Scanner {
  calls = 0;
  lastSignal: AbortSignal | null = null;

  constructor(private readonly label: string, private readonly behaviour: ScanBehaviour, private readonly available = true) {}

  name(): string { return this.label; }
  isAvailable(): boolean { return this.available; }

  scan(signal: AbortSignal): Promise<DetectedSignal[]> {
    this.calls++;
    this.lastSignal = signal;
    return this.behaviour(signal);
  }
}

export function resolving(...signals: DetectedSignal[]): ScanBehaviour {
  return () => Promise.resolve(signals.map((s) => ({ ...s })));
}

/** Settles only when aborted, rejecting with the abort reason. */
export function hangingUntilAborted(): ScanBehaviour {
  return (signal) => new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/** Ignores the abort signal and never settles. */
export function neverSettling(): ScanBehaviour {
  return () => new Promise<DetectedSignal[]>(() => undefined);
}

export function failing(message: string): ScanBehaviour {
  return () => Promise.reject(new Error(message));
}

/** Lets pending promise callbacks run. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
