import { describe, it, expect } from 'vitest';
import type { CoordinatorStatus } from '@radarscope/shared';
import { CommandError, KEY_BINDINGS, parseCommand } from '../api/commands.js';
import { buildHealth } from '../api/health.js';

describe('parseCommand', () => {
  it('accepts plain commands', () => {
    expect(parseCommand({ type: 'speed_up' })).toEqual({ type: 'speed_up' });
    expect(parseCommand({ type: 'toggle_real_data', extra: true })).toEqual({ type: 'toggle_real_data' });
  });

  it('requires a known kind for filter toggles', () => {
    expect(parseCommand({ type: 'toggle_filter', kind: 'Satellite' })).toEqual({ type: 'toggle_filter', kind: 'Satellite' });
    expect(() => parseCommand({ type: 'toggle_filter', kind: 'Lidar' })).toThrow('Unknown signal kind: Lidar');
    expect(() => parseCommand({ type: 'toggle_filter' })).toThrow(CommandError);
  });

  it('maps keys to commands', () => {
    expect(parseCommand({ key: '7' })).toEqual({ type: 'toggle_filter', kind: 'Network' });
    expect(parseCommand({ key: ' ' })).toBe(KEY_BINDINGS[' ']);
    expect(() => parseCommand({ key: 'z' })).toThrow('No command bound to key "z"');
  });

  it('rejects malformed input', () => {
    expect(() => parseCommand(null)).toThrow('Command must be an object');
    expect(() => parseCommand({})).toThrow('Command type is required');
    expect(() => parseCommand({ type: 'self_destruct' })).toThrow('Unknown command: self_destruct');
  });
});

describe('buildHealth', () => {
  const coordinator: CoordinatorStatus = {
    state: 'idle',
    lastScanAt: 1_000,
    cachedSignals: 1,
    scanners: [
      { name: 'WiFi Scanner', available: true, lastOutcome: 'ok', lastDetections: 1, lastDurationMs: 40, failures: 0 },
      { name: 'Network Interface Scanner', available: false, lastOutcome: 'unavailable', lastDetections: 0, failures: 0 },
    ],
  };

  it('is healthy on live data', () => {
    const health = buildHealth({ coordinator, collectorSource: 'live', dataMode: 'real', now: 2_000 });
    expect(health.status).toBe('healthy');
    expect(health.components.map((c) => [c.name, c.status])).toEqual([
      ['Real Data Collector', 'up'],
      ['WiFi Scanner', 'up'],
      ['Network Interface Scanner', 'down'],
    ]);
    expect(health.components[1]).toMatchObject({ latency: 40, lastCheck: 1_000 });
  });

  it('is degraded on fallback data and unhealthy on none', () => {
    expect(buildHealth({ coordinator, collectorSource: 'fallback', dataMode: 'real', now: 0 }).status).toBe('degraded');
    expect(buildHealth({ coordinator, collectorSource: 'empty', dataMode: 'real', now: 0 }).status).toBe('unhealthy');
  });

  it('ignores the collector in simulated mode', () => {
    expect(buildHealth({ coordinator, collectorSource: 'empty', dataMode: 'simulated', now: 0 }).status).toBe('healthy');
  });
});
