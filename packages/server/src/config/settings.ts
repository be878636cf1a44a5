// ============================================================================
// RadarScope — Settings
// Defaults overridden by environment variables. Durations arrive in seconds
// (refresh rate in milliseconds) and are stored in milliseconds.
// ============================================================================
import type { RadarConfig, ScanConfig } from '@radarscope/shared';
import type { SignalLimits } from '../signal/model.js';
import { ConfigError } from '../util/errors.js';

export const DEFAULT_CONFIG: Readonly<RadarConfig> = Object.freeze({
  port: 3401,
  refreshRate: 80,
  sweepSpeed: Math.PI / 30,
  beamWidth: Math.PI / 60,
  maxSignals: 8,
  signalLifetime: 30_000,
  maxPhase: 8,
  historyUpdateRate: 0.5,
  maxHistory: 20,
  scanInterval: 8_000,
  maxScanRange: 10,
  minDistance: 0.5,
  useRealData: true,
  useSimulatedFallback: true,
  enableConsent: false,
  demoScanner: false,
});

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, min: number, max: number, integer = false): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigError(key, `expected a number, got "${raw}"`);
  if (integer && !Number.isInteger(value)) throw new ConfigError(key, `expected an integer, got "${raw}"`);
  if (value < min || value > max) throw new ConfigError(key, `must be between ${min} and ${max}, got ${value}`);
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  switch (raw.trim().toLowerCase()) {
    case '1': case 'true': case 'yes': case 'on': return true;
    case '0': case 'false': case 'no': case 'off': return false;
    default: throw new ConfigError(key, `expected true or false, got "${raw}"`);
  }
}

export function loadConfig(env: Env = process.env): Readonly<RadarConfig> {
  const d = DEFAULT_CONFIG;
  return Object.freeze({
    ...d,
    port: readNumber(env, 'PORT', d.port, 1, 65535, true),
    refreshRate: readNumber(env, 'RADAR_REFRESH_RATE', d.refreshRate, 10, 1000, true),
    sweepSpeed: readNumber(env, 'RADAR_SWEEP_SPEED', d.sweepSpeed, Math.PI / 120, Math.PI / 5),
    beamWidth: readNumber(env, 'RADAR_BEAM_WIDTH', d.beamWidth, 0.001, Math.PI),
    maxSignals: readNumber(env, 'RADAR_MAX_SIGNALS', d.maxSignals, 1, 500, true),
    signalLifetime: readNumber(env, 'RADAR_SIGNAL_LIFETIME', d.signalLifetime / 1000, 1, 3600) * 1000,
    scanInterval: readNumber(env, 'RADAR_SCAN_INTERVAL', d.scanInterval / 1000, 1, 3600) * 1000,
    maxScanRange: readNumber(env, 'RADAR_MAX_SCAN_RANGE', d.maxScanRange, 1, 1000),
    useRealData: readBoolean(env, 'RADAR_REAL_DATA', d.useRealData),
    useSimulatedFallback: readBoolean(env, 'RADAR_SIMULATED_FALLBACK', d.useSimulatedFallback),
    enableConsent: readBoolean(env, 'RADAR_ENABLE_CONSENT', d.enableConsent),
    demoScanner: readBoolean(env, 'RADAR_DEMO_SCANNER', d.demoScanner),
  });
}

export function toScanConfig(config: RadarConfig): Readonly<ScanConfig> {
  return Object.freeze({
    scanInterval: config.scanInterval,
    maxSignals: config.maxSignals,
    maxScanRange: config.maxScanRange,
    useRealData: config.useRealData,
    enableConsent: config.enableConsent,
  });
}

export function signalLimits(config: Pick<RadarConfig, 'minDistance' | 'maxScanRange' | 'maxHistory' | 'maxPhase'>): SignalLimits {
  return {
    minDistance: config.minDistance,
    maxScanRange: config.maxScanRange,
    maxHistory: config.maxHistory,
    maxPhase: config.maxPhase,
  };
}
