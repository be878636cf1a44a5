// ============================================================================
// RadarScope — Signal kind catalogue (icons, demo names, drift profiles)
// ============================================================================
import type { SignalKind } from '@radarscope/shared';

export const KIND_ICONS: Record<SignalKind, string> = {
  WiFi: '≋',
  Bluetooth: 'β',
  Cellular: '▲',
  Radio: '◈',
  IoT: '◇',
  Satellite: '★',
  Network: '⚡',
};

/** Kinds the simulator produces. Network only ever comes from a real scanner. */
export const SIMULATED_KINDS: readonly SignalKind[] = ['WiFi', 'Bluetooth', 'Cellular', 'Radio', 'IoT', 'Satellite'];

export const DEMO_NAMES: Record<SignalKind, readonly string[]> = {
  WiFi: ['MyWiFi_5G', 'NETGEAR_2.4G', 'Linksys_AC', 'TP-Link_Guest'],
  Bluetooth: ['iPhone-12', 'AirPods-Pro', 'MacBook', 'Xbox-Controller'],
  Cellular: ['Verizon-LTE', 'AT&T-5G', 'T-Mobile', 'Cell-Tower-1'],
  Radio: ['FM-101.5', 'AM-680', 'HAM-Radio', 'Emergency-Freq'],
  IoT: ['Smart-TV', 'Nest-Cam', 'Ring-Door', 'Alexa-Echo'],
  Satellite: ['GPS-III', 'Starlink', 'ISS', 'Weather-Sat'],
  Network: ['HTTP', 'SSH', 'DNS', 'Other'],
};

export interface DriftProfile {
  /** Chance per history update that the signal moves at all. */
  moveChance: number;
  /** Half-width of the uniform distance step. */
  distanceStep: number;
  /** Half-width of the uniform angle step, radians. */
  angleStep: number;
  /** Orbital kinds advance by this much on every update, regardless of moveChance. */
  orbitalStep?: number;
}

const STATIONARY: DriftProfile = { moveChance: 0.05, distanceStep: 0.1, angleStep: 0.05 };

export const DRIFT_PROFILES: Record<SignalKind, DriftProfile> = {
  WiFi: STATIONARY,
  Radio: STATIONARY,
  IoT: STATIONARY,
  Network: STATIONARY,
  Bluetooth: { moveChance: 0.15, distanceStep: 0.25, angleStep: 0.1 },
  Cellular: { moveChance: 0.25, distanceStep: 0.4, angleStep: 0.15 },
  Satellite: { moveChance: 0.2, distanceStep: 0.15, angleStep: 0, orbitalStep: 0.05 },
};
