// ============================================================================
// RadarScope Scanner Types
// ============================================================================

/** Shared by reference with every data-acquisition component. */
export interface ScanConfig {
  readonly scanInterval: number; // ms
  readonly maxSignals: number;
  readonly maxScanRange: number;
  readonly useRealData: boolean;
  readonly enableConsent: boolean;
}

export type CoordinatorState = 'idle' | 'scanning';

export type ScannerOutcome = 'ok' | 'timeout' | 'failed' | 'unavailable';

export interface ScannerHealth {
  name: string;
  available: boolean;
  lastOutcome?: ScannerOutcome;
  lastDetections: number;
  lastDurationMs?: number;
  lastError?: string;
  failures: number;
}

export interface CoordinatorStatus {
  state: CoordinatorState;
  lastScanAt: number | null;
  cachedSignals: number;
  scanners: ScannerHealth[];
}

export type CollectionSource = 'live' | 'cache' | 'fallback' | 'empty';
