// ============================================================================
// RadarScope Radar Types
// ============================================================================

export type SignalKind =
  | 'WiFi'
  | 'Bluetooth'
  | 'Cellular'
  | 'Radio'
  | 'IoT'
  | 'Satellite'
  | 'Network';

export const SIGNAL_KINDS: readonly SignalKind[] = [
  'WiFi', 'Bluetooth', 'Cellular', 'Radio', 'IoT', 'Satellite', 'Network',
];

/** Where a signal came from: a scanner, the simulator, or the collector's placeholder set. */
export type SignalOrigin = 'real' | 'simulated' | 'placeholder';

export interface PositionSample {
  readonly distance: number;
  readonly angle: number;       // radians
  readonly strength: number;    // 0-100
  readonly timestamp: number;   // epoch ms
  readonly wasIlluminated: boolean;
}

/** Raw record produced by a scanner, before it becomes a live signal. */
export interface DetectedSignal {
  kind: SignalKind;
  name: string;
  strength: number;       // 0-100
  distance: number;       // radar units
  icon?: string;
  angle?: number;         // radians; random when omitted
  source?: string;        // scanner name
}

/** Read-only snapshot of one signal, handed to renderers each frame. */
export interface SignalView {
  id: string;
  kind: SignalKind;
  icon: string;
  name: string;
  origin: SignalOrigin;
  strength: number;
  distance: number;
  angle: number;
  phase: number;
  persistence: number;
  createdAt: number;
  lastIlluminatedAt: number;
  history: PositionSample[];
}

export type FilterState = Record<SignalKind, boolean> & { all: boolean };

export interface DisplayOptions {
  showTrails: boolean;
  showNames: boolean;
  showInfoPanel: boolean;
}

export interface FrameStats {
  frames: number;
  avgTickMs: number;
  frameRate: number;
}

export type DataMode = 'real' | 'simulated';

export interface RadarFrame {
  t: number;
  sweepAngle: number;
  sweepSpeed: number;
  beamWidth: number;
  maxScanRange: number;
  paused: boolean;
  dataMode: DataMode;
  signals: SignalView[];
  selectedSignalId: string | null;
  selectedSignalIndex: number;   // index into `signals`, -1 when none
  filters: FilterState;
  counts: Record<SignalKind, number>;
  totalSignals: number;
  display: DisplayOptions;
  stats: FrameStats;
}

export type RadarCommand =
  | { type: 'toggle_pause' }
  | { type: 'speed_up' }
  | { type: 'slow_down' }
  | { type: 'reset' }
  | { type: 'toggle_filter'; kind: SignalKind }
  | { type: 'toggle_all_filters' }
  | { type: 'select_next' }
  | { type: 'select_previous' }
  | { type: 'clear_selection' }
  | { type: 'toggle_trails' }
  | { type: 'toggle_names' }
  | { type: 'toggle_info' }
  | { type: 'toggle_real_data' };

export interface RadarConfig {
  port: number;
  refreshRate: number;          // ms per frame
  sweepSpeed: number;           // radians per tick
  beamWidth: number;            // radians
  maxSignals: number;
  signalLifetime: number;       // ms
  maxPhase: number;
  historyUpdateRate: number;    // seconds
  maxHistory: number;
  scanInterval: number;         // ms
  maxScanRange: number;         // radar units
  minDistance: number;          // radar units
  useRealData: boolean;
  useSimulatedFallback: boolean;
  enableConsent: boolean;
  demoScanner: boolean;
}
