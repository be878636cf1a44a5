// ============================================================================
// RadarScope — Radar Tick Engine
// Per-frame sweep, illumination/decay, history, and periodic signal management.
// ============================================================================
import { EventEmitter } from 'events';
import { SIGNAL_KINDS } from '@radarscope/shared';
import type { DataMode, DisplayOptions, FilterState, RadarCommand, RadarConfig, RadarFrame, SignalKind } from '@radarscope/shared';
import type { CollectionResult } from '../collector/service.js';
import { angularDistance, clamp, normalizeAngle } from '../signal/geometry.js';
import { Signal, createIdSource, type SignalLimits } from '../signal/model.js';
import { generateInitialSignals, synthesizeSignal, type SimulatorDeps } from './simulator.js';
import { signalLimits } from '../config/settings.js';
import { describeError } from '../util/errors.js';
import { createLogger } from '../util/log.js';
import { randomInt, systemClock, systemRandom, type Clock, type Random } from '../util/runtime.js';

export const MANAGEMENT_INTERVAL_MS = 2_000;
export const SYNTHESIS_CHANCE = 0.3;
export const STRENGTH_JITTER_CHANCE = 0.1;
export const MIN_SWEEP_SPEED = Math.PI / 120;
export const MAX_SWEEP_SPEED = Math.PI / 5;
export const SWEEP_SPEED_STEP = 1.2;

const log = createLogger('🎯 [Radar]');

export type EngineConfig = Pick<RadarConfig,
  | 'sweepSpeed' | 'beamWidth' | 'maxSignals' | 'signalLifetime' | 'maxPhase'
  | 'historyUpdateRate' | 'maxHistory' | 'maxScanRange' | 'minDistance' | 'useRealData'>;

/** What the engine needs from the real data collector. */
export interface SignalFeed {
  collect(): Promise<CollectionResult>;
  cachedSignals(): Signal[];
  getGeneration(): number;
}

export interface EngineOptions {
  clock?: Clock;
  random?: Random;
  feed?: SignalFeed;
  /** Starting population. Defaults to a freshly simulated set. */
  initialSignals?: Signal[];
}

function allFilters(visible: boolean): FilterState {
  return {
    WiFi: visible, Bluetooth: visible, Cellular: visible, Radio: visible,
    IoT: visible, Satellite: visible, Network: visible, all: visible,
  };
}

function emptyCounts(): Record<SignalKind, number> {
  return { WiFi: 0, Bluetooth: 0, Cellular: 0, Radio: 0, IoT: 0, Satellite: 0, Network: 0 };
}

export class RadarEngine extends EventEmitter {
  private signals: Signal[];
  private sweepAngle = 0;
  private sweepSpeed: number;
  private paused = false;
  private useRealData: boolean;
  private filters: FilterState = allFilters(true);
  private display: DisplayOptions = { showTrails: true, showNames: false, showInfoPanel: false };
  private selectedId: string | null = null;

  private lastHistoryUpdate: number;
  private lastManagementAt: number;
  private inbox: CollectionResult | null = null;
  private mergedGeneration = 0;
  private collecting = false;

  private frames = 0;
  private avgTickMs = 0;
  private avgIntervalMs = 0;
  private lastTickAt: number | null = null;

  private readonly clock: Clock;
  private readonly random: Random;
  private readonly feed?: SignalFeed;
  private readonly limits: SignalLimits;
  private readonly simulator: SimulatorDeps;

  constructor(private readonly config: EngineConfig, options: EngineOptions = {}) {
    super();
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? systemRandom;
    this.feed = options.feed;
    this.limits = signalLimits(config);
    this.simulator = { limits: this.limits, random: this.random, nextId: createIdSource('sim') };
    this.sweepSpeed = clamp(config.sweepSpeed, MIN_SWEEP_SPEED, MAX_SWEEP_SPEED);
    this.useRealData = config.useRealData;

    const now = this.clock();
    this.lastHistoryUpdate = now;
    this.lastManagementAt = now;
    this.signals = options.initialSignals ? [...options.initialSignals] : generateInitialSignals(now, this.simulator);
    if (this.useRealData) this.requestCollection();
  }

  getSweepAngle(): number { return this.sweepAngle; }
  getSweepSpeed(): number { return this.sweepSpeed; }
  isPaused(): boolean { return this.paused; }
  getDataMode(): DataMode { return this.useRealData ? 'real' : 'simulated'; }
  getFilters(): FilterState { return { ...this.filters }; }
  signalCount(): number { return this.signals.length; }
  hasSignal(id: string): boolean { return this.signals.some((s) => s.id === id); }

  /** Whether the beam currently overlaps `angle` (shorter-arc distance under the beam width). */
  isIlluminated(angle: number, sweepAngle = this.sweepAngle): boolean {
    return angularDistance(angle, sweepAngle) < this.config.beamWidth;
  }

  tick() {
    if (this.paused) return;
    const started = performance.now();
    const now = this.clock();

    if (now - this.lastHistoryUpdate >= this.config.historyUpdateRate * 1000) {
      this.updateHistory(now);
      this.lastHistoryUpdate = now;
    }

    // every signal is judged against the same sweep position
    const sweep = this.sweepAngle;
    for (const signal of this.signals) {
      signal.advancePhase();
      if (this.isIlluminated(signal.angle, sweep)) {
        signal.illuminate(now);
        if (this.random() < STRENGTH_JITTER_CHANCE) signal.jitterStrength(randomInt(this.random, -10, 10));
      } else {
        signal.decay(now);
      }
    }

    this.sweepAngle = normalizeAngle(sweep + this.sweepSpeed);

    if (now - this.lastManagementAt >= MANAGEMENT_INTERVAL_MS) {
      this.manageSignals(now);
      this.lastManagementAt = now;
    }

    this.recordStats(now, performance.now() - started);
  }

  private updateHistory(now: number) {
    for (const signal of this.signals) {
      signal.drift(this.random);
      signal.recordPosition(now, this.isIlluminated(signal.angle));
    }
  }

  private manageSignals(now: number) {
    const before = this.signals.length;
    this.signals = this.signals.filter((s) => s.age(now) <= this.config.signalLifetime && s.isVisible());
    const dropped = before - this.signals.length;

    const batch = this.inbox;
    this.inbox = null;
    if (batch && this.useRealData && batch.generation > this.mergedGeneration) {
      this.mergedGeneration = batch.generation;
      if (batch.signals.length > 0) {
        this.signals.push(...batch.signals);
        if (this.signals.length > this.config.maxSignals) {
          this.signals = this.signals.slice(-this.config.maxSignals);
        }
        log.debug(`Merged ${batch.signals.length} ${batch.source} signals (generation ${batch.generation})`);
      }
    }

    if (this.useRealData) this.requestCollection();

    if (this.signals.length < this.config.maxSignals && this.random() < SYNTHESIS_CHANCE) {
      this.signals.push(synthesizeSignal(now, this.simulator));
    }

    if (this.selectedId !== null && !this.hasSignal(this.selectedId)) this.selectedId = null;
    if (dropped > 0) this.emit('signals_dropped', dropped);
  }

  /** Starts a background collection; its result is merged by a later management tick. */
  private requestCollection() {
    if (!this.feed || this.collecting) return;
    this.collecting = true;
    this.feed.collect()
      .then((result) => { this.inbox = result; })
      .catch((err: unknown) => { log.error(`Collection failed: ${describeError(err)}`); })
      .finally(() => { this.collecting = false; });
  }

  private recordStats(now: number, tickMs: number) {
    this.frames++;
    this.avgTickMs = this.frames === 1 ? tickMs : this.avgTickMs * 0.9 + tickMs * 0.1;
    if (this.lastTickAt !== null) {
      const interval = now - this.lastTickAt;
      this.avgIntervalMs = this.avgIntervalMs === 0 ? interval : this.avgIntervalMs * 0.9 + interval * 0.1;
    }
    this.lastTickAt = now;
  }

  // ── Render boundary ────────────────────────────────────────────────────

  private visibleSignals(): Signal[] {
    return this.signals.filter((s) => s.isVisible() && this.filters[s.kind]);
  }

  frame(): RadarFrame {
    const visible = this.visibleSignals();
    const counts = emptyCounts();
    for (const s of visible) counts[s.kind]++;
    return {
      t: this.clock(),
      sweepAngle: this.sweepAngle,
      sweepSpeed: this.sweepSpeed,
      beamWidth: this.config.beamWidth,
      maxScanRange: this.config.maxScanRange,
      paused: this.paused,
      dataMode: this.getDataMode(),
      signals: visible.map((s) => s.toView()),
      selectedSignalId: this.selectedId,
      selectedSignalIndex: this.selectedId === null ? -1 : visible.findIndex((s) => s.id === this.selectedId),
      filters: { ...this.filters },
      counts,
      totalSignals: this.signals.length,
      display: { ...this.display },
      stats: {
        frames: this.frames,
        avgTickMs: this.avgTickMs,
        frameRate: this.avgIntervalMs > 0 ? 1000 / this.avgIntervalMs : 0,
      },
    };
  }

  // ── Controls ───────────────────────────────────────────────────────────

  apply(command: RadarCommand) {
    switch (command.type) {
      case 'toggle_pause': this.paused = !this.paused; break;
      case 'speed_up': this.sweepSpeed = Math.min(this.sweepSpeed * SWEEP_SPEED_STEP, MAX_SWEEP_SPEED); break;
      case 'slow_down': this.sweepSpeed = Math.max(this.sweepSpeed / SWEEP_SPEED_STEP, MIN_SWEEP_SPEED); break;
      case 'reset': this.reset(); break;
      case 'toggle_filter': this.toggleFilter(command.kind); break;
      case 'toggle_all_filters': this.filters = allFilters(!this.filters.all); break;
      case 'select_next': this.selectStep(1); break;
      case 'select_previous': this.selectStep(-1); break;
      case 'clear_selection': this.selectedId = null; break;
      case 'toggle_trails': this.display.showTrails = !this.display.showTrails; break;
      case 'toggle_names': this.display.showNames = !this.display.showNames; break;
      case 'toggle_info': this.display.showInfoPanel = !this.display.showInfoPanel; break;
      case 'toggle_real_data': this.toggleRealData(); break;
    }
    this.emit('command', command);
  }

  private reset() {
    this.signals = generateInitialSignals(this.clock(), this.simulator);
    this.sweepAngle = 0;
    this.paused = false;
    this.selectedId = null;
  }

  private toggleFilter(kind: SignalKind) {
    this.filters[kind] = !this.filters[kind];
    this.filters.all = SIGNAL_KINDS.every((k) => this.filters[k]);
  }

  private selectStep(step: 1 | -1) {
    const visible = this.visibleSignals();
    if (visible.length === 0) {
      this.selectedId = null;
      return;
    }
    const current = this.selectedId === null ? -1 : visible.findIndex((s) => s.id === this.selectedId);
    let next: number;
    if (current === -1) next = step === 1 ? 0 : visible.length - 1;
    else next = (current + step + visible.length) % visible.length;
    this.selectedId = visible[next].id;
  }

  private toggleRealData() {
    this.useRealData = !this.useRealData;
    this.inbox = null;
    this.selectedId = null;
    if (this.useRealData) {
      if (this.feed) {
        const cached = this.feed.cachedSignals();
        if (cached.length > 0) {
          this.signals = cached.slice(-this.config.maxSignals);
          this.mergedGeneration = this.feed.getGeneration();
        }
      }
      this.requestCollection();
    } else {
      this.signals = generateInitialSignals(this.clock(), this.simulator);
    }
    log.info(`Data mode: ${this.getDataMode()}`);
  }
}
