// ============================================================================
// RadarScope — Signal model: persistence decay, position history, drift
// ============================================================================
import type { PositionSample, SignalKind, SignalOrigin, SignalView } from '@radarscope/shared';
import { DRIFT_PROFILES, KIND_ICONS } from './catalog.js';
import { clamp, normalizeAngle } from './geometry.js';
import { RingBuffer } from './history.js';
import type { Random } from '../util/runtime.js';

/** Persistence lost per second without sweep contact: a full fade takes 8 s. */
export const DECAY_RATE = 1 / 8;
export const VISIBILITY_THRESHOLD = 0.1;
export const STRENGTH_JITTER_RANGE = { min: 10, max: 100 } as const;

export interface SignalLimits {
  minDistance: number;
  maxScanRange: number;
  maxHistory: number;
  maxPhase: number;
}

export const DEFAULT_SIGNAL_LIMITS: SignalLimits = {
  minDistance: 0.5,
  maxScanRange: 10,
  maxHistory: 20,
  maxPhase: 8,
};

export interface SignalInit {
  id: string;
  kind: SignalKind;
  name: string;
  origin: SignalOrigin;
  strength: number;
  distance: number;
  angle: number;
  createdAt: number;
  icon?: string;
  phase?: number;
  lastIlluminatedAt?: number;
  persistence?: number;
}

export class Signal {
  readonly id: string;
  readonly kind: SignalKind;
  readonly icon: string;
  readonly name: string;
  readonly origin: SignalOrigin;
  readonly createdAt: number;
  lastIlluminatedAt: number;

  private _strength = 0;
  private _distance = 0;
  private _angle = 0;
  private _phase = 0;
  private _persistence = 1;
  private readonly history: RingBuffer<PositionSample>;

  constructor(init: SignalInit, private readonly limits: SignalLimits = DEFAULT_SIGNAL_LIMITS) {
    this.id = init.id;
    this.kind = init.kind;
    this.icon = init.icon ?? KIND_ICONS[init.kind];
    this.name = init.name;
    this.origin = init.origin;
    this.createdAt = init.createdAt;
    this.lastIlluminatedAt = init.lastIlluminatedAt ?? init.createdAt;
    this.strength = init.strength;
    this.distance = init.distance;
    this.angle = init.angle;
    this.phase = init.phase ?? 0;
    this.persistence = init.persistence ?? 1;
    this.history = new RingBuffer<PositionSample>(limits.maxHistory);
  }

  get strength(): number { return this._strength; }
  set strength(value: number) { this._strength = Math.round(clamp(value, 0, 100)); }

  get distance(): number { return this._distance; }
  set distance(value: number) {
    this._distance = clamp(Number.isFinite(value) ? value : this.limits.minDistance, this.limits.minDistance, this.limits.maxScanRange);
  }

  get angle(): number { return this._angle; }
  set angle(value: number) { this._angle = normalizeAngle(value); }

  get phase(): number { return this._phase; }
  set phase(value: number) {
    const max = Math.max(1, this.limits.maxPhase);
    this._phase = ((Math.trunc(value) % max) + max) % max;
  }

  get persistence(): number { return this._persistence; }
  set persistence(value: number) { this._persistence = clamp(value, 0, 1); }

  get historyLength(): number { return this.history.length; }

  /** The sweep is over this signal right now. */
  illuminate(now: number) {
    this.lastIlluminatedAt = now;
    this.persistence = 1;
  }

  /** Linear fade from the last sweep contact; reaches 0 eight seconds later. */
  decay(now: number) {
    const elapsedSeconds = (now - this.lastIlluminatedAt) / 1000;
    this.persistence = Math.max(0, 1 - elapsedSeconds * DECAY_RATE);
  }

  isVisible(): boolean {
    return this._persistence > VISIBILITY_THRESHOLD;
  }

  age(now: number): number {
    return now - this.createdAt;
  }

  advancePhase() {
    this.phase = this._phase + 1;
  }

  /** Strength wobble applied on sweep contact. Stays within [10, 100]. */
  jitterStrength(delta: number) {
    this.strength = clamp(this._strength + delta, STRENGTH_JITTER_RANGE.min, STRENGTH_JITTER_RANGE.max);
  }

  recordPosition(now: number, wasIlluminated: boolean) {
    this.history.push(Object.freeze({
      distance: this._distance,
      angle: this._angle,
      strength: this._strength,
      timestamp: now,
      wasIlluminated,
    }));
  }

  getHistory(): PositionSample[] {
    return this.history.toArray();
  }

  /**
   * Per-kind movement. Stationary kinds rarely move and only a little, mobile
   * kinds move more often and further, orbital kinds advance their angle on
   * every call.
   */
  drift(random: Random) {
    const profile = DRIFT_PROFILES[this.kind];
    let angle = this._angle;
    let distance = this._distance;
    if (profile.orbitalStep !== undefined) angle += profile.orbitalStep;
    if (random() < profile.moveChance) {
      distance += (random() - 0.5) * 2 * profile.distanceStep;
      if (profile.angleStep > 0) angle += (random() - 0.5) * 2 * profile.angleStep;
    }
    this.distance = distance;
    this.angle = angle;
  }

  toView(): SignalView {
    return {
      id: this.id,
      kind: this.kind,
      icon: this.icon,
      name: this.name,
      origin: this.origin,
      strength: this._strength,
      distance: this._distance,
      angle: this._angle,
      phase: this._phase,
      persistence: this._persistence,
      createdAt: this.createdAt,
      lastIlluminatedAt: this.lastIlluminatedAt,
      history: this.history.toArray(),
    };
  }
}

export function createIdSource(prefix: string): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
