// ============================================================================
// RadarScope — Real Data Collector
// Turns scanner detections into live signals under a hard one-second budget.
// ============================================================================
import { EventEmitter } from 'events';
import type { CollectionSource, DetectedSignal, ScanConfig, SignalOrigin } from '@radarscope/shared';
import type { Scanner } from '../scanner/types.js';
import { Signal, createIdSource, DEFAULT_SIGNAL_LIMITS, type SignalLimits } from '../signal/model.js';
import { TWO_PI } from '../signal/geometry.js';
import { AggregateEmptyError, RadarError, ScanFailedError, ScanTimeoutError } from '../util/errors.js';
import { createLogger } from '../util/log.js';
import { systemClock, systemRandom, type Clock, type Random } from '../util/runtime.js';

export const COLLECT_TIMEOUT_MS = 1_000;

const log = createLogger('🛰️ [Collector]');

/** Fixed placeholder set, marked `origin: 'placeholder'`. */
export const PLACEHOLDER_DETECTIONS: readonly DetectedSignal[] = [
  { kind: 'WiFi', name: 'Unknown-WiFi', strength: 60, distance: 3, angle: Math.PI / 4 },
  { kind: 'Cellular', name: 'Network-Activity', strength: 55, distance: 4, angle: (5 * Math.PI) / 4 },
];

export interface CollectionResult {
  signals: Signal[];
  /** Bumped whenever the cached detections change; consumers merge each generation once. */
  generation: number;
  source: CollectionSource;
  collectedAt: number;
}

export interface CollectorOptions {
  useSimulatedFallback: boolean;
  limits?: SignalLimits;
  timeoutMs?: number;
  clock?: Clock;
  random?: Random;
}

interface CachedDetections {
  detections: DetectedSignal[];
  origin: SignalOrigin;
}

type Attempt = { ok: true; signals: DetectedSignal[] } | { ok: false; error: unknown };

const TIMED_OUT = Symbol('timed-out');

export class RealDataCollector extends EventEmitter {
  private cache: CachedDetections = { detections: [], origin: 'real' };
  private generation = 0;
  private lastCollectAt: number | null = null;
  private lastSource: CollectionSource = 'empty';
  private readonly nextId = createIdSource('real');
  private readonly nextPlaceholderId = createIdSource('placeholder');
  private readonly limits: SignalLimits;
  private readonly timeoutMs: number;
  private readonly clock: Clock;
  private readonly random: Random;

  constructor(private readonly source: Scanner, private readonly config: ScanConfig, private readonly options: CollectorOptions) {
    super();
    this.limits = options.limits ?? DEFAULT_SIGNAL_LIMITS;
    this.timeoutMs = options.timeoutMs ?? COLLECT_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? systemRandom;
  }

  getLastSource(): CollectionSource { return this.lastSource; }
  getGeneration(): number { return this.generation; }

  /** Fresh signals built from whatever is cached, without scanning. */
  cachedSignals(): Signal[] {
    return this.materialize(this.clock());
  }

  /**
   * Never takes longer than the timeout. Within `scanInterval` of the last
   * collection it answers from the cache with an unchanged generation.
   */
  async collect(): Promise<CollectionResult> {
    const now = this.clock();
    if (this.lastCollectAt !== null && now - this.lastCollectAt < this.config.scanInterval) {
      return this.result(this.cachedSource(), now);
    }
    this.lastCollectAt = now;

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.timeoutMs);
    });
    const attempt: Promise<Attempt> = Promise.resolve()
      .then(() => this.source.scan(controller.signal))
      .then((signals): Attempt => ({ ok: true, signals }), (error: unknown): Attempt => ({ ok: false, error }));

    const outcome = await Promise.race([attempt, timeout]);
    if (timer) clearTimeout(timer);

    const name = this.source.name();
    if (outcome === TIMED_OUT) {
      const err = new ScanTimeoutError(name, this.timeoutMs);
      controller.abort(err);
      return this.degrade(err);
    }
    if (!outcome.ok) return this.degrade(new ScanFailedError(name, outcome.error));
    if (outcome.signals.length === 0) return this.degrade(new AggregateEmptyError(name));

    this.cache = { detections: outcome.signals.map((s) => ({ ...s })), origin: 'real' };
    this.generation++;
    log.debug(`Collected ${outcome.signals.length} detections from ${name}`);
    return this.result('live', this.clock());
  }

  private degrade(err: RadarError): CollectionResult {
    const now = this.clock();
    log.warn(`${err.message}; serving ${this.cache.detections.length > 0 ? 'cached' : 'fallback'} data`);
    this.emit('degraded', err);
    if (this.cache.detections.length > 0) return this.result(this.cachedSource(), now);
    if (this.options.useSimulatedFallback) {
      this.cache = { detections: PLACEHOLDER_DETECTIONS.map((d) => ({ ...d })), origin: 'placeholder' };
      this.generation++;
      return this.result('fallback', now);
    }
    return this.result('empty', now);
  }

  /** Re-served placeholders still count as fallback data. */
  private cachedSource(): CollectionSource {
    if (this.cache.detections.length === 0) return 'empty';
    return this.cache.origin === 'placeholder' ? 'fallback' : 'cache';
  }

  private result(source: CollectionSource, now: number): CollectionResult {
    this.lastSource = source;
    return { signals: this.materialize(now), generation: this.generation, source, collectedAt: now };
  }

  private materialize(now: number): Signal[] {
    const { detections, origin } = this.cache;
    return detections.map((d) => toSignal(d, origin, now, this.limits, this.random,
      origin === 'placeholder' ? this.nextPlaceholderId : this.nextId));
  }
}

export function toSignal(
  detection: DetectedSignal,
  origin: SignalOrigin,
  now: number,
  limits: SignalLimits,
  random: Random,
  nextId: () => string,
): Signal {
  const signal = new Signal({
    id: nextId(),
    kind: detection.kind,
    name: detection.name,
    icon: detection.icon,
    origin,
    strength: detection.strength,
    distance: detection.distance,
    angle: detection.angle ?? random() * TWO_PI,
    createdAt: now,
  }, limits);
  signal.recordPosition(now, true);
  return signal;
}
