// ============================================================================
// RadarScope — Scan Coordinator
// Runs every registered scanner concurrently under one deadline and serves a
// rate-limited cached aggregate without ever making the caller wait on I/O.
// ============================================================================
import { EventEmitter } from 'events';
import type { CoordinatorState, CoordinatorStatus, DetectedSignal, ScanConfig, ScannerHealth } from '@radarscope/shared';
import { copyDetections, type ScanReport, type Scanner } from './types.js';
import { ScanFailedError, ScanTimeoutError, ScannerUnavailableError, describeError } from '../util/errors.js';
import { createLogger } from '../util/log.js';
import { systemClock, type Clock } from '../util/runtime.js';

export const SCAN_TIMEOUT_MS = 5_000;

const log = createLogger('📡 [Coordinator]');

export interface CoordinatorOptions {
  timeoutMs?: number;
  clock?: Clock;
}

export interface ScanSummary {
  startedAt: number;
  finishedAt: number;
  detections: number;
  reported: string[];
  timedOut: string[];
  failed: string[];
}

export class ScanCoordinator extends EventEmitter implements Scanner {
  private scanners: Scanner[] = [];
  private health = new Map<string, ScannerHealth>();
  private cachedSignals: DetectedSignal[] = [];
  private state: CoordinatorState = 'idle';
  private lastScanAt: number | null = null;
  private inflight: Promise<void> | null = null;
  private readonly timeoutMs: number;
  private readonly clock: Clock;

  constructor(private readonly config: ScanConfig, options: CoordinatorOptions = {}) {
    super();
    this.timeoutMs = options.timeoutMs ?? SCAN_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
  }

  name(): string { return 'Scan Coordinator'; }
  isAvailable(): boolean { return true; }

  /** Probes the scanner once. Unavailable scanners are never retried. */
  register(scanner: Scanner): boolean {
    const name = scanner.name();
    let available = false;
    try {
      available = scanner.isAvailable();
    } catch (err) {
      log.warn(`${name} probe threw: ${describeError(err)}`);
    }
    if (!available) {
      const err = new ScannerUnavailableError(name);
      this.health.set(name, { name, available: false, lastOutcome: 'unavailable', lastDetections: 0, lastError: err.message, failures: 0 });
      log.info(err.message);
      return false;
    }
    this.scanners.push(scanner);
    this.health.set(name, { name, available: true, lastDetections: 0, failures: 0 });
    log.info(`Registered ${name}`);
    return true;
  }

  getScannerNames(): string[] {
    return this.scanners.map((s) => s.name());
  }

  getCachedSignals(): DetectedSignal[] {
    return copyDetections(this.cachedSignals);
  }

  getState(): CoordinatorState { return this.state; }

  getStatus(): CoordinatorStatus {
    return {
      state: this.state,
      lastScanAt: this.lastScanAt,
      cachedSignals: this.cachedSignals.length,
      scanners: Array.from(this.health.values(), (h) => ({ ...h })),
    };
  }

  /** Resolves once the in-flight aggregation (if any) has finished. */
  whenIdle(): Promise<void> {
    return this.inflight ?? Promise.resolve();
  }

  /**
   * Returns a copy of the cached aggregate straight away. Outside the rate
   * limit window, and when no aggregation is running, it also starts one in
   * the background; its result is visible to later calls.
   */
  async scan(signal?: AbortSignal): Promise<DetectedSignal[]> {
    return this.poll(signal);
  }

  /** Synchronous form of `scan`. */
  poll(signal?: AbortSignal): DetectedSignal[] {
    const now = this.clock();
    if (this.lastScanAt !== null && now - this.lastScanAt < this.config.scanInterval) {
      return this.getCachedSignals();
    }
    if (this.state === 'idle') {
      this.state = 'scanning';
      this.inflight = this.aggregate(signal).catch((err: unknown) => {
        log.error(`Aggregation crashed: ${describeError(err)}`);
      });
    }
    return this.getCachedSignals();
  }

  private async aggregate(parent?: AbortSignal): Promise<void> {
    const startedAt = this.clock();
    const scanners = [...this.scanners];
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parent?.reason);
    if (parent?.aborted) controller.abort(parent.reason);
    else parent?.addEventListener('abort', onParentAbort, { once: true });

    const reports: ScanReport[] = [];
    const pending = new Set(scanners.map((s) => s.name()));
    let closed = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      const units = scanners.map((scanner) =>
        this.runUnit(scanner, controller.signal).then((report) => {
          if (closed) return;
          reports.push(report);
          pending.delete(report.scanner);
        }),
      );
      const deadline = new Promise<'timeout' | 'aborted'>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), this.timeoutMs);
        controller.signal.addEventListener('abort', () => resolve('aborted'), { once: true });
      });
      const outcome = await Promise.race([Promise.all(units).then(() => 'done' as const), deadline]);
      closed = true;
      if (outcome !== 'done') controller.abort(new ScanTimeoutError(this.name(), this.timeoutMs));

      const combined: DetectedSignal[] = [];
      const failed: string[] = [];
      for (const report of reports) {
        if (report.error !== undefined) {
          failed.push(report.scanner);
          this.recordFailure(report.scanner, 'failed', new ScanFailedError(report.scanner, report.error).message, report.durationMs);
          continue;
        }
        combined.push(...report.signals);
        this.recordSuccess(report.scanner, report.signals.length, report.durationMs);
      }
      const timedOut = Array.from(pending);
      for (const name of timedOut) {
        this.recordFailure(name, 'timeout', new ScanTimeoutError(name, this.timeoutMs).message, this.clock() - startedAt);
      }

      // single assignment: readers see the old aggregate or the new one
      this.cachedSignals = copyDetections(combined.slice(0, Math.max(0, this.config.maxSignals)));

      const summary: ScanSummary = {
        startedAt,
        finishedAt: this.clock(),
        detections: this.cachedSignals.length,
        reported: reports.filter((r) => r.error === undefined).map((r) => r.scanner),
        timedOut,
        failed,
      };
      if (timedOut.length || failed.length) {
        log.warn(`Scan finished with ${summary.detections} detections (timed out: ${timedOut.join(', ') || '-'}, failed: ${failed.join(', ') || '-'})`);
      } else {
        log.debug(`Scan finished with ${summary.detections} detections`);
      }
      this.emit('scan_complete', summary);
    } finally {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
      this.state = 'idle';
      this.lastScanAt = this.clock();
      this.inflight = null;
    }
  }

  private async runUnit(scanner: Scanner, signal: AbortSignal): Promise<ScanReport> {
    const name = scanner.name();
    const start = this.clock();
    try {
      const signals = await scanner.scan(signal);
      return { scanner: name, signals: signals.map((s) => ({ ...s, source: s.source ?? name })), durationMs: this.clock() - start };
    } catch (error) {
      return { scanner: name, signals: [], error, durationMs: this.clock() - start };
    }
  }

  private recordSuccess(name: string, detections: number, durationMs: number) {
    const h = this.health.get(name);
    if (!h) return;
    h.lastOutcome = 'ok';
    h.lastDetections = detections;
    h.lastDurationMs = durationMs;
    h.lastError = undefined;
  }

  private recordFailure(name: string, outcome: 'timeout' | 'failed', message: string, durationMs: number) {
    const h = this.health.get(name);
    if (!h) return;
    h.lastOutcome = outcome;
    h.lastDetections = 0;
    h.lastDurationMs = durationMs;
    h.lastError = message;
    h.failures++;
  }
}
