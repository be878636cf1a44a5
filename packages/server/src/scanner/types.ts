import type { DetectedSignal } from '@radarscope/shared';

/**
 * A pluggable, possibly slow, possibly unavailable source of detections.
 *
 * `scan` must honour `signal`: once it aborts, the returned promise has to
 * settle promptly (partial or empty results are fine; rejecting is fine).
 * `isAvailable` is a cheap capability probe, evaluated once at registration.
 */
export interface Scanner {
  name(): string;
  isAvailable(): boolean;
  scan(signal: AbortSignal): Promise<DetectedSignal[]>;
}

export interface ScanReport {
  scanner: string;
  signals: DetectedSignal[];
  error?: unknown;
  durationMs: number;
}

export function copyDetections(signals: readonly DetectedSignal[]): DetectedSignal[] {
  return signals.map((s) => ({ ...s }));
}
