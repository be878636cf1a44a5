export type RadarErrorCode =
  | 'SCANNER_UNAVAILABLE'
  | 'SCAN_TIMEOUT'
  | 'SCAN_FAILED'
  | 'AGGREGATE_EMPTY'
  | 'CONFIG_INVALID';

export class RadarError extends Error {
  constructor(readonly code: RadarErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Probe failed at registration; the scanner stays excluded for the process lifetime. */
export class ScannerUnavailableError extends RadarError {
  constructor(readonly scanner: string) {
    super('SCANNER_UNAVAILABLE', `${scanner} is not available on this system`);
  }
}

export class ScanTimeoutError extends RadarError {
  constructor(readonly scanner: string, readonly timeoutMs: number) {
    super('SCAN_TIMEOUT', `${scanner} did not report within ${timeoutMs}ms`);
  }
}

export class ScanFailedError extends RadarError {
  constructor(readonly scanner: string, cause: unknown) {
    super('SCAN_FAILED', `${scanner} failed: ${describeError(cause)}`, { cause });
  }
}

export class AggregateEmptyError extends RadarError {
  constructor(source: string) {
    super('AGGREGATE_EMPTY', `${source} returned no detections`);
  }
}

export class ConfigError extends RadarError {
  constructor(readonly key: string, message: string) {
    super('CONFIG_INVALID', `${key}: ${message}`);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
