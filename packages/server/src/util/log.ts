// ============================================================================
// RadarScope — Console logging with component prefixes
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug': case 'info': case 'warn': case 'error': case 'silent':
      return value;
    default:
      return 'info';
  }
}

const threshold: LogLevel = parseLogLevel(process.env.RADAR_LOG_LEVEL);

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[threshold];
}

/** `prefix` is printed before every line, e.g. `📡 [Coordinator]`. */
export function createLogger(prefix: string): Logger {
  return {
    debug: (message, ...args) => { if (enabled('debug')) console.log(`${prefix} ${message}`, ...args); },
    info: (message, ...args) => { if (enabled('info')) console.log(`${prefix} ${message}`, ...args); },
    warn: (message, ...args) => { if (enabled('warn')) console.warn(`${prefix} ${message}`, ...args); },
    error: (message, ...args) => { if (enabled('error')) console.error(`${prefix} ${message}`, ...args); },
  };
}
