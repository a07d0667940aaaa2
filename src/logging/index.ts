/**
 * Logging and metrics hooks
 *
 * Every stateful component takes an optional Logger and Metrics. The defaults
 * write to the console and drop metrics on the floor.
 */

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function formatMeta(meta?: Record<string, unknown>): string {
  return meta ? JSON.stringify(meta) : '';
}

/**
 * Console logger that drops messages below the given level
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const enabled = (candidate: LogLevel): boolean => LEVEL_RANK[candidate] >= LEVEL_RANK[level];

  return {
    info: (msg, meta) => {
      if (enabled('info')) console.log(`[INFO] ${msg}`, formatMeta(meta));
    },
    warn: (msg, meta) => {
      if (enabled('warn')) console.warn(`[WARN] ${msg}`, formatMeta(meta));
    },
    error: (msg, meta) => {
      if (enabled('error')) console.error(`[ERROR] ${msg}`, formatMeta(meta));
    },
    debug: (msg, meta) => {
      if (enabled('debug')) console.debug(`[DEBUG] ${msg}`, formatMeta(meta));
    },
  };
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = createConsoleLogger('debug');

/**
 * Logger that discards everything (tests, embedding apps with their own sink)
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Default no-op metrics implementation
 */
export const defaultMetrics: Metrics = {
  increment: () => {},
  gauge: () => {},
  timing: () => {},
};
