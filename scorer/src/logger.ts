/**
 * Logger Abstraction
 *
 * Console-backed loggers with a module prefix. Every component accepts a
 * Logger so callers can route output into their own logging stack.
 *
 * Supports both string messages and structured data objects (JSON lines
 * when LOG_FORMAT=json).
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry for production logging.
 */
export interface StructuredLogEntry {
  /** Event type identifier (e.g., 'evaluation_complete', 'attempt_failed') */
  readonly event: string;
  readonly message?: string;
  readonly [key: string]: unknown;
}

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

export interface StructuredLogger extends Logger {
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

// ============================================================================
// Configuration
// ============================================================================

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isJsonLogging = (): boolean => process.env.LOG_FORMAT === 'json';

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Minimum level from LOG_LEVEL (default: info). Read on every call so tests
 * and long-running processes can change it.
 */
function minimumLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return configured && isLogLevel(configured) ? configured : 'info';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

// ============================================================================
// String-Based Logger
// ============================================================================

export const logger: Logger = {
  info: (message: string) => {
    if (enabled('info')) console.log(message);
  },
  warn: (message: string) => {
    if (enabled('warn')) console.warn(message);
  },
  error: (message: string) => {
    if (enabled('error')) console.error(message);
  },
  debug: (message: string) => {
    if (enabled('debug')) console.debug(message);
  },
};

/**
 * Discards everything. Useful in tests and for embedding callers that
 * do not want console output.
 */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

/**
 * Creates a prefixed logger for specific modules.
 *
 * @example
 * const log = createPrefixedLogger('[Scorer]');
 * log.info('Evaluation completed'); // logs: "[Scorer] Evaluation completed"
 */
export function createPrefixedLogger(prefix: string, base: Logger = logger): Logger {
  return {
    info: (message: string) => base.info(`${prefix} ${message}`),
    warn: (message: string) => base.warn(`${prefix} ${message}`),
    error: (message: string) => base.error(`${prefix} ${message}`),
    debug: (message: string) => base.debug(`${prefix} ${message}`),
  };
}

// ============================================================================
// Structured Logger
// ============================================================================

function formatStructuredEntry(prefix: string, entry: StructuredLogEntry): string {
  const { event, message, ...rest } = entry;
  const dataStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const msgStr = message ? `: ${message}` : '';
  return `${prefix} [${event}]${msgStr}${dataStr}`;
}

function formatStructuredJson(prefix: string, level: LogLevel, entry: StructuredLogEntry): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    module: prefix.replace(/[[\]]/g, '').trim(),
    ...entry,
  });
}

/**
 * Creates a structured logger for specific modules.
 *
 * @example
 * const log = createStructuredLogger('[Retry]');
 * log.structured('info', {
 *   event: 'attempt_evaluated',
 *   attempt: 2,
 *   score: 84,
 * });
 */
export function createStructuredLogger(prefix: string, base: Logger = logger): StructuredLogger {
  const prefixed = createPrefixedLogger(prefix, base);

  return {
    ...prefixed,
    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, entry)
        : formatStructuredEntry(prefix, entry);
      base[level](formatted);
    },
  };
}
