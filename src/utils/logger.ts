/**
 * Logger Abstraction
 *
 * Console-backed logging shared by the server, the CLI scripts and the AI
 * pipelines. Supports plain string messages, structured entries (JSON when
 * LOG_FORMAT=json) and loggers bound to a request/run context such as a
 * correlation ID.
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry for production logging.
 */
export interface StructuredLogEntry {
  /** Event type identifier (e.g., 'phase_complete', 'search_executed') */
  readonly event: string;
  /** Optional message for human readability */
  readonly message?: string;
  /** Additional structured data */
  readonly [key: string]: unknown;
}

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

export interface StructuredLogger extends Logger {
  /**
   * Log structured data at the specified level.
   * In JSON mode outputs one JSON line, otherwise a readable string.
   */
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

/**
 * Context carried by a contextual logger (correlation ID, recipient, ...).
 */
export type LogContext = Readonly<Record<string, string | number | boolean | undefined>>;

export interface ContextualLogger extends StructuredLogger {
  readonly context: LogContext;
  /** Returns a new logger with `extra` merged over this logger's context. */
  child: (extra: LogContext) => ContextualLogger;
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
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Minimum level from LOG_LEVEL. Read on every call so tests and scripts can
 * change it at runtime.
 */
function currentThreshold(): number {
  const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return LEVEL_ORDER[isLogLevel(raw) ? raw : 'info'];
}

const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= currentThreshold();

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
    if (enabled('debug')) console.log(message);
  },
};

function logAtLevel(level: LogLevel, message: string): void {
  switch (level) {
    case 'debug':
      logger.debug(message);
      break;
    case 'info':
      logger.info(message);
      break;
    case 'warn':
      logger.warn(message);
      break;
    case 'error':
      logger.error(message);
      break;
  }
}

/**
 * Creates a prefixed logger for specific modules.
 *
 * @example
 * const log = createPrefixedLogger('[LabDiscovery]');
 * log.info('Searching'); // logs: "[LabDiscovery] Searching"
 */
export function createPrefixedLogger(prefix: string): Logger {
  return {
    info: (message: string) => logger.info(`${prefix} ${message}`),
    warn: (message: string) => logger.warn(`${prefix} ${message}`),
    error: (message: string) => logger.error(`${prefix} ${message}`),
    debug: (message: string) => logger.debug(`${prefix} ${message}`),
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
 * const log = createStructuredLogger('[Outreach]');
 * log.structured('info', { event: 'iteration_complete', iteration: 2, approved: false });
 */
export function createStructuredLogger(prefix: string): StructuredLogger {
  const base = createPrefixedLogger(prefix);
  return {
    ...base,
    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, entry)
        : formatStructuredEntry(prefix, entry);
      logAtLevel(level, formatted);
    },
  };
}

// ============================================================================
// Contextual Logger
// ============================================================================

/**
 * Generates a short, sortable correlation ID: `<base36 timestamp>-<6 random base36 chars>`.
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 8).padEnd(6, '0');
  return `${timestamp}-${random}`;
}

function contextTag(context: LogContext): string {
  return typeof context.correlationId === 'string' ? `[${context.correlationId}] ` : '';
}

/**
 * Creates a logger bound to a context. Messages are prefixed with the
 * correlation ID (when present) and structured entries carry the whole context.
 *
 * @example
 * const log = createContextualLogger('[Outreach]', { correlationId: generateCorrelationId() });
 * log.info('Starting'); // "[lx3k2a-9f8e7d] [Outreach] Starting"
 * const iterLog = log.child({ iteration: 1 });
 */
export function createContextualLogger(prefix: string, context: LogContext = {}): ContextualLogger {
  const tagged = `${contextTag(context)}${prefix}`;
  const base = createPrefixedLogger(tagged);

  return {
    ...base,
    context,
    child: (extra: LogContext) => createContextualLogger(prefix, { ...context, ...extra }),
    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const withContext: StructuredLogEntry = { ...context, ...entry };
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, withContext)
        : formatStructuredEntry(tagged, withContext);
      logAtLevel(level, formatted);
    },
  };
}
