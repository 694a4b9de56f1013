/**
 * NewsScout — Logger
 *
 * Structured, level-filtered logging.
 * JSON lines in production, compact human-readable lines otherwise.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(defaultContext: LogContext): Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

// Read on every call so tests and CLIs can change LOG_LEVEL after import
function currentThreshold(): number {
  const level = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(level) ? LOG_LEVELS[level] : LOG_LEVELS.info;
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;
  const scope = typeof context?.scope === 'string' ? `[${context.scope}] ` : '';

  let output = `${time} ${level.toUpperCase().padEnd(5)} ${scope}${message}`;

  if (context) {
    const { scope: _scope, ...rest } = context;
    if (Object.keys(rest).length > 0) {
      output += ` ${JSON.stringify(rest)}`;
    }
  }

  return output;
}

function write(level: LogLevel, message: string, context?: LogContext): void {
  if (LOG_LEVELS[level] < currentThreshold()) return;

  const formatted = formatEntry({
    timestamp: new Date().toISOString(),
    level,
    message,
    context: context && Object.keys(context).length > 0 ? context : undefined,
  });

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

function createLogger(defaultContext: LogContext = {}): Logger {
  const merge = (context?: LogContext): LogContext => ({ ...defaultContext, ...context });

  return {
    debug: (message, context) => write('debug', message, merge(context)),
    info: (message, context) => write('info', message, merge(context)),
    warn: (message, context) => write('warn', message, merge(context)),
    error: (message, context) => write('error', message, merge(context)),
    child: (childContext) => createLogger({ ...defaultContext, ...childContext }),
  };
}

export const logger: Logger = createLogger();

/**
 * Logger scoped to a module, e.g. `scopedLogger('grouper')`.
 */
export function scopedLogger(scope: string): Logger {
  return logger.child({ scope });
}

/**
 * Normalize an unknown thrown value into a loggable message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run an async operation and report how long it took.
 */
export async function timeOperation<T>(
  name: string,
  operation: () => Promise<T>,
  log: Logger = logger
): Promise<{ result: T; durationMs: number }> {
  const start = performance.now();

  try {
    const result = await operation();
    const durationMs = Math.round(performance.now() - start);
    log.debug(`${name} completed`, { durationMs });
    return { result, durationMs };
  } catch (err) {
    log.debug(`${name} failed`, { durationMs: Math.round(performance.now() - start) });
    throw err;
  }
}
