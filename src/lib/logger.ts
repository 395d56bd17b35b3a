/**
 * Postwatch — Logger
 *
 * Structured logging utility.
 * JSON lines in production, a compact human-readable line otherwise.
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

// Read on every call so LOG_LEVEL can change at runtime (and in tests)
function currentLevel(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? LOG_LEVELS[raw] : LOG_LEVELS.info;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevel();
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const formatted = formatEntry({
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
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

function createLogger(defaultContext?: LogContext): Logger {
  const merge = (context?: LogContext): LogContext | undefined =>
    defaultContext ? { ...defaultContext, ...context } : context;

  return {
    debug: (message, context) => log('debug', message, merge(context)),
    info: (message, context) => log('info', message, merge(context)),
    warn: (message, context) => log('warn', message, merge(context)),
    error: (message, context) => log('error', message, merge(context)),
    child: (childContext) => createLogger({ ...defaultContext, ...childContext }),
  };
}

export const logger: Logger = createLogger();

/**
 * Mask a secret for logs: first 8 characters followed by an ellipsis.
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) return `${secret.slice(0, 2)}...`;
  return `${secret.slice(0, 8)}...`;
}
