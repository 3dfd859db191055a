/**
 * logger.ts
 * Structured, scoped console logging
 *
 * - JSON lines when NODE_ENV=production, a readable single line otherwise
 * - Minimum level from MARKET_LOG_LEVEL, else `warn` under tests, else `info`
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly scope: string;
  readonly message: string;
  readonly context?: LogContext;
  readonly error?: {
    readonly name: string;
    readonly message: string;
    readonly stack?: string;
  };
}

export interface Logger {
  readonly scope: string;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: unknown): void;
  child(scope: string): Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.MARKET_LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === 'test' ? 'warn' : 'info';
}

let minLevel: LogLevel = defaultLogLevel();

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const parts = [
    `[${entry.timestamp}]`,
    `[${entry.level.toUpperCase()}]`,
    `[${entry.scope}]`,
    entry.message,
  ];

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  if (entry.error) {
    parts.push(`| ${entry.error.name}: ${entry.error.message}`);
  }

  return parts.join(' ');
}

function describeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

function write(
  level: LogLevel,
  scope: string,
  message: string,
  context?: LogContext,
  error?: unknown
): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    scope,
    message,
    context,
    error: error === undefined ? undefined : describeError(error),
  };

  const formatted = formatEntry(entry);

  switch (level) {
    case 'debug':
    case 'info':
      console.log(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    case 'error':
      console.error(formatted);
      break;
  }
}

export function createLogger(scope: string): Logger {
  return {
    scope,
    debug: (message, context) => write('debug', scope, message, context),
    info: (message, context) => write('info', scope, message, context),
    warn: (message, context) => write('warn', scope, message, context),
    error: (message, context, error) => write('error', scope, message, context, error),
    child: (childScope) => createLogger(`${scope}:${childScope}`),
  };
}
