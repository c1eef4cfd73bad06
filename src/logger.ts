import type { NextFunction, Request, Response } from 'express';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  requestId?: string;
  route?: string;
  method?: string;
  postId?: string;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

const envLevel = process.env.LOG_LEVEL;
const MIN_LOG_LEVEL: LogLevel = isLogLevel(envLevel)
  ? envLevel
  : process.env.NODE_ENV === 'production'
    ? 'info'
    : 'debug';

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[MIN_LOG_LEVEL];
}

function formatLogEntry(entry: LogEntry): string {
  // structured output for production log collectors
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context, error } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const contextStr = context ? ` ${JSON.stringify(context)}` : '';
  const errorStr = error ? `\n  Error: ${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}` : '';

  return `[${timestamp}] ${levelStr} ${message}${contextStr}${errorStr}`;
}

function log(level: LogLevel, message: string, context?: LogContext, error?: unknown) {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    context
  };

  if (error instanceof Error) {
    entry.error = { name: error.name, message: error.message, stack: error.stack };
  } else if (error !== undefined) {
    entry.error = { name: 'NonError', message: String(error) };
  }

  const formatted = formatLogEntry(entry);

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

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext, error?: unknown) => void;
  error: (message: string, context?: LogContext, error?: unknown) => void;
}

function withContext(baseContext?: LogContext): Logger {
  const merge = (context?: LogContext) => (baseContext ? { ...baseContext, ...context } : context);
  return {
    debug: (message, context) => log('debug', message, merge(context)),
    info: (message, context) => log('info', message, merge(context)),
    warn: (message, context, error) => log('warn', message, merge(context), error),
    error: (message, context, error) => log('error', message, merge(context), error)
  };
}

export const logger: Logger & { child: (baseContext: LogContext) => Logger } = {
  ...withContext(),
  child: (baseContext) => withContext(baseContext)
};

/**
 * Logs one line per request once the response has been sent.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  res.on('finish', () => {
    const context = {
      method: req.method,
      route: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - start
    };
    if (res.statusCode >= 500) logger.warn('request failed', context);
    else logger.debug('request', context);
  });
  next();
}
