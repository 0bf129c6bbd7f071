/**
 * Structured Logging with Correlation IDs
 *
 * JSON lines on stdout/stderr. Every entry carries the correlation, job and
 * caller IDs of the surrounding AsyncLocalStorage context, plus any bindings
 * attached through `child()`.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | unknown, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

function minimumLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured === 'debug' || configured === 'info' || configured === 'warn' || configured === 'error') {
    return configured;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

function formatLog(level: LogLevel, message: string, bindings: LogContext, context?: LogContext): string {
  const reqContext = getContext();

  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level: level.toUpperCase(),
    correlationId: getCorrelationId(),
    jobId: reqContext?.jobId,
    callerId: reqContext?.callerId,
    stage: reqContext?.stage,
    message,
    ...bindings,
    ...context,
  });
}

function serializeError(error: Error | unknown): unknown {
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    return { message: error.message, stack: error.stack, name: error.name, code };
  }
  return error === undefined ? undefined : String(error);
}

export function createLogger(bindings: LogContext = {}): Logger {
  return {
    info: (message, context) => {
      if (enabled('info')) console.log(formatLog('info', message, bindings, context));
    },

    warn: (message, context) => {
      if (enabled('warn')) console.warn(formatLog('warn', message, bindings, context));
    },

    error: (message, error, context) => {
      if (!enabled('error')) return;
      console.error(formatLog('error', message, bindings, { ...context, error: serializeError(error) }));
    },

    debug: (message, context) => {
      if (enabled('debug')) console.debug(formatLog('debug', message, bindings, context));
    },

    child: (childBindings) => createLogger({ ...bindings, ...childBindings }),
  };
}

export const logger: Logger = createLogger();
