/**
 * Structured Logging
 *
 * One JSON line per entry, stamped with the job context (correlation ID,
 * document, file name, pipeline step). LOG_LEVEL picks the threshold:
 * debug | info | warn | error | silent. Without it, production logs from
 * info and everything else from debug.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string | undefined): value is LogLevel | 'silent' {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

// Read per entry
function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isThreshold(configured)) return LEVEL_RANK[configured];
  return process.env.NODE_ENV === 'production' ? LEVEL_RANK.info : LEVEL_RANK.debug;
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const jobContext = getContext();

  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level: level.toUpperCase(),
    correlationId: getCorrelationId(),
    documentId: jobContext?.documentId,
    fileName: jobContext?.fileName,
    stage: jobContext?.stage,
    message,
    ...context,
  });
}

function emit(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_RANK[level] < threshold()) return;

  const line = formatLog(level, message, context);
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

function describeError(error: unknown): LogContext['error'] {
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
      stack: error.stack,
      ...('code' in error ? { code: error.code } : {}),
    };
  }
  return String(error);
}

export const logger = {
  debug: (message: string, context?: LogContext) => emit('debug', message, context),

  info: (message: string, context?: LogContext) => emit('info', message, context),

  warn: (message: string, context?: LogContext) => emit('warn', message, context),

  error: (message: string, error?: unknown, context?: LogContext) =>
    emit('error', message, { ...context, error: describeError(error) }),
};
