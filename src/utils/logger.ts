/**
 * Structured logger
 *
 * One JSON object per line. The minimum level comes from LOG_LEVEL and
 * defaults to `info` in production and `debug` elsewhere; `silent` mutes
 * everything (the test suite runs with it).
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Threshold = LogLevel | 'silent';

const LEVEL_PRIORITY: Record<Threshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isThreshold(value: string): value is Threshold {
  return value in LEVEL_PRIORITY;
}

function getMinLevel(): Threshold {
  const envLevel = process.env.LOG_LEVEL;
  if (envLevel && isThreshold(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
}

function formatEntry(level: LogLevel, message: string, context?: Record<string, unknown>): string {
  const entry: Record<string, unknown> = {
    level,
    msg: message,
    ts: new Date().toISOString(),
  };
  if (context) {
    Object.assign(entry, context);
  }
  return JSON.stringify(entry);
}

export const logger = {
  debug(message: string, context?: Record<string, unknown>) {
    if (!shouldLog('debug')) return;
    console.debug(formatEntry('debug', message, context));
  },

  info(message: string, context?: Record<string, unknown>) {
    if (!shouldLog('info')) return;
    console.info(formatEntry('info', message, context));
  },

  warn(message: string, context?: Record<string, unknown>) {
    if (!shouldLog('warn')) return;
    console.warn(formatEntry('warn', message, context));
  },

  error(message: string, context?: Record<string, unknown>) {
    if (!shouldLog('error')) return;
    console.error(formatEntry('error', message, context));
  },
};
