/**
 * Scoped console logger.
 *
 * Every line is prefixed with `[scope]` and carries an optional context object,
 * e.g. `[scan] progress { processed: 40, inserted: 12 }`.
 * The threshold comes from MEDIA_INDEX_LOG_LEVEL and is read on every call,
 * so tests and embedding apps can change it at runtime.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, context?: Record<string, unknown>) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

function currentLevel(): LogLevel {
  return parseLogLevel(process.env.MEDIA_INDEX_LOG_LEVEL);
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const write = (
    level: Exclude<LogLevel, 'silent'>,
    sink: (...args: unknown[]) => void,
    message: string,
    context?: Record<string, unknown>,
  ) => {
    if (!enabled(level)) return;
    if (context) {
      sink(prefix, message, context);
    } else {
      sink(prefix, message);
    }
  };

  return {
    debug: (message, context) => write('debug', console.debug, message, context),
    info: (message, context) => write('info', console.log, message, context),
    warn: (message, context) => write('warn', console.warn, message, context),
    error: (message, context) => write('error', console.error, message, context),
  };
}
