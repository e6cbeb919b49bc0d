export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export type LogLineOptions = {
  scope?: string;
  meta?: LogMeta;
  at?: Date;
};

const DEBUG = process.env.STORY_IMAGES_DEBUG === '1' || process.env.STORY_IMAGES_DEBUG === 'true';

const SILENT = (() => {
  if (process.env.STORY_IMAGES_LOGS_VERBOSE === '1') return false;
  if (process.env.STORY_IMAGES_LOGS_SILENT === '1') return true;
  if (process.env.STORY_IMAGES_LOGS_SILENT === '0') return false;
  return process.env.NODE_ENV === 'test';
})();

const sinks: Record<LogLevel, (line: string) => void> = {
  // eslint-disable-next-line no-console
  debug: (line) => console.debug(line),
  // eslint-disable-next-line no-console
  info: (line) => console.log(line),
  // eslint-disable-next-line no-console
  warn: (line) => console.warn(line),
  // eslint-disable-next-line no-console
  error: (line) => console.error(line),
};

/** One console line: `[ISO time] LEVEL [scope] message {meta}`. */
export function formatLogLine(level: LogLevel, message: string, options: LogLineOptions = {}) {
  const at = (options.at ?? new Date()).toISOString();
  const scope = options.scope ? `[${options.scope}] ` : '';
  const meta = options.meta && Object.keys(options.meta).length > 0 ? ` ${JSON.stringify(options.meta)}` : '';
  return `[${at}] ${level.toUpperCase().padEnd(5)} ${scope}${message}${meta}`;
}

export type Logger = {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(scope: string): Logger;
};

export function createLogger(scope?: string): Logger {
  const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (SILENT || (level === 'debug' && !DEBUG)) return;
    sinks[level](formatLogLine(level, message, { scope, meta }));
  };
  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    child: (childScope) => createLogger(scope ? `${scope} ${childScope}` : childScope),
  };
}

export const logger = createLogger();
