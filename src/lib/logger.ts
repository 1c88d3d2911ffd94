/**
 * Structured JSON Logger
 *
 * One JSON object per line on stdout (stderr for errors):
 *   {"timestamp":"...","level":"info","service":"licensing-engine","message":"...",...fields}
 *
 * Child loggers carry bound fields (requestId, subscriptionId, ...).
 */

const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

/**
 * Receives every formatted line; defaults to console
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  service: string;
  level?: LogLevel;
  bindings?: LogFields;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Errors do not survive JSON.stringify, flatten them first
 */
function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const serialized: LogFields = {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
    if (value.cause !== undefined) {
      serialized.cause = serializeValue(value.cause);
    }
    return serialized;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = LOG_LEVELS[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;
  const bindings = options.bindings ?? {};

  function write(level: LogLevel, message: string, fields?: LogFields): void {
    if (LOG_LEVELS[level] < threshold) return;

    const entry: LogFields = {
      timestamp: new Date().toISOString(),
      level,
      service: options.service,
      message,
    };
    for (const [key, value] of Object.entries({ ...bindings, ...fields })) {
      entry[key] = serializeValue(value);
    }

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch {
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        service: options.service,
        message,
        note: 'fields not serializable',
      });
    }
    sink(level, line);
  }

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child(childBindings: LogFields): Logger {
      return createLogger({
        ...options,
        bindings: { ...bindings, ...childBindings },
      });
    },
  };
}

/**
 * Logger that discards everything (tests, scripts)
 */
export const silentLogger: Logger = createLogger({
  service: 'silent',
  sink: () => undefined,
});
