export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives one serialised JSON line per entry. Defaults to stderr. */
  sink?: (line: string) => void;
  bindings?: LogMeta;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const stderrSink = (line: string): void => {
  process.stderr.write(line + '\n');
};

// Errors do not serialise through JSON.stringify; flatten them first.
function serialiseMeta(meta: LogMeta): LogMeta {
  const result: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return result;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? stderrSink;
  const bindings = options.bindings ?? {};
  const threshold = levelPriority[level];

  const log = (entryLevel: LogLevel, message: string, meta?: LogMeta): void => {
    if (levelPriority[entryLevel] < threshold) {
      return;
    }

    const payload = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      message,
      ...bindings,
      ...(meta ? serialiseMeta(meta) : {}),
    };

    sink(JSON.stringify(payload));
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (extra) => createLogger({ level, sink, bindings: { ...bindings, ...extra } }),
  };
}

/** Logger that drops everything; the default for library callers. */
export const silentLogger: Logger = createLogger({ level: 'error', sink: () => undefined });
