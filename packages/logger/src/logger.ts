export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Make a context object JSON-safe: errors become {name, message, stack},
 * bigints become strings, repeated references become '[Circular]'.
 */
function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack };
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    const serialized: Record<string, unknown> = JSON.parse(JSON.stringify(obj, replacer));
    return serialized;
  } catch (error) {
    return { error: `[unserializable: ${error instanceof Error ? error.message : String(error)}]` };
  }
}

let globalConfig: Required<LoggerConfig> = {
  level: 'info',
  sinks: [],
};

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.emit('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.emit('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.emit('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.emit('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.emit('error', msgOrObj, maybeMsg);
  }

  private emit(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    if (globalConfig.sinks.length === 0 || levelRank(level) < levelRank(globalConfig.level)) return;

    const entry: LogEntry =
      typeof msgOrObj === 'string'
        ? { level, category: this.category, timestamp: new Date(), msg: msgOrObj }
        : {
            level,
            category: this.category,
            timestamp: new Date(),
            msg: maybeMsg ?? '',
            context: serializeContext(msgOrObj),
          };

    for (const sink of globalConfig.sinks) {
      sink.write(entry);
    }
  }
}

const loggerCache = new Map<string, Logger>();

/**
 * Configure level and sinks for every logger. Loggers obtained before this
 * call pick up the new configuration immediately.
 */
export function initLogger(config: LoggerConfig): void {
  globalConfig = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
  loggerCache.clear();
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  const logger = new CategoryLogger(category);
  loggerCache.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of globalConfig.sinks) {
    sink.flush();
  }
}
