export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  readonly level: LogLevel;
  readonly subsystem: string;
  readonly message: string;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
}

export type LogWriter = (entry: LogEntry) => void;
export type NowFn = () => number;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const toIsoTimestamp = (timestamp: number): string => new Date(timestamp).toISOString();

const bindConsole = (method: LogLevel): ((...parts: unknown[]) => void) => {
  const { console } = globalThis;
  const candidate: ((...parts: unknown[]) => void) | undefined = console[method];
  return (candidate ?? console.log).bind(console);
};

export const defaultLogWriter: LogWriter = (entry) => {
  const sink = bindConsole(entry.level);
  const line = `${toIsoTimestamp(entry.timestamp)} [${entry.level.toUpperCase()}][${entry.subsystem}] ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    sink(line, entry.context);
    return;
  }

  sink(line);
};

export const silentLogWriter: LogWriter = () => undefined;

type LogMethod = (message: string, context?: Record<string, unknown>) => void;

export interface Logger {
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;
  readonly child: (subsystem: string) => Logger;
}

export interface LoggerOptions {
  readonly writer?: LogWriter;
  readonly now?: NowFn;
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly level?: LogLevel;
}

const sanitizeSubsystem = (subsystem: string): string => subsystem.trim() || 'unknown';

export const createLogger = (subsystem: string, options: LoggerOptions = {}): Logger => {
  const writer = options.writer ?? defaultLogWriter;
  const now = options.now ?? Date.now;
  const threshold = options.level ?? 'debug';
  const normalized = sanitizeSubsystem(subsystem);

  const forLevel = (level: LogLevel): LogMethod => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return () => undefined;
    }

    return (message, context) => {
      writer({
        level,
        subsystem: normalized,
        message,
        context,
        timestamp: now(),
      });
    };
  };

  const child: Logger['child'] = (suffix) =>
    createLogger(`${normalized}:${sanitizeSubsystem(suffix)}`, { writer, now, level: threshold });

  return {
    debug: forLevel('debug'),
    info: forLevel('info'),
    warn: forLevel('warn'),
    error: forLevel('error'),
    child,
  };
};

export const rootLogger = createLogger('catcher', { level: 'info' });
