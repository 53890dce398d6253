/**
 * Structured logging for the tracker.
 *
 * Emits one JSON object per entry. Loggers form a tree: a child inherits
 * its parent's level, sink and bound fields and appends its own component
 * name (`tracker.dispatcher`).
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/** Numeric log levels; an entry is emitted when its level is at or above the threshold. */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  /** Suppress all output. */
  SILENT = 4,
}

/** Lower-case level names accepted in configuration files. */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/** Return true when `value` names a log level. */
export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVELS_BY_NAME, value);
}

/** Map a configuration level name to its {@link LogLevel}. */
export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/** A single structured log entry. */
export interface LogEntry {
  /** Level name, e.g. "INFO". */
  level: string;
  message: string;
  /** ISO 8601 creation time. */
  timestamp: string;
  /** Dotted component path of the emitting logger. */
  component?: string;
  [key: string]: unknown;
}

/** Sink receiving every emitted entry. Defaults to JSON on `console.log`. */
export type LogOutput = (entry: LogEntry) => void;

const defaultOutput: LogOutput = (entry: LogEntry): void => {
  console.log(JSON.stringify(entry));
};

/** Options accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  component?: string;
  output?: LogOutput;
  /** Fields attached to every entry this logger (and its children) emits. */
  fields?: Record<string, unknown>;
}

// ─── Logger ─────────────────────────────────────────────────────────────────────

/**
 * Levelled structured logger.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'tracker' });
 * const ingest = log.child('ingest', { instanceId });
 * ingest.info('assertion ingested', { height: 3, logs: 12 });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;
  private readonly fields: Record<string, unknown>;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? defaultOutput;
    this.fields = options?.fields ?? {};
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a child logger scoped to `component`. The child's component is
   * `parent.component` when this logger already has one.
   */
  child(component: string, fields?: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      component: this.component ? `${this.component}.${component}` : component,
      output: this.output,
      fields: { ...this.fields, ...fields },
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Whether an entry at `level` would currently be emitted. */
  isEnabled(level: LogLevel): boolean {
    return level >= this.level && this.level !== LogLevel.SILENT;
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...this.fields,
      ...fields,
    };

    this.output(entry);
  }
}

/** Convenience wrapper around `new Logger(options)`. */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/** A logger that discards everything; the default for library consumers that pass none. */
export const silentLogger: Logger = createLogger({ level: LogLevel.SILENT });
