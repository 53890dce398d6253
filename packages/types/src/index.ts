/**
 * @logtrack/types — error codes, logging, guards and metrics shared by
 * every logtrack package.
 *
 * @packageDocumentation
 */

export {
  TrackerError,
  TrackerErrorCode,
  isFatal,
  formatError,
  toError,
} from './errors';
export type { TrackerErrorOptions } from './errors';

export {
  Logger,
  LogLevel,
  createLogger,
  silentLogger,
  parseLogLevel,
  isLogLevelName,
} from './logger';
export type { LogEntry, LogOutput, LoggerOptions, LogLevelName } from './logger';

export {
  isHash32,
  isAddress,
  isHexData,
  isNonNegativeInteger,
  isPositiveInteger,
  isIntegerString,
  isPlainObject,
} from './guards';

export { Counter, Gauge, Histogram, MetricsRegistry, createMetricsRegistry } from './metrics';
export type { HistogramSnapshot, MetricsSnapshot } from './metrics';
