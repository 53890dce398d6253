/**
 * Error codes and the base error class shared by every logtrack package.
 *
 * Each code maps to one documented failure mode so that callers can branch
 * on `code` instead of parsing messages.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All logtrack error codes. */
export enum TrackerErrorCode {
  // Encoding (1xx)
  /** A hex-encoded string was malformed. */
  INVALID_HEX = 'LOGTRACK_E100',
  /** A value expected to be 32 bytes had a different length. */
  INVALID_HASH = 'LOGTRACK_E101',
  /** A value expected to be a 20-byte address was malformed. */
  INVALID_ADDRESS = 'LOGTRACK_E102',
  /** An integer did not fit the requested width. */
  INTEGER_OUT_OF_RANGE = 'LOGTRACK_E103',

  // Assertion ingestion (2xx)
  /** The finalized assertion differs from the assertion it proposed. */
  ASSERTION_DIGEST_MISMATCH = 'LOGTRACK_E200',
  /** The reported count of new logs exceeds the logs the assertion carries. */
  NEW_LOG_COUNT_OUT_OF_RANGE = 'LOGTRACK_E201',
  /** A record was appended out of height order. */
  STORE_HEIGHT_MISMATCH = 'LOGTRACK_E202',

  // Outcome decoding (3xx)
  /** A raw outcome value could not be decoded into an EVM outcome. */
  OUTCOME_DECODE_FAILED = 'LOGTRACK_E300',

  // Dispatcher (4xx)
  /** The dispatcher stopped after a fatal ingestion error. */
  DISPATCHER_HALTED = 'LOGTRACK_E400',
  /** The dispatcher was closed and accepts no more requests. */
  DISPATCHER_CLOSED = 'LOGTRACK_E401',
  /** An upstream source did not answer in time. */
  RESPONSE_TIMEOUT = 'LOGTRACK_E402',

  // Configuration (5xx)
  /** A configuration value is missing or has the wrong shape. */
  CONFIG_INVALID = 'LOGTRACK_E500',
  /** The configuration file is not valid JSON. */
  CONFIG_PARSE_FAILED = 'LOGTRACK_E501',
}

/**
 * Codes that signal a protocol-consistency violation upstream. Processing
 * must stop rather than continue with inconsistent state.
 */
const FATAL_CODES: ReadonlySet<TrackerErrorCode> = new Set([
  TrackerErrorCode.ASSERTION_DIGEST_MISMATCH,
  TrackerErrorCode.NEW_LOG_COUNT_OUT_OF_RANGE,
  TrackerErrorCode.STORE_HEIGHT_MISMATCH,
]);

// ─── Error class ────────────────────────────────────────────────────────────────

/** Options for constructing a {@link TrackerError}. */
export interface TrackerErrorOptions {
  /** Structured context for logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause, for error chaining. */
  cause?: unknown;
}

/**
 * Base error class for all logtrack errors.
 *
 * @example
 * ```typescript
 * throw new TrackerError(
 *   TrackerErrorCode.INVALID_HASH,
 *   'beforeHash must be 32 bytes',
 *   { context: { length: 31 } },
 * );
 * ```
 */
export class TrackerError extends Error {
  readonly code: TrackerErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: TrackerErrorCode, message: string, options?: TrackerErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TrackerError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /** Whether this error must stop ingestion. */
  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }

  /** Structured representation suitable for a log entry. */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/** Return true when `error` is a {@link TrackerError} that must stop ingestion. */
export function isFatal(error: unknown): boolean {
  return error instanceof TrackerError && error.fatal;
}

/**
 * Format an error for terminal or log output.
 *
 * ```
 * [LOGTRACK_E200] finalized assertion does not match its proposal
 * Hint: the validator feed is inconsistent; restart from a known height
 * ```
 */
export function formatError(error: TrackerError): string {
  const lines: string[] = [`[${error.code}] ${error.message}`];
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}

/** Normalise an unknown thrown value into an `Error`. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
