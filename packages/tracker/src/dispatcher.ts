/**
 * Single-owner request loop around {@link TrackerState}.
 *
 * Every ingestion and query becomes one message on a promise-chained
 * mailbox. Messages run one at a time in arrival order, and each runs to
 * completion before the next starts, so a query sees either all of an
 * assertion or none of it.
 *
 * @packageDocumentation
 */

import { TrackerError, TrackerErrorCode, createMetricsRegistry, silentLogger } from '@logtrack/types';
import type { Logger, MetricsRegistry } from '@logtrack/types';
import type { Hash32 } from '@logtrack/crypto';

import type { IngestSummary, TrackerState } from './tracker-state';
import type { FinalizedAssertion, LogEntry, LogQuery, TransactionLookup } from './types';

/** Default bound on waiting for an upstream answer. */
export const DEFAULT_RESPONSE_TIMEOUT_MS = 30_000;

/** Yields the hash of the transaction that created the rollup instance. */
export type InstanceCreationSource = () => Promise<Hash32>;

export interface DispatcherOptions {
  state: TrackerState;
  /** Called at most once, on the first request for the creation hash. */
  instanceCreationTxHash: InstanceCreationSource;
  /** How long a creation-hash request waits for the source. */
  responseTimeoutMs?: number;
  metrics?: MetricsRegistry;
  logger?: Logger;
}

/**
 * Serialises access to one {@link TrackerState}.
 *
 * A fatal ingestion error halts the dispatcher: the failing call rejects
 * with it, and every queued or later call rejects with `DISPATCHER_HALTED`
 * carrying it as `cause`.
 *
 * @example
 * ```ts
 * const dispatcher = new RequestDispatcher({ state, instanceCreationTxHash: () => feed.creationTx });
 * void dispatcher.consume(feed.assertions());
 * const logs = await dispatcher.findLogs({ fromHeight: 10 });
 * ```
 */
export class RequestDispatcher {
  private readonly state: TrackerState;
  private readonly creationSource: InstanceCreationSource;
  private readonly responseTimeoutMs: number;
  private readonly metrics: MetricsRegistry;
  private readonly log: Logger;

  private tail: Promise<void> = Promise.resolve();
  private depth = 0;
  private haltedBy: TrackerError | undefined;
  private closed = false;
  private creationHash: Promise<Hash32> | undefined;

  constructor(options: DispatcherOptions) {
    this.state = options.state;
    this.creationSource = options.instanceCreationTxHash;
    this.responseTimeoutMs = options.responseTimeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS;
    this.metrics = options.metrics ?? createMetricsRegistry();
    this.log = (options.logger ?? silentLogger).child('dispatcher');
  }

  /** Whether a fatal error stopped the dispatcher. */
  get halted(): boolean {
    return this.haltedBy !== undefined;
  }

  /** Messages queued and not yet processed. */
  get mailboxDepth(): number {
    return this.depth;
  }

  // ── Requests ──────────────────────────────────────────────────────

  /** Ingest the next finalized assertion. */
  ingest(fa: FinalizedAssertion): Promise<IngestSummary> {
    return this.enqueue('ingest', () => this.state.ingest(fa));
  }

  /** Height of the latest finalized assertion, or -1 when none. */
  assertionCount(): Promise<number> {
    return this.enqueue('assertionCount', () => {
      this.metrics.counter('logtrack_queries_total').increment();
      return this.state.assertionCount();
    });
  }

  transactionByHash(id: string): Promise<TransactionLookup> {
    return this.enqueue('transactionByHash', () => {
      this.metrics.counter('logtrack_queries_total').increment();
      return this.state.transactionByHash(id);
    });
  }

  findLogs(query: LogQuery = {}): Promise<LogEntry[]> {
    return this.enqueue('findLogs', () => {
      this.metrics.counter('logtrack_queries_total').increment();
      return this.state.findLogs(query);
    });
  }

  /**
   * The instance-creation transaction hash, forwarded from the upstream
   * source. The mailbox only hands out the pending answer; the wait itself
   * happens outside it and is bounded by `responseTimeoutMs`.
   *
   * @throws {TrackerError} `RESPONSE_TIMEOUT` when the source does not answer in time.
   */
  async instanceCreationTxHash(): Promise<Hash32> {
    const { pending } = await this.enqueue('instanceCreationTxHash', () => {
      this.metrics.counter('logtrack_queries_total').increment();
      return { pending: this.memoisedCreationHash() };
    });
    return this.withTimeout(pending, 'instance creation transaction hash');
  }

  /**
   * Feed every assertion from `feed` through {@link ingest}, in order.
   *
   * @returns The number of assertions ingested once the feed ends.
   */
  async consume(feed: AsyncIterable<FinalizedAssertion>): Promise<number> {
    let count = 0;
    for await (const fa of feed) {
      await this.ingest(fa);
      count++;
    }
    this.log.info('validator feed ended', { assertions: count });
    return count;
  }

  /**
   * Stop accepting requests. Resolves once every message already queued
   * has been processed.
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.tail;
  }

  // ── Mailbox ───────────────────────────────────────────────────────

  private enqueue<T>(kind: string, handler: () => T): Promise<T> {
    if (this.closed) {
      return Promise.reject(
        new TrackerError(TrackerErrorCode.DISPATCHER_CLOSED, `dispatcher is closed; ${kind} rejected`),
      );
    }
    if (this.haltedBy) {
      return Promise.reject(this.haltedError(kind));
    }

    this.setDepth(this.depth + 1);
    return new Promise<T>((resolve, reject) => {
      this.tail = this.tail.then(() => {
        this.setDepth(this.depth - 1);
        if (this.haltedBy) {
          reject(this.haltedError(kind));
          return;
        }
        try {
          resolve(handler());
        } catch (err) {
          if (err instanceof TrackerError && err.fatal) {
            this.haltedBy = err;
            this.log.error('fatal ingestion error; dispatcher halted', { kind, error: err.toJSON() });
          }
          reject(err);
        }
      });
    });
  }

  private haltedError(kind: string): TrackerError {
    return new TrackerError(
      TrackerErrorCode.DISPATCHER_HALTED,
      `dispatcher halted after a fatal error; ${kind} rejected`,
      { cause: this.haltedBy },
    );
  }

  private setDepth(depth: number): void {
    this.depth = depth;
    this.metrics.gauge('logtrack_mailbox_depth').set(depth);
  }

  private memoisedCreationHash(): Promise<Hash32> {
    if (this.creationHash === undefined) {
      this.creationHash = this.creationSource();
    }
    return this.creationHash;
  }

  private withTimeout<T>(pending: Promise<T>, what: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(
          new TrackerError(TrackerErrorCode.RESPONSE_TIMEOUT, `timed out waiting for ${what}`, {
            context: { timeoutMs: this.responseTimeoutMs },
          }),
        );
      }, this.responseTimeoutMs);
      void pending.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }
}
