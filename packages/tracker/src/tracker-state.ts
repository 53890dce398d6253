import { silentLogger } from '@logtrack/types';
import type { Logger, MetricsRegistry } from '@logtrack/types';
import type { Hash32 } from '@logtrack/crypto';

import { AssertionStore } from './assertion-store';
import type { AssertionStoreView } from './assertion-store';
import { planIngestion } from './ingest';
import type { IngestContext } from './ingest';
import { findLogs } from './log-filter';
import { TransactionIndex } from './transaction-index';
import type { FinalizedAssertion, LogEntry, LogQuery, TransactionLookup } from './types';

/** What one ingestion changed. */
export interface IngestSummary {
  height: number;
  partialHash: Hash32;
  /** Identifiers indexed, in transaction order. */
  transactions: Hash32[];
  decodeFailures: number;
  duplicates: number;
}

/**
 * The tracker's mutable state: assertion history and transaction index.
 *
 * Every method runs to completion synchronously. Callers that share one
 * instance across tasks go through a {@link RequestDispatcher}.
 */
export class TrackerState {
  private readonly store = new AssertionStore();
  private readonly index = new TransactionIndex();
  private readonly ctx: IngestContext;
  private readonly metrics: MetricsRegistry;
  private readonly log: Logger;

  constructor(ctx: IngestContext, metrics: MetricsRegistry, logger: Logger = silentLogger) {
    this.ctx = ctx;
    this.metrics = metrics;
    this.log = logger.child('ingest');
  }

  /** Read-only view of the assertion history. */
  get assertions(): AssertionStoreView {
    return this.store;
  }

  get transactionCount(): number {
    return this.index.size;
  }

  /**
   * Ingest the next finalized assertion at height {@link AssertionStore.length}.
   *
   * The assertion and all of its transaction records are committed before
   * any logging or metrics, so an error from a log sink cannot leave a
   * partial assertion in the index.
   *
   * @throws {TrackerError} A fatal error from {@link planIngestion}; state is unchanged.
   */
  ingest(fa: FinalizedAssertion): IngestSummary {
    const height = this.store.length;
    const plan = planIngestion(fa, height, this.ctx);

    // Commit first: nothing after this point may leave half an assertion behind.
    this.store.append(plan.assertion);
    const replaced = plan.transactions.map((tx) => this.index.upsert(tx.id, tx.record));

    let decodeFailures = 0;
    let duplicates = 0;
    plan.transactions.forEach((tx, i) => {
      if (tx.decodeError) {
        decodeFailures++;
        this.metrics.counter('logtrack_decode_failures_total').increment();
        this.log.warn('invalid transaction outcome', {
          height,
          valueHash: tx.id,
          error: tx.decodeError.message,
        });
      }
      const previous = replaced[i];
      if (previous) {
        duplicates++;
        this.metrics.counter('logtrack_duplicate_transactions_total').increment();
        this.log.warn('transaction identifier already indexed; replacing record', {
          id: tx.id,
          previousHeight: previous.assertionIndex,
          height,
        });
      }
      this.log.debug('response recorded', { id: tx.id, outcome: tx.record.outcomeKind ?? 'invalid' });
    });

    this.metrics.counter('logtrack_assertions_ingested_total').increment();
    this.metrics.counter('logtrack_transactions_indexed_total').increment(plan.transactions.length);
    this.metrics.histogram('logtrack_ingest_logs').observe(fa.assertion.logs.length);
    this.log.info('assertion ingested', {
      height,
      sequenceNum: fa.proposal.sequenceNum.toString(),
      logs: fa.assertion.logs.length,
      transactions: plan.transactions.length,
    });

    return {
      height,
      partialHash: plan.partialHash,
      transactions: plan.transactions.map((tx) => tx.id),
      decodeFailures,
      duplicates,
    };
  }

  /** Height of the latest assertion, or -1 when none has been ingested. */
  assertionCount(): number {
    return this.store.latestHeight;
  }

  transactionByHash(id: string): TransactionLookup {
    return this.index.lookup(id);
  }

  findLogs(query: LogQuery = {}): LogEntry[] {
    return findLogs(this.store, query);
  }
}
