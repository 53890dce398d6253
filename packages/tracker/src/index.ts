/**
 * @logtrack/tracker — ingests finalized rollup assertions, keeps their log
 * hash chains and transaction records, and answers log and transaction
 * queries through a single-owner dispatcher.
 *
 * @packageDocumentation
 */

import { defaultHashPrimitives } from '@logtrack/crypto';
import type { Hash32, HashPrimitives } from '@logtrack/crypto';
import { JsonOutcomeDecoder } from '@logtrack/evm';
import type { OutcomeDecoder } from '@logtrack/evm';
import { createMetricsRegistry, silentLogger } from '@logtrack/types';
import type { Logger, MetricsRegistry } from '@logtrack/types';

import { RequestDispatcher } from './dispatcher';
import type { InstanceCreationSource } from './dispatcher';
import { TrackerState } from './tracker-state';

export type {
  TimeBounds,
  ExecutionAssertion,
  ProposalResults,
  FinalizedAssertion,
  TransactionLogBundle,
  AssertionRecord,
  TransactionRecord,
  TransactionNotFound,
  TransactionLookup,
  LogQuery,
  LogEntry,
} from './types';

export {
  buildHashChain,
  chainHead,
  foldChain,
  verifyHashChain,
  transactionWindows,
  windowCommitment,
  executionDigest,
  partialHash,
} from './hash-chain';
export type { HashChain, LogWindow, WindowCommitment } from './hash-chain';

export { AssertionStore } from './assertion-store';
export type { AssertionStoreView } from './assertion-store';
export { TransactionIndex } from './transaction-index';
export { findLogs, matchesLog, heightWindow } from './log-filter';
export { planIngestion } from './ingest';
export type { IngestContext, IngestionPlan, PlannedTransaction } from './ingest';
export { TrackerState } from './tracker-state';
export type { IngestSummary } from './tracker-state';
export { RequestDispatcher, DEFAULT_RESPONSE_TIMEOUT_MS } from './dispatcher';
export type { DispatcherOptions, InstanceCreationSource } from './dispatcher';
export {
  CONFIG_FILE_NAME,
  LOG_LEVEL_ENV,
  findConfigFile,
  loadConfig,
  validateConfigFile,
  resolveConfig,
} from './config';
export type { TrackerConfig, TrackerConfigFile } from './config';

// ─── Factory ────────────────────────────────────────────────────────────────────

export interface CreateTrackerOptions {
  instanceId: Hash32;
  instanceCreationTxHash: InstanceCreationSource;
  /** Defaults to {@link JsonOutcomeDecoder}. */
  decoder?: OutcomeDecoder;
  /** Defaults to keccak-256 links over keccak-256 value hashes. */
  primitives?: HashPrimitives;
  responseTimeoutMs?: number;
  metrics?: MetricsRegistry;
  logger?: Logger;
}

/** A dispatcher together with the registry its metrics are recorded in. */
export interface Tracker {
  dispatcher: RequestDispatcher;
  metrics: MetricsRegistry;
}

/**
 * Wire a {@link TrackerState} and its {@link RequestDispatcher}.
 *
 * @example
 * ```ts
 * const config = resolveConfig(loadConfig());
 * const { dispatcher } = createTracker({
 *   instanceId: config.instanceId,
 *   instanceCreationTxHash: () => validator.creationTxHash(),
 *   responseTimeoutMs: config.responseTimeoutMs,
 *   logger: createLogger({ level: config.logLevel, component: 'tracker' }),
 * });
 * await dispatcher.consume(validator.finalizedAssertions());
 * ```
 */
export function createTracker(options: CreateTrackerOptions): Tracker {
  const metrics = options.metrics ?? createMetricsRegistry();
  const logger = options.logger ?? silentLogger;
  const state = new TrackerState(
    {
      instanceId: options.instanceId.toLowerCase(),
      primitives: options.primitives ?? defaultHashPrimitives,
      decoder: options.decoder ?? new JsonOutcomeDecoder(),
    },
    metrics,
    logger,
  );
  const dispatcher = new RequestDispatcher({
    state,
    instanceCreationTxHash: options.instanceCreationTxHash,
    responseTimeoutMs: options.responseTimeoutMs,
    metrics,
    logger,
  });
  return { dispatcher, metrics };
}
