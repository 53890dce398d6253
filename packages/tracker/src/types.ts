/**
 * Type definitions for the @logtrack/tracker package: what the validator
 * feed delivers, what the store keeps, and what queries return.
 */

import type { Hash32, HexData } from '@logtrack/crypto';
import type { Address, EvmLog, EvmMessage, OutcomeKind } from '@logtrack/evm';

// ─── Validator feed ─────────────────────────────────────────────────────────────

/** Inclusive time window a proposal is valid for. */
export interface TimeBounds {
  start: bigint;
  end: bigint;
}

/** Result of executing one batch of messages. */
export interface ExecutionAssertion {
  /** Machine state hash after execution. */
  afterHash: Hash32;
  numSteps: bigint;
  /** Raw outcome values, one per transaction outcome, in production order. */
  logs: readonly Uint8Array[];
}

/** Parameters of the proposal round the assertion was agreed in. */
export interface ProposalResults {
  sequenceNum: bigint;
  beforeHash: Hash32;
  timeBounds: TimeBounds;
  newInboxHash: Hash32;
  originalInboxHash: Hash32;
  /** The assertion as originally proposed; must match the finalized one. */
  assertion: ExecutionAssertion;
}

/** One finalized assertion as delivered by the validator feed. */
export interface FinalizedAssertion {
  assertion: ExecutionAssertion;
  proposal: ProposalResults;
  /** How many of `assertion.logs`, counted from the end, are new. */
  newLogCount: number;
  signatures: readonly Uint8Array[];
  /** Hash of the transaction that submitted the assertion on chain. */
  onChainTxHash: Uint8Array;
}

// ─── Stored records ─────────────────────────────────────────────────────────────

/** A transaction that completed with logs (stop or return). */
export interface TransactionLogBundle {
  readonly messageHash: Hash32;
  readonly message: EvmMessage;
  readonly logs: readonly EvmLog[];
}

/** Everything kept for one ingested assertion. Never mutated after append. */
export interface AssertionRecord {
  /** Position in the store; doubles as the block number for log queries. */
  readonly height: number;
  readonly bundles: readonly TransactionLogBundle[];
  readonly valueHashes: readonly Hash32[];
  /** `cumulativeHashes[i] = link(cumulativeHashes[i - 1], valueHashes[i])`. */
  readonly cumulativeHashes: readonly Hash32[];
}

/** What the tracker knows about one transaction. */
export interface TransactionRecord {
  readonly found: true;
  /** Height of the owning assertion. */
  readonly assertionIndex: number;
  readonly rawValue: Uint8Array;
  /** Undefined when the outcome could not be decoded. */
  readonly outcomeKind: OutcomeKind | undefined;
  readonly logsPreHash: Hash32;
  readonly logsPostHash: Hash32;
  readonly logsValHashes: readonly Hash32[];
  readonly validatorSigs: readonly HexData[];
  readonly partialHash: Hash32;
  readonly onChainTxHash: HexData;
}

export interface TransactionNotFound {
  readonly found: false;
}

export type TransactionLookup = TransactionRecord | TransactionNotFound;

// ─── Queries ────────────────────────────────────────────────────────────────────

/** Log filter criteria; every field is optional. */
export interface LogQuery {
  /** First height to include; negative values clamp to 0. */
  fromHeight?: number;
  /** Last height to include. */
  toHeight?: number;
  /** Only logs emitted by this contract. */
  address?: Address;
  /** Positional prefix the log's topics must start with. */
  topics?: readonly Hash32[];
}

/** One matching log, as returned by a query. */
export interface LogEntry {
  address: Address;
  /** Identifier of the message that emitted the log. */
  transactionHash: Hash32;
  height: number;
  data: HexData;
  topics: Hash32[];
  /** Position among the assertion's matching logs. */
  logIndex: number;
}
