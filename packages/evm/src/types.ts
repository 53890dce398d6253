/**
 * EVM-level values the tracker reads out of raw transaction outcomes.
 */

import type { Hash32, HexData } from '@logtrack/crypto';

/** 0x-prefixed, lowercase, 20-byte address. */
export type Address = string;

/** Maximum number of topics an EVM log carries. */
export const MAX_LOG_TOPICS = 4;

/** The message (transaction) an outcome answers. */
export interface EvmMessage {
  caller: Address;
  to: Address;
  sequenceNum: bigint;
  value: bigint;
  /** Call data. */
  data: HexData;
}

/** One event log emitted by a contract. */
export interface EvmLog {
  /** Emitting contract. */
  address: Address;
  /** At most {@link MAX_LOG_TOPICS} entries. */
  topics: Hash32[];
  data: HexData;
}

/** Execution halted normally without return data. */
export interface StopOutcome {
  kind: 'stop';
  message: EvmMessage;
  logs: EvmLog[];
}

/** Execution returned data. */
export interface ReturnOutcome {
  kind: 'return';
  message: EvmMessage;
  logs: EvmLog[];
  returnData: HexData;
}

/** Execution reverted; any logs it emitted were discarded. */
export interface RevertOutcome {
  kind: 'revert';
  message: EvmMessage;
  returnData: HexData;
}

/** Closed set of transaction outcomes. */
export type EvmOutcome = StopOutcome | ReturnOutcome | RevertOutcome;

/** Outcome discriminator. */
export type OutcomeKind = EvmOutcome['kind'];

/**
 * Decodes one raw outcome value into an {@link EvmOutcome}.
 *
 * Implementations throw a `TrackerError` with code `OUTCOME_DECODE_FAILED`
 * when the value is malformed.
 */
export interface OutcomeDecoder {
  decode(raw: Uint8Array): EvmOutcome;
}
