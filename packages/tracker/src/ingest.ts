/**
 * Turns one finalized assertion into the records the tracker stores.
 *
 * Planning is pure: every check runs and every record is built before
 * anything is written, so a fatal error leaves the store and index as they
 * were.
 */

import { toHex } from '@logtrack/crypto';
import type { Hash32, HashPrimitives } from '@logtrack/crypto';
import { messageHash, outcomeLogs } from '@logtrack/evm';
import type { OutcomeDecoder, OutcomeKind } from '@logtrack/evm';
import { TrackerError, TrackerErrorCode, isFatal, toError } from '@logtrack/types';

import {
  buildHashChain,
  chainHead,
  executionDigest,
  partialHash,
  transactionWindows,
  windowCommitment,
} from './hash-chain';
import type { AssertionRecord, FinalizedAssertion, TransactionLogBundle, TransactionRecord } from './types';

/** Fixed inputs of an ingestion. */
export interface IngestContext {
  instanceId: Hash32;
  primitives: HashPrimitives;
  decoder: OutcomeDecoder;
}

/** One transaction record and the identifier it is indexed under. */
export interface PlannedTransaction {
  id: Hash32;
  record: TransactionRecord;
  /** Set when the outcome could not be decoded and `id` is the value hash. */
  decodeError?: Error;
}

/** Everything one assertion adds to the tracker. */
export interface IngestionPlan {
  assertion: AssertionRecord;
  transactions: PlannedTransaction[];
  partialHash: Hash32;
}

/**
 * Check `fa` against its proposal and build its assertion record and
 * transaction records for `height`.
 *
 * @throws {TrackerError} `ASSERTION_DIGEST_MISMATCH` when the finalized assertion differs from the proposed one.
 * @throws {TrackerError} `NEW_LOG_COUNT_OUT_OF_RANGE` when `fa.newLogCount` is not within the assertion's logs.
 */
export function planIngestion(fa: FinalizedAssertion, height: number, ctx: IngestContext): IngestionPlan {
  const chain = buildHashChain(fa.assertion.logs, ctx.primitives);
  const digest = executionDigest(fa.assertion, ctx.primitives, chainHead(chain.cumulativeHashes));
  const proposed = executionDigest(fa.proposal.assertion, ctx.primitives);
  if (digest !== proposed) {
    throw new TrackerError(
      TrackerErrorCode.ASSERTION_DIGEST_MISMATCH,
      'finalized assertion does not match its proposal',
      {
        context: { height, sequenceNum: fa.proposal.sequenceNum.toString(), digest, proposed },
        hint: 'The validator feed is inconsistent; restart from a known height.',
      },
    );
  }
  const partial = partialHash(ctx.instanceId, fa.proposal, digest);
  const windows = transactionWindows(fa.assertion.logs.length, fa.newLogCount);

  const validatorSigs = Object.freeze(fa.signatures.map((sig) => toHex(sig)));
  const onChainTxHash = toHex(fa.onChainTxHash);

  const bundles: TransactionLogBundle[] = [];
  const transactions: PlannedTransaction[] = [];

  for (const window of windows) {
    const position = window.end - 1;
    // Copied so the feed cannot change a stored record through its own buffer.
    const rawValue = (fa.assertion.logs[position] ?? new Uint8Array()).slice();
    const commitment = windowCommitment(chain, window);
    const base = {
      found: true as const,
      assertionIndex: height,
      rawValue,
      logsPreHash: commitment.logsPreHash,
      logsPostHash: commitment.logsPostHash,
      logsValHashes: Object.freeze(commitment.logsValHashes),
      validatorSigs,
      partialHash: partial,
      onChainTxHash,
    };

    let id: Hash32;
    let outcomeKind: OutcomeKind;
    try {
      const outcome = ctx.decoder.decode(rawValue);
      id = messageHash(ctx.instanceId, outcome.message);
      outcomeKind = outcome.kind;
      if (outcome.kind !== 'revert') {
        bundles.push({ messageHash: id, message: outcome.message, logs: outcomeLogs(outcome) });
      }
    } catch (err) {
      if (isFatal(err)) {
        throw err;
      }
      transactions.push({
        id: chain.valueHashes[position] ?? ctx.primitives.valueHash(rawValue),
        record: { ...base, outcomeKind: undefined },
        decodeError: toError(err),
      });
      continue;
    }
    transactions.push({ id, record: { ...base, outcomeKind } });
  }

  return {
    assertion: {
      height,
      bundles,
      valueHashes: chain.valueHashes,
      cumulativeHashes: chain.cumulativeHashes,
    },
    transactions,
    partialHash: partial,
  };
}
