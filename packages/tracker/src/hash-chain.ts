/**
 * Pure computations behind an assertion's log commitment: the value-hash
 * chain, the per-transaction windows over it, and the digests that bind a
 * finalized assertion to its proposal.
 *
 * @packageDocumentation
 */

import { ZERO_HASH } from '@logtrack/crypto';
import type { Hash32, HashPrimitives } from '@logtrack/crypto';
import { packBytes32, packUint, solidityKeccak } from '@logtrack/evm';
import { TrackerError, TrackerErrorCode } from '@logtrack/types';

import type { ExecutionAssertion, ProposalResults } from './types';

// ─── Chain ──────────────────────────────────────────────────────────────────────

/** Value hashes of an assertion's logs and the running chain over them. */
export interface HashChain {
  valueHashes: Hash32[];
  cumulativeHashes: Hash32[];
}

/**
 * Hash every log value and fold the results into a chain that starts from
 * {@link ZERO_HASH}.
 */
export function buildHashChain(values: readonly Uint8Array[], primitives: HashPrimitives): HashChain {
  const valueHashes: Hash32[] = [];
  const cumulativeHashes: Hash32[] = [];
  let acc = ZERO_HASH;
  for (const value of values) {
    const valueHash = primitives.valueHash(value);
    acc = primitives.link(acc, valueHash);
    valueHashes.push(valueHash);
    cumulativeHashes.push(acc);
  }
  return { valueHashes, cumulativeHashes };
}

/** Last link of a chain, or {@link ZERO_HASH} for an empty one. */
export function chainHead(cumulativeHashes: readonly Hash32[]): Hash32 {
  return cumulativeHashes[cumulativeHashes.length - 1] ?? ZERO_HASH;
}

/** Fold `valueHashes` onto `start`. */
export function foldChain(start: Hash32, valueHashes: readonly Hash32[], primitives: HashPrimitives): Hash32 {
  return valueHashes.reduce((acc, valueHash) => primitives.link(acc, valueHash), start);
}

/**
 * Check `cumulativeHashes[i] = link(cumulativeHashes[i - 1], valueHashes[i])`
 * for every `i`, with a zero predecessor for the first link.
 */
export function verifyHashChain(chain: HashChain, primitives: HashPrimitives): boolean {
  if (chain.valueHashes.length !== chain.cumulativeHashes.length) {
    return false;
  }
  let prev = ZERO_HASH;
  for (let i = 0; i < chain.valueHashes.length; i++) {
    const expected = primitives.link(prev, chain.valueHashes[i] ?? ZERO_HASH);
    if (chain.cumulativeHashes[i] !== expected) {
      return false;
    }
    prev = expected;
  }
  return true;
}

// ─── Transaction windows ────────────────────────────────────────────────────────

/** Half-open range `[start, end)` of positions in an assertion's log list. */
export interface LogWindow {
  start: number;
  end: number;
}

/**
 * Windows of the new transactions at the tail of an assertion's `total`
 * logs. New transaction `i` sits at `total - newCount + i`; its window runs
 * from the end of the previous window to its own position, so the first
 * window also covers the logs that were already pending.
 *
 * @throws {TrackerError} `NEW_LOG_COUNT_OUT_OF_RANGE` unless `0 <= newCount <= total`.
 */
export function transactionWindows(total: number, newCount: number): LogWindow[] {
  if (!Number.isSafeInteger(newCount) || newCount < 0 || newCount > total) {
    throw new TrackerError(
      TrackerErrorCode.NEW_LOG_COUNT_OUT_OF_RANGE,
      `new log count ${newCount} is outside [0, ${total}]`,
      { context: { total, newCount }, hint: 'The validator feed reported more new logs than the assertion carries.' },
    );
  }
  const windows: LogWindow[] = [];
  const firstNew = total - newCount;
  for (let i = 0; i < newCount; i++) {
    const position = firstNew + i;
    windows.push({ start: i === 0 ? 0 : position, end: position + 1 });
  }
  return windows;
}

/** Commitment fields a transaction record carries for its window. */
export interface WindowCommitment {
  logsPreHash: Hash32;
  logsPostHash: Hash32;
  logsValHashes: Hash32[];
}

/**
 * The chain link before the window, the head of the whole chain, and the
 * value hashes inside the window.
 *
 * `logsPostHash` is the head of the whole assertion chain, not of the
 * window. Folding `logsValHashes` onto `logsPreHash` reaches it only for the
 * last window; earlier windows verify against the assertion's
 * `cumulativeHashes` instead.
 */
export function windowCommitment(chain: HashChain, window: LogWindow): WindowCommitment {
  return {
    logsPreHash: window.start === 0 ? ZERO_HASH : (chain.cumulativeHashes[window.start - 1] ?? ZERO_HASH),
    logsPostHash: chainHead(chain.cumulativeHashes),
    logsValHashes: chain.valueHashes.slice(window.start, window.end),
  };
}

// ─── Digests ────────────────────────────────────────────────────────────────────

/**
 * Digest of an execution result:
 * `keccak256(abi.encodePacked(bytes32 afterHash, uint64 numSteps, bytes32 logsHead))`.
 *
 * @param logsHead - Head of the assertion's log chain, when already computed.
 */
export function executionDigest(
  assertion: ExecutionAssertion,
  primitives: HashPrimitives,
  logsHead?: Hash32,
): Hash32 {
  const head = logsHead ?? chainHead(buildHashChain(assertion.logs, primitives).cumulativeHashes);
  return solidityKeccak(packBytes32(assertion.afterHash), packUint(assertion.numSteps, 64), packBytes32(head));
}

/**
 * Commitment to a proposal's parameters that validators sign:
 * `keccak256(abi.encodePacked(bytes32 instanceId, uint64 sequenceNum,
 * bytes32 beforeHash, uint64 start, uint64 end, bytes32 newInboxHash,
 * bytes32 originalInboxHash, bytes32 digest))`.
 */
export function partialHash(instanceId: Hash32, proposal: ProposalResults, digest: Hash32): Hash32 {
  return solidityKeccak(
    packBytes32(instanceId),
    packUint(proposal.sequenceNum, 64),
    packBytes32(proposal.beforeHash),
    packUint(proposal.timeBounds.start, 64),
    packUint(proposal.timeBounds.end, 64),
    packBytes32(proposal.newInboxHash),
    packBytes32(proposal.originalInboxHash),
    packBytes32(digest),
  );
}
