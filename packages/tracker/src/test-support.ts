/**
 * Builders for finalized assertions in tests. Not part of the public API.
 */

import { ZERO_HASH } from '@logtrack/crypto';
import type { Hash32 } from '@logtrack/crypto';
import { encodeJsonOutcome } from '@logtrack/evm';
import type { EvmLog, EvmMessage, EvmOutcome } from '@logtrack/evm';

import type { FinalizedAssertion } from './types';

export const INSTANCE_ID: Hash32 = '0x' + 'ab'.repeat(32);
export const CALLER = '0x' + '11'.repeat(20);
export const CONTRACT_A = '0x' + 'a0'.repeat(20);
export const CONTRACT_B = '0x' + 'b0'.repeat(20);
export const TOPIC_A: Hash32 = '0x' + 'a1'.repeat(32);
export const TOPIC_B: Hash32 = '0x' + 'b2'.repeat(32);
export const TOPIC_C: Hash32 = '0x' + 'c3'.repeat(32);
export const TOPIC_X: Hash32 = '0x' + 'ee'.repeat(32);

export function message(sequenceNum: bigint, to: string = CONTRACT_A): EvmMessage {
  return { caller: CALLER, to, sequenceNum, value: 0n, data: '0x' };
}

export function evmLog(address: string, topics: Hash32[], data = '0x'): EvmLog {
  return { address, topics, data };
}

export function stop(sequenceNum: bigint, logs: EvmLog[] = []): EvmOutcome {
  return { kind: 'stop', message: message(sequenceNum), logs };
}

export function ret(sequenceNum: bigint, logs: EvmLog[] = []): EvmOutcome {
  return { kind: 'return', message: message(sequenceNum), logs, returnData: '0x01' };
}

export function revert(sequenceNum: bigint): EvmOutcome {
  return { kind: 'revert', message: message(sequenceNum), returnData: '0x' };
}

export interface AssertionShape {
  /** Outcomes or already-encoded raw values, in production order. */
  values: ReadonlyArray<EvmOutcome | Uint8Array>;
  /** Defaults to every value being new. */
  newLogCount?: number;
  sequenceNum?: bigint;
  /** Replaces the proposed assertion's step count to force a digest mismatch. */
  proposedNumSteps?: bigint;
}

/** A finalized assertion whose proposal agrees with it unless told otherwise. */
export function finalized(shape: AssertionShape): FinalizedAssertion {
  const logs = shape.values.map((value) => (value instanceof Uint8Array ? value : encodeJsonOutcome(value)));
  const assertion = { afterHash: '0x' + '0f'.repeat(32), numSteps: 100n, logs };
  return {
    assertion,
    proposal: {
      sequenceNum: shape.sequenceNum ?? 1n,
      beforeHash: '0x' + '0e'.repeat(32),
      timeBounds: { start: 10n, end: 20n },
      newInboxHash: '0x' + '0d'.repeat(32),
      originalInboxHash: ZERO_HASH,
      assertion: { ...assertion, numSteps: shape.proposedNumSteps ?? assertion.numSteps },
    },
    newLogCount: shape.newLogCount ?? logs.length,
    signatures: [new Uint8Array([1, 2, 3])],
    onChainTxHash: new Uint8Array(32).fill(0x42),
  };
}
