/**
 * End-to-end tests for the tracker: validator feed in, queries out, with
 * ingestion and queries interleaved through one dispatcher.
 */

import { describe, it, expect } from 'vitest';
import { ZERO_HASH, keccak256, linkHash } from '@logtrack/crypto';
import type { Hash32 } from '@logtrack/crypto';
import { encodeJsonOutcome, messageHash } from '@logtrack/evm';
import type { EvmLog, EvmMessage, EvmOutcome } from '@logtrack/evm';
import { createTracker } from '@logtrack/tracker';
import type { FinalizedAssertion, LogEntry, Tracker } from '@logtrack/tracker';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const INSTANCE_ID: Hash32 = '0x' + '5a'.repeat(32);
const CALLER = '0x' + '77'.repeat(20);
const TOKEN = '0x' + '88'.repeat(20);
const TRANSFER_TOPIC: Hash32 = '0x' + 'dd'.repeat(32);

function msg(sequenceNum: bigint): EvmMessage {
  return { caller: CALLER, to: TOKEN, sequenceNum, value: 0n, data: '0x' };
}

function transfer(data: string): EvmLog {
  return { address: TOKEN, topics: [TRANSFER_TOPIC], data };
}

function finalizedOf(sequenceNum: bigint, outcomes: EvmOutcome[], newLogCount = outcomes.length): FinalizedAssertion {
  const assertion = { afterHash: '0x' + '01'.repeat(32), numSteps: 1000n, logs: outcomes.map(encodeJsonOutcome) };
  return {
    assertion,
    proposal: {
      sequenceNum,
      beforeHash: '0x' + '02'.repeat(32),
      timeBounds: { start: 0n, end: 100n },
      newInboxHash: '0x' + '03'.repeat(32),
      originalInboxHash: '0x' + '04'.repeat(32),
      assertion,
    },
    newLogCount,
    signatures: [new Uint8Array([9, 9])],
    onChainTxHash: new Uint8Array(32),
  };
}

/** Assertion `h` carries `h + 1` transactions with one transfer log each. */
function assertionAt(h: number): FinalizedAssertion {
  const outcomes: EvmOutcome[] = [];
  for (let t = 0; t <= h; t++) {
    const seq = BigInt(h * 100 + t);
    outcomes.push({ kind: 'stop', message: msg(seq), logs: [transfer(`0x${h.toString(16).padStart(2, '0')}`)] });
  }
  return finalizedOf(BigInt(h + 1), outcomes);
}

// Small deterministic generator so the interleaving is reproducible.
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };
}

function newTracker(): Tracker {
  return createTracker({ instanceId: INSTANCE_ID, instanceCreationTxHash: () => Promise.resolve(ZERO_HASH) });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('tracker flow', () => {
  it('commits one transaction with two logs from a zero pre hash', async () => {
    const { dispatcher } = newTracker();
    const pending: EvmOutcome = { kind: 'stop', message: msg(1n), logs: [] };
    const current: EvmOutcome = { kind: 'return', message: msg(2n), logs: [transfer('0xaa')], returnData: '0x' };
    const fa = finalizedOf(1n, [pending, current], 1);

    await dispatcher.ingest(fa);

    const v0 = keccak256(encodeJsonOutcome(pending));
    const v1 = keccak256(encodeJsonOutcome(current));
    const c0 = linkHash(ZERO_HASH, v0);
    const c1 = linkHash(c0, v1);
    const record = await dispatcher.transactionByHash(messageHash(INSTANCE_ID, msg(2n)));
    expect(record).toMatchObject({
      found: true,
      assertionIndex: 0,
      outcomeKind: 'return',
      logsPreHash: ZERO_HASH,
      logsPostHash: c1,
      logsValHashes: [v0, v1],
    });
    expect(await dispatcher.transactionByHash(messageHash(INSTANCE_ID, msg(1n)))).toEqual({ found: false });
  });

  it('answers from its own copy after the feed reuses its buffers', async () => {
    const { dispatcher } = newTracker();
    const fa = finalizedOf(1n, [{ kind: 'stop', message: msg(7n), logs: [transfer('0x07')] }]);
    const original = Uint8Array.from(fa.assertion.logs[0] ?? []);
    await dispatcher.ingest(fa);

    (fa.assertion.logs[0] ?? new Uint8Array()).fill(0);
    const id = messageHash(INSTANCE_ID, msg(7n));
    const record = await dispatcher.transactionByHash(id);
    expect(record).toMatchObject({ found: true, rawValue: original, outcomeKind: 'stop' });
    expect(await dispatcher.findLogs()).toMatchObject([{ transactionHash: id, data: '0x07' }]);
  });

  it('returns every log in height, transaction, log order', async () => {
    const { dispatcher } = newTracker();
    for (let h = 0; h < 3; h++) await dispatcher.ingest(assertionAt(h));

    const logs = await dispatcher.findLogs();
    expect(logs.map((l) => [l.height, l.logIndex])).toEqual([
      [0, 0],
      [1, 0],
      [1, 1],
      [2, 0],
      [2, 1],
      [2, 2],
    ]);
    expect(await dispatcher.findLogs({ fromHeight: 3 })).toEqual([]);
    expect(await dispatcher.findLogs({ fromHeight: 2, toHeight: 1 })).toEqual([]);
  });

  it('only ever shows queries a complete prefix of the ingested assertions', async () => {
    const { dispatcher } = newTracker();
    const random = lcg(42);
    const ingestions = 8;
    const queries: Array<Promise<LogEntry[]>> = [];
    const counts: Array<Promise<number>> = [];
    const done: Array<Promise<unknown>> = [];

    let next = 0;
    while (next < ingestions) {
      if (random() < 0.4) {
        done.push(dispatcher.ingest(assertionAt(next++)));
      } else if (random() < 0.5) {
        queries.push(dispatcher.findLogs());
      } else {
        counts.push(dispatcher.assertionCount());
      }
    }
    queries.push(dispatcher.findLogs());
    await Promise.all(done);

    const results = await Promise.all(queries);
    for (const logs of results) {
      const heights = new Map<number, number>();
      for (const log of logs) heights.set(log.height, (heights.get(log.height) ?? 0) + 1);
      const seen = [...heights.keys()];
      // heights 0..k-1, each with all of its h + 1 logs
      expect(seen).toEqual(seen.map((_, i) => i));
      for (const [height, count] of heights) expect(count).toBe(height + 1);
    }
    expect(results[results.length - 1]?.length).toBe((ingestions * (ingestions + 1)) / 2);

    const observed = await Promise.all(counts);
    expect(observed).toEqual([...observed].sort((a, b) => a - b));
  });
});
