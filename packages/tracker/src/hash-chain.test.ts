import { describe, it, expect } from 'vitest';
import { ZERO_HASH, defaultHashPrimitives, fromHex, keccak256, linkHash, strip0x } from '@logtrack/crypto';
import { packBytes32, packUint, solidityKeccak } from '@logtrack/evm';
import { TrackerErrorCode } from '@logtrack/types';

import {
  buildHashChain,
  chainHead,
  executionDigest,
  foldChain,
  partialHash,
  transactionWindows,
  verifyHashChain,
  windowCommitment,
} from './hash-chain';
import type { ExecutionAssertion, ProposalResults } from './types';

const enc = new TextEncoder();
const values = ['first', 'second', 'third', 'fourth', 'fifth'].map((s) => enc.encode(s));

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

describe('buildHashChain', () => {
  it('returns empty sequences for no values', () => {
    const chain = buildHashChain([], defaultHashPrimitives);
    expect(chain).toEqual({ valueHashes: [], cumulativeHashes: [] });
    expect(chainHead(chain.cumulativeHashes)).toBe(ZERO_HASH);
  });

  it('links each value hash onto the previous cumulative hash', () => {
    const chain = buildHashChain(values.slice(0, 2), defaultHashPrimitives);
    const v0 = keccak256(values[0] ?? new Uint8Array());
    const v1 = keccak256(values[1] ?? new Uint8Array());
    const c0 = linkHash(ZERO_HASH, v0);
    expect(chain.valueHashes).toEqual([v0, v1]);
    expect(chain.cumulativeHashes).toEqual([c0, linkHash(c0, v1)]);
  });

  it('keeps both sequences the same length', () => {
    const chain = buildHashChain(values, defaultHashPrimitives);
    expect(chain.valueHashes).toHaveLength(5);
    expect(chain.cumulativeHashes).toHaveLength(5);
    expect(verifyHashChain(chain, defaultHashPrimitives)).toBe(true);
  });

  it('uses the supplied primitives', () => {
    const chain = buildHashChain(values.slice(0, 2), {
      valueHash: (raw) => '0x' + raw.length.toString(16).padStart(64, '0'),
      link: (_prev, value) => value,
    });
    expect(chain.cumulativeHashes).toEqual(chain.valueHashes);
    expect(chain.valueHashes[0]).toBe('0x' + '5'.padStart(64, '0'));
  });
});

describe('verifyHashChain', () => {
  it('rejects a tampered link', () => {
    const chain = buildHashChain(values, defaultHashPrimitives);
    const tampered = { ...chain, cumulativeHashes: [...chain.cumulativeHashes] };
    tampered.cumulativeHashes[2] = ZERO_HASH;
    expect(verifyHashChain(tampered, defaultHashPrimitives)).toBe(false);
  });

  it('rejects sequences of different lengths', () => {
    const chain = buildHashChain(values, defaultHashPrimitives);
    expect(
      verifyHashChain({ ...chain, cumulativeHashes: chain.cumulativeHashes.slice(1) }, defaultHashPrimitives),
    ).toBe(false);
  });
});

describe('foldChain', () => {
  it('reproduces the chain head from zero', () => {
    const chain = buildHashChain(values, defaultHashPrimitives);
    expect(foldChain(ZERO_HASH, chain.valueHashes, defaultHashPrimitives)).toBe(
      chainHead(chain.cumulativeHashes),
    );
  });

  it('continues a chain from any link', () => {
    const chain = buildHashChain(values, defaultHashPrimitives);
    expect(foldChain(chain.cumulativeHashes[1] ?? ZERO_HASH, chain.valueHashes.slice(2), defaultHashPrimitives)).toBe(
      chain.cumulativeHashes[4],
    );
  });
});

describe('transactionWindows', () => {
  it('gives a single new transaction every log', () => {
    expect(transactionWindows(2, 1)).toEqual([{ start: 0, end: 2 }]);
  });

  it('gives later transactions one log each', () => {
    expect(transactionWindows(5, 3)).toEqual([
      { start: 0, end: 3 },
      { start: 3, end: 4 },
      { start: 4, end: 5 },
    ]);
  });

  it('returns no windows when nothing is new', () => {
    expect(transactionWindows(3, 0)).toEqual([]);
    expect(transactionWindows(0, 0)).toEqual([]);
  });

  it('rejects counts outside the logs', () => {
    expect(thrownBy(() => transactionWindows(2, 3))).toMatchObject({
      code: TrackerErrorCode.NEW_LOG_COUNT_OUT_OF_RANGE,
    });
    expect(() => transactionWindows(2, -1)).toThrow('new log count -1 is outside [0, 2]');
    expect(() => transactionWindows(2, 1.5)).toThrow('new log count 1.5 is outside [0, 2]');
  });

  it.each([
    [5, 5],
    [5, 3],
    [5, 1],
    [1, 1],
  ])('partitions %i value hashes with %i new logs', (total, newCount) => {
    const chain = buildHashChain(values.slice(0, total), defaultHashPrimitives);
    const joined = transactionWindows(total, newCount).flatMap(
      (window) => windowCommitment(chain, window).logsValHashes,
    );
    expect(joined).toEqual(chain.valueHashes);
  });
});

describe('windowCommitment', () => {
  const chain = buildHashChain(values, defaultHashPrimitives);

  it('starts from zero for a window at the beginning', () => {
    const commitment = windowCommitment(chain, { start: 0, end: 3 });
    expect(commitment.logsPreHash).toBe(ZERO_HASH);
    expect(commitment.logsValHashes).toEqual(chain.valueHashes.slice(0, 3));
  });

  it('starts from the link before the window', () => {
    const commitment = windowCommitment(chain, { start: 3, end: 4 });
    expect(commitment.logsPreHash).toBe(chain.cumulativeHashes[2]);
    expect(commitment.logsValHashes).toEqual([chain.valueHashes[3]]);
  });

  it('always ends at the chain head', () => {
    expect(windowCommitment(chain, { start: 0, end: 1 }).logsPostHash).toBe(chain.cumulativeHashes[4]);
    expect(windowCommitment(chain, { start: 3, end: 4 }).logsPostHash).toBe(chain.cumulativeHashes[4]);
  });

  it('reaches the chain head by folding only the last window', () => {
    const first = windowCommitment(chain, { start: 0, end: 1 });
    const last = windowCommitment(chain, { start: 4, end: 5 });
    expect(foldChain(first.logsPreHash, first.logsValHashes, defaultHashPrimitives)).toBe(chain.cumulativeHashes[0]);
    expect(foldChain(first.logsPreHash, first.logsValHashes, defaultHashPrimitives)).not.toBe(first.logsPostHash);
    expect(foldChain(last.logsPreHash, last.logsValHashes, defaultHashPrimitives)).toBe(last.logsPostHash);
  });

  it('folds from the pre hash through the window to the window end link', () => {
    const commitment = windowCommitment(chain, { start: 1, end: 3 });
    expect(foldChain(commitment.logsPreHash, commitment.logsValHashes, defaultHashPrimitives)).toBe(
      chain.cumulativeHashes[2],
    );
  });
});

describe('executionDigest', () => {
  const assertion: ExecutionAssertion = {
    afterHash: '0x' + '0f'.repeat(32),
    numSteps: 42n,
    logs: values.slice(0, 2),
  };

  it('packs the after hash, step count and log chain head', () => {
    const head = chainHead(buildHashChain(assertion.logs, defaultHashPrimitives).cumulativeHashes);
    const manual = keccak256(fromHex('0f'.repeat(32) + '000000000000002a' + strip0x(head)));
    expect(executionDigest(assertion, defaultHashPrimitives)).toBe(manual);
  });

  it('uses a precomputed head when given one', () => {
    expect(executionDigest(assertion, defaultHashPrimitives, ZERO_HASH)).toBe(
      solidityKeccak(packBytes32(assertion.afterHash), packUint(42n, 64), packBytes32(ZERO_HASH)),
    );
  });

  it('changes when a log changes', () => {
    const other = { ...assertion, logs: [values[0] ?? new Uint8Array(), values[2] ?? new Uint8Array()] };
    expect(executionDigest(other, defaultHashPrimitives)).not.toBe(executionDigest(assertion, defaultHashPrimitives));
  });
});

describe('partialHash', () => {
  it('packs the proposal fields around the digest', () => {
    const instanceId = '0x' + 'ab'.repeat(32);
    const digest = '0x' + 'dd'.repeat(32);
    const proposal: ProposalResults = {
      sequenceNum: 3n,
      beforeHash: '0x' + '0e'.repeat(32),
      timeBounds: { start: 10n, end: 20n },
      newInboxHash: '0x' + '0d'.repeat(32),
      originalInboxHash: ZERO_HASH,
      assertion: { afterHash: ZERO_HASH, numSteps: 0n, logs: [] },
    };
    const manual =
      'ab'.repeat(32) +
      '0000000000000003' +
      '0e'.repeat(32) +
      '000000000000000a' +
      '0000000000000014' +
      '0d'.repeat(32) +
      '00'.repeat(32) +
      'dd'.repeat(32);
    expect(partialHash(instanceId, proposal, digest)).toBe(keccak256(fromHex(manual)));
  });
});
