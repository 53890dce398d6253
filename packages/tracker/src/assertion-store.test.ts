import { describe, it, expect } from 'vitest';
import { TrackerErrorCode } from '@logtrack/types';

import { AssertionStore } from './assertion-store';
import type { AssertionRecord } from './types';

function record(height: number): AssertionRecord {
  return { height, bundles: [], valueHashes: [], cumulativeHashes: [] };
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

describe('AssertionStore', () => {
  it('starts empty', () => {
    const store = new AssertionStore();
    expect(store.length).toBe(0);
    expect(store.latestHeight).toBe(-1);
    expect(store.get(0)).toBeUndefined();
    expect(store.range(0, 10)).toEqual([]);
  });

  it('appends records in height order', () => {
    const store = new AssertionStore();
    store.append(record(0));
    store.append(record(1));
    expect(store.length).toBe(2);
    expect(store.latestHeight).toBe(1);
    expect(store.get(1)?.height).toBe(1);
  });

  it('rejects a record for the wrong height', () => {
    const store = new AssertionStore();
    store.append(record(0));
    expect(() => store.append(record(2))).toThrow('expected record for height 1, got 2');
    expect(thrownBy(() => store.append(record(0)))).toMatchObject({
      code: TrackerErrorCode.STORE_HEIGHT_MISMATCH,
      fatal: true,
    });
    expect(store.length).toBe(1);
  });

  it('freezes records on append', () => {
    const store = new AssertionStore();
    const rec = record(0);
    store.append(rec);
    expect(Object.isFrozen(rec)).toBe(true);
    expect(Object.isFrozen(rec.valueHashes)).toBe(true);
    expect(Object.isFrozen(rec.bundles)).toBe(true);
  });

  it('clamps ranges to the stored heights', () => {
    const store = new AssertionStore();
    for (let h = 0; h < 4; h++) store.append(record(h));
    expect(store.range(-3, 2).map((r) => r.height)).toEqual([0, 1]);
    expect(store.range(2, 99).map((r) => r.height)).toEqual([2, 3]);
    expect(store.range(3, 1)).toEqual([]);
  });
});
