import { TrackerError, TrackerErrorCode } from '@logtrack/types';

import type { AssertionRecord } from './types';

/** Read-only view of the assertion history handed to queries. */
export interface AssertionStoreView {
  readonly length: number;
  /** Height of the newest record, or -1 when empty. */
  readonly latestHeight: number;
  get(height: number): AssertionRecord | undefined;
  /** Records with `start <= height < end`, clamped to the store. */
  range(start: number, end: number): readonly AssertionRecord[];
}

/**
 * Append-only sequence of assertion records, indexed by height.
 *
 * Records are frozen on append. The store grows for the life of the process;
 * nothing is evicted.
 */
export class AssertionStore implements AssertionStoreView {
  private readonly records: AssertionRecord[] = [];

  get length(): number {
    return this.records.length;
  }

  get latestHeight(): number {
    return this.records.length - 1;
  }

  /**
   * Append the record for the next height.
   *
   * @throws {TrackerError} `STORE_HEIGHT_MISMATCH` when `record.height` is not the current length.
   */
  append(record: AssertionRecord): void {
    if (record.height !== this.records.length) {
      throw new TrackerError(
        TrackerErrorCode.STORE_HEIGHT_MISMATCH,
        `expected record for height ${this.records.length}, got ${record.height}`,
      );
    }
    Object.freeze(record.bundles);
    Object.freeze(record.valueHashes);
    Object.freeze(record.cumulativeHashes);
    this.records.push(Object.freeze(record));
  }

  get(height: number): AssertionRecord | undefined {
    return this.records[height];
  }

  range(start: number, end: number): readonly AssertionRecord[] {
    return this.records.slice(Math.max(0, start), Math.min(this.records.length, end));
  }
}
