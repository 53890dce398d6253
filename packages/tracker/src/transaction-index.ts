import { isHash32 } from '@logtrack/types';
import type { Hash32 } from '@logtrack/crypto';

import type { TransactionLookup, TransactionNotFound, TransactionRecord } from './types';

const NOT_FOUND: TransactionNotFound = Object.freeze({ found: false as const });

/**
 * Map from message identifier to its transaction record, filled in as
 * assertions are ingested. Identifiers are compared in lowercase.
 *
 * Stored records are frozen. A typed array cannot be, so lookups hand out a
 * copy of `rawValue`.
 */
export class TransactionIndex {
  private readonly records = new Map<Hash32, TransactionRecord>();

  get size(): number {
    return this.records.size;
  }

  /**
   * Insert `record` under `id`, replacing any record already stored there.
   *
   * @returns The replaced record, if there was one.
   */
  upsert(id: Hash32, record: TransactionRecord): TransactionRecord | undefined {
    const key = id.toLowerCase();
    const previous = this.records.get(key);
    Object.freeze(record.logsValHashes);
    Object.freeze(record.validatorSigs);
    this.records.set(key, Object.freeze(record));
    return previous;
  }

  /** Record for `id`, or `{ found: false }` when unknown or malformed. */
  lookup(id: string): TransactionLookup {
    if (!isHash32(id)) {
      return NOT_FOUND;
    }
    const record = this.records.get(id.toLowerCase());
    if (!record) {
      return NOT_FOUND;
    }
    return { ...record, rawValue: record.rawValue.slice() };
  }
}
