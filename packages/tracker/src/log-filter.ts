import type { EvmLog } from '@logtrack/evm';

import type { AssertionStoreView } from './assertion-store';
import type { LogEntry, LogQuery } from './types';

/** Query with its address and topics lowercased for comparison. */
interface NormalizedQuery {
  address: string | undefined;
  topics: readonly string[];
}

function normalizeQuery(query: LogQuery): NormalizedQuery {
  return {
    address: query.address?.toLowerCase(),
    topics: (query.topics ?? []).map((topic) => topic.toLowerCase()),
  };
}

/**
 * Whether `log` passes the address filter and has `topics` as a positional
 * prefix of its own topics. An empty topic list matches every log.
 */
export function matchesLog(log: EvmLog, address: string | undefined, topics: readonly string[]): boolean {
  if (address !== undefined && log.address.toLowerCase() !== address.toLowerCase()) {
    return false;
  }
  if (topics.length > log.topics.length) {
    return false;
  }
  return topics.every((topic, i) => log.topics[i]?.toLowerCase() === topic.toLowerCase());
}

/** Clamp a query's height bounds to `[start, end)` within a store of `length`. */
export function heightWindow(query: LogQuery, length: number): { start: number; end: number } {
  const start = Math.max(0, query.fromHeight ?? 0);
  const end = Math.min(length, (query.toHeight ?? length - 1) + 1);
  return { start, end };
}

/**
 * Every stored log matching `query`, ordered by height, then by transaction
 * within the assertion, then by log within the transaction.
 *
 * A range that starts past the end of the store, or ends before it starts,
 * yields an empty list.
 */
export function findLogs(store: AssertionStoreView, query: LogQuery = {}): LogEntry[] {
  const { start, end } = heightWindow(query, store.length);
  if (start >= store.length || end <= start) {
    return [];
  }

  const { address, topics } = normalizeQuery(query);
  const entries: LogEntry[] = [];
  for (const record of store.range(start, end)) {
    let logIndex = 0;
    for (const bundle of record.bundles) {
      for (const log of bundle.logs) {
        if (!matchesLog(log, address, topics)) {
          continue;
        }
        entries.push({
          address: log.address,
          transactionHash: bundle.messageHash,
          height: record.height,
          data: log.data,
          topics: [...log.topics],
          logIndex: logIndex++,
        });
      }
    }
  }
  return entries;
}

