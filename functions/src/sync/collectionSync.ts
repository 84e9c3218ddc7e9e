import type { EventCollection, EventRecord } from '../models/event';
import { civilDateKey, formatTimestampString } from '../utils/timezone';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CollectionSyncOptions {
  now: Date;
  timeZone: string;
  /** Forward window, in days, the provider was queried for. */
  horizonDays: number;
}

export interface CollectionSyncStats {
  received: number;
  added: number;
  updated: number;
  expired: number;
  /** Kept although absent from the batch, starting inside the horizon. */
  unconfirmed: number;
  /** Kept although absent from the batch, starting beyond the horizon. */
  outOfWindow: number;
  total: number;
  todayCount: number;
}

export interface CollectionSyncResult<T extends EventRecord> {
  collection: EventCollection<T>;
  stats: CollectionSyncStats;
}

type AbsentItemFate = 'expired' | 'unconfirmed' | 'outOfWindow';

/**
 * Reconciles a freshly normalized batch with the persisted collection.
 *
 * Batch records replace stored records with the same id wholesale. Stored
 * records missing from the batch are dropped only once they have ended
 * (`end`, or `start` when there is no end, strictly before `now`); an empty
 * batch therefore only prunes. `todayCount` and `lastUpdated` are rebuilt
 * from the final item set on every call.
 */
export function mergeEventCollection<T extends EventRecord>(
  existing: EventCollection<T> | null,
  batch: readonly T[],
  options: CollectionSyncOptions,
): CollectionSyncResult<T> {
  const previous = existing?.items ?? {};
  const incoming = new Map<string, T>();
  for (const record of batch) {
    incoming.set(record.id, record);
  }

  const stats: CollectionSyncStats = {
    received: batch.length,
    added: 0,
    updated: 0,
    expired: 0,
    unconfirmed: 0,
    outOfWindow: 0,
    total: 0,
    todayCount: 0,
  };

  const next = new Map<string, T>();

  for (const [id, record] of Object.entries(previous)) {
    if (incoming.has(id)) {
      continue;
    }
    const fate = classifyAbsentItem(record, options);
    stats[fate] += 1;
    if (fate !== 'expired') {
      next.set(id, record);
    }
  }

  for (const [id, record] of incoming) {
    if (Object.prototype.hasOwnProperty.call(previous, id)) {
      stats.updated += 1;
    } else {
      stats.added += 1;
    }
    next.set(id, record);
  }

  const items: Record<string, T> = {};
  for (const record of sortByStart(Array.from(next.values()))) {
    items[record.id] = record;
  }

  const todayCount = countEventsOnDay(Object.values(items), options.now, options.timeZone);
  stats.total = next.size;
  stats.todayCount = todayCount;

  return {
    collection: {
      lastUpdated: formatTimestampString(options.now, options.timeZone),
      todayCount,
      items,
    },
    stats,
  };
}

/** Number of events whose start falls on `now`'s civil date in `timeZone`. */
export function countEventsOnDay(items: readonly EventRecord[], now: Date, timeZone: string): number {
  const today = civilDateKey(now, timeZone);
  let count = 0;
  for (const item of items) {
    const start = Date.parse(item.start);
    if (!Number.isNaN(start) && civilDateKey(new Date(start), timeZone) === today) {
      count += 1;
    }
  }
  return count;
}

function classifyAbsentItem(record: EventRecord, options: CollectionSyncOptions): AbsentItemFate {
  const nowMs = options.now.getTime();
  const start = Date.parse(record.start);
  const end = record.end ? Date.parse(record.end) : Number.NaN;
  const finishedAt = Number.isNaN(end) ? start : end;

  if (!Number.isNaN(finishedAt) && finishedAt < nowMs) {
    return 'expired';
  }

  const horizonEnd = nowMs + options.horizonDays * DAY_MS;
  if (!Number.isNaN(start) && start >= horizonEnd) {
    return 'outOfWindow';
  }
  return 'unconfirmed';
}

function sortByStart<T extends EventRecord>(records: T[]): T[] {
  return records.sort((a, b) => {
    const diff = Date.parse(a.start) - Date.parse(b.start);
    if (!Number.isNaN(diff) && diff !== 0) {
      return diff;
    }
    return a.id.localeCompare(b.id);
  });
}
