import type { CalendarEventRecord, EventCollection, EventRecord, OrganizationEventRecord } from '../models/event';
import type { DocumentStore } from './types';

export const EVENTS_COLLECTION = 'events';

export type EventRecordGuard<T extends EventRecord> = (value: unknown) => value is T;

/**
 * One Firestore document per event domain holds that domain's whole
 * collection: `events/calendarEvents`, `events/organizationEvents`.
 */
export class EventCollectionStore<T extends EventRecord> {
  constructor(
    private readonly store: DocumentStore,
    private readonly documentId: string,
    private readonly isRecord: EventRecordGuard<T>,
  ) {}

  get path(): string {
    return `${EVENTS_COLLECTION}/${this.documentId}`;
  }

  /** Stored items that no longer match the record shape are dropped. */
  async load(): Promise<EventCollection<T> | null> {
    const data = await this.store.getDocument(EVENTS_COLLECTION, this.documentId);
    if (!data) {
      return null;
    }

    const items: Record<string, T> = {};
    const storedItems = data.items;
    if (typeof storedItems === 'object' && storedItems !== null) {
      for (const [id, value] of Object.entries(storedItems)) {
        if (this.isRecord(value) && value.id === id) {
          items[id] = value;
        }
      }
    }

    return {
      lastUpdated: typeof data.lastUpdated === 'string' ? data.lastUpdated : '',
      todayCount: typeof data.todayCount === 'number' ? data.todayCount : 0,
      items,
    };
  }

  async save(collection: EventCollection<T>): Promise<void> {
    await this.store.setDocument(EVENTS_COLLECTION, this.documentId, {
      lastUpdated: collection.lastUpdated,
      todayCount: collection.todayCount,
      items: collection.items,
    });
  }
}

function hasEventShape(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return typeof record.id === 'string'
    && typeof record.title === 'string'
    && typeof record.start === 'string'
    && (record.end === null || typeof record.end === 'string')
    && Array.isArray(record.categories);
}

export function isCalendarEventRecord(value: unknown): value is CalendarEventRecord {
  return hasEventShape(value) && value.source === 'localist';
}

export function isOrganizationEventRecord(value: unknown): value is OrganizationEventRecord {
  return hasEventShape(value) && value.source === 'engage';
}
