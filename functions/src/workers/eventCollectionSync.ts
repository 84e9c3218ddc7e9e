import type { EngageFetchResult } from '../connectors/engageConnector';
import type { LocalistEventEnvelope } from '../connectors/localistConnector';
import type { ProviderConnector } from '../connectors/types';
import type { CalendarEventRecord, EventRecord, OrganizationEventRecord } from '../models/event';
import { normalizeEngageEvent } from '../normalizers/engageNormalizer';
import { normalizeLocalistEvent } from '../normalizers/localistNormalizer';
import type { EventCollectionStore } from '../services/eventCollectionStore';
import { mergeEventCollection, type CollectionSyncStats } from '../sync/collectionSync';
import type { CampusDomain } from './invocation';
import { normalizeEach, type NormalizedBatch } from './normalizeBatch';

export const CALENDAR_HORIZON_DAYS = 7;
export const ORGANIZATION_HORIZON_DAYS = 90;

interface EventSyncDeps<TRaw, T extends EventRecord> {
  connector: ProviderConnector<TRaw>;
  store: EventCollectionStore<T>;
  timeZone: string;
  horizonDays: number;
  now?: () => Date;
}

export interface EventSyncSummary extends CollectionSyncStats {
  path: string;
  skipped: number;
}

export async function syncCalendarEvents(
  deps: EventSyncDeps<LocalistEventEnvelope[], CalendarEventRecord>,
): Promise<EventSyncSummary> {
  return syncEventCollection('calendarEvents', deps, raw =>
    normalizeEach('calendarEvents', raw, envelope => normalizeLocalistEvent(envelope, deps.timeZone)),
  );
}

export async function syncOrganizationEvents(
  deps: EventSyncDeps<EngageFetchResult, OrganizationEventRecord>,
): Promise<EventSyncSummary> {
  return syncEventCollection('organizationEvents', deps, raw =>
    normalizeEach('organizationEvents', raw.events, event => normalizeEngageEvent(event, {
      timeZone: deps.timeZone,
      organizations: raw.organizations,
    })),
  );
}

/** fetch -> normalize -> read back -> merge -> write. */
async function syncEventCollection<TRaw, T extends EventRecord>(
  domain: CampusDomain,
  deps: EventSyncDeps<TRaw, T>,
  normalize: (raw: TRaw) => NormalizedBatch<T>,
): Promise<EventSyncSummary> {
  const raw = await deps.connector.fetch();
  const { records, skipped } = normalize(raw);
  const now = deps.now ? deps.now() : new Date();

  const existing = await deps.store.load();
  const { collection, stats } = mergeEventCollection(existing, records, {
    now,
    timeZone: deps.timeZone,
    horizonDays: deps.horizonDays,
  });

  await deps.store.save(collection);

  return { ...stats, path: deps.store.path, skipped };
}
