import * as logger from 'firebase-functions/logger';
import type { BusynessLocation, BusynessSnapshot } from '../models/busyness';
import type { Coordinate } from '../models/location';
import type { ParkingLot, ParkingSnapshot } from '../models/parking';
import type { ProviderConnector } from '../connectors/types';
import type { OpenSpaceLot } from '../connectors/openSpaceConnector';
import type { WaitzLocation } from '../connectors/waitzConnector';
import type { WeatherStemStation } from '../connectors/weatherStemConnector';
import { normalizeBusynessLocation } from '../normalizers/busynessNormalizer';
import { normalizeParkingLot } from '../normalizers/parkingNormalizer';
import { normalizeWeatherStation } from '../normalizers/weatherNormalizer';
import type { OverwriteStore } from '../services/types';
import { MalformedUpstreamDataError } from '../utils/errors';
import { formatTimestampString } from '../utils/timezone';
import type { CampusDomain } from './invocation';
import { normalizeEach } from './normalizeBatch';

export const WEATHER_PATH = 'weather';
export const PARKING_PATH = 'liveParking';
export const BUSYNESS_PATH = 'liveCampusBusyness';

interface SnapshotSyncDeps<TRaw> {
  connector: ProviderConnector<TRaw>;
  store: OverwriteStore;
  timeZone: string;
  now?: () => Date;
}

export interface WeatherSyncDeps extends SnapshotSyncDeps<WeatherStemStation | null> {
  campus: Coordinate;
}

export interface WeatherSyncSummary {
  path: string;
  temperature: number;
  feelsLike: number;
}

export interface CollectionSnapshotSummary {
  path: string;
  fetched: number;
  written: number;
  skipped: number;
  persisted: boolean;
}

export async function syncWeather(deps: WeatherSyncDeps): Promise<WeatherSyncSummary> {
  const station = await deps.connector.fetch();
  if (!station) {
    throw new MalformedUpstreamDataError('WeatherSTEM response carried no station record');
  }

  const snapshot = normalizeWeatherStation(station, {
    now: (deps.now ?? defaultNow)(),
    timeZone: deps.timeZone,
    campus: deps.campus,
  });

  await deps.store.put(WEATHER_PATH, snapshot);
  return { path: WEATHER_PATH, temperature: snapshot.temperature, feelsLike: snapshot.feelsLike };
}

export async function syncParking(deps: SnapshotSyncDeps<OpenSpaceLot[]>): Promise<CollectionSnapshotSummary> {
  return syncKeyedSnapshot<OpenSpaceLot, ParkingLot>({
    domain: 'parking',
    path: PARKING_PATH,
    deps,
    normalize: normalizeParkingLot,
    build: (lastUpdated, lots): ParkingSnapshot => ({ lastUpdated, lots }),
  });
}

export async function syncBusyness(deps: SnapshotSyncDeps<WaitzLocation[]>): Promise<CollectionSnapshotSummary> {
  return syncKeyedSnapshot<WaitzLocation, BusynessLocation>({
    domain: 'busyness',
    path: BUSYNESS_PATH,
    deps,
    normalize: normalizeBusynessLocation,
    build: (lastUpdated, locations): BusynessSnapshot => ({ lastUpdated, locations }),
  });
}

interface KeyedSnapshotOptions<TRaw, T extends { id: string }> {
  domain: CampusDomain;
  path: string;
  deps: SnapshotSyncDeps<TRaw[]>;
  normalize: (raw: TRaw) => T;
  build: (lastUpdated: string, entries: Record<string, T>) => unknown;
}

/** Replaces the stored snapshot wholesale. An empty result writes nothing. */
async function syncKeyedSnapshot<TRaw, T extends { id: string }>(
  options: KeyedSnapshotOptions<TRaw, T>,
): Promise<CollectionSnapshotSummary> {
  const { domain, path, deps } = options;
  const raw = await deps.connector.fetch();
  const { records, skipped } = normalizeEach(domain, raw, options.normalize);

  if (records.length === 0) {
    logger.warn(`[${domain}] Provider returned no usable records; keeping previous snapshot`, {
      domain,
      fetched: raw.length,
      skipped,
    });
    return { path, fetched: raw.length, written: 0, skipped, persisted: false };
  }

  const entries: Record<string, T> = {};
  for (const record of records) {
    entries[record.id] = record;
  }

  const lastUpdated = formatTimestampString((deps.now ?? defaultNow)(), deps.timeZone);
  await deps.store.put(path, options.build(lastUpdated, entries));

  return { path, fetched: raw.length, written: Object.keys(entries).length, skipped, persisted: true };
}

function defaultNow(): Date {
  return new Date();
}
