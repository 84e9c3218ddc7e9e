import type { WaitzLocation, WaitzSubLocation } from '../connectors/waitzConnector';
import type { BusynessLocation, BusynessStatus, BusynessSubLocation } from '../models/busyness';
import { MalformedUpstreamDataError } from '../utils/errors';
import { readBoolean, readNumber, readString } from './fields';

export function occupancyStatus(occupancy: number | null): BusynessStatus | null {
  if (occupancy === null) {
    return null;
  }
  if (occupancy >= 80) {
    return 'veryHigh';
  }
  if (occupancy >= 50) {
    return 'high';
  }
  if (occupancy >= 25) {
    return 'moderate';
  }
  return 'low';
}

export function normalizeBusynessLocation(raw: WaitzLocation): BusynessLocation {
  const id = readString(raw.id);
  if (!id) {
    throw new MalformedUpstreamDataError('Waitz location is missing its id', { name: raw.name ?? null });
  }

  const subLocations = (Array.isArray(raw.subLocs) ? raw.subLocs : [])
    .map(normalizeSubLocation)
    .filter((item): item is BusynessSubLocation => item !== null);

  return {
    ...buildReading(id, raw),
    bestSpot: findBestSpot(raw, subLocations),
    subLocations,
  };
}

function normalizeSubLocation(raw: WaitzSubLocation): BusynessSubLocation | null {
  const id = readString(raw?.id);
  return id ? buildReading(id, raw) : null;
}

function buildReading(id: string, raw: WaitzSubLocation): BusynessSubLocation {
  const occupancy = readNumber(raw.busyness);
  return {
    id,
    name: readString(raw.name) ?? '',
    occupancy,
    capacity: readNumber(raw.capacity),
    isOpen: readBoolean(raw.isOpen, false),
    status: occupancyStatus(occupancy),
  };
}

/** Name of the sub-location Waitz ranks least busy. */
function findBestSpot(raw: WaitzLocation, subLocations: BusynessSubLocation[]): string | null {
  const best = Array.isArray(raw.bestLocations) ? raw.bestLocations[0] : undefined;
  const bestId = readString(best?.id);
  if (!bestId) {
    return null;
  }
  return subLocations.find(subLocation => subLocation.id === bestId)?.name ?? null;
}
