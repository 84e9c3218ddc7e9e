import type { TimestampString } from './location';

export type BusynessStatus = 'low' | 'moderate' | 'high' | 'veryHigh';

export interface BusynessSubLocation {
  id: string;
  name: string;
  occupancy: number | null;
  capacity: number | null;
  isOpen: boolean;
  status: BusynessStatus | null;
}

export interface BusynessLocation extends BusynessSubLocation {
  bestSpot: string | null;
  subLocations: BusynessSubLocation[];
}

export interface BusynessSnapshot {
  lastUpdated: TimestampString;
  locations: Record<string, BusynessLocation>;
}
