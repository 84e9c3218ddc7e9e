import type { Location, TimestampString } from './location';

export interface ParkingLot {
  id: string;
  name: string;
  location: Location;
  totalSpaces: number | null;
  availableSpaces: number | null;
  occupancy: number | null;
  isHidden: boolean;
}

export interface ParkingSnapshot {
  lastUpdated: TimestampString;
  lots: Record<string, ParkingLot>;
}
