import type { Coordinate, Location } from '../models/location';

export function readString(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Accepts numbers and numeric strings; anything else is null. */
export function readNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readInteger(value: unknown): number | null {
  const parsed = readNumber(value);
  return parsed === null ? null : Math.trunc(parsed);
}

export function readBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === 1) {
    return true;
  }
  if (value === 'false' || value === 0) {
    return false;
  }
  return fallback;
}

export function readStringList(values: unknown): string[] {
  if (!Array.isArray(values)) {
    return [];
  }
  const seen = new Set<string>();
  for (const value of values) {
    const item = readString(value);
    if (item) {
      seen.add(item);
    }
  }
  return Array.from(seen);
}

export function buildCoordinate(lat: unknown, lng: unknown): Coordinate | null {
  const latitude = readNumber(lat);
  const longitude = readNumber(lng);
  if (latitude === null || longitude === null) {
    return null;
  }
  return { lat: latitude, lng: longitude };
}

/** Parses a `"(35.78, -78.67)"` geocode string. */
export function parseGeocode(value: unknown): Coordinate | null {
  if (typeof value !== 'string') {
    return null;
  }
  const parts = value.trim().replace(/^\(|\)$/g, '').split(',');
  if (parts.length !== 2) {
    return null;
  }
  return buildCoordinate(parts[0], parts[1]);
}

/** Null only when name, address and coordinate are all missing. */
export function buildLocation(
  name: unknown,
  address: unknown,
  coordinate: Coordinate | null,
): Location | null {
  const locationName = readString(name);
  const locationAddress = readString(address);
  if (!locationName && !locationAddress && !coordinate) {
    return null;
  }
  return {
    name: locationName,
    address: locationAddress,
    coordinate,
  };
}

/** `"Coliseum Deck"` -> `"coliseumDeck"` */
export function toCamelCaseKey(value: string): string {
  const words = value
    .split(/[^A-Za-z0-9]+/)
    .filter(word => word.length > 0);

  return words
    .map((word, index) => {
      const lower = word.toLowerCase();
      return index === 0 ? lower : lower.charAt(0).toUpperCase() + lower.slice(1);
    })
    .join('');
}
