import type { OpenSpaceLot } from '../connectors/openSpaceConnector';
import type { ParkingLot } from '../models/parking';
import { MalformedUpstreamDataError } from '../utils/errors';
import { parseGeocode, readBoolean, readNumber, readString, toCamelCaseKey } from './fields';

/**
 * OpenSpace lots carry no id of their own; the camelCase key of the lot
 * name is the id the mobile clients address them by.
 */
export function normalizeParkingLot(raw: OpenSpaceLot): ParkingLot {
  const name = readString(raw.location_name);
  const id = name ? toCamelCaseKey(name) : '';
  if (!name || id.length === 0) {
    throw new MalformedUpstreamDataError('OpenSpace lot is missing its name', {
      address: raw.location_address ?? null,
    });
  }

  return {
    id,
    name,
    location: {
      name,
      address: readString(raw.location_address),
      coordinate: parseGeocode(raw.geocode),
    },
    totalSpaces: readNumber(raw.total_spaces),
    availableSpaces: readNumber(raw.free_spaces),
    occupancy: readNumber(raw.occupancy),
    isHidden: readBoolean(raw.hidden, false),
  };
}
