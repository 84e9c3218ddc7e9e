import assert from 'node:assert/strict';
import test from 'node:test';
import { MalformedUpstreamDataError } from '../utils/errors';
import { normalizeParkingLot } from './parkingNormalizer';

test('maps an OpenSpace lot', () => {
  assert.deepEqual(normalizeParkingLot({
    location_name: 'Coliseum Deck',
    location_address: '2610 Jensen Dr',
    geocode: '(35.7849, -78.6886)',
    total_spaces: '1100',
    free_spaces: 245,
    occupancy: '78',
  }), {
    id: 'coliseumDeck',
    name: 'Coliseum Deck',
    location: {
      name: 'Coliseum Deck',
      address: '2610 Jensen Dr',
      coordinate: { lat: 35.7849, lng: -78.6886 },
    },
    totalSpaces: 1100,
    availableSpaces: 245,
    occupancy: 78,
    isHidden: false,
  });
});

test('missing counts and geocode stay null', () => {
  const lot = normalizeParkingLot({ location_name: 'West Lot', hidden: 'true' });

  assert.equal(lot.id, 'westLot');
  assert.equal(lot.totalSpaces, null);
  assert.equal(lot.availableSpaces, null);
  assert.equal(lot.occupancy, null);
  assert.equal(lot.location.coordinate, null);
  assert.equal(lot.isHidden, true);
});

test('fractional counts pass through unrounded', () => {
  const lot = normalizeParkingLot({ location_name: 'West Lot', occupancy: '78.5', free_spaces: 12.5 });

  assert.equal(lot.occupancy, 78.5);
  assert.equal(lot.availableSpaces, 12.5);
});

test('a lot without a usable name is rejected', () => {
  assert.throws(() => normalizeParkingLot({ location_address: '1 Main St' }), MalformedUpstreamDataError);
  assert.throws(() => normalizeParkingLot({ location_name: '---' }), MalformedUpstreamDataError);
});
