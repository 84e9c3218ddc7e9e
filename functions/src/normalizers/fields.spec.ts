import assert from 'node:assert/strict';
import test from 'node:test';
import { buildLocation, parseGeocode, readInteger, readNumber, readStringList, toCamelCaseKey } from './fields';

test('readNumber accepts numeric strings only', () => {
  assert.equal(readNumber(' 42.5 '), 42.5);
  assert.equal(readNumber(7), 7);
  assert.equal(readNumber(''), null);
  assert.equal(readNumber('n/a'), null);
  assert.equal(readNumber(Number.NaN), null);
  assert.equal(readInteger('78.9'), 78);
});

test('readStringList trims and drops duplicates', () => {
  assert.deepEqual(readStringList([' Music ', 'Music', '', null, 'Arts']), ['Music', 'Arts']);
  assert.deepEqual(readStringList('Music'), []);
});

test('parseGeocode reads a parenthesized pair', () => {
  assert.deepEqual(parseGeocode('(35.7849, -78.6886)'), { lat: 35.7849, lng: -78.6886 });
  assert.equal(parseGeocode('35.7849'), null);
  assert.equal(parseGeocode(null), null);
});

test('buildLocation keeps whatever the provider sent', () => {
  assert.equal(buildLocation('  ', '', null), null);
  assert.deepEqual(buildLocation('  ', '2610 Cates Ave', null), {
    name: null,
    address: '2610 Cates Ave',
    coordinate: null,
  });
  assert.deepEqual(buildLocation(undefined, null, { lat: 35.78, lng: -78.67 }), {
    name: null,
    address: null,
    coordinate: { lat: 35.78, lng: -78.67 },
  });
  assert.deepEqual(buildLocation('Talley Student Union', '', null), {
    name: 'Talley Student Union',
    address: null,
    coordinate: null,
  });
});

test('toCamelCaseKey splits on punctuation and spaces', () => {
  assert.equal(toCamelCaseKey('Coliseum Deck'), 'coliseumDeck');
  assert.equal(toCamelCaseKey('Dan Allen Deck (East)'), 'danAllenDeckEast');
  assert.equal(toCamelCaseKey('WEST LOT'), 'westLot');
});
