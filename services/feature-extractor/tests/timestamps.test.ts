import assert from 'node:assert/strict';
import { test } from 'node:test';
import { hasEpoch, normalizeEpoch } from '../src/features/timestamps';

const FALLBACK = '2024-05-01T12:00:00.000Z';

test('numeric epoch seconds map to the UTC instant', () => {
  assert.equal(normalizeEpoch(1700000000, FALLBACK), '2023-11-14T22:13:20.000Z');
  assert.equal(normalizeEpoch(1700000123.5, FALLBACK), '2023-11-14T22:15:23.500Z');
  assert.equal(normalizeEpoch(0, FALLBACK), '1970-01-01T00:00:00.000Z');
});

test('numeric strings are accepted', () => {
  assert.equal(normalizeEpoch('1700000000', FALLBACK), '2023-11-14T22:13:20.000Z');
  assert.equal(normalizeEpoch(' 1699990000 ', FALLBACK), '2023-11-14T19:26:40.000Z');
});

test('missing or malformed values fall back', () => {
  assert.equal(normalizeEpoch(undefined, FALLBACK), FALLBACK);
  assert.equal(normalizeEpoch(null, FALLBACK), FALLBACK);
  assert.equal(normalizeEpoch('', FALLBACK), FALLBACK);
  assert.equal(normalizeEpoch('yesterday', FALLBACK), FALLBACK);
  assert.equal(normalizeEpoch(Number.NaN, FALLBACK), FALLBACK);
  assert.equal(normalizeEpoch(Number.POSITIVE_INFINITY, FALLBACK), FALLBACK);
  assert.equal(normalizeEpoch(true, FALLBACK), FALLBACK);
  assert.equal(normalizeEpoch({ seconds: 1700000000 }, FALLBACK), FALLBACK);
});

test('values outside the representable date range fall back', () => {
  assert.equal(normalizeEpoch(1e20, FALLBACK), FALLBACK);
  assert.equal(normalizeEpoch(-1e20, FALLBACK), FALLBACK);
  assert.equal(normalizeEpoch('9e15', FALLBACK), FALLBACK);
});

test('hasEpoch treats zero and empty values as unrecorded', () => {
  assert.equal(hasEpoch(1700000000), true);
  assert.equal(hasEpoch('1700000000'), true);
  assert.equal(hasEpoch('garbage'), true);
  assert.equal(hasEpoch(0), false);
  assert.equal(hasEpoch('0'), false);
  assert.equal(hasEpoch(''), false);
  assert.equal(hasEpoch(null), false);
  assert.equal(hasEpoch(undefined), false);
});
