import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ssidEntropy } from '../src/features/entropy';

function closeTo(actual: number, expected: number, epsilon = 1e-9): void {
  assert.ok(Math.abs(actual - expected) < epsilon, `expected ${actual} to be within ${epsilon} of ${expected}`);
}

test('empty and single-symbol strings have zero entropy', () => {
  assert.equal(ssidEntropy(''), 0);
  assert.equal(ssidEntropy('a'), 0);
  assert.equal(ssidEntropy('zzzzzzzz'), 0);
  assert.ok(Object.is(ssidEntropy('zzzz'), 0));
});

test('uniform distributions yield log2 of the alphabet size', () => {
  closeTo(ssidEntropy('ab'), 1);
  closeTo(ssidEntropy('aabb'), 1);
  closeTo(ssidEntropy('abcd'), 2);
});

test('mixed distributions follow the Shannon formula', () => {
  // o, f and e appear twice; seven other symbols once, over 13 symbols.
  closeTo(ssidEntropy('CoffeeShop_5G'), 3.238901256602631);
  closeTo(ssidEntropy('HomeNet'), 2.521640636343318);
});

test('entropy is invariant under permutation of the characters', () => {
  const original = 'CoffeeShop_5G';
  const permuted = 'G5_pohSeeffoC';
  closeTo(ssidEntropy(permuted), ssidEntropy(original));
  closeTo(ssidEntropy('GoSffee_5pohC'), ssidEntropy(original));
});

test('multi-byte characters count as one symbol each', () => {
  // Five distinct code points, including one outside the BMP.
  closeTo(ssidEntropy('Café☕'), 2.321928094887362);
  closeTo(ssidEntropy('naïve'), 2.321928094887362);
  closeTo(ssidEntropy('📶📶'), 0);
  closeTo(ssidEntropy('📶a'), 1);
});

test('entropy is finite and non-negative for arbitrary text', () => {
  for (const sample of ['x', 'Guest WiFi', '   ', '\u0000\u0001', 'Ünïcödé-网络-🛰️']) {
    const value = ssidEntropy(sample);
    assert.ok(Number.isFinite(value));
    assert.ok(value >= 0);
  }
});
