import assert from 'node:assert/strict';
import test from 'node:test';
import { distance, isFiniteVec, polarToCartesian, rotate, wrapUnit } from '../geometry';
import { assertClose, assertVecClose } from './helpers';

test('wrapUnit keeps values inside [0, 1)', () => {
  assert.equal(wrapUnit(0.25), 0.25);
  assert.equal(wrapUnit(1.25), 0.25);
  assert.equal(wrapUnit(3), 0);
  assert.equal(wrapUnit(-0.25), 0.75);
});

test('wrapUnit maps tiny negatives to 0 instead of 1', () => {
  assert.equal(wrapUnit(-1e-17), 0);
});

test('polarToCartesian places angle 0 on +x and π/2 on +y', () => {
  assertVecClose(polarToCartesian(10, 0), { x: 10, y: 0 });
  assertVecClose(polarToCartesian(10, Math.PI / 2), { x: 0, y: 10 });
});

test('rotate turns counter-clockwise', () => {
  assertVecClose(rotate({ x: 1, y: 0 }, Math.PI / 2), { x: 0, y: 1 });
  assertVecClose(rotate({ x: 0, y: 2 }, Math.PI), { x: 0, y: -2 });
});

test('distance is Euclidean', () => {
  assert.equal(distance({ x: 0, y: 0 }, { x: 3, y: 4 }), 5);
  assertClose(distance({ x: -1, y: -1 }, { x: 1, y: 1 }), Math.SQRT2 * 2);
});

test('isFiniteVec rejects NaN and infinities', () => {
  assert.equal(isFiniteVec({ x: 1, y: 2 }), true);
  assert.equal(isFiniteVec({ x: NaN, y: 2 }), false);
  assert.equal(isFiniteVec({ x: 1, y: Infinity }), false);
});
