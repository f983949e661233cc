import assert from 'node:assert/strict';
import test from 'node:test';
import { detectOverlap } from '../proximity';

test('coincident pointer overlaps for any positive threshold', () => {
  const p = { x: 12.5, y: -40 };
  assert.equal(detectOverlap({ ...p }, [p], 36), true);
  assert.equal(detectOverlap({ ...p }, [p], 1e-6), true);
});

test('distance exactly at the threshold does not overlap', () => {
  assert.equal(detectOverlap({ x: 0, y: 0 }, [{ x: 36, y: 0 }], 36), false);
  assert.equal(detectOverlap({ x: 0, y: 0 }, [{ x: 3, y: 4 }], 5), false);
});

test('distance just inside the threshold overlaps', () => {
  assert.equal(detectOverlap({ x: 0, y: 0 }, [{ x: 35.9, y: 0 }], 36), true);
});

test('any one close point is enough', () => {
  const points = [{ x: 200, y: 200 }, { x: -100, y: 0 }, { x: 10, y: 10 }];
  assert.equal(detectOverlap({ x: 0, y: 0 }, points, 36), true);
  assert.equal(detectOverlap({ x: 0, y: 0 }, points.slice(0, 2), 36), false);
});

test('unavailable or invalid pointer never overlaps', () => {
  const points = [{ x: 0, y: 0 }];
  assert.equal(detectOverlap(null, points, 36), false);
  assert.equal(detectOverlap({ x: NaN, y: 0 }, points, 36), false);
  assert.equal(detectOverlap({ x: 0, y: 0 }, [], 36), false);
});
