import assert from 'node:assert/strict';
import type { Vec2 } from '@/types';

export function assertClose(actual: number, expected: number, tolerance = 1e-9, message?: string): void {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    message ?? `expected ${actual} to be within ${tolerance} of ${expected}`
  );
}

export function assertVecClose(actual: Vec2, expected: Vec2, tolerance = 1e-9, message?: string): void {
  assertClose(actual.x, expected.x, tolerance, message ?? `x: ${actual.x} vs ${expected.x}`);
  assertClose(actual.y, expected.y, tolerance, message ?? `y: ${actual.y} vs ${expected.y}`);
}
