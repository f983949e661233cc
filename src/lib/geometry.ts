import type { Vec2 } from '@/types';

export const TAU = 2 * Math.PI;

/** Wrap into [0, 1), negative inputs included */
export function wrapUnit(value: number): number {
  const wrapped = value % 1;
  if (wrapped >= 0) return wrapped;
  const shifted = wrapped + 1;
  // -1e-17 + 1 rounds up to 1
  return shifted < 1 ? shifted : 0;
}

export function polarToCartesian(radius: number, angle: number): Vec2 {
  return { x: radius * Math.cos(angle), y: radius * Math.sin(angle) };
}

export function rotate(point: Vec2, angle: number): Vec2 {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return {
    x: point.x * c - point.y * s,
    y: point.x * s + point.y * c
  };
}

export function distance(p1: Vec2, p2: Vec2): number {
  return Math.hypot(p1.x - p2.x, p1.y - p2.y);
}

export function isFiniteVec(p: Vec2): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y);
}
