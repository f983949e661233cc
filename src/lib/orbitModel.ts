/**
 * Orbit Motion Model
 *
 * Positions are a pure function of elapsed time. Nothing is integrated
 * between frames, so motion is exactly periodic and independent of the
 * frame rate.
 */

import type { ShuttlePoint, Vec2 } from '@/types';
import { TAU, rotate, wrapUnit } from './geometry';

export function orbitPhase(elapsed: number, speed: number, phaseOffset: number): number {
  return wrapUnit(elapsed * speed + phaseOffset);
}

/** Point on an ellipse with semi-axes (a, b), major axis rotated to `theta` */
export function ellipsePosition(phase: number, theta: number, a: number, b: number): Vec2 {
  const t = TAU * phase;
  return rotate({ x: a * Math.cos(t), y: b * Math.sin(t) }, theta);
}

export function shuttlePosition(point: ShuttlePoint, elapsed: number): Vec2 {
  const phase = orbitPhase(elapsed, point.speed, point.phaseOffset);
  return ellipsePosition(phase, point.theta, point.a, point.b);
}

export function evaluateShuttlePositions(points: readonly ShuttlePoint[], elapsed: number): Vec2[] {
  return points.map(p => shuttlePosition(p, elapsed));
}
