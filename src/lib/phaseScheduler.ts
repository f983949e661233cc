/**
 * Phase Scheduler
 *
 * Turns the single phase-spread control into one phase offset per shuttle
 * point. Spread 0 starts every point on the left endpoint of its own pair;
 * spread 1 staggers successive points by 1/M of a cycle on top of that.
 */

import { wrapUnit } from './geometry';

/**
 * Phase that puts a point at the endpoint with negative x.
 * Phase 0 sits at angle `theta`, phase 0.5 at the opposite endpoint.
 */
export function leftStartPhase(theta: number): number {
  return Math.cos(theta) < 0 ? 0.0 : 0.5;
}

export function computePhaseOffsets(thetas: readonly number[], spread: number): number[] {
  const count = Math.max(1, thetas.length);
  const gap = spread * (1.0 / count);
  return thetas.map((theta, j) => wrapUnit(leftStartPhase(theta) + j * gap));
}
