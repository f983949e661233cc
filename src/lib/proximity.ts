import type { Vec2 } from '@/types';
import { distance, isFiniteVec } from './geometry';

/**
 * True iff any point lies strictly closer than `threshold` to the pointer.
 * An unavailable pointer never overlaps.
 */
export function detectOverlap(
  pointer: Vec2 | null,
  points: readonly Vec2[],
  threshold: number
): boolean {
  if (!pointer || !isFiniteVec(pointer)) return false;
  return points.some(p => distance(pointer, p) < threshold);
}
