/**
 * Ring layout and pair allocation
 *
 * Targets sit at θₖ = 2πk/N on a circle centred at the origin. Target k
 * and target k + N/2 are diametrically opposite and form pair k.
 */

import type { Pair, PairAllocation, TargetRing, Vec2 } from '@/types';
import { ConfigError } from './errors';
import { TAU, polarToCartesian } from './geometry';

function assertEvenCount(count: number): void {
  if (!Number.isInteger(count) || count < 2 || count % 2 !== 0) {
    throw new ConfigError([`target count must be an even integer >= 2 (got ${count})`]);
  }
}

export function targetAngle(index: number, count: number): number {
  return (TAU * index) / count;
}

export function buildTargetRing(count: number, radius: number): TargetRing {
  assertEvenCount(count);
  if (!(radius > 0)) {
    throw new ConfigError([`ring radius must be positive (got ${radius})`]);
  }

  const positions: Vec2[] = [];
  for (let k = 0; k < count; k++) {
    positions.push(Object.freeze(polarToCartesian(radius, targetAngle(k, count))));
  }
  return Object.freeze(positions);
}

export function allocatePairs(count: number, trackedPairIndex: number = 0): PairAllocation {
  assertEvenCount(count);
  const pairCount = count / 2;
  if (!Number.isInteger(trackedPairIndex) || trackedPairIndex < 0 || trackedPairIndex >= pairCount) {
    throw new ConfigError([
      `tracked pair index must be an integer in [0, ${pairCount - 1}] (got ${trackedPairIndex})`
    ]);
  }

  const pairs: Pair[] = [];
  for (let i = 0; i < pairCount; i++) {
    pairs.push(Object.freeze({
      index: i,
      a: i,
      b: i + pairCount,
      angle: targetAngle(i, count)
    }));
  }

  const tracked = pairs[trackedPairIndex];
  return Object.freeze({
    pairs: Object.freeze(pairs),
    tracked,
    shuttlePairs: Object.freeze(pairs.filter(p => p.index !== trackedPairIndex))
  });
}
