/**
 * Cue Trigger
 *
 * Level-debounced: while overlap holds, a cue fires immediately and then
 * at most once per `minInterval` seconds. It stops the moment overlap
 * ends. Without an audio device the trigger never fires and leaves
 * `lastCueTime` untouched.
 */

import type { CueDecision } from '@/types';

// Elapsed times are sums of decimal seconds; 0.88 - 0.66 < 0.22 in doubles
const INTERVAL_TOLERANCE = 1e-9;

export function decideCue(
  overlap: boolean,
  now: number,
  lastCueTime: number | null,
  minInterval: number,
  audioAvailable: boolean
): CueDecision {
  const due = lastCueTime === null || now - lastCueTime >= minInterval - INTERVAL_TOLERANCE;
  if (audioAvailable && overlap && due) {
    return { fire: true, lastCueTime: now };
  }
  return { fire: false, lastCueTime };
}
