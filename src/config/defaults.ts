// Default stimulus parameters.
// Every value can be overridden through resolveConfig() or the page query string.

import type { StimulusConfig } from '@/types';

export const defaultConfig: StimulusConfig = {
  // ── Window ──────────────────────────────────────────────────────────
  window: {
    width: 1000,
    height: 800,
    background: 0x000000,
  },

  // ── Ring ────────────────────────────────────────────────────────────
  /** Must be even: targets are paired with their opposite */
  targetCount: 20,
  /** Pair matched by the pointer dot; it gets markers instead of a shuttle */
  trackedPairIndex: 0,
  ringRadius: 250,
  targetRadius: 16,
  targetOutlineWidth: 2,

  // ── Shuttle points ──────────────────────────────────────────────────
  shuttleRadius: 8,
  shuttleOutlineWidth: 1.5,
  ellipseScale: 0.35,
  /** Cycles per second */
  speed: 0.15,
  /** 0 = all in sync from the left endpoint, 1 = evenly staggered */
  phaseSpread: 1.0,

  // ── Pointer ─────────────────────────────────────────────────────────
  pointerRadius: 10,
  trackedMarkerRadius: 5,
  overlapThreshold: 36,

  // ── Cue ─────────────────────────────────────────────────────────────
  /** Seconds */
  cueInterval: 0.22,
  cue: {
    frequency: 1000,
    duration: 0.2,
    volume: 1.0,
  },

  // ── Colors ──────────────────────────────────────────────────────────
  colors: {
    targetFill: 0xffffff,
    targetOutline: 0x000000,
    shuttleFill: 0xffffff,
    shuttleOutline: 0xffffff,
    tracked: 0x66ff66,
  },

  /** Used only for stall detection */
  expectedRefreshRate: 60,
};
