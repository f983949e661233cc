/**
 * Stimulus Engine
 *
 * Static setup (ring, pairs, shuttle points) plus the pure per-frame step.
 * All mutable state lives in SimulationState, which the caller threads
 * from one frame to the next.
 */

import type {
  DrawCommand, FrameInputs, FrameResult, SimulationState, Stimulus, StimulusConfig, Vec2
} from '@/types';
import { decideCue } from './cueTrigger';
import { evaluateShuttlePositions } from './orbitModel';
import { computePhaseOffsets } from './phaseScheduler';
import { detectOverlap } from './proximity';
import { allocatePairs, buildTargetRing } from './ringLayout';

// =========================================================================
// SETUP
// =========================================================================

export function createStimulus(config: StimulusConfig): Stimulus {
  const ring = buildTargetRing(config.targetCount, config.ringRadius);
  const allocation = allocatePairs(config.targetCount, config.trackedPairIndex);

  const a = config.ringRadius;
  const b = a * config.ellipseScale;
  const offsets = computePhaseOffsets(
    allocation.shuttlePairs.map(p => p.angle),
    config.phaseSpread
  );

  const shuttles = allocation.shuttlePairs.map((pair, j) => Object.freeze({
    pairIndex: pair.index,
    theta: pair.angle,
    a,
    b,
    speed: config.speed,
    phaseOffset: offsets[j]
  }));

  return Object.freeze({
    config,
    ring,
    allocation,
    shuttles: Object.freeze(shuttles)
  });
}

export function createSimulationState(): SimulationState {
  return {
    phase: 'running',
    elapsed: 0,
    lastCueTime: null,
    frameCount: 0,
    cueCount: 0
  };
}

// =========================================================================
// DRAW LIST
// =========================================================================

/**
 * Z-order: targets, tracked-pair markers, shuttle points, pointer.
 * The pointer is omitted while it is unavailable.
 */
export function buildDrawCommands(
  stimulus: Stimulus,
  shuttlePositions: readonly Vec2[],
  pointer: Vec2 | null
): DrawCommand[] {
  const { config, ring, allocation } = stimulus;
  const { colors } = config;
  const commands: DrawCommand[] = [];

  for (const center of ring) {
    commands.push({
      kind: 'circle',
      layer: 'target',
      center,
      radius: config.targetRadius,
      fillColor: colors.targetFill,
      lineColor: colors.targetOutline,
      lineWidth: config.targetOutlineWidth
    });
  }

  for (const index of [allocation.tracked.a, allocation.tracked.b]) {
    commands.push({
      kind: 'circle',
      layer: 'tracked-marker',
      center: ring[index],
      radius: config.trackedMarkerRadius,
      fillColor: colors.tracked,
      lineColor: colors.tracked,
      lineWidth: 0
    });
  }

  for (const center of shuttlePositions) {
    commands.push({
      kind: 'circle',
      layer: 'shuttle',
      center,
      radius: config.shuttleRadius,
      fillColor: colors.shuttleFill,
      lineColor: colors.shuttleOutline,
      lineWidth: config.shuttleOutlineWidth
    });
  }

  if (pointer) {
    commands.push({
      kind: 'circle',
      layer: 'pointer',
      center: pointer,
      radius: config.pointerRadius,
      fillColor: colors.tracked,
      lineColor: colors.tracked,
      lineWidth: 0
    });
  }

  return commands;
}

// =========================================================================
// FRAME STEP
// =========================================================================

export function stepFrame(
  stimulus: Stimulus,
  state: SimulationState,
  inputs: FrameInputs,
  audioAvailable: boolean
): FrameResult {
  const idle = { fire: false, lastCueTime: state.lastCueTime };

  if (state.phase === 'terminated') {
    return { state, drawCommands: [], cue: idle, overlap: false };
  }

  if (inputs.exitRequested) {
    return {
      state: { ...state, phase: 'terminated' },
      drawCommands: [],
      cue: idle,
      overlap: false
    };
  }

  const { config } = stimulus;
  const positions = evaluateShuttlePositions(stimulus.shuttles, inputs.now);
  const overlap = detectOverlap(inputs.pointer, positions, config.overlapThreshold);
  const cue = decideCue(overlap, inputs.now, state.lastCueTime, config.cueInterval, audioAvailable);

  return {
    state: {
      phase: 'running',
      elapsed: inputs.now,
      lastCueTime: cue.lastCueTime,
      frameCount: state.frameCount + 1,
      cueCount: state.cueCount + (cue.fire ? 1 : 0)
    },
    drawCommands: buildDrawCommands(stimulus, positions, inputs.pointer),
    cue,
    overlap
  };
}
