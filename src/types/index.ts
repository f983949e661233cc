/**
 * Shuttle Ring Type Definitions
 *
 * World coordinates are centred on the window: +x right, +y up, pixels.
 */

// =============================================================================
// GEOMETRY
// =============================================================================

export interface Vec2 {
  x: number;
  y: number;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface WindowConfig {
  width: number;
  height: number;
  background: number;
}

export interface CueConfig {
  /** Tone frequency in Hz */
  frequency: number;
  /** Tone length in seconds */
  duration: number;
  volume: number;
}

export interface ColorConfig {
  targetFill: number;
  targetOutline: number;
  shuttleFill: number;
  shuttleOutline: number;
  tracked: number;
}

export interface StimulusConfig {
  window: WindowConfig;
  targetCount: number;
  trackedPairIndex: number;
  ringRadius: number;
  targetRadius: number;
  shuttleRadius: number;
  pointerRadius: number;
  trackedMarkerRadius: number;
  /** Minor/major axis ratio of every shuttle ellipse */
  ellipseScale: number;
  /** Orbit speed in cycles per second */
  speed: number;
  overlapThreshold: number;
  phaseSpread: number;
  /** Minimum seconds between two cues */
  cueInterval: number;
  cue: CueConfig;
  colors: ColorConfig;
  targetOutlineWidth: number;
  shuttleOutlineWidth: number;
  expectedRefreshRate: number;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type ConfigOverrides = DeepPartial<StimulusConfig>;

// =============================================================================
// LAYOUT
// =============================================================================

export type TargetRing = readonly Vec2[];

export interface Pair {
  index: number;
  a: number;
  b: number;
  /** Axis angle of the pair, i.e. the ring angle of endpoint `a` */
  angle: number;
}

export interface PairAllocation {
  pairs: readonly Pair[];
  tracked: Pair;
  /** Every non-tracked pair, ascending by index */
  shuttlePairs: readonly Pair[];
}

export interface ShuttlePoint {
  pairIndex: number;
  theta: number;
  a: number;
  b: number;
  speed: number;
  phaseOffset: number;
}

export interface Stimulus {
  config: StimulusConfig;
  ring: TargetRing;
  allocation: PairAllocation;
  shuttles: readonly ShuttlePoint[];
}

// =============================================================================
// RUNTIME STATE
// =============================================================================

export type LoopPhase = 'running' | 'terminated';

export interface SimulationState {
  phase: LoopPhase;
  /** Seconds since the loop started, as of the last step */
  elapsed: number;
  /** `null` until the first cue fires */
  lastCueTime: number | null;
  frameCount: number;
  cueCount: number;
}

export interface FrameInputs {
  now: number;
  pointer: Vec2 | null;
  exitRequested: boolean;
}

export type DrawLayer = 'target' | 'tracked-marker' | 'shuttle' | 'pointer';

export interface CircleCommand {
  kind: 'circle';
  layer: DrawLayer;
  center: Vec2;
  radius: number;
  fillColor: number;
  lineColor: number;
  /** 0 disables the outline */
  lineWidth: number;
}

export type DrawCommand = CircleCommand;

export interface CueDecision {
  fire: boolean;
  lastCueTime: number | null;
}

export interface FrameResult {
  state: SimulationState;
  drawCommands: DrawCommand[];
  cue: CueDecision;
  overlap: boolean;
}

export interface FrameStats {
  frames: number;
  cues: number;
  stalls: number;
  elapsed: number;
}

// =============================================================================
// COLLABORATORS
// =============================================================================

export interface DisplaySurface {
  draw(commands: readonly DrawCommand[]): void;
  present(): void;
  destroy(): void;
}

export interface CueSink {
  readonly available: boolean;
  playCue(): void;
}

export interface InputSample {
  pointer: Vec2 | null;
  exitRequested: boolean;
}

export interface InputSource {
  sample(): InputSample;
}

export interface FrameScheduler {
  request(callback: () => void): number;
  cancel(handle: number): void;
}

/** Monotonic clock in milliseconds */
export type Clock = () => number;
