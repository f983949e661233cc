/**
 * Stimulus Loop
 * Thin driver around stepFrame(): owns the clock, the frame scheduler and the collaborators
 */

import * as d3 from 'd3';
import type {
  Clock, CueSink, DisplaySurface, FrameScheduler, FrameStats, InputSource, SimulationState, Stimulus
} from '@/types';
import { createSimulationState, stepFrame } from './stimulusEngine';

type TerminatedCallback = (stats: FrameStats) => void;

export interface StimulusLoopOptions {
  stimulus: Stimulus;
  surface: DisplaySurface;
  input: InputSource;
  cues: CueSink;
  scheduler?: FrameScheduler;
  clock?: Clock;
  onTerminated?: TerminatedCallback;
}

export const animationFrameScheduler: FrameScheduler = {
  request: callback => requestAnimationFrame(() => callback()),
  cancel: handle => cancelAnimationFrame(handle)
};

export class StimulusLoop {
  // A frame gap this many times the expected interval counts as a stall
  private static readonly STALL_MULTIPLIER = 3;
  private static readonly TIMING_WINDOW = 600;

  private stimulus: Stimulus;
  private surface: DisplaySurface;
  private input: InputSource;
  private cues: CueSink;
  private scheduler: FrameScheduler;
  private clock: Clock;
  private onTerminated: TerminatedCallback | null;

  private state: SimulationState = createSimulationState();
  private isRunning: boolean = false;
  private frameHandle: number | null = null;
  private startTime: number = 0;
  private lastFrameTime: number = 0;
  private stallCount: number = 0;
  private frameIntervals: number[] = [];

  private boundTick: () => void;

  constructor(options: StimulusLoopOptions) {
    this.stimulus = options.stimulus;
    this.surface = options.surface;
    this.input = options.input;
    this.cues = options.cues;
    this.scheduler = options.scheduler ?? animationFrameScheduler;
    this.clock = options.clock ?? (() => performance.now());
    this.onTerminated = options.onTerminated ?? null;
    this.boundTick = this.tick.bind(this);
  }

  // =========================================================================
  // PUBLIC API
  // =========================================================================

  start(): void {
    if (this.isRunning || this.state.phase === 'terminated') return;
    this.isRunning = true;
    this.startTime = this.clock();
    this.lastFrameTime = this.startTime;
    console.log(
      `[Stimulus] started: ${this.stimulus.shuttles.length} shuttle points, ` +
      `spread ${this.stimulus.config.phaseSpread}, audio ${this.cues.available ? 'on' : 'off'}`
    );
    this.frameHandle = this.scheduler.request(this.boundTick);
  }

  /** Requests termination from outside the input source */
  stop(): void {
    if (!this.isRunning) return;
    this.terminate();
  }

  getState(): SimulationState {
    return this.state;
  }

  getStats(): FrameStats {
    return {
      frames: this.state.frameCount,
      cues: this.state.cueCount,
      stalls: this.stallCount,
      elapsed: this.state.elapsed
    };
  }

  /** Mean gap over the most recent frames in milliseconds, 0 before the second frame */
  getMeanFrameInterval(): number {
    return d3.mean(this.frameIntervals) ?? 0;
  }

  // =========================================================================
  // FRAME
  // =========================================================================

  tick(): void {
    if (!this.isRunning) return;
    this.frameHandle = null;

    const currentTime = this.clock();
    this.trackFrameTiming(currentTime);

    const sample = this.input.sample();
    const result = stepFrame(
      this.stimulus,
      this.state,
      {
        now: (currentTime - this.startTime) / 1000,
        pointer: sample.pointer,
        exitRequested: sample.exitRequested
      },
      this.cues.available
    );
    this.state = result.state;

    if (this.state.phase === 'terminated') {
      this.terminate();
      return;
    }

    // A failed frame is dropped; the next tick recomputes everything
    try {
      this.surface.draw(result.drawCommands);
      this.surface.present();
    } catch (error) {
      console.error('[Stimulus] frame failed:', error);
    }

    if (result.cue.fire) {
      this.cues.playCue();
    }

    this.frameHandle = this.scheduler.request(this.boundTick);
  }

  private trackFrameTiming(currentTime: number): void {
    if (this.state.frameCount > 0) {
      const interval = currentTime - this.lastFrameTime;
      this.frameIntervals.push(interval);
      if (this.frameIntervals.length > StimulusLoop.TIMING_WINDOW) this.frameIntervals.shift();
      const expected = 1000 / this.stimulus.config.expectedRefreshRate;
      if (interval > expected * StimulusLoop.STALL_MULTIPLIER) {
        this.stallCount++;
      }
    }
    this.lastFrameTime = currentTime;
  }

  private terminate(): void {
    this.isRunning = false;
    this.state = { ...this.state, phase: 'terminated' };
    if (this.frameHandle !== null) {
      this.scheduler.cancel(this.frameHandle);
      this.frameHandle = null;
    }

    const stats = this.getStats();
    console.log(
      `[Stimulus] terminated after ${stats.elapsed.toFixed(2)}s: ` +
      `${stats.frames} frames, ${stats.cues} cues, ${stats.stalls} stalls, ` +
      `mean frame ${this.getMeanFrameInterval().toFixed(1)}ms`
    );
    if (this.onTerminated) this.onTerminated(stats);
  }
}
