import assert from 'node:assert/strict';
import test from 'node:test';
import type {
  CueSink, DisplaySurface, DrawCommand, FrameScheduler, FrameStats, InputSample, InputSource, Stimulus, Vec2
} from '@/types';
import { resolveConfig } from '../config';
import { shuttlePosition } from '../orbitModel';
import { createStimulus } from '../stimulusEngine';
import { StimulusLoop } from '../stimulusLoop';

const START = 1000;

class FakeScheduler implements FrameScheduler {
  private pending = new Map<number, () => void>();
  private nextHandle = 1;

  request(callback: () => void): number {
    const handle = this.nextHandle++;
    this.pending.set(handle, callback);
    return handle;
  }

  cancel(handle: number): void {
    this.pending.delete(handle);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Runs the oldest pending frame callback */
  runFrame(): void {
    const first = this.pending.entries().next();
    assert.equal(first.done, false, 'no frame pending');
    if (first.done) return;
    const [handle, callback] = first.value;
    this.pending.delete(handle);
    callback();
  }
}

class FakeSurface implements DisplaySurface {
  frames: DrawCommand[][] = [];
  presents = 0;
  destroyed = false;
  failures = 0;

  draw(commands: readonly DrawCommand[]): void {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('context lost');
    }
    this.frames.push([...commands]);
  }

  present(): void {
    this.presents++;
  }

  destroy(): void {
    this.destroyed = true;
  }
}

class FakeCues implements CueSink {
  played = 0;
  constructor(readonly available: boolean) {}
  playCue(): void {
    this.played++;
  }
}

class FakeInput implements InputSource {
  exitOnSample: number | null = null;
  private samples = 0;
  constructor(private pointerAt: () => Vec2 | null = () => null) {}

  sample(): InputSample {
    this.samples++;
    return { pointer: this.pointerAt(), exitRequested: this.samples === this.exitOnSample };
  }
}

type PointerScript = (elapsed: number, stimulus: Stimulus) => Vec2 | null;

function setup(options: { audio?: boolean; pointerAt?: PointerScript } = {}) {
  const stimulus = createStimulus(resolveConfig());
  let now = START;
  const scheduler = new FakeScheduler();
  const surface = new FakeSurface();
  const cues = new FakeCues(options.audio ?? true);
  const pointerAt = options.pointerAt;
  const input = new FakeInput(pointerAt ? () => pointerAt((now - START) / 1000, stimulus) : undefined);
  const terminated: FrameStats[] = [];

  const loop = new StimulusLoop({
    stimulus,
    surface,
    input,
    cues,
    scheduler,
    clock: () => now,
    onTerminated: stats => terminated.push(stats)
  });

  const frameAt = (time: number): void => {
    now = time;
    scheduler.runFrame();
  };

  return { stimulus, loop, scheduler, surface, cues, input, terminated, frameAt };
}

test('each tick draws the full list, presents, and schedules the next frame', () => {
  const { loop, scheduler, surface, frameAt } = setup();
  loop.start();
  assert.equal(scheduler.size, 1);

  frameAt(START);
  frameAt(START + 16);

  assert.equal(surface.frames.length, 2);
  assert.equal(surface.frames[0].length, 31);
  assert.equal(surface.presents, 2);
  assert.equal(scheduler.size, 1);
  assert.equal(loop.getStats().frames, 2);
  assert.equal(loop.getState().elapsed, 0.016);
});

test('motion follows the clock, not the frame count', () => {
  const { stimulus, loop, surface, frameAt } = setup();
  loop.start();
  frameAt(START + 2500);

  const shuttles = surface.frames[0].filter(c => c.layer === 'shuttle');
  assert.deepEqual(shuttles[0].center, shuttlePosition(stimulus.shuttles[0], 2.5));
});

test('overlap held across frames plays throttled cues', () => {
  const { loop, cues, frameAt } = setup({
    pointerAt: (t, stimulus) => shuttlePosition(stimulus.shuttles[0], t)
  });

  loop.start();
  for (const time of [START, START + 100, START + 220, START + 300, START + 440]) {
    frameAt(time);
  }

  assert.equal(cues.played, 3);
  assert.equal(loop.getStats().cues, 3);
  assert.equal(loop.getState().lastCueTime, 0.44);
});

test('without audio overlap plays nothing', () => {
  const { loop, cues, frameAt } = setup({
    audio: false,
    pointerAt: (t, stimulus) => shuttlePosition(stimulus.shuttles[1], t)
  });

  loop.start();
  frameAt(START);
  frameAt(START + 500);

  assert.equal(cues.played, 0);
  assert.equal(loop.getState().lastCueTime, null);
});

test('exit input terminates once, without drawing the exit frame', () => {
  const { loop, scheduler, surface, input, terminated, frameAt } = setup();
  input.exitOnSample = 2;
  loop.start();

  frameAt(START);
  frameAt(START + 16);

  assert.equal(surface.frames.length, 1);
  assert.equal(scheduler.size, 0);
  assert.equal(loop.getState().phase, 'terminated');
  assert.deepEqual(terminated, [{ frames: 1, cues: 0, stalls: 0, elapsed: 0 }]);

  loop.tick();
  loop.stop();
  loop.start();
  assert.equal(surface.frames.length, 1);
  assert.equal(scheduler.size, 0);
  assert.equal(terminated.length, 1);
});

test('a frame that fails to draw is dropped and the loop keeps going', () => {
  const { loop, scheduler, surface, terminated, frameAt } = setup();
  surface.failures = 1;
  loop.start();

  frameAt(START);
  assert.equal(scheduler.size, 1);
  assert.equal(loop.getState().phase, 'running');
  assert.equal(surface.frames.length, 0);
  assert.equal(surface.presents, 0);

  frameAt(START + 16);
  assert.equal(surface.frames.length, 1);
  assert.equal(surface.presents, 1);
  assert.equal(loop.getStats().frames, 2);
  assert.equal(terminated.length, 0);
});

test('stop cancels the pending frame and reports stats', () => {
  const { loop, scheduler, terminated, frameAt } = setup();
  loop.start();
  frameAt(START);
  loop.stop();

  assert.equal(scheduler.size, 0);
  assert.equal(terminated.length, 1);
  assert.equal(terminated[0].frames, 1);
});

test('frame gaps over three expected intervals count as stalls', () => {
  const { loop, frameAt } = setup();
  loop.start();
  frameAt(START);
  frameAt(START + 16);
  frameAt(START + 116);
  frameAt(START + 132);

  assert.equal(loop.getStats().stalls, 1);
  assert.equal(loop.getMeanFrameInterval(), (16 + 100 + 16) / 3);
});
