/**
 * Audio Manager
 * Plays the overlap cue through the Web Audio API
 */

import type { CueConfig, CueSink } from '@/types';

// Onset/offset ramp length, seconds
const RAMP_DURATION = 0.005;
// Headroom against clipping
const AMPLITUDE = 0.3;

/**
 * Sine tone with Hamming-shaped onset and offset ramps.
 * Pure: used by AudioManager to fill its buffer once at init.
 */
export function synthesizeTone(
  sampleRate: number,
  frequency: number,
  duration: number,
  rampDuration: number = RAMP_DURATION
): Float32Array {
  const numSamples = Math.floor(duration * sampleRate);
  const rampSamples = Math.min(Math.floor(rampDuration * sampleRate), Math.floor(numSamples / 2));
  const data = new Float32Array(numSamples);

  for (let i = 0; i < numSamples; i++) {
    const t = i / sampleRate;
    const fromEdge = Math.min(i, numSamples - 1 - i);

    let envelope = 1.0;
    if (fromEdge < rampSamples) {
      envelope = 0.54 - 0.46 * Math.cos((Math.PI * fromEdge) / rampSamples);
    }

    data[i] = Math.sin(2 * Math.PI * frequency * t) * envelope * AMPLITUDE;
  }

  return data;
}

export class AudioManager {
  private audioContext: AudioContext | null = null;
  private cueBuffer: AudioBuffer | null = null;
  private masterGain: GainNode | null = null;
  private currentSources: Set<AudioBufferSourceNode> = new Set();
  private isInitialized: boolean = false;
  private cue: CueConfig | null = null;

  init(cue: CueConfig, sampleRate: number = 48000): void {
    if (this.isInitialized) {
      console.warn('[Audio] AudioManager already initialized');
      return;
    }

    this.audioContext = new AudioContext({ sampleRate });

    // Autoplay policy keeps the context suspended until a user gesture;
    // resume() is retried from play() and from the first pointer/key event
    this.resumeIfSuspended();

    this.masterGain = this.audioContext.createGain();
    this.masterGain.connect(this.audioContext.destination);
    this.masterGain.gain.value = cue.volume;

    const samples = synthesizeTone(this.audioContext.sampleRate, cue.frequency, cue.duration);
    this.cueBuffer = this.audioContext.createBuffer(1, samples.length, this.audioContext.sampleRate);
    this.cueBuffer.getChannelData(0).set(samples);

    this.cue = cue;
    this.isInitialized = true;
    console.log(
      `[Audio] initialized: ${cue.frequency} Hz, ${cue.duration * 1000} ms, ` +
      `${this.audioContext.sampleRate} Hz sample rate, ${this.getLatencyMs().toFixed(1)} ms latency`
    );
  }

  /**
   * Schedule the cue and return immediately; playback never blocks the caller.
   */
  play(): void {
    if (!this.isInitialized || !this.audioContext || !this.masterGain || !this.cueBuffer || !this.cue) {
      throw new Error('AudioManager not initialized. Call init() first.');
    }

    this.resumeIfSuspended();

    const scheduledTime = this.audioContext.currentTime;
    const source = this.audioContext.createBufferSource();
    source.buffer = this.cueBuffer;
    source.connect(this.masterGain);
    source.start(scheduledTime);
    source.stop(scheduledTime + this.cue.duration);

    this.currentSources.add(source);
    source.onended = () => {
      this.currentSources.delete(source);
    };
  }

  resumeIfSuspended(): void {
    if (this.audioContext && this.audioContext.state === 'suspended') {
      this.audioContext.resume().catch(error => {
        console.warn('[Audio] Failed to resume AudioContext:', error);
      });
    }
  }

  /** Estimated output latency in seconds */
  getLatency(): number {
    if (!this.audioContext) {
      return 0;
    }
    const baseLatency = this.audioContext.baseLatency || 0;
    const outputLatency = this.audioContext.outputLatency || 0;
    return baseLatency + outputLatency;
  }

  getLatencyMs(): number {
    return this.getLatency() * 1000;
  }

  stopAll(): void {
    this.currentSources.forEach(source => {
      source.onended = null;
      source.stop();
    });
    this.currentSources.clear();
  }

  async destroy(): Promise<void> {
    this.stopAll();

    if (this.masterGain) {
      this.masterGain.disconnect();
      this.masterGain = null;
    }

    if (this.audioContext) {
      await this.audioContext.close();
      this.audioContext = null;
    }

    this.cueBuffer = null;
    this.cue = null;
    this.isInitialized = false;
  }
}

// =========================================================================
// CUE SINK
// =========================================================================

interface CuePlayer {
  play(): void;
}

/**
 * Resolves audio availability once. Without a player the sink is silent and
 * reports `available: false`, which the cue trigger honours.
 */
export function createCueSink(player: CuePlayer | null): CueSink {
  if (!player) {
    return { available: false, playCue: () => {} };
  }
  return {
    available: true,
    playCue: () => {
      try {
        player.play();
      } catch (error) {
        console.warn('[Audio] Cue playback failed:', error);
      }
    }
  };
}

// Singleton instance
let audioManagerInstance: AudioManager | null = null;

export function getAudioManager(): AudioManager {
  if (!audioManagerInstance) {
    audioManagerInstance = new AudioManager();
  }
  return audioManagerInstance;
}

export async function destroyAudioManager(): Promise<void> {
  if (audioManagerInstance) {
    const instance = audioManagerInstance;
    audioManagerInstance = null;
    await instance.destroy();
  }
}
