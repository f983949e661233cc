import type { DisplaySurface, StimulusConfig } from '@/types';
import { DisplayInitError } from './errors';
import type { InputSampler } from './inputSampler';
import type { Viewport } from './viewport';

export interface InitializableSurface extends DisplaySurface {
  initialize(): void | Promise<void>;
}

export interface SurfaceCandidate {
  name: string;
  create: () => Promise<InitializableSurface>;
}

/** PixiJS first, Canvas2D when WebGL is unavailable */
export function defaultSurfaceCandidates(
  container: HTMLElement,
  config: StimulusConfig,
  viewport: Viewport,
  input: InputSampler
): SurfaceCandidate[] {
  return [
    {
      name: 'PixiJS',
      create: async () => {
        const { PixiRenderer } = await import('./pixiRenderer');
        return new PixiRenderer(container, config, viewport, input);
      }
    },
    {
      name: 'Canvas2D',
      create: async () => {
        const { Canvas2DRenderer } = await import('./canvas2dRenderer');
        return new Canvas2DRenderer(container, config, viewport, input);
      }
    }
  ];
}

/**
 * Returns the first candidate that initializes. A candidate that fails is
 * torn down before the next one is tried.
 * Throws DisplayInitError when none can be created.
 */
export async function createDisplaySurface(candidates: readonly SurfaceCandidate[]): Promise<DisplaySurface> {
  let lastError: unknown = null;

  for (const candidate of candidates) {
    let surface: InitializableSurface | null = null;
    try {
      surface = await candidate.create();
      await surface.initialize();
      if (candidate !== candidates[0]) console.log(`Using ${candidate.name} fallback renderer`);
      return surface;
    } catch (error) {
      lastError = error;
      console.warn(`${candidate.name} renderer unavailable:`, error);
    }

    try {
      surface?.destroy();
    } catch (error) {
      console.warn(`${candidate.name} renderer cleanup failed:`, error);
    }
  }

  throw new DisplayInitError(
    `Graphics initialization failed: none of ${candidates.map(c => c.name).join(', ')} is available`,
    { cause: lastError }
  );
}
