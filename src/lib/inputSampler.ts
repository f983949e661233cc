/**
 * Input Sampler
 * Collects pointer and keyboard events between frames; the loop samples once per frame
 */

import type { InputSample, InputSource, Vec2 } from '@/types';
import type { Viewport } from './viewport';

export interface SurfaceRect {
  left: number;
  top: number;
  width: number;
  height: number;
}

const EXIT_KEYS = new Set(['Escape', 'Esc']);

export class InputSampler implements InputSource {
  private viewport: Viewport;
  private pointer: Vec2 | null = null;
  private exitRequested: boolean = false;

  constructor(viewport: Viewport) {
    this.viewport = viewport;
  }

  /**
   * Client coordinates are scaled from CSS pixels to canvas pixels, since the
   * canvas may be stretched to fill the page.
   */
  handlePointerMove(clientX: number, clientY: number, rect: SurfaceRect): void {
    if (rect.width <= 0 || rect.height <= 0) {
      this.pointer = null;
      return;
    }
    const px = (clientX - rect.left) * (this.viewport.width / rect.width);
    const py = (clientY - rect.top) * (this.viewport.height / rect.height);
    this.pointer = this.viewport.toWorld(px, py);
  }

  handlePointerLeave(): void {
    this.pointer = null;
  }

  handleKeyDown(key: string): void {
    if (EXIT_KEYS.has(key)) this.exitRequested = true;
  }

  /** Exit requests are consumed by the sample that reports them */
  sample(): InputSample {
    const exitRequested = this.exitRequested;
    this.exitRequested = false;
    return {
      pointer: this.pointer ? { ...this.pointer } : null,
      exitRequested
    };
  }
}

/**
 * Wire DOM events on `canvas` (pointer) and `document` (keys) into the sampler.
 * Returns the matching detach function.
 */
export function attachInputListeners(canvas: HTMLCanvasElement, sampler: InputSampler): () => void {
  const onPointerMove = (e: PointerEvent): void => {
    sampler.handlePointerMove(e.clientX, e.clientY, canvas.getBoundingClientRect());
  };
  const onPointerLeave = (): void => sampler.handlePointerLeave();
  const onKeyDown = (e: KeyboardEvent): void => sampler.handleKeyDown(e.key);

  canvas.addEventListener('pointermove', onPointerMove);
  canvas.addEventListener('pointerleave', onPointerLeave);
  document.addEventListener('keydown', onKeyDown);

  return () => {
    canvas.removeEventListener('pointermove', onPointerMove);
    canvas.removeEventListener('pointerleave', onPointerLeave);
    document.removeEventListener('keydown', onKeyDown);
  };
}
