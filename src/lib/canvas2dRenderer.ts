/**
 * Canvas2D Fallback Renderer
 * Used when PixiJS WebGL initialization fails (e.g. a WebView without GPU)
 */

import type { DisplaySurface, DrawCommand, StimulusConfig } from '@/types';
import { DisplayInitError } from './errors';
import { attachInputListeners } from './inputSampler';
import type { InputSampler } from './inputSampler';
import { toCssColor } from './viewport';
import type { Viewport } from './viewport';

export class Canvas2DRenderer implements DisplaySurface {
  private container: HTMLElement;
  private config: StimulusConfig;
  private viewport: Viewport;
  private input: InputSampler;
  private canvas: HTMLCanvasElement;
  private ctx: CanvasRenderingContext2D | null = null;
  private pending: readonly DrawCommand[] = [];
  private detachInput: (() => void) | null = null;

  constructor(container: HTMLElement, config: StimulusConfig, viewport: Viewport, input: InputSampler) {
    this.container = container;
    this.config = config;
    this.viewport = viewport;
    this.input = input;
    this.canvas = document.createElement('canvas');
    this.canvas.width = config.window.width;
    this.canvas.height = config.window.height;
    this.canvas.style.display = 'block';
  }

  initialize(): void {
    const ctx = this.canvas.getContext('2d');
    if (!ctx) {
      throw new DisplayInitError('Canvas 2D context unavailable');
    }
    this.ctx = ctx;
    this.container.appendChild(this.canvas);
    this.detachInput = attachInputListeners(this.canvas, this.input);
  }

  draw(commands: readonly DrawCommand[]): void {
    this.pending = commands;
  }

  /** Canvas2D has no retained scene: the whole frame is painted here */
  present(): void {
    const ctx = this.ctx;
    if (!ctx) return;

    ctx.fillStyle = toCssColor(this.config.window.background);
    ctx.fillRect(0, 0, this.canvas.width, this.canvas.height);

    for (const cmd of this.pending) {
      const { x, y } = this.viewport.toScreen(cmd.center);
      ctx.beginPath();
      ctx.arc(x, y, cmd.radius, 0, Math.PI * 2);
      ctx.fillStyle = toCssColor(cmd.fillColor);
      ctx.fill();
      if (cmd.lineWidth > 0) {
        ctx.strokeStyle = toCssColor(cmd.lineColor);
        ctx.lineWidth = cmd.lineWidth;
        ctx.stroke();
      }
    }
  }

  destroy(): void {
    this.detachInput?.();
    this.detachInput = null;
    this.ctx = null;
    this.canvas.remove();
  }
}
