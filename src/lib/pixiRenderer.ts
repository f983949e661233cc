/**
 * Stimulus Renderer using PixiJS
 *
 * The ticker is disabled: the stimulus loop submits a draw list and calls
 * present() once per animation frame, so presentation never runs ahead of
 * or behind the simulation.
 */

import * as PIXI from 'pixi.js';
import type { DisplaySurface, DrawCommand, StimulusConfig } from '@/types';
import { DisplayInitError } from './errors';
import { attachInputListeners } from './inputSampler';
import type { InputSampler } from './inputSampler';
import type { Viewport } from './viewport';

export class PixiRenderer implements DisplaySurface {
  private app: PIXI.Application;
  private container: HTMLElement;
  private config: StimulusConfig;
  private viewport: Viewport;
  private input: InputSampler;

  // One retained Graphics, redrawn in draw-list order each frame
  private scene: PIXI.Graphics | null = null;
  private detachInput: (() => void) | null = null;

  constructor(container: HTMLElement, config: StimulusConfig, viewport: Viewport, input: InputSampler) {
    this.container = container;
    this.config = config;
    this.viewport = viewport;
    this.input = input;
    this.app = new PIXI.Application();
  }

  async initialize(): Promise<void> {
    try {
      await this.app.init({
        width: this.config.window.width,
        height: this.config.window.height,
        backgroundColor: this.config.window.background,
        antialias: true,
        resolution: window.devicePixelRatio || 1,
        autoDensity: true,
        autoStart: false,
        preferWebGLVersion: 2,
      });
    } catch (error) {
      throw new DisplayInitError('PixiJS initialization failed', { cause: error });
    }

    this.app.canvas.style.display = 'block';
    this.container.appendChild(this.app.canvas);

    this.scene = new PIXI.Graphics();
    this.app.stage.addChild(this.scene);

    this.detachInput = attachInputListeners(this.app.canvas, this.input);
  }

  draw(commands: readonly DrawCommand[]): void {
    const scene = this.scene;
    if (!scene) return;

    scene.clear();
    for (const cmd of commands) {
      const { x, y } = this.viewport.toScreen(cmd.center);
      scene.circle(x, y, cmd.radius).fill(cmd.fillColor);
      if (cmd.lineWidth > 0) {
        scene.stroke({ width: cmd.lineWidth, color: cmd.lineColor });
      }
    }
  }

  present(): void {
    if (this.scene) this.app.render();
  }

  destroy(): void {
    this.detachInput?.();
    this.detachInput = null;

    if (this.scene) {
      this.app.stage.removeChild(this.scene);
      this.scene.destroy();
      this.scene = null;
    }

    this.app.destroy(true, { children: true });
  }
}
