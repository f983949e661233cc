/**
 * Viewport
 * Maps centred, y-up world coordinates to canvas pixels and back
 */

import * as d3 from 'd3';
import type { Vec2 } from '@/types';

export class Viewport {
  readonly width: number;
  readonly height: number;
  private x: d3.ScaleLinear<number, number>;
  private y: d3.ScaleLinear<number, number>;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.x = d3.scaleLinear().domain([-width / 2, width / 2]).range([0, width]);
    // Canvas y grows downward
    this.y = d3.scaleLinear().domain([-height / 2, height / 2]).range([height, 0]);
  }

  toScreen(point: Vec2): Vec2 {
    return { x: this.x(point.x), y: this.y(point.y) };
  }

  /** `null` when the canvas pixel lies outside the surface */
  toWorld(px: number, py: number): Vec2 | null {
    if (!Number.isFinite(px) || !Number.isFinite(py)) return null;
    const world = { x: this.x.invert(px), y: this.y.invert(py) };
    return this.contains(world) ? world : null;
  }

  contains(point: Vec2): boolean {
    return Math.abs(point.x) <= this.width / 2 && Math.abs(point.y) <= this.height / 2;
  }
}

/** 0xRRGGBB → '#rrggbb' */
export function toCssColor(color: number): string {
  return d3.rgb((color >> 16) & 0xff, (color >> 8) & 0xff, color & 0xff).formatHex();
}
