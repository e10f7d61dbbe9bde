/**
 * Coverage layer for one object.
 *
 * A layer covers the object's pixel bounding box (clipped to the frame) and
 * records, per pixel, which paint covers it: nothing, the fill or the stroke.
 * Painting later wins, so the stroke is drawn over the fill. Coverage is
 * sampled at pixel centres.
 */

import type { Bounds, Polygon } from '@/lib/shapes';

export enum Paint {
  None = 0,
  Fill = 1,
  Stroke = 2,
}

export class CoverageLayer {
  readonly data: Uint8Array;

  constructor(
    /** Frame column of the layer's left edge */
    readonly x: number,
    /** Frame row of the layer's top edge */
    readonly y: number,
    readonly width: number,
    readonly height: number
  ) {
    this.data = new Uint8Array(width * height);
  }

  /**
   * Create a layer for the pixels whose centres may fall inside `bounds`,
   * clipped to a frame of the given size. Returns null when nothing is visible.
   */
  static fromBounds(bounds: Bounds, frameWidth: number, frameHeight: number): CoverageLayer | null {
    const x0 = Math.max(0, Math.floor(bounds.minX));
    const y0 = Math.max(0, Math.floor(bounds.minY));
    const x1 = Math.min(frameWidth, Math.ceil(bounds.maxX));
    const y1 = Math.min(frameHeight, Math.ceil(bounds.maxY));
    if (x1 <= x0 || y1 <= y0) return null;
    return new CoverageLayer(x0, y0, x1 - x0, y1 - y0);
  }

  get(frameX: number, frameY: number): Paint {
    const column = frameX - this.x;
    const row = frameY - this.y;
    if (column < 0 || row < 0 || column >= this.width || row >= this.height) return Paint.None;
    return this.data[row * this.width + column] ?? Paint.None;
  }

  set(frameX: number, frameY: number, paint: Paint): void {
    const column = frameX - this.x;
    const row = frameY - this.y;
    if (column < 0 || row < 0 || column >= this.width || row >= this.height) return;
    this.data[row * this.width + column] = paint;
  }

  /**
   * Scanline-fill a polygon with the even-odd rule
   */
  fillPolygon(polygon: Polygon, paint: Paint): void {
    if (polygon.length < 3) return;
    const crossings: number[] = [];

    for (let row = 0; row < this.height; row++) {
      const sampleY = this.y + row + 0.5;
      crossings.length = 0;

      for (let i = 0; i < polygon.length; i++) {
        const a = polygon[i];
        const b = polygon[(i + 1) % polygon.length];
        if (!a || !b) continue;
        // Half-open in y so a vertex on the scanline is counted once
        if ((a.y <= sampleY && b.y > sampleY) || (b.y <= sampleY && a.y > sampleY)) {
          crossings.push(a.x + ((sampleY - a.y) * (b.x - a.x)) / (b.y - a.y));
        }
      }

      crossings.sort((left, right) => left - right);

      for (let k = 0; k + 1 < crossings.length; k += 2) {
        const enter = crossings[k];
        const exit = crossings[k + 1];
        if (enter === undefined || exit === undefined) continue;
        // Pixel centres in [enter, exit)
        const first = Math.max(this.x, Math.ceil(enter - 0.5));
        const last = Math.min(this.x + this.width, Math.ceil(exit - 0.5));
        const offset = row * this.width - this.x;
        for (let column = first; column < last; column++) {
          this.data[offset + column] = paint;
        }
      }
    }
  }

  fillPolygons(polygons: readonly Polygon[], paint: Paint): void {
    for (const polygon of polygons) {
      this.fillPolygon(polygon, paint);
    }
  }
}
