/**
 * RGBA frame buffer helpers: background fill and source-over compositing of
 * coverage layers.
 */

import type { ColorValue } from '@/types/value';
import { type CoverageLayer, Paint } from './coverage-layer';

export interface PixelBuffer {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

/**
 * Allocate an opaque buffer filled with the background color
 */
export function createPixelBuffer(width: number, height: number, background: ColorValue): PixelBuffer {
  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = background.r;
    data[i + 1] = background.g;
    data[i + 2] = background.b;
    data[i + 3] = 255;
  }
  return { width, height, data };
}

function blend(source: number, destination: number, alpha: number): number {
  return Math.round(source * alpha + destination * (1 - alpha));
}

export interface LayerColors {
  fill?: ColorValue;
  stroke?: ColorValue;
}

/**
 * Composite a coverage layer onto the buffer with a single opacity.
 * Pixels whose paint has no color are left untouched.
 */
export function compositeLayer(
  buffer: PixelBuffer,
  layer: CoverageLayer,
  colors: LayerColors,
  opacity: number
): void {
  const alpha = Math.max(0, Math.min(1, opacity));
  if (alpha === 0) return;

  for (let row = 0; row < layer.height; row++) {
    for (let column = 0; column < layer.width; column++) {
      const paint = layer.data[row * layer.width + column];
      const color = paint === Paint.Fill ? colors.fill : paint === Paint.Stroke ? colors.stroke : undefined;
      if (!color) continue;

      const i = ((layer.y + row) * buffer.width + layer.x + column) * 4;
      buffer.data[i] = blend(color.r, buffer.data[i] ?? 0, alpha);
      buffer.data[i + 1] = blend(color.g, buffer.data[i + 1] ?? 0, alpha);
      buffer.data[i + 2] = blend(color.b, buffer.data[i + 2] ?? 0, alpha);
      buffer.data[i + 3] = blend(255, buffer.data[i + 3] ?? 0, alpha);
    }
  }
}

/**
 * Read one pixel as [r, g, b, a]
 */
export function readPixel(buffer: Pick<PixelBuffer, 'width' | 'data'>, x: number, y: number): number[] {
  const i = (y * buffer.width + x) * 4;
  return Array.from(buffer.data.subarray(i, i + 4));
}
