import { describe, expect, it } from 'vitest';
import { CoverageLayer, Paint } from './coverage-layer';

function paintedCells(layer: CoverageLayer): string[] {
  const rows: string[] = [];
  for (let row = 0; row < layer.height; row++) {
    let line = '';
    for (let column = 0; column < layer.width; column++) {
      line += String(layer.data[row * layer.width + column]);
    }
    rows.push(line);
  }
  return rows;
}

describe('CoverageLayer', () => {
  it('covers the pixels whose centres lie inside a rectangle', () => {
    const layer = new CoverageLayer(0, 0, 5, 4);
    layer.fillPolygon(
      [
        { x: 1, y: 1 },
        { x: 4, y: 1 },
        { x: 4, y: 3 },
        { x: 1, y: 3 },
      ],
      Paint.Fill
    );

    expect(paintedCells(layer)).toEqual(['00000', '01110', '01110', '00000']);
  });

  it('paints later polygons over earlier ones', () => {
    const layer = new CoverageLayer(0, 0, 3, 1);
    layer.fillPolygon(
      [
        { x: 0, y: 0 },
        { x: 3, y: 0 },
        { x: 3, y: 1 },
        { x: 0, y: 1 },
      ],
      Paint.Fill
    );
    layer.fillPolygon(
      [
        { x: 2, y: 0 },
        { x: 3, y: 0 },
        { x: 3, y: 1 },
        { x: 2, y: 1 },
      ],
      Paint.Stroke
    );

    expect(paintedCells(layer)).toEqual(['112']);
  });

  it('uses the even-odd rule for self-overlapping outlines', () => {
    // Outer 0..6 square wound around an inner 2..4 square in the same direction
    const layer = new CoverageLayer(0, 0, 6, 6);
    layer.fillPolygon(
      [
        { x: 0, y: 0 },
        { x: 6, y: 0 },
        { x: 6, y: 6 },
        { x: 0, y: 6 },
        { x: 0, y: 0 },
        { x: 2, y: 2 },
        { x: 4, y: 2 },
        { x: 4, y: 4 },
        { x: 2, y: 4 },
        { x: 2, y: 2 },
      ],
      Paint.Fill
    );

    expect(paintedCells(layer)).toEqual(['111111', '111111', '110011', '110011', '111111', '111111']);
  });

  it('clips to its own bounds in frame coordinates', () => {
    const layer = new CoverageLayer(2, 1, 2, 2);
    layer.fillPolygon(
      [
        { x: 0, y: 0 },
        { x: 10, y: 0 },
        { x: 10, y: 10 },
        { x: 0, y: 10 },
      ],
      Paint.Stroke
    );

    expect(paintedCells(layer)).toEqual(['22', '22']);
    expect(layer.get(2, 1)).toBe(Paint.Stroke);
    expect(layer.get(0, 0)).toBe(Paint.None);
  });

  it('is built from bounds clipped to the frame', () => {
    const layer = CoverageLayer.fromBounds({ minX: -3.5, minY: 2.2, maxX: 4.1, maxY: 50 }, 10, 8);
    expect(layer && [layer.x, layer.y, layer.width, layer.height]).toEqual([0, 2, 5, 6]);
  });

  it('has no layer for off-frame bounds', () => {
    expect(CoverageLayer.fromBounds({ minX: 20, minY: 0, maxX: 30, maxY: 5 }, 10, 8)).toBeNull();
  });
});
