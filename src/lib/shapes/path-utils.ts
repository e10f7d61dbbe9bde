/**
 * Polygon and affine transform utilities.
 *
 * Transforms use the canvas matrix layout: a point (x, y) maps to
 * (a*x + c*y + e, b*x + d*y + f). Screen space has y pointing down, so a
 * positive rotation turns clockwise on screen.
 */

export interface Vec2 {
  x: number;
  y: number;
}

/** Closed ring of vertices; the last vertex connects back to the first */
export type Polygon = Vec2[];

export interface Transform2D {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
}

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Build the local-to-parent transform of an object: scale about the pivot,
 * then rotate about it, then move the pivot to `position`.
 *
 * @param rotation - Clockwise rotation in degrees
 */
export function makeObjectTransform(position: Vec2, rotation: number, scale: number): Transform2D {
  const radians = degreesToRadians(rotation);
  // Keep 0/90/180/270 exact so axis-aligned shapes stay on pixel boundaries
  const cos = rotation % 90 === 0 ? Math.round(Math.cos(radians)) : Math.cos(radians);
  const sin = rotation % 90 === 0 ? Math.round(Math.sin(radians)) : Math.sin(radians);

  return {
    a: cos * scale,
    b: sin * scale,
    c: -sin * scale,
    d: cos * scale,
    e: position.x,
    f: position.y,
  };
}

/**
 * Compose two transforms: the result applies `inner` first, then `outer`.
 */
export function composeTransforms(outer: Transform2D, inner: Transform2D): Transform2D {
  return {
    a: outer.a * inner.a + outer.c * inner.b,
    b: outer.b * inner.a + outer.d * inner.b,
    c: outer.a * inner.c + outer.c * inner.d,
    d: outer.b * inner.c + outer.d * inner.d,
    e: outer.a * inner.e + outer.c * inner.f + outer.e,
    f: outer.b * inner.e + outer.d * inner.f + outer.f,
  };
}

/**
 * Invert a transform. Returns null for degenerate (zero-scale) transforms.
 */
export function invertTransform(t: Transform2D): Transform2D | null {
  const det = t.a * t.d - t.b * t.c;
  if (det === 0 || !Number.isFinite(det)) return null;

  return {
    a: t.d / det,
    b: -t.b / det,
    c: -t.c / det,
    d: t.a / det,
    e: (t.c * t.f - t.d * t.e) / det,
    f: (t.b * t.e - t.a * t.f) / det,
  };
}

export function applyTransform(t: Transform2D, point: Vec2): Vec2 {
  return {
    x: t.a * point.x + t.c * point.y + t.e,
    y: t.b * point.x + t.d * point.y + t.f,
  };
}

export function transformPolygon(t: Transform2D, polygon: Polygon): Polygon {
  return polygon.map((point) => applyTransform(t, point));
}

/**
 * Bounding box of a set of polygons, or null when there are no vertices.
 */
export function polygonBounds(polygons: readonly Polygon[]): Bounds | null {
  let bounds: Bounds | null = null;

  for (const polygon of polygons) {
    for (const { x, y } of polygon) {
      if (!bounds) {
        bounds = { minX: x, minY: y, maxX: x, maxY: y };
        continue;
      }
      bounds.minX = Math.min(bounds.minX, x);
      bounds.minY = Math.min(bounds.minY, y);
      bounds.maxX = Math.max(bounds.maxX, x);
      bounds.maxY = Math.max(bounds.maxY, y);
    }
  }

  return bounds;
}
