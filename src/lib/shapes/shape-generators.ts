/**
 * Polygon shape generators.
 *
 * All shapes are generated in local coordinates around the pivot (0,0) and
 * are transformed into place by the renderer. Curves are approximated by
 * polygons fine enough that no edge spans more than a couple of pixels.
 */

import type { Polygon, Vec2 } from './path-utils';

const MIN_CURVE_SEGMENTS = 16;
const MAX_CURVE_SEGMENTS = 720;
/** Target edge length in pixels for curve approximation */
const CURVE_EDGE_LENGTH = 2;

/**
 * Number of polygon edges used for a curve of the given radius
 */
export function curveSegmentCount(radius: number): number {
  const count = Math.ceil((2 * Math.PI * Math.max(0, radius)) / CURVE_EDGE_LENGTH);
  return Math.min(MAX_CURVE_SEGMENTS, Math.max(MIN_CURVE_SEGMENTS, count));
}

/**
 * Generate a rectangle centred on the pivot
 */
export function makeRect(options: { width: number; height: number }): Polygon {
  const halfWidth = options.width / 2;
  const halfHeight = options.height / 2;
  if (halfWidth <= 0 || halfHeight <= 0) return [];

  return [
    { x: -halfWidth, y: -halfHeight },
    { x: halfWidth, y: -halfHeight },
    { x: halfWidth, y: halfHeight },
    { x: -halfWidth, y: halfHeight },
  ];
}

/**
 * Generate an ellipse centred on the pivot
 */
export function makeEllipse(options: { rx: number; ry: number }): Polygon {
  const { rx, ry } = options;
  if (rx <= 0 || ry <= 0) return [];

  const segments = curveSegmentCount(Math.max(rx, ry));
  const points: Polygon = [];
  for (let i = 0; i < segments; i++) {
    const angle = (2 * Math.PI * i) / segments;
    points.push({ x: rx * Math.cos(angle), y: ry * Math.sin(angle) });
  }
  return points;
}

/**
 * Generate a circle centred on the pivot
 */
export function makeCircle(options: { radius: number }): Polygon {
  return makeEllipse({ rx: options.radius, ry: options.radius });
}

/**
 * Generate a triangle from three vertices given as offsets from the pivot
 */
export function makeTriangle(options: { points: readonly [Vec2, Vec2, Vec2] }): Polygon {
  return options.points.map(({ x, y }) => ({ x, y }));
}

/**
 * Generate the quad covering a stroke of `width` along from -> to.
 *
 * @param cap - Extra length added past both ends, e.g. width / 2 for square caps
 */
export function makeSegmentStroke(from: Vec2, to: Vec2, width: number, cap = 0): Polygon | null {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const length = Math.hypot(dx, dy);
  if (length === 0 || width <= 0) return null;

  const ux = dx / length;
  const uy = dy / length;
  // Unit normal scaled to half the stroke width
  const nx = (-uy * width) / 2;
  const ny = (ux * width) / 2;
  const start = { x: from.x - ux * cap, y: from.y - uy * cap };
  const end = { x: to.x + ux * cap, y: to.y + uy * cap };

  return [
    { x: start.x + nx, y: start.y + ny },
    { x: end.x + nx, y: end.y + ny },
    { x: end.x - nx, y: end.y - ny },
    { x: start.x - nx, y: start.y - ny },
  ];
}

/**
 * Generate the stroke of a closed outline as one square-capped quad per edge,
 * centred on the outline.
 */
export function makeOutlineStroke(outline: Polygon, width: number): Polygon[] {
  const quads: Polygon[] = [];

  outline.forEach((from, i) => {
    const to = outline[(i + 1) % outline.length];
    if (!to) return;
    const quad = makeSegmentStroke(from, to, width, width / 2);
    if (quad) quads.push(quad);
  });

  return quads;
}

/**
 * Generate a filled arrowhead whose tip sits at `tip`, pointing away from `tail`.
 *
 * @param length - Distance from the tip to the base of the head
 * @param angle - Half-angle at the tip, in degrees
 */
export function makeArrowhead(options: { tail: Vec2; tip: Vec2; length: number; angle: number }): Polygon | null {
  const { tail, tip, length, angle } = options;
  const dx = tip.x - tail.x;
  const dy = tip.y - tail.y;
  const distance = Math.hypot(dx, dy);
  if (distance === 0 || length <= 0) return null;

  const ux = dx / distance;
  const uy = dy / distance;
  const halfWidth = length * Math.tan((angle * Math.PI) / 180);
  const baseX = tip.x - ux * length;
  const baseY = tip.y - uy * length;

  return [
    { x: tip.x, y: tip.y },
    { x: baseX - uy * halfWidth, y: baseY + ux * halfWidth },
    { x: baseX + uy * halfWidth, y: baseY - ux * halfWidth },
  ];
}
