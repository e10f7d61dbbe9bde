/**
 * Per-kind shape geometry.
 *
 * Turns an object's resolved properties into fill and stroke polygons in
 * object-local coordinates (pivot at the origin). Text and groups have no
 * polygon geometry.
 */

import type { ObjectSnapshot } from '@/types/frame';
import type { ColorValue, PointValue } from '@/types/value';
import { RenderInvariantError } from '@/lib/diagnostics';
import {
  type Polygon,
  type Vec2,
  makeArrowhead,
  makeCircle,
  makeEllipse,
  makeOutlineStroke,
  makeRect,
  makeSegmentStroke,
  makeTriangle,
} from '@/lib/shapes';
import { getColor, getNumber, getPoint, getText } from '@/features/values/utils/value-model';

export interface ShapeGeometry {
  fill: Polygon[];
  stroke: Polygon[];
  fillColor?: ColorValue;
  strokeColor?: ColorValue;
}

function missing(object: ObjectSnapshot, property: string): RenderInvariantError {
  return new RenderInvariantError(`${object.kind} "${object.id}" has no ${property} to draw with`, {
    object: object.id,
    shape: object.kind,
    property,
  });
}

export function requireNumber(object: ObjectSnapshot, property: string): number {
  const value = getNumber(object.properties, property);
  if (value === undefined) throw missing(object, property);
  return value;
}

export function requirePoint(object: ObjectSnapshot, property: string): PointValue {
  const value = getPoint(object.properties, property);
  if (value === undefined) throw missing(object, property);
  return value;
}

export function requireColor(object: ObjectSnapshot, property: string): ColorValue {
  const value = getColor(object.properties, property);
  if (value === undefined) throw missing(object, property);
  return value;
}

export function requireText(object: ObjectSnapshot, property: string): string {
  const value = getText(object.properties, property);
  if (value === undefined) throw missing(object, property);
  return value;
}

const toVec = ({ x, y }: PointValue): Vec2 => ({ x, y });

/**
 * Closed shapes: optional fill, optional border centred on the outline.
 */
function closedGeometry(object: ObjectSnapshot, outline: Polygon): ShapeGeometry {
  const fillColor = getColor(object.properties, 'fill');
  const strokeColor = getColor(object.properties, 'border_color');
  const geometry: ShapeGeometry = { fill: [], stroke: [] };

  if (fillColor) {
    geometry.fill.push(outline);
    geometry.fillColor = fillColor;
  }
  if (strokeColor) {
    const width = requireNumber(object, 'border_width');
    geometry.stroke.push(...makeOutlineStroke(outline, width));
    geometry.strokeColor = strokeColor;
  }

  return geometry;
}

/**
 * Open shapes: a stroked segment with optional arrowheads, all in the border color.
 */
function strokeGeometry(object: ObjectSnapshot, from: Vec2, to: Vec2, heads: 'none' | 'end' | 'both'): ShapeGeometry {
  const strokeColor = requireColor(object, 'border_color');
  const width = requireNumber(object, 'border_width');
  const stroke: Polygon[] = [];

  const shaft = makeSegmentStroke(from, to, width);
  if (shaft) stroke.push(shaft);

  if (heads !== 'none') {
    const length = requireNumber(object, 'tip_length');
    const angle = requireNumber(object, 'tip_angle');
    const endHead = makeArrowhead({ tail: from, tip: to, length, angle });
    if (endHead) stroke.push(endHead);
    if (heads === 'both') {
      const startHead = makeArrowhead({ tail: to, tip: from, length, angle });
      if (startHead) stroke.push(startHead);
    }
  }

  return { fill: [], stroke, strokeColor };
}

/**
 * Build the local geometry of a drawable object.
 * @throws RenderInvariantError when a property the kind needs is missing
 */
export function buildShapeGeometry(object: ObjectSnapshot): ShapeGeometry {
  switch (object.kind) {
    case 'square': {
      const size = requireNumber(object, 'size');
      return closedGeometry(object, makeRect({ width: size, height: size }));
    }
    case 'rectangle':
      return closedGeometry(
        object,
        makeRect({ width: requireNumber(object, 'width'), height: requireNumber(object, 'height') })
      );
    case 'circle':
      return closedGeometry(object, makeCircle({ radius: requireNumber(object, 'radius') }));
    case 'ellipse':
      return closedGeometry(
        object,
        makeEllipse({ rx: requireNumber(object, 'rx'), ry: requireNumber(object, 'ry') })
      );
    case 'triangle':
      return closedGeometry(
        object,
        makeTriangle({
          points: [
            toVec(requirePoint(object, 'p1')),
            toVec(requirePoint(object, 'p2')),
            toVec(requirePoint(object, 'p3')),
          ],
        })
      );
    case 'line':
      return strokeGeometry(object, toVec(requirePoint(object, 'p1')), toVec(requirePoint(object, 'p2')), 'none');
    case 'arrow':
      return strokeGeometry(object, toVec(requirePoint(object, 'p1')), toVec(requirePoint(object, 'p2')), 'end');
    case 'double_arrow':
      return strokeGeometry(object, toVec(requirePoint(object, 'p1')), toVec(requirePoint(object, 'p2')), 'both');
    case 'vector':
      return strokeGeometry(object, { x: 0, y: 0 }, toVec(requirePoint(object, 'p2')), 'end');
    case 'text':
    case 'group':
      return { fill: [], stroke: [] };
  }
}
