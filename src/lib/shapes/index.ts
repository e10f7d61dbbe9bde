/**
 * Native shape utilities
 *
 * Polygon generators and the affine transforms that place them on a frame.
 */

// Shape polygon generators
export {
  curveSegmentCount,
  makeArrowhead,
  makeCircle,
  makeEllipse,
  makeOutlineStroke,
  makeRect,
  makeSegmentStroke,
  makeTriangle,
} from './shape-generators';

// Transform utilities
export {
  applyTransform,
  composeTransforms,
  degreesToRadians,
  invertTransform,
  makeObjectTransform,
  polygonBounds,
  transformPolygon,
  type Bounds,
  type Polygon,
  type Transform2D,
  type Vec2,
} from './path-utils';
