/**
 * Frame renderer.
 *
 * Rasterizes one frame snapshot into an RGBA buffer: background first, then
 * every object in declaration order. Each object is painted into its own
 * coverage layer (fill, then stroke) and composited once with its opacity,
 * so an object's stroke never shows its own fill through it.
 */

import type { FrameSnapshot, ObjectSnapshot, RasterFrame } from '@/types/frame';
import type { Camera } from '@/types/scene';
import { RenderInvariantError } from '@/lib/diagnostics';
import { createLogger } from '@/lib/logger';
import {
  type Transform2D,
  applyTransform,
  composeTransforms,
  invertTransform,
  makeObjectTransform,
  polygonBounds,
  transformPolygon,
} from '@/lib/shapes';
import { getText } from '@/features/values/utils/value-model';
import { CoverageLayer, Paint } from './coverage-layer';
import { type GlyphRasterizer, defaultGlyphRasterizer } from './glyph-rasterizer';
import { type PixelBuffer, compositeLayer, createPixelBuffer } from './pixel-buffer';
import { buildShapeGeometry, requireColor, requireNumber, requirePoint, requireText } from './shape-geometry';

const log = createLogger('FrameRenderer');

export interface RenderFrameOptions {
  /** Glyph source for text objects; defaults to the block placeholder */
  glyphRasterizer?: GlyphRasterizer;
}

/** World placement of an object after its parent chain is applied */
interface Placement {
  transform: Transform2D;
  opacity: number;
}

class PlacementResolver {
  private cache = new Map<string, Placement>();
  private byId: Map<string, ObjectSnapshot>;

  constructor(objects: readonly ObjectSnapshot[]) {
    this.byId = new Map(objects.map((object) => [object.id, object]));
  }

  resolve(object: ObjectSnapshot, chain: ReadonlySet<string> = new Set()): Placement {
    const cached = this.cache.get(object.id);
    if (cached) return cached;

    if (chain.has(object.id)) {
      throw new RenderInvariantError(`Parent chain of "${object.id}" loops back on itself`, {
        object: object.id,
        property: 'parent',
      });
    }

    const position = requirePoint(object, 'position');
    let placement: Placement = {
      transform: makeObjectTransform(position, requireNumber(object, 'rotation'), requireNumber(object, 'scale')),
      opacity: requireNumber(object, 'opacity'),
    };

    const parentId = getText(object.properties, 'parent');
    if (parentId) {
      const parent = this.byId.get(parentId);
      if (!parent) {
        throw new RenderInvariantError(`Parent "${parentId}" of "${object.id}" is not in the frame`, {
          object: object.id,
          property: 'parent',
        });
      }
      const parentPlacement = this.resolve(parent, new Set([...chain, object.id]));
      placement = {
        transform: composeTransforms(parentPlacement.transform, placement.transform),
        opacity: parentPlacement.opacity * placement.opacity,
      };
    }

    this.cache.set(object.id, placement);
    return placement;
  }
}

function drawShape(buffer: PixelBuffer, object: ObjectSnapshot, placement: Placement): void {
  const geometry = buildShapeGeometry(object);
  const fill = geometry.fill.map((polygon) => transformPolygon(placement.transform, polygon));
  const stroke = geometry.stroke.map((polygon) => transformPolygon(placement.transform, polygon));

  const bounds = polygonBounds([...fill, ...stroke]);
  if (!bounds) return;
  const layer = CoverageLayer.fromBounds(bounds, buffer.width, buffer.height);
  if (!layer) return;

  layer.fillPolygons(fill, Paint.Fill);
  layer.fillPolygons(stroke, Paint.Stroke);
  compositeLayer(buffer, layer, { fill: geometry.fillColor, stroke: geometry.strokeColor }, placement.opacity);
}

function drawText(
  buffer: PixelBuffer,
  object: ObjectSnapshot,
  placement: Placement,
  glyphRasterizer: GlyphRasterizer
): void {
  const text = requireText(object, 'text');
  const fontSize = requireNumber(object, 'font_size');
  const color = requireColor(object, 'fill');
  if (text === '' || fontSize <= 0) return;

  const mask = glyphRasterizer.rasterize(text, fontSize);
  if (mask.width === 0 || mask.height === 0) return;

  const inverse = invertTransform(placement.transform);
  if (!inverse) return;

  // Mask is centred on the pivot
  const halfWidth = mask.width / 2;
  const halfHeight = mask.height / 2;
  const corners = transformPolygon(placement.transform, [
    { x: -halfWidth, y: -halfHeight },
    { x: halfWidth, y: -halfHeight },
    { x: halfWidth, y: halfHeight },
    { x: -halfWidth, y: halfHeight },
  ]);
  const bounds = polygonBounds([corners]);
  const layer = bounds && CoverageLayer.fromBounds(bounds, buffer.width, buffer.height);
  if (!layer) return;

  for (let y = layer.y; y < layer.y + layer.height; y++) {
    for (let x = layer.x; x < layer.x + layer.width; x++) {
      const local = applyTransform(inverse, { x: x + 0.5, y: y + 0.5 });
      const column = Math.floor(local.x + halfWidth);
      const row = Math.floor(local.y + halfHeight);
      if (column < 0 || row < 0 || column >= mask.width || row >= mask.height) continue;
      if (mask.data[row * mask.width + column] === 1) layer.set(x, y, Paint.Fill);
    }
  }

  compositeLayer(buffer, layer, { fill: color }, placement.opacity);
}

/**
 * Render a frame snapshot through a camera.
 * @throws RenderInvariantError when an object lacks a property its kind needs
 */
export function renderFrame(snapshot: FrameSnapshot, camera: Camera, options: RenderFrameOptions = {}): RasterFrame {
  const glyphRasterizer = options.glyphRasterizer ?? defaultGlyphRasterizer;
  const buffer = createPixelBuffer(camera.width, camera.height, camera.background);
  const placements = new PlacementResolver(snapshot.objects);

  for (const object of snapshot.objects) {
    if (object.kind === 'group') continue;

    try {
      const placement = placements.resolve(object);
      if (placement.opacity <= 0) continue;

      if (object.kind === 'text') {
        drawText(buffer, object, placement, glyphRasterizer);
      } else {
        drawShape(buffer, object, placement);
      }
    } catch (error) {
      if (error instanceof RenderInvariantError) {
        throw new RenderInvariantError(error.message, {
          ...error.context,
          scene: snapshot.sceneName,
          frame: snapshot.index,
        });
      }
      throw error;
    }
  }

  log.debug('Rendered frame', { scene: snapshot.sceneName, index: snapshot.index });

  return {
    sceneName: snapshot.sceneName,
    index: snapshot.index,
    timeMs: snapshot.timeMs,
    width: buffer.width,
    height: buffer.height,
    data: buffer.data,
  };
}
