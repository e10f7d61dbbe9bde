/**
 * Scene model types.
 * Produced once by the scene model builder and read-only afterwards.
 */

import type { ColorValue, PropertySet, Value, ValueType } from './value';

/** Closed set of drawable object kinds */
export type ShapeKind =
  | 'circle'
  | 'square'
  | 'rectangle'
  | 'ellipse'
  | 'triangle'
  | 'line'
  | 'arrow'
  | 'double_arrow'
  | 'vector'
  | 'text'
  | 'group';

export const SHAPE_KINDS: readonly ShapeKind[] = [
  'circle',
  'square',
  'rectangle',
  'ellipse',
  'triangle',
  'line',
  'arrow',
  'double_arrow',
  'vector',
  'text',
  'group',
];

/**
 * Schema entry for one property of one shape kind.
 * Entries without a default are optional: when not declared they are absent
 * from the object's property set (e.g. `fill` on a stroke-only square).
 */
export interface PropertySpec {
  type: ValueType;
  default?: Value;
  /** Structural properties such as `parent` cannot be targeted by animations */
  animatable: boolean;
}

export type ShapeSchema = ReadonlyMap<string, PropertySpec>;

export interface SceneObject {
  id: string;
  kind: ShapeKind;
  /** Declaration order within the scene; also the draw order */
  index: number;
  properties: PropertySet;
}

export interface Scene {
  name: string;
  /** Duration declared in the document, if any */
  declaredDurationMs?: number;
  objects: readonly SceneObject[];
}

export interface Camera {
  width: number;
  height: number;
  background: ColorValue;
}

export const DEFAULT_CAMERA: Camera = {
  width: 1920,
  height: 1080,
  background: { type: 'color', r: 0, g: 0, b: 0 },
};
