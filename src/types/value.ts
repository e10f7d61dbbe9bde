/**
 * Typed property values.
 * Every object property holds exactly one of these variants; the variant is
 * fixed by the shape's property schema and never changes over an animation.
 */

export interface NumberValue {
  type: 'number';
  value: number;
}

export interface PointValue {
  type: 'point';
  x: number;
  y: number;
}

/** RGB color with integer channels in [0, 255] */
export interface ColorValue {
  type: 'color';
  r: number;
  g: number;
  b: number;
}

export interface TextValue {
  type: 'text';
  value: string;
}

export type Value = NumberValue | PointValue | ColorValue | TextValue;

export type ValueType = Value['type'];

/** Narrow a value union to the variant with the given tag */
export type ValueOf<T extends ValueType> = Extract<Value, { type: T }>;

/**
 * Validated, strongly-typed property set of an object.
 * Keys are property names from the shape schema.
 */
export type PropertySet = ReadonlyMap<string, Value>;

export const VALUE_TYPES: readonly ValueType[] = ['number', 'point', 'color', 'text'];
