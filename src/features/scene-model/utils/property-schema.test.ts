import { describe, expect, it } from 'vitest';
import { SHAPE_KINDS } from '@/types/scene';
import { PROPERTY_SCHEMAS, buildSchemaTable, getShapeSchema, isShapeKind } from './property-schema';

describe('PROPERTY_SCHEMAS', () => {
  it('has an entry for every shape kind', () => {
    for (const kind of SHAPE_KINDS) {
      expect(PROPERTY_SCHEMAS.has(kind)).toBe(true);
    }
  });

  it('merges transform properties into every shape', () => {
    for (const kind of SHAPE_KINDS) {
      const schema = getShapeSchema(kind);
      expect(schema.get('position')?.type).toBe('point');
      expect(schema.get('rotation')?.default).toEqual({ type: 'number', value: 0 });
      expect(schema.get('scale')?.default).toEqual({ type: 'number', value: 1 });
      expect(schema.get('opacity')?.default).toEqual({ type: 'number', value: 1 });
    }
  });

  it('leaves fill and border optional on closed shapes', () => {
    const square = getShapeSchema('square');
    expect(square.get('fill')).toEqual({ type: 'color', animatable: true });
    expect(square.get('border_color')).toEqual({ type: 'color', animatable: true });
    expect(square.get('size')?.default).toEqual({ type: 'number', value: 100 });
  });

  it('gives stroke shapes a white default border', () => {
    expect(getShapeSchema('line').get('border_color')?.default).toEqual({
      type: 'color',
      r: 255,
      g: 255,
      b: 255,
    });
  });

  it('marks parent as not animatable', () => {
    expect(getShapeSchema('circle').get('parent')).toEqual({
      type: 'text',
      default: { type: 'text', value: '' },
      animatable: false,
    });
  });

  it('converts point defaults from tuples', () => {
    expect(getShapeSchema('triangle').get('p2')?.default).toEqual({ type: 'point', x: 50, y: 50 });
  });
});

describe('buildSchemaTable', () => {
  it('rejects a table missing a shape kind', () => {
    expect(() => buildSchemaTable({ groups: {}, shapes: {} })).toThrow(/Missing schema for shape/);
  });

  it('rejects an invalid default color', () => {
    const shapes: Record<string, unknown> = Object.fromEntries(
      SHAPE_KINDS.map((kind) => [kind, { groups: [], properties: {} }])
    );
    shapes.circle = { groups: [], properties: { fill: { type: 'color', default: 'red' } } };
    expect(() => buildSchemaTable({ groups: {}, shapes })).toThrow(/valid hex color/);
  });
});

describe('isShapeKind', () => {
  it('accepts only the closed set of kinds', () => {
    expect(isShapeKind('double_arrow')).toBe(true);
    expect(isShapeKind('star')).toBe(false);
  });
});
