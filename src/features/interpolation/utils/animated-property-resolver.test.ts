import { describe, expect, it } from 'vitest';
import type { ParsedScene } from '@/types/parse-tree';
import { compileSceneOrThrow } from '@/features/timeline/utils/timeline-compiler';
import { hasAnimation, resolveSnapshot } from './animated-property-resolver';

const scene: ParsedScene = {
  name: 'intro',
  objects: [
    {
      shape: 'square',
      id: 'my_box',
      properties: [
        { name: 'position', value: { kind: 'tuple', x: 75, y: 360 } },
        { name: 'fill', value: { kind: 'hex_color', hex: '#ff0000' } },
      ],
    },
    { shape: 'text', id: 'title', properties: [{ name: 'text', value: { kind: 'string', value: 'Hello' } }] },
  ],
};

const compiled = compileSceneOrThrow(scene, [
  {
    start: { value: 0, unit: 's' },
    end: { value: 2, unit: 's' },
    target: 'my_box',
    property: 'position',
    to: { kind: 'tuple', x: 1205, y: 360 },
    easing: 'ease_in_out',
  },
  {
    start: { value: 1, unit: 's' },
    target: 'title',
    property: 'text',
    to: { kind: 'string', value: 'World' },
  },
]);

describe('resolveSnapshot', () => {
  it('overlays animated values on the base properties', () => {
    const snapshot = resolveSnapshot(compiled, 1000, 30);

    expect(snapshot.index).toBe(30);
    expect(snapshot.timeMs).toBe(1000);
    const box = snapshot.objects[0];
    expect(box?.properties.get('position')).toEqual({ type: 'point', x: 640, y: 360 });
    expect(box?.properties.get('fill')).toEqual({ type: 'color', r: 255, g: 0, b: 0 });
    expect(snapshot.objects[1]?.properties.get('text')).toEqual({ type: 'text', value: 'World' });
  });

  it('keeps objects in draw order', () => {
    expect(resolveSnapshot(compiled, 0, 0).objects.map((o) => [o.id, o.kind, o.index])).toEqual([
      ['my_box', 'square', 0],
      ['title', 'text', 1],
    ]);
  });

  it('holds final values after every segment ends', () => {
    const snapshot = resolveSnapshot(compiled, 2500, 75);
    expect(snapshot.objects[0]?.properties.get('position')).toEqual({ type: 'point', x: 1205, y: 360 });
  });
});

describe('hasAnimation', () => {
  it('reports whether any track exists', () => {
    expect(hasAnimation(compiled)).toBe(true);
    expect(hasAnimation(compileSceneOrThrow(scene, []))).toBe(false);
  });
});
