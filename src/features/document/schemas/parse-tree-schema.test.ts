import { describe, expect, it } from 'vitest';
import { ParseTreeError } from '@/lib/diagnostics';
import { parseDocumentTree } from './parse-tree-schema';

describe('parseDocumentTree', () => {
  it('accepts a minimal document and fills empty lists', () => {
    expect(parseDocumentTree({ scenes: [{ name: 'intro' }] })).toEqual({
      scenes: [{ name: 'intro', objects: [] }],
      timelines: [],
    });
  });

  it('keeps every value kind', () => {
    const tree = {
      camera: { properties: [{ name: 'width', value: { kind: 'number', value: 640 } }] },
      scenes: [
        {
          name: 'intro',
          duration: { value: 2, unit: 's' },
          objects: [
            {
              shape: 'text',
              id: 'title',
              properties: [
                { name: 'text', value: { kind: 'string', value: 'Hi' } },
                { name: 'position', value: { kind: 'tuple', x: 1, y: 2 } },
                { name: 'fill', value: { kind: 'hex_color', hex: '#fff' } },
              ],
            },
          ],
        },
      ],
      timelines: [
        {
          scene: 'intro',
          animations: [
            {
              start: { value: 0, unit: 'ms' },
              end: { value: 500, unit: 'ms' },
              target: 'title',
              property: 'position',
              to: { kind: 'tuple', x: 3, y: 4 },
              easing: 'ease_out',
            },
          ],
        },
      ],
    };

    expect(parseDocumentTree(tree)).toEqual(tree);
  });

  it('reports the path of each structural problem', () => {
    const run = () =>
      parseDocumentTree({
        scenes: [{ name: 'intro', objects: [{ shape: 'circle', id: '', properties: [] }] }],
        timelines: [{ scene: 'intro', animations: [{ start: { value: 1, unit: 'min' } }] }],
      });

    expect(run).toThrow(ParseTreeError);
    try {
      run();
    } catch (error) {
      const issues = error instanceof ParseTreeError ? error.issues : [];
      expect(issues.some((issue) => issue.startsWith('scenes.0.objects.0.id: '))).toBe(true);
      expect(issues.some((issue) => issue.startsWith('timelines.0.animations.0.start.unit: '))).toBe(true);
      expect(issues.some((issue) => issue.startsWith('timelines.0.animations.0.target: '))).toBe(true);
    }
  });

  it('rejects unknown value kinds', () => {
    expect(() =>
      parseDocumentTree({
        scenes: [
          {
            name: 'intro',
            objects: [{ shape: 'circle', id: 'c', properties: [{ name: 'radius', value: { kind: 'vector' } }] }],
          },
        ],
      })
    ).toThrow(ParseTreeError);
  });

  it('rejects negative times', () => {
    expect(() => parseDocumentTree({ scenes: [{ name: 'intro', duration: { value: -1, unit: 's' } }] })).toThrow(
      /Times cannot be negative/
    );
  });

  it('rejects input that is not a document', () => {
    expect(() => parseDocumentTree('scene "intro" {}')).toThrow(ParseTreeError);
  });
});
