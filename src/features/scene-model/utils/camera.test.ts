import { describe, expect, it } from 'vitest';
import { DEFAULT_CAMERA } from '@/types/scene';
import { buildCamera } from './camera';

describe('buildCamera', () => {
  it('defaults to 1920x1080 on black', () => {
    const result = buildCamera(undefined);
    expect(result).toEqual({ ok: true, value: DEFAULT_CAMERA, warnings: [] });
    expect(DEFAULT_CAMERA.background).toEqual({ type: 'color', r: 0, g: 0, b: 0 });
  });

  it('reads width, height and background color', () => {
    const result = buildCamera({
      properties: [
        { name: 'width', value: { kind: 'number', value: 200 } },
        { name: 'height', value: { kind: 'number', value: 100 } },
        { name: 'background_color', value: { kind: 'hex_color', hex: '#FFFF00' } },
      ],
    });
    expect(result.ok && result.value).toEqual({
      width: 200,
      height: 100,
      background: { type: 'color', r: 255, g: 255, b: 0 },
    });
  });

  it('ignores unknown properties with a warning', () => {
    const result = buildCamera({ properties: [{ name: 'zoom', value: { kind: 'number', value: 2 } }] });
    expect(result.ok).toBe(true);
    expect(result.warnings).toEqual(['Ignoring unknown camera property "zoom"']);
  });

  it('rejects non-integer or non-positive sizes', () => {
    const result = buildCamera({
      properties: [
        { name: 'width', value: { kind: 'number', value: 0 } },
        { name: 'height', value: { kind: 'number', value: 10.5 } },
      ],
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.diagnostics.map((d) => d.code)).toEqual(['InvalidCameraProperty', 'InvalidCameraProperty']);
  });

  it('rejects a mistyped background', () => {
    const result = buildCamera({
      properties: [{ name: 'background_color', value: { kind: 'string', value: 'black' } }],
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.diagnostics[0]?.code).toBe('SchemaTypeMismatch');
    expect(result.diagnostics[0]?.message).toBe('Camera background_color expects color, got text');
  });
});
