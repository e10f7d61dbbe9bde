/**
 * Camera configuration from the document's `camera` block.
 *
 * Recognised properties: `width`, `height` (positive integer pixels) and
 * `background_color` (hex). Anything else is ignored with a warning.
 */

import type { ParsedCamera } from '@/types/parse-tree';
import type { Camera } from '@/types/scene';
import { DEFAULT_CAMERA } from '@/types/scene';
import { type BuildResult, type CompileDiagnostic, SchemaError } from '@/lib/diagnostics';
import { createLogger } from '@/lib/logger';
import { RAW_KIND_TO_TYPE, parseHexColor } from '@/features/values/utils/value-model';

const log = createLogger('Camera');

export const CAMERA_PROPERTIES = ['width', 'height', 'background_color'] as const;

type CameraProperty = (typeof CAMERA_PROPERTIES)[number];

function isCameraProperty(name: string): name is CameraProperty {
  return (CAMERA_PROPERTIES as readonly string[]).includes(name);
}

export function buildCamera(parsed: ParsedCamera | undefined): BuildResult<Camera> {
  const camera: Camera = { ...DEFAULT_CAMERA };
  const diagnostics: CompileDiagnostic[] = [];
  const warnings: string[] = [];

  for (const { name, value } of parsed?.properties ?? []) {
    if (!isCameraProperty(name)) {
      const warning = `Ignoring unknown camera property "${name}"`;
      log.warn(warning);
      warnings.push(warning);
      continue;
    }

    const context = { property: name };

    if (name === 'background_color') {
      const color = value.kind === 'hex_color' ? parseHexColor(value.hex) : null;
      if (!color) {
        diagnostics.push(
          new SchemaError(
            value.kind === 'hex_color'
              ? `Invalid hex color "${value.hex}"`
              : `Camera background_color expects color, got ${RAW_KIND_TO_TYPE[value.kind]}`,
            value.kind === 'hex_color' ? 'InvalidColor' : 'SchemaTypeMismatch',
            context
          )
        );
        continue;
      }
      camera.background = color;
      continue;
    }

    if (value.kind !== 'number') {
      diagnostics.push(
        new SchemaError(
          `Camera ${name} expects number, got ${RAW_KIND_TO_TYPE[value.kind]}`,
          'SchemaTypeMismatch',
          context
        )
      );
      continue;
    }
    if (!Number.isInteger(value.value) || value.value <= 0) {
      diagnostics.push(
        new SchemaError(
          `Camera ${name} must be a positive integer, got ${value.value}`,
          'InvalidCameraProperty',
          context
        )
      );
      continue;
    }
    camera[name] = value.value;
  }

  if (diagnostics.length > 0) {
    return { ok: false, diagnostics, warnings };
  }
  return { ok: true, value: Object.freeze(camera), warnings };
}
