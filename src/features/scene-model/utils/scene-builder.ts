/**
 * Scene model builder.
 * Validates parsed object declarations against the property schema table and
 * produces an immutable scene. All diagnostics of a scene are collected; the
 * scene is only produced when there are none.
 */

import type { ParsedObject, ParsedScene, TimeValue } from '@/types/parse-tree';
import type { Scene, SceneObject, ShapeKind } from '@/types/scene';
import type { Value } from '@/types/value';
import {
  type BuildResult,
  type CompileDiagnostic,
  SchemaError,
  TimingError,
} from '@/lib/diagnostics';
import { createLogger } from '@/lib/logger';
import { RAW_KIND_TO_TYPE, fromRawValue } from '@/features/values/utils/value-model';
import { getShapeSchema, isShapeKind } from './property-schema';

const log = createLogger('SceneBuilder');

/** Sub-millisecond resolution kept when converting seconds */
const NANOSECONDS_PER_MS = 1e6;

/**
 * Convert a parse-tree time to milliseconds.
 * Seconds are snapped to whole nanoseconds so `1.001s` equals `1001ms`.
 */
export function toMilliseconds(time: TimeValue): number {
  if (time.unit === 'ms') return time.value;
  return Math.round(time.value * 1000 * NANOSECONDS_PER_MS) / NANOSECONDS_PER_MS;
}

function buildObject(
  sceneName: string,
  declaration: ParsedObject,
  index: number,
  diagnostics: CompileDiagnostic[]
): SceneObject | null {
  const { shape, id } = declaration;

  if (!isShapeKind(shape)) {
    diagnostics.push(
      new SchemaError(`Unknown shape "${shape}"`, 'UnknownShape', { scene: sceneName, object: id, shape })
    );
    return null;
  }

  const kind: ShapeKind = shape;
  const schema = getShapeSchema(kind);
  const properties = new Map<string, Value>();
  const seen = new Set<string>();
  let valid = true;

  for (const property of declaration.properties) {
    const context = { scene: sceneName, object: id, shape: kind, property: property.name };
    const spec = schema.get(property.name);

    if (!spec) {
      diagnostics.push(
        new SchemaError(`Shape "${kind}" has no property "${property.name}"`, 'UnknownProperty', context)
      );
      valid = false;
      continue;
    }

    if (seen.has(property.name)) {
      diagnostics.push(
        new SchemaError(`Property "${property.name}" is declared more than once`, 'DuplicateProperty', context)
      );
      valid = false;
      continue;
    }
    seen.add(property.name);

    const actual = RAW_KIND_TO_TYPE[property.value.kind];
    if (actual !== spec.type) {
      diagnostics.push(
        new SchemaError(
          `Property "${property.name}" of ${kind} expects ${spec.type}, got ${actual}`,
          'SchemaTypeMismatch',
          context
        )
      );
      valid = false;
      continue;
    }

    const converted = fromRawValue(property.value);
    if (!converted.ok) {
      diagnostics.push(
        new SchemaError(`Invalid hex color "${converted.hex}"`, 'InvalidColor', context)
      );
      valid = false;
      continue;
    }

    properties.set(property.name, Object.freeze(converted.value));
  }

  // Fill defaults in schema order so every object of a kind iterates alike
  const ordered = new Map<string, Value>();
  for (const [name, spec] of schema) {
    const value = properties.get(name) ?? spec.default;
    if (value) ordered.set(name, value);
  }

  if (!valid) return null;

  return Object.freeze({ id, kind, index, properties: ordered });
}

/**
 * Check `parent` links: each must name a group declared earlier in the scene.
 */
function validateParents(
  sceneName: string,
  objects: readonly SceneObject[],
  diagnostics: CompileDiagnostic[]
): void {
  const groupsSoFar = new Set<string>();

  for (const object of objects) {
    const parent = object.properties.get('parent');
    if (parent?.type === 'text' && parent.value !== '' && !groupsSoFar.has(parent.value)) {
      diagnostics.push(
        new SchemaError(
          `Parent "${parent.value}" is not a group declared before "${object.id}"`,
          'UnknownParent',
          { scene: sceneName, object: object.id, shape: object.kind, property: 'parent' }
        )
      );
    }
    if (object.kind === 'group') groupsSoFar.add(object.id);
  }
}

/**
 * Build an immutable scene from its parsed declaration.
 */
export function buildScene(parsed: ParsedScene): BuildResult<Scene> {
  const diagnostics: CompileDiagnostic[] = [];
  const objects: SceneObject[] = [];
  const ids = new Set<string>();

  parsed.objects.forEach((declaration) => {
    if (ids.has(declaration.id)) {
      diagnostics.push(
        new SchemaError(`Duplicate object id "${declaration.id}"`, 'DuplicateObjectId', {
          scene: parsed.name,
          object: declaration.id,
        })
      );
      return;
    }
    ids.add(declaration.id);

    const object = buildObject(parsed.name, declaration, objects.length, diagnostics);
    if (object) objects.push(object);
  });

  validateParents(parsed.name, objects, diagnostics);

  let declaredDurationMs: number | undefined;
  if (parsed.duration) {
    declaredDurationMs = toMilliseconds(parsed.duration);
    if (!(declaredDurationMs > 0)) {
      diagnostics.push(
        new TimingError(`Scene duration must be positive, got ${declaredDurationMs}ms`, 'NonPositiveDuration', {
          scene: parsed.name,
        })
      );
    }
  }

  if (diagnostics.length > 0) {
    log.debug(`Scene "${parsed.name}" rejected`, { errors: diagnostics.length });
    return { ok: false, diagnostics, warnings: [] };
  }

  const scene: Scene = {
    name: parsed.name,
    objects: Object.freeze(objects),
  };
  if (declaredDurationMs !== undefined) scene.declaredDurationMs = declaredDurationMs;

  log.debug(`Built scene "${parsed.name}"`, { objects: objects.length });
  return { ok: true, value: Object.freeze(scene), warnings: [] };
}
