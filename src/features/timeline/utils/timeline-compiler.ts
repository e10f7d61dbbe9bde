/**
 * Timeline compiler.
 *
 * Resolves the animations of one scene against its objects, groups them into
 * per-(object, property) tracks sorted by time and rejects overlapping
 * segments. A scene compiles completely or not at all.
 */

import type { ParsedAnimation, ParsedScene } from '@/types/parse-tree';
import type { Scene } from '@/types/scene';
import type { Animation, CompiledScene, CompiledTrack } from '@/types/timeline';
import {
  type BuildResult,
  type CompileDiagnostic,
  EasingError,
  SceneCompilationError,
  SchemaError,
  TimelineReferenceError,
  TimingError,
  formatRange,
} from '@/lib/diagnostics';
import { createLogger } from '@/lib/logger';
import { describeValue, fromRawValue } from '@/features/values/utils/value-model';
import { isEasingType } from '@/features/interpolation/utils/easing';
import { getShapeSchema } from '@/features/scene-model/utils/property-schema';
import { buildScene, toMilliseconds } from '@/features/scene-model/utils/scene-builder';

const log = createLogger('TimelineCompiler');

/**
 * Check if two sorted segments of one track overlap.
 * Touching ranges do not; two instants at the same time do.
 */
export function segmentsOverlap(prev: Animation, next: Animation): boolean {
  if (next.startMs < prev.endMs) return true;
  return (
    prev.startMs === prev.endMs &&
    next.startMs === next.endMs &&
    prev.startMs === next.startMs
  );
}

function compareSegments(a: Animation, b: Animation): number {
  return a.startMs - b.startMs || a.endMs - b.endMs || a.declarationIndex - b.declarationIndex;
}

function resolveAnimation(
  scene: Scene,
  parsed: ParsedAnimation,
  declarationIndex: number,
  diagnostics: CompileDiagnostic[]
): { animation: Animation; objectIndex: number } | null {
  const startMs = toMilliseconds(parsed.start);
  const endMs = parsed.end ? toMilliseconds(parsed.end) : startMs;
  const range = { startMs, endMs };
  const context = { scene: scene.name, object: parsed.target, property: parsed.property, range };

  const objectIndex = scene.objects.findIndex((o) => o.id === parsed.target);
  const object = scene.objects[objectIndex];
  if (!object) {
    diagnostics.push(
      new TimelineReferenceError(
        `Animation targets unknown object "${parsed.target}"`,
        'UnknownObjectReference',
        context
      )
    );
    return null;
  }

  let valid = true;
  const current = object.properties.get(parsed.property);
  const spec = getShapeSchema(object.kind).get(parsed.property);
  const target = fromRawValue(parsed.to);

  if (!current || !spec) {
    diagnostics.push(
      new TimelineReferenceError(
        `Object "${object.id}" has no property "${parsed.property}"`,
        'UnknownPropertyReference',
        context
      )
    );
    valid = false;
  } else if (!spec.animatable) {
    diagnostics.push(
      new TimelineReferenceError(
        `Property "${parsed.property}" of ${object.kind} cannot be animated`,
        'UnknownPropertyReference',
        context
      )
    );
    valid = false;
  } else if (!target.ok) {
    diagnostics.push(new SchemaError(`Invalid hex color "${target.hex}"`, 'InvalidColor', context));
    valid = false;
  } else if (target.value.type !== current.type) {
    diagnostics.push(
      new TimelineReferenceError(
        `Property "${parsed.property}" of "${object.id}" holds ${current.type}, cannot animate to ${describeValue(target.value)}`,
        'UnknownPropertyReference',
        context
      )
    );
    valid = false;
  }

  const easing = parsed.easing ?? 'linear';
  if (!isEasingType(easing)) {
    diagnostics.push(new EasingError(`Unknown easing "${easing}"`, 'UnknownEasing', context));
    valid = false;
  }

  if (endMs < startMs) {
    diagnostics.push(
      new TimingError(`Animation ends before it starts (${startMs}ms-${endMs}ms)`, 'InvertedRange', context)
    );
    valid = false;
  }

  if (!valid || !target.ok || !isEasingType(easing)) return null;

  return {
    objectIndex,
    animation: {
      sceneName: scene.name,
      objectId: object.id,
      property: parsed.property,
      startMs,
      endMs,
      to: target.value,
      easing,
      declarationIndex,
    },
  };
}

/**
 * Compile the animations declared for a scene.
 * @param animations Animations of every timeline block for the scene, in document order
 */
export function compileTimeline(scene: Scene, animations: readonly ParsedAnimation[]): BuildResult<CompiledScene> {
  const diagnostics: CompileDiagnostic[] = [];
  const warnings: string[] = [];
  const grouped = new Map<string, { objectIndex: number; segments: Animation[] }>();

  animations.forEach((parsed, declarationIndex) => {
    const resolved = resolveAnimation(scene, parsed, declarationIndex, diagnostics);
    if (!resolved) return;

    const { animation, objectIndex } = resolved;
    const key = `${animation.objectId}\u0000${animation.property}`;
    const group = grouped.get(key);
    if (group) {
      group.segments.push(animation);
    } else {
      grouped.set(key, { objectIndex, segments: [animation] });
    }
  });

  const tracks: CompiledTrack[] = [];
  for (const { objectIndex, segments } of grouped.values()) {
    segments.sort(compareSegments);

    for (let i = 1; i < segments.length; i++) {
      const prev = segments[i - 1];
      const next = segments[i];
      if (prev && next && segmentsOverlap(prev, next)) {
        diagnostics.push(
          new TimingError(
            `Animation ${formatRange({ startMs: next.startMs, endMs: next.endMs })} overlaps ` +
              `${formatRange({ startMs: prev.startMs, endMs: prev.endMs })} on "${next.objectId}".${next.property}`,
            'OverlappingAnimation',
            {
              scene: scene.name,
              object: next.objectId,
              property: next.property,
              range: { startMs: next.startMs, endMs: next.endMs },
            }
          )
        );
      }
    }

    const object = scene.objects[objectIndex];
    const first = segments[0];
    const baseValue = first && object?.properties.get(first.property);
    if (!object || !first || !baseValue) continue;

    tracks.push(
      Object.freeze({
        objectIndex,
        objectId: object.id,
        property: first.property,
        baseValue,
        segments: Object.freeze(segments),
      })
    );
  }

  if (diagnostics.length > 0) {
    log.debug(`Timeline for "${scene.name}" rejected`, { errors: diagnostics.length });
    return { ok: false, diagnostics, warnings };
  }

  tracks.sort((a, b) => a.objectIndex - b.objectIndex);

  const lastEndMs = tracks.reduce(
    (max, track) => track.segments.reduce((m, segment) => Math.max(m, segment.endMs), max),
    0
  );

  let durationMs = lastEndMs;
  if (scene.declaredDurationMs !== undefined) {
    durationMs = scene.declaredDurationMs;
    if (durationMs < lastEndMs) {
      const warning = `Scene "${scene.name}" lasts ${durationMs}ms but animates until ${lastEndMs}ms`;
      log.warn(warning);
      warnings.push(warning);
    }
  }

  const tracksByObject = scene.objects.map((_, index) =>
    Object.freeze(tracks.filter((track) => track.objectIndex === index))
  );

  log.debug(`Compiled timeline for "${scene.name}"`, { tracks: tracks.length, durationMs });

  return {
    ok: true,
    value: Object.freeze({
      scene,
      tracks: Object.freeze(tracks),
      tracksByObject: Object.freeze(tracksByObject),
      durationMs,
    }),
    warnings,
  };
}

/**
 * Build a scene and compile its timeline in one step.
 */
export function compileScene(
  parsed: ParsedScene,
  animations: readonly ParsedAnimation[]
): BuildResult<CompiledScene> {
  const built = buildScene(parsed);
  if (!built.ok) return built;

  const compiled = compileTimeline(built.value, animations);
  return { ...compiled, warnings: [...built.warnings, ...compiled.warnings] };
}

/**
 * Same as `compileScene`, but throws a `SceneCompilationError` carrying every
 * diagnostic of the scene.
 */
export function compileSceneOrThrow(parsed: ParsedScene, animations: readonly ParsedAnimation[]): CompiledScene {
  const result = compileScene(parsed, animations);
  if (!result.ok) {
    throw new SceneCompilationError(parsed.name, result.diagnostics);
  }
  return result.value;
}
