/**
 * Animated property resolver.
 * Merges track-animated values with the base property sets of a scene.
 */

import type { Value } from '@/types/value';
import type { CompiledScene, CompiledTrack } from '@/types/timeline';
import type { FrameSnapshot, ObjectSnapshot } from '@/types/frame';
import type { SceneObject } from '@/types/scene';
import { resolveTrack } from './interpolation';

/**
 * Resolve one object at a scene time.
 * Objects without tracks are returned with their base properties untouched.
 */
export function resolveObject(
  object: SceneObject,
  tracks: readonly CompiledTrack[],
  timeMs: number
): ObjectSnapshot {
  if (tracks.length === 0) {
    return { id: object.id, kind: object.kind, index: object.index, properties: object.properties };
  }

  const properties = new Map<string, Value>(object.properties);
  for (const track of tracks) {
    properties.set(track.property, resolveTrack(track, timeMs));
  }

  return { id: object.id, kind: object.kind, index: object.index, properties };
}

/**
 * Resolve every object of a compiled scene at a scene time.
 */
export function resolveSnapshot(compiled: CompiledScene, timeMs: number, index: number): FrameSnapshot {
  const objects = compiled.scene.objects.map((object, i) =>
    resolveObject(object, compiled.tracksByObject[i] ?? [], timeMs)
  );

  return { sceneName: compiled.scene.name, index, timeMs, objects };
}

/**
 * Check if a compiled scene has any animation at all.
 */
export function hasAnimation(compiled: CompiledScene): boolean {
  return compiled.tracks.some((track) => track.segments.length > 0);
}
