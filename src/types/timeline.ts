/**
 * Animation and compiled timeline types.
 */

import type { Scene } from './scene';
import type { Value } from './value';

/** Easing functions applied to normalized progress before interpolation */
export type EasingType = 'linear' | 'ease_in' | 'ease_out' | 'ease_in_out';

export const EASING_TYPES: readonly EasingType[] = [
  'linear',
  'ease_in',
  'ease_out',
  'ease_in_out',
];

/**
 * One animation declaration after reference resolution.
 * An instant change (`at T`) has `endMs === startMs`.
 */
export interface Animation {
  sceneName: string;
  objectId: string;
  property: string;
  startMs: number;
  endMs: number;
  to: Value;
  easing: EasingType;
  /** Position within the scene's merged timeline blocks */
  declarationIndex: number;
}

/**
 * Time-ordered, non-overlapping animations for one (object, property) pair.
 * Segment i ends no later than segment i + 1 starts.
 */
export interface CompiledTrack {
  /** Index into `scene.objects` */
  objectIndex: number;
  objectId: string;
  property: string;
  /** Value before the first segment starts */
  baseValue: Value;
  segments: readonly Animation[];
}

export interface CompiledScene {
  scene: Scene;
  tracks: readonly CompiledTrack[];
  /** Tracks grouped by object index, parallel to `scene.objects` */
  tracksByObject: ReadonlyArray<readonly CompiledTrack[]>;
  /** Declared duration, or the latest segment end when none was declared */
  durationMs: number;
}
