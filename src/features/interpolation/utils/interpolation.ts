/**
 * Segment interpolation utilities.
 * Provides functions to calculate property values at any time of a scene.
 */

import type { Value } from '@/types/value';
import type { CompiledTrack } from '@/types/timeline';
import { RenderInvariantError } from '@/lib/diagnostics';
import { colorValue } from '@/features/values/utils/value-model';
import { applyEasing } from './easing';

function lerp(from: number, to: number, progress: number): number {
  return from + (to - from) * progress;
}

/**
 * Blend two values of the same tag by eased progress.
 * Progress at or below 0 yields `from`, at or above 1 yields `to`, both
 * unchanged. Text never blends: it keeps `from` until progress reaches 1.
 */
export function interpolateValue(from: Value, to: Value, progress: number): Value {
  if (from.type !== to.type) {
    throw new RenderInvariantError(`Cannot interpolate ${from.type} to ${to.type}`, {});
  }
  if (progress <= 0) return from;
  if (progress >= 1) return to;

  switch (from.type) {
    case 'number':
      return to.type === 'number' ? { type: 'number', value: lerp(from.value, to.value, progress) } : to;
    case 'point':
      return to.type === 'point'
        ? { type: 'point', x: lerp(from.x, to.x, progress), y: lerp(from.y, to.y, progress) }
        : to;
    case 'color':
      return to.type === 'color'
        ? colorValue(lerp(from.r, to.r, progress), lerp(from.g, to.g, progress), lerp(from.b, to.b, progress))
        : to;
    case 'text':
      return from;
  }
}

/**
 * Get the value of a compiled track at a scene time.
 *
 * Segments are walked in order carrying the value that holds at each
 * segment's start: before a segment the carried value holds, after it the
 * segment's target does, and inside it the two are blended. Zero-length
 * segments therefore jump to their target at their start time.
 */
export function resolveTrack(track: CompiledTrack, timeMs: number): Value {
  let current = track.baseValue;

  for (const segment of track.segments) {
    if (timeMs < segment.startMs) return current;

    if (timeMs >= segment.endMs) {
      current = segment.to;
      continue;
    }

    const progress = (timeMs - segment.startMs) / (segment.endMs - segment.startMs);
    return interpolateValue(current, segment.to, applyEasing(progress, segment.easing));
  }

  return current;
}
