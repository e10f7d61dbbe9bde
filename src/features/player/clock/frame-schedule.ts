/**
 * Frame schedule - sample timestamps for a scene.
 *
 * Frame k is sampled at k / fps seconds for k = 0 ... ceil(duration * fps),
 * so the last frame always lands on the scene's final instant. Iteration is
 * lazy and can be restarted any number of times.
 */

import type { FrameSnapshot, FrameTimestamp } from '@/types/frame';
import type { CompiledScene } from '@/types/timeline';
import { resolveSnapshot } from '@/features/interpolation/utils/animated-property-resolver';

// Absorbs float noise in duration * fps for fractional rates such as 29.97
const FRAME_COUNT_EPSILON = 1e-9;

export class FrameSchedule implements Iterable<FrameTimestamp> {
  readonly frameCount: number;

  constructor(
    readonly durationMs: number,
    readonly fps: number
  ) {
    if (!Number.isFinite(fps) || fps <= 0) {
      throw new RangeError(`Frame rate must be a positive number, got ${fps}`);
    }
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      throw new RangeError(`Duration must be a non-negative number, got ${durationMs}`);
    }
    this.frameCount = Math.ceil((durationMs * fps) / 1000 - FRAME_COUNT_EPSILON) + 1;
  }

  /**
   * Timestamp of frame `index`; the final frame is clamped to the duration.
   */
  timeAt(index: number): number {
    return Math.min((index * 1000) / this.fps, this.durationMs);
  }

  *[Symbol.iterator](): Iterator<FrameTimestamp> {
    for (let index = 0; index < this.frameCount; index++) {
      yield { index, timeMs: this.timeAt(index) };
    }
  }
}

export function createFrameSchedule(durationMs: number, fps: number): FrameSchedule {
  return new FrameSchedule(durationMs, fps);
}

/**
 * Lazily resolve the snapshot of every scheduled frame, in index order.
 */
export function* iterateSnapshots(compiled: CompiledScene, fps: number): Generator<FrameSnapshot> {
  for (const { index, timeMs } of createFrameSchedule(compiled.durationMs, fps)) {
    yield resolveSnapshot(compiled, timeMs, index);
  }
}
