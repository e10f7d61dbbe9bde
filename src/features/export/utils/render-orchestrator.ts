/**
 * Render Orchestrator
 *
 * Top-level entry points that drive frame rendering:
 * - {@link renderSceneFrames} – renders every frame of one compiled scene
 * - {@link renderDocumentFrames} – renders all compiled scenes of a document
 *   back to back with a document-wide sequence number
 *
 * Frames are produced by a pluggable worker with a bounded number in flight
 * and are always delivered in index order. Progress is reported through a
 * callback and, when a job id is given, through the render job store.
 */

import type { FrameSnapshot, RasterFrame, SequencedFrame } from '@/types/frame';
import type { Camera } from '@/types/scene';
import type { CompiledScene } from '@/types/timeline';
import { config } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import { createFrameSchedule } from '@/features/player/clock/frame-schedule';
import { hasAnimation, resolveSnapshot } from '@/features/interpolation/utils/animated-property-resolver';
import type { DocumentCompileResult } from '@/features/document/utils/document-compiler';
import { type RenderJobStoreApi, renderJobStore } from '../stores/render-job-store';
import { type RenderFrameOptions, renderFrame } from './frame-renderer';

const log = createLogger('RenderOrchestrator');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Turns one snapshot into pixels. May run anywhere (e.g. a worker thread)
 * as long as it returns the frame for the snapshot it was given.
 */
export type FrameWorker = (snapshot: FrameSnapshot, camera: Camera) => RasterFrame | Promise<RasterFrame>;

export interface RenderProgress {
  sceneName: string;
  renderedFrames: number;
  totalFrames: number;
  /** 0-100 */
  progress: number;
}

export interface RenderEngineOptions {
  /** Frames per second of scene time; defaults to FRAMECAST_FPS */
  fps?: number;
  /** Frames in flight at once; defaults to FRAMECAST_CONCURRENCY */
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (progress: RenderProgress) => void;
  /** Defaults to in-process `renderFrame` */
  worker?: FrameWorker;
  /** Passed to the default worker */
  renderOptions?: RenderFrameOptions;
  /** Track the render as this job in `store` */
  jobId?: string;
  store?: RenderJobStoreApi;
}

interface FrameSource {
  fps: number;
  concurrency: number;
  worker: FrameWorker;
  signal?: AbortSignal;
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new DOMException('Render cancelled', 'AbortError');
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  return promise.then(
    (value): Settled<T> => ({ ok: true, value }),
    (error: unknown): Settled<T> => ({ ok: false, error })
  );
}

function resolveSource(options: RenderEngineOptions): FrameSource {
  const renderOptions = options.renderOptions;
  const concurrency = options.concurrency ?? config.render.concurrency;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  return {
    fps: options.fps ?? config.render.fps,
    concurrency,
    worker: options.worker ?? ((snapshot, camera) => renderFrame(snapshot, camera, renderOptions)),
    signal: options.signal,
  };
}

/**
 * Produce the frames of one scene in index order.
 * A scene without animation is rasterized once and copied for every frame.
 */
async function* produceFrames(
  compiled: CompiledScene,
  camera: Camera,
  source: FrameSource
): AsyncGenerator<RasterFrame> {
  const { worker, signal, concurrency } = source;
  const schedule = createFrameSchedule(compiled.durationMs, source.fps);
  throwIfAborted(signal);

  if (!hasAnimation(compiled)) {
    log.debug(`Scene "${compiled.scene.name}" is static, rendering once`);
    const still = await worker(resolveSnapshot(compiled, 0, 0), camera);
    for (const { index, timeMs } of schedule) {
      throwIfAborted(signal);
      yield { ...still, index, timeMs, data: index === 0 ? still.data : still.data.slice() };
    }
    return;
  }

  const timestamps = schedule[Symbol.iterator]();
  // Reorder buffer: frames may finish out of order but leave in index order
  const inFlight = new Map<number, Promise<Settled<RasterFrame>>>();
  let exhausted = false;

  const fill = () => {
    while (!exhausted && inFlight.size < concurrency) {
      const next = timestamps.next();
      if (next.done) {
        exhausted = true;
        break;
      }
      const { index, timeMs } = next.value;
      const snapshot = resolveSnapshot(compiled, timeMs, index);
      inFlight.set(index, settle(Promise.resolve().then(() => worker(snapshot, camera))));
    }
  };

  for (let index = 0; index < schedule.frameCount; index++) {
    throwIfAborted(signal);
    fill();

    const pending = inFlight.get(index);
    if (!pending) {
      throw new Error(`Frame ${index} of scene "${compiled.scene.name}" was never scheduled`);
    }
    const result = await pending;
    inFlight.delete(index);

    if (!result.ok) throw result.error;
    throwIfAborted(signal);
    yield result.value;
  }
}

/**
 * Produce the frames of several scenes back to back, numbered across scenes.
 */
async function* sequenceFrames(
  scenes: readonly CompiledScene[],
  camera: Camera,
  source: FrameSource
): AsyncGenerator<SequencedFrame> {
  let sequence = 0;
  for (const compiled of scenes) {
    for await (const frame of produceFrames(compiled, camera, source)) {
      yield { ...frame, sequence: sequence++ };
    }
  }
}

/**
 * Report progress for every frame passing through and keep the job, if any,
 * in step with the render.
 */
async function* trackProgress<T extends RasterFrame>(
  frames: AsyncIterable<T>,
  totalFrames: number,
  options: RenderEngineOptions
): AsyncGenerator<T> {
  const { jobId, onProgress } = options;
  const store = options.store ?? renderJobStore;
  let renderedFrames = 0;
  let finished = false;

  if (jobId) store.getState().startJob(jobId, totalFrames);

  try {
    for await (const frame of frames) {
      renderedFrames++;
      const progress: RenderProgress = {
        sceneName: frame.sceneName,
        renderedFrames,
        totalFrames,
        progress: Math.round((renderedFrames / totalFrames) * 100),
      };
      onProgress?.(progress);
      if (jobId) store.getState().updateProgress(jobId, progress);
      yield frame;
    }
    finished = true;
    if (jobId) store.getState().completeJob(jobId);
  } catch (error) {
    finished = true;
    if (jobId) {
      if (isAbortError(error)) {
        store.getState().cancelJob(jobId);
      } else {
        store.getState().failJob(jobId, error instanceof Error ? error.message : String(error));
      }
    }
    throw error;
  } finally {
    // Consumer stopped iterating early
    if (!finished && jobId) store.getState().cancelJob(jobId);
  }
}

// ---------------------------------------------------------------------------
// renderSceneFrames
// ---------------------------------------------------------------------------

/**
 * Render every frame of a compiled scene, yielding frames strictly by index.
 */
export async function* renderSceneFrames(
  compiled: CompiledScene,
  camera: Camera,
  options: RenderEngineOptions = {}
): AsyncGenerator<RasterFrame> {
  const source = resolveSource(options);
  const totalFrames = createFrameSchedule(compiled.durationMs, source.fps).frameCount;

  log.info('Rendering scene', {
    scene: compiled.scene.name,
    totalFrames,
    fps: source.fps,
    concurrency: source.concurrency,
  });

  yield* trackProgress(produceFrames(compiled, camera, source), totalFrames, options);
}

// ---------------------------------------------------------------------------
// renderDocumentFrames
// ---------------------------------------------------------------------------

/**
 * Total number of frames of every compiled scene of a document
 */
export function countDocumentFrames(result: DocumentCompileResult, fps: number = config.render.fps): number {
  return result.scenes.reduce((total, compiled) => total + createFrameSchedule(compiled.durationMs, fps).frameCount, 0);
}

/**
 * Render every compiled scene of a document in document order.
 * Frames carry a sequence number that keeps counting across scenes.
 */
export async function* renderDocumentFrames(
  result: DocumentCompileResult,
  options: RenderEngineOptions = {}
): AsyncGenerator<SequencedFrame> {
  const { camera } = result;
  if (!camera) {
    throw new Error('Cannot render a document whose camera failed to compile');
  }

  const source = resolveSource(options);
  const totalFrames = countDocumentFrames(result, source.fps);

  log.info('Rendering document', { scenes: result.scenes.length, totalFrames, fps: source.fps });

  yield* trackProgress(sequenceFrames(result.scenes, camera, source), totalFrames, options);
}
