import type { ShapeKind } from './scene';
import type { PropertySet } from './value';

/** Resolved property state of one object at one sampled time */
export interface ObjectSnapshot {
  id: string;
  kind: ShapeKind;
  index: number;
  properties: PropertySet;
}

/** Resolved state of every object of a scene at one sampled time */
export interface FrameSnapshot {
  sceneName: string;
  /** Frame index k within the scene */
  index: number;
  timeMs: number;
  /** Objects in draw order */
  objects: readonly ObjectSnapshot[];
}

export interface FrameTimestamp {
  index: number;
  timeMs: number;
}

/** RGBA pixel buffer tagged with its frame index */
export interface RasterFrame {
  sceneName: string;
  index: number;
  timeMs: number;
  width: number;
  height: number;
  /** Row-major RGBA, 4 bytes per pixel */
  data: Uint8ClampedArray;
}

/** Raster frame placed within a whole-document render */
export interface SequencedFrame extends RasterFrame {
  /** Document-wide frame number across all scenes */
  sequence: number;
}
