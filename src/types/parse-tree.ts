/**
 * Parse tree handed over by the grammar front end.
 *
 * Mirrors the document syntax one-to-one: a camera block, `scene "<name>" { ... }`
 * blocks and `timeline for "<name>" { ... }` blocks. Values are still
 * syntactic here (a hex string is not yet a color); the scene model builder
 * turns them into typed values.
 */

export type RawValueKind = 'number' | 'tuple' | 'hex_color' | 'string';

export type RawValue =
  | { kind: 'number'; value: number }
  | { kind: 'tuple'; x: number; y: number }
  | { kind: 'hex_color'; hex: string }
  | { kind: 'string'; value: string };

export type TimeUnit = 's' | 'ms';

export interface TimeValue {
  value: number;
  unit: TimeUnit;
}

export interface ParsedProperty {
  name: string;
  value: RawValue;
}

export interface ParsedObject {
  /** Shape keyword as written, e.g. `circle` */
  shape: string;
  /** Quoted object identifier */
  id: string;
  properties: ParsedProperty[];
}

export interface ParsedScene {
  name: string;
  duration?: TimeValue;
  objects: ParsedObject[];
}

export interface ParsedAnimation {
  /** `at T` carries only `start`; `at A to B` carries both */
  start: TimeValue;
  end?: TimeValue;
  /** Object id from the `"id".property` target */
  target: string;
  property: string;
  to: RawValue;
  easing?: string;
}

export interface ParsedTimeline {
  scene: string;
  animations: ParsedAnimation[];
}

export interface ParsedCamera {
  properties: ParsedProperty[];
}

export interface ParsedDocument {
  camera?: ParsedCamera;
  scenes: ParsedScene[];
  timelines: ParsedTimeline[];
}
