/**
 * Compile diagnostics and pipeline errors.
 *
 * Compile-stage problems are collected per scene as `CompileDiagnostic`s and
 * returned alongside results; a scene with any diagnostic produces no output.
 * Every diagnostic carries the scene/object/property/time context needed to
 * locate it in the source document.
 */

import type { ShapeKind } from '@/types/scene';

export type DiagnosticCategory = 'schema' | 'reference' | 'timing' | 'easing';

export type SchemaErrorCode =
  | 'UnknownShape'
  | 'UnknownProperty'
  | 'SchemaTypeMismatch'
  | 'InvalidColor'
  | 'DuplicateProperty'
  | 'DuplicateObjectId'
  | 'DuplicateSceneName'
  | 'UnknownParent'
  | 'InvalidCameraProperty';

export type ReferenceErrorCode =
  | 'UnknownSceneReference'
  | 'UnknownObjectReference'
  | 'UnknownPropertyReference';

export type TimingErrorCode = 'OverlappingAnimation' | 'NonPositiveDuration' | 'InvertedRange';

export type EasingErrorCode = 'UnknownEasing';

export type DiagnosticCode = SchemaErrorCode | ReferenceErrorCode | TimingErrorCode | EasingErrorCode;

export interface TimeRange {
  startMs: number;
  endMs: number;
}

export interface DiagnosticContext {
  /** Scene name; omitted for document-level camera problems */
  scene?: string;
  object?: string;
  shape?: ShapeKind | string;
  property?: string;
  range?: TimeRange;
}

export abstract class CompileDiagnostic extends Error {
  abstract readonly category: DiagnosticCategory;

  constructor(
    message: string,
    public readonly code: DiagnosticCode,
    public readonly context: DiagnosticContext
  ) {
    super(message);
  }

  /** Human-readable source location, e.g. `scene "intro", object "box", property position` */
  get location(): string {
    return formatContext(this.context);
  }
}

export class SchemaError extends CompileDiagnostic {
  readonly category = 'schema' as const;

  constructor(message: string, code: SchemaErrorCode, context: DiagnosticContext) {
    super(message, code, context);
    this.name = 'SchemaError';
  }
}

/** Timeline references to unknown scenes, objects or properties */
export class TimelineReferenceError extends CompileDiagnostic {
  readonly category = 'reference' as const;

  constructor(message: string, code: ReferenceErrorCode, context: DiagnosticContext) {
    super(message, code, context);
    this.name = 'TimelineReferenceError';
  }
}

export class TimingError extends CompileDiagnostic {
  readonly category = 'timing' as const;

  constructor(message: string, code: TimingErrorCode, context: DiagnosticContext) {
    super(message, code, context);
    this.name = 'TimingError';
  }
}

export class EasingError extends CompileDiagnostic {
  readonly category = 'easing' as const;

  constructor(message: string, code: EasingErrorCode, context: DiagnosticContext) {
    super(message, code, context);
    this.name = 'EasingError';
  }
}

/**
 * Thrown by the throwing compile helpers; wraps every diagnostic of one scene.
 */
export class SceneCompilationError extends Error {
  constructor(
    public readonly sceneName: string,
    public readonly diagnostics: readonly CompileDiagnostic[]
  ) {
    super(
      `Scene "${sceneName}" failed to compile with ${diagnostics.length} error(s):\n` +
        diagnostics.map((d) => `  ${d.code}: ${d.message}`).join('\n')
    );
    this.name = 'SceneCompilationError';
  }
}

/**
 * A render-stage invariant was broken (e.g. a required geometry property is
 * missing after defaulting). Indicates a scene model bug, never bad input.
 */
export class RenderInvariantError extends Error {
  constructor(
    message: string,
    public readonly context: DiagnosticContext & { frame?: number }
  ) {
    super(message);
    this.name = 'RenderInvariantError';
  }
}

/** Structurally invalid parse tree (wrong node shapes, missing fields) */
export class ParseTreeError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = 'ParseTreeError';
  }
}

export function formatContext(context: DiagnosticContext): string {
  const parts: string[] = [];
  if (context.scene !== undefined) parts.push(`scene "${context.scene}"`);
  if (context.object !== undefined) parts.push(`object "${context.object}"`);
  if (context.property !== undefined) parts.push(`property ${context.property}`);
  if (context.range) parts.push(formatRange(context.range));
  return parts.join(', ');
}

export function formatRange(range: TimeRange): string {
  return range.startMs === range.endMs
    ? `at ${range.startMs}ms`
    : `${range.startMs}ms-${range.endMs}ms`;
}

/**
 * Result of a compile step: a value when no diagnostics were raised.
 */
export type BuildResult<T> =
  | { ok: true; value: T; warnings: string[] }
  | { ok: false; diagnostics: CompileDiagnostic[]; warnings: string[] };
