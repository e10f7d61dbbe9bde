// framecast public API

export * from './features/values';
export * from './features/scene-model';
export * from './features/timeline';
export * from './features/interpolation';
export { FrameSchedule, createFrameSchedule, iterateSnapshots } from './features/player/clock/frame-schedule';
export * from './features/document';
export * from './features/export';

export {
  CompileDiagnostic,
  EasingError,
  ParseTreeError,
  RenderInvariantError,
  SceneCompilationError,
  SchemaError,
  TimelineReferenceError,
  TimingError,
  formatContext,
  formatRange,
} from './lib/diagnostics';
export type {
  BuildResult,
  DiagnosticCategory,
  DiagnosticCode,
  DiagnosticContext,
  TimeRange,
} from './lib/diagnostics';
export { loadConfig } from './lib/config';
export type { AppConfig, LogLevelName } from './lib/config';
export { LogLevel, Logger, createLogger, setRootLogLevel } from './lib/logger';

export type * from './types/value';
export type * from './types/parse-tree';
export type * from './types/scene';
export type * from './types/timeline';
export type * from './types/frame';
export { VALUE_TYPES } from './types/value';
export { DEFAULT_CAMERA, SHAPE_KINDS } from './types/scene';
export { EASING_TYPES } from './types/timeline';
