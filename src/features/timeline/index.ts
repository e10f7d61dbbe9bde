// Timeline feature: compiles animation declarations into per-property tracks

export { compileScene, compileSceneOrThrow, compileTimeline, segmentsOverlap } from './utils/timeline-compiler';
