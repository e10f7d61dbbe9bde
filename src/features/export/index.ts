// Export feature: rasterization, frame orchestration and render jobs

export { renderFrame } from './utils/frame-renderer';
export type { RenderFrameOptions } from './utils/frame-renderer';
export { BlockGlyphRasterizer, GlyphMaskCache, defaultGlyphRasterizer } from './utils/glyph-rasterizer';
export type { GlyphMask, GlyphRasterizer } from './utils/glyph-rasterizer';
export {
  countDocumentFrames,
  isAbortError,
  renderDocumentFrames,
  renderSceneFrames,
} from './utils/render-orchestrator';
export type { FrameWorker, RenderEngineOptions, RenderProgress } from './utils/render-orchestrator';
export {
  createRenderJobStore,
  isTerminalStatus,
  renderJobStore,
  selectActiveJobs,
  selectJob,
} from './stores/render-job-store';
export type { RenderJob, RenderJobStatus, RenderJobStoreApi } from './stores/render-job-store';
