/**
 * Render job store.
 *
 * Tracks frame rendering jobs from creation to a terminal state. Built on the
 * vanilla zustand store so it works outside any UI; subscribe with
 * `renderJobStore.subscribe` to follow progress.
 */

import { createStore } from 'zustand/vanilla';
import { createLogger } from '@/lib/logger';

const log = createLogger('RenderJobStore');

export type RenderJobStatus = 'pending' | 'rendering' | 'completed' | 'failed' | 'cancelled';

export interface RenderJob {
  jobId: string;
  status: RenderJobStatus;
  /** 0-100 */
  progress: number;
  renderedFrames: number;
  totalFrames: number;
  error?: string;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface RenderJobProgress {
  progress: number;
  renderedFrames: number;
  totalFrames: number;
}

interface RenderJobState {
  jobs: Record<string, RenderJob>;
}

interface RenderJobActions {
  createJob: (jobId: string) => RenderJob;
  getJob: (jobId: string) => RenderJob | undefined;
  getAllJobs: () => RenderJob[];
  /** Move a pending job to rendering; creates the job when unknown */
  startJob: (jobId: string, totalFrames: number) => RenderJob | undefined;
  updateProgress: (jobId: string, progress: Partial<RenderJobProgress>) => RenderJob | undefined;
  completeJob: (jobId: string) => RenderJob | undefined;
  failJob: (jobId: string, error: string) => RenderJob | undefined;
  cancelJob: (jobId: string) => RenderJob | undefined;
  deleteJob: (jobId: string) => boolean;
  /** Drop finished jobs that completed more than `maxAgeMs` ago */
  cleanupOldJobs: (maxAgeMs?: number, now?: Date) => string[];
}

export type RenderJobStore = RenderJobState & RenderJobActions;

const ONE_HOUR_MS = 60 * 60 * 1000;

export function isTerminalStatus(status: RenderJobStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

export function createRenderJobStore() {
  return createStore<RenderJobStore>()((set, get) => {
    /**
     * Apply an update to a job that has not finished yet.
     * Finished jobs are never changed again.
     */
    const updateJob = (jobId: string, update: (job: RenderJob) => RenderJob): RenderJob | undefined => {
      const job = get().jobs[jobId];
      if (!job) return undefined;
      if (isTerminalStatus(job.status)) {
        log.debug(`Ignoring update to finished job ${jobId}`, { status: job.status });
        return job;
      }

      const updatedJob = update(job);
      set((state) => ({ jobs: { ...state.jobs, [jobId]: updatedJob } }));
      return updatedJob;
    };

    return {
      jobs: {},

      createJob: (jobId) => {
        const job: RenderJob = {
          jobId,
          status: 'pending',
          progress: 0,
          renderedFrames: 0,
          totalFrames: 0,
          createdAt: new Date(),
        };

        set((state) => ({ jobs: { ...state.jobs, [jobId]: job } }));
        log.debug(`Created job ${jobId}`);
        return job;
      },

      getJob: (jobId) => get().jobs[jobId],

      getAllJobs: () => Object.values(get().jobs),

      startJob: (jobId, totalFrames) => {
        if (!get().jobs[jobId]) get().createJob(jobId);

        return updateJob(jobId, (job) => ({
          ...job,
          status: 'rendering',
          totalFrames,
          startedAt: new Date(),
        }));
      },

      updateProgress: (jobId, progress) =>
        updateJob(jobId, (job) => ({
          ...job,
          progress: progress.progress ?? job.progress,
          renderedFrames: progress.renderedFrames ?? job.renderedFrames,
          totalFrames: progress.totalFrames ?? job.totalFrames,
        })),

      completeJob: (jobId) => {
        const job = updateJob(jobId, (current) => ({
          ...current,
          status: 'completed',
          progress: 100,
          renderedFrames: current.totalFrames,
          completedAt: new Date(),
        }));
        if (job?.status === 'completed') log.info(`Job ${jobId} completed`);
        return job;
      },

      failJob: (jobId, error) => {
        const job = updateJob(jobId, (current) => ({
          ...current,
          status: 'failed',
          error,
          completedAt: new Date(),
        }));
        if (job?.status === 'failed') log.error(`Job ${jobId} failed:`, error);
        return job;
      },

      cancelJob: (jobId) => {
        const job = updateJob(jobId, (current) => ({
          ...current,
          status: 'cancelled',
          completedAt: new Date(),
        }));
        if (job?.status === 'cancelled') log.info(`Job ${jobId} cancelled`);
        return job;
      },

      deleteJob: (jobId) => {
        if (!get().jobs[jobId]) return false;
        set((state) => {
          const jobs = { ...state.jobs };
          delete jobs[jobId];
          return { jobs };
        });
        log.debug(`Deleted job ${jobId}`);
        return true;
      },

      cleanupOldJobs: (maxAgeMs = ONE_HOUR_MS, now = new Date()) => {
        const cutoff = now.getTime() - maxAgeMs;
        const expired = Object.values(get().jobs)
          .filter((job) => isTerminalStatus(job.status) && job.completedAt && job.completedAt.getTime() < cutoff)
          .map((job) => job.jobId);

        if (expired.length > 0) {
          set((state) => ({
            jobs: Object.fromEntries(Object.entries(state.jobs).filter(([jobId]) => !expired.includes(jobId))),
          }));
          log.debug('Cleaned up old jobs', { count: expired.length });
        }
        return expired;
      },
    };
  });
}

export type RenderJobStoreApi = ReturnType<typeof createRenderJobStore>;

/** Process-wide job store used by the render orchestrator by default */
export const renderJobStore: RenderJobStoreApi = createRenderJobStore();

// Selectors
export const selectJob = (jobId: string) => (state: RenderJobStore) => state.jobs[jobId];
export const selectActiveJobs = (state: RenderJobStore) =>
  Object.values(state.jobs).filter((job) => !isTerminalStatus(job.status));
