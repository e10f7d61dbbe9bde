/**
 * Runtime configuration from environment variables
 *
 * Recognised variables (all optional):
 *   FRAMECAST_FPS          frames sampled per second of scene time (default 30)
 *   FRAMECAST_CONCURRENCY  frames rendered in flight at once (default 4)
 *   FRAMECAST_LOG_LEVEL    debug | info | warn | error | silent (default warn)
 *
 * Usage:
 *   import { config } from '@/lib/config';
 *   const fps = config.render.fps;
 */

import { z } from 'zod';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export interface AppConfig {
  render: {
    fps: number;
    concurrency: number;
  };
  logLevel: LogLevelName;
  isTest: boolean;
}

const envSchema = z.object({
  FRAMECAST_FPS: z.coerce
    .number()
    .positive('FRAMECAST_FPS must be positive')
    .max(240, 'FRAMECAST_FPS must be at most 240')
    .default(30),
  FRAMECAST_CONCURRENCY: z.coerce
    .number()
    .int('FRAMECAST_CONCURRENCY must be an integer')
    .min(1, 'FRAMECAST_CONCURRENCY must be at least 1')
    .max(64, 'FRAMECAST_CONCURRENCY must be at most 64')
    .default(4),
  FRAMECAST_LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional(),
  VITEST: z.string().optional(),
});

/**
 * Build configuration from an environment map.
 * Throws a ZodError describing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  // Empty strings count as unset
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.parse(defined);
  const isTest = parsed.VITEST !== undefined;

  return {
    render: {
      fps: parsed.FRAMECAST_FPS,
      concurrency: parsed.FRAMECAST_CONCURRENCY,
    },
    logLevel: parsed.FRAMECAST_LOG_LEVEL ?? (isTest ? 'silent' : 'warn'),
    isTest,
  };
}

export const config: AppConfig = loadConfig(process.env);
