/**
 * Stage Timer Utility
 * Provides consistent timing instrumentation for pipeline stages
 *
 * LOG NOISE REDUCTION:
 * - Stage events: INFO if slower than SLOW_STAGE_MS, DEBUG otherwise
 */

import { performance } from 'perf_hooks';
import { logger } from '../logger/structured-logger.js';

export const SLOW_STAGE_MS = 1000;

/**
 * Anything a stage can record its duration into
 */
export interface StageTimingContext {
  requestId: string;
  timings: Record<string, number>;
}

export interface StageTimerExtra {
  [key: string]: unknown;
}

/**
 * Start a stage and log stage_started event
 */
export function startStage(ctx: StageTimingContext, stage: string, extra?: StageTimerExtra): number {
  logger.debug({
    requestId: ctx.requestId,
    stage,
    event: 'stage_started',
    ...extra
  }, `[Turn] ${stage} started`);

  return performance.now();
}

/**
 * End a stage, store `<stage>Ms` in ctx.timings and log stage_completed
 */
export function endStage(
  ctx: StageTimingContext,
  stage: string,
  startTime: number,
  extra?: StageTimerExtra
): number {
  const durationMs = Math.round(performance.now() - startTime);
  ctx.timings[`${stage}Ms`] = durationMs;

  const isSlow = durationMs > SLOW_STAGE_MS;
  logger[isSlow ? 'info' : 'debug']({
    requestId: ctx.requestId,
    stage,
    event: 'stage_completed',
    durationMs,
    ...(isSlow && { slow: true }),
    ...extra
  }, `[Turn] ${stage} completed`);

  return durationMs;
}

/**
 * Simple timer for non-stage operations
 */
export function startTimer(): { stop: () => number; elapsed: () => number } {
  const startTime = performance.now();
  return {
    stop: () => Math.round(performance.now() - startTime),
    elapsed: () => Math.round(performance.now() - startTime)
  };
}
