/**
 * Health & Readiness Endpoints
 *
 * - /healthz: Liveness check (is process alive?)
 * - /ready:   Readiness check (can the stores serve traffic?)
 */

import { Router, type Request, type Response } from 'express';
import { logger } from '../lib/logger/structured-logger.js';

export type ReadinessProbe = () => Promise<boolean>;

type CheckStatus = 'UP' | 'DOWN';

/**
 * Liveness check
 * Does NOT check stores or external dependencies
 */
export function livenessHandler(_req: Request, res: Response): void {
  res.status(200).json({
    status: 'UP',
    timestamp: new Date().toISOString(),
    checks: {
      process: 'UP'
    }
  });
}

async function runProbe(name: string, probe: ReadinessProbe): Promise<CheckStatus> {
  try {
    return (await probe()) ? 'UP' : 'DOWN';
  } catch (error) {
    logger.warn({
      event: 'readiness_probe_failed',
      check: name,
      error: error instanceof Error ? error.message : String(error)
    }, '[Health] Readiness probe threw');
    return 'DOWN';
  }
}

/**
 * Readiness check: 200 only when every probe is UP, 503 otherwise
 */
export function createReadinessHandler(probes: Record<string, ReadinessProbe>) {
  return async (_req: Request, res: Response): Promise<void> => {
    const names = Object.keys(probes);
    const statuses = await Promise.all(names.map(name => runProbe(name, probes[name])));

    const checks: Record<string, CheckStatus> = { process: 'UP' };
    names.forEach((name, i) => {
      checks[name] = statuses[i];
    });

    const ready = statuses.every(status => status === 'UP');

    if (!ready) {
      logger.warn({ event: 'readiness_down', checks }, '[Health] Readiness check FAILED');
    }

    res.status(ready ? 200 : 503).json({
      status: ready ? 'UP' : 'NOT_READY',
      ready,
      timestamp: new Date().toISOString(),
      checks
    });
  };
}

export function createHealthRouter(probes: Record<string, ReadinessProbe>): Router {
  const router = Router();
  const readinessHandler = createReadinessHandler(probes);

  router.get('/healthz', livenessHandler);
  router.get('/ready', (req, res, next) => {
    readinessHandler(req, res).catch(next);
  });
  return router;
}
