/**
 * Recommendations Controller
 *
 * POST   /api/v1/recommendations     - run one turn
 * GET    /api/v1/recommendations/stats
 * POST   /api/v1/interactions        - liked/disliked feedback (202, processed in background)
 * GET    /api/v1/profile/:userId
 * DELETE /api/v1/session/:userId     - forget saved location, cancel in-flight turn
 */

import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { z } from 'zod';
import type { RecommendationServices } from '../../services/recommendation/index.js';
import {
  geoPointSchema,
  recommendationQuerySchema
} from '../../services/recommendation/query/recommendation-query.schema.js';
import type { TurnResult } from '../../services/recommendation/types.js';

const userIdSchema = z.string().trim().min(1).max(128);

const deadlineSchema = z.number().int().min(0).max(60_000).optional();

export const recommendationRequestSchema = z.object({
  userId: userIdSchema,
  query: recommendationQuerySchema,
  userLocation: geoPointSchema.optional(),
  deadlines: z
    .object({
      retrievalMs: deadlineSchema,
      profileMs: deadlineSchema,
      scoringMs: deadlineSchema,
      selectionMs: deadlineSchema
    })
    .optional()
});

export const interactionRequestSchema = z.object({
  userId: userIdSchema,
  venueId: z.number().int().positive(),
  type: z.enum(['liked', 'disliked'])
});

function statusFor(result: TurnResult): number {
  switch (result.state) {
    case 'Failed':
      return 503;
    case 'Cancelled':
      return 409;
    default:
      return 200;
  }
}

/**
 * Express 4 does not forward rejected promises to the error middleware
 */
function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createRecommendationsRouter(services: RecommendationServices): Router {
  const router = Router();
  const { orchestrator, interactions, turns, profileStore, locationStore } = services;

  router.post('/recommendations', asyncHandler(async (req, res) => {
    const body = recommendationRequestSchema.parse(req.body);
    const turn = turns.begin(body.userId, req.traceId);

    // Client went away before the answer: stop working on it
    res.on('close', () => {
      if (!res.writableEnded) {
        turn.abort('client_disconnected');
      }
    });

    try {
      const result = await orchestrator.runTurn({
        requestId: req.traceId,
        userId: body.userId,
        query: body.query,
        userLocation: body.userLocation,
        deadlines: body.deadlines,
        signal: turn.signal
      });

      res.status(statusFor(result)).json(result);
    } finally {
      turn.release();
    }
  }));

  router.get('/recommendations/stats', (_req, res) => {
    res.json(turns.getStats());
  });

  router.post('/interactions', (req, res) => {
    const body = interactionRequestSchema.parse(req.body);

    interactions.record(body.userId, body.venueId, body.type, req.traceId);

    res.status(202).json({ accepted: true, traceId: req.traceId });
  });

  router.get('/profile/:userId', asyncHandler(async (req, res) => {
    const userId = userIdSchema.parse(req.params.userId);
    const profile = await profileStore.getProfile(userId);

    if (!profile) {
      res.status(404).json({ error: 'Profile not found', code: 'PROFILE_NOT_FOUND', traceId: req.traceId });
      return;
    }

    res.json({ profile, traceId: req.traceId });
  }));

  router.delete('/session/:userId', asyncHandler(async (req, res) => {
    const userId = userIdSchema.parse(req.params.userId);

    turns.cancel(userId, 'session_cleared');
    await locationStore.clear(userId);

    req.log.info({ event: 'session_cleared', userId }, '[Session] Saved location cleared');
    res.status(204).end();
  }));

  return router;
}
