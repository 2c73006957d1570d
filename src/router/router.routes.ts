/**
 * Router Routes
 *
 * HTTP surface for the query router.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { QueryRouter } from './router.service.js';
import type { PrototypeStore } from './prototype.store.js';
import { RouteCancelledError } from './router.errors.js';
import { getErrorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

// ============================================
// Validation Schemas
// ============================================

const RouteRequestSchema = z.object({
  query: z.string().trim().min(1).max(2000),
  routeHint: z.string().max(100).optional(),
});

// ============================================
// Routes
// ============================================

export function createRouterRoutes(queryRouter: QueryRouter, store: PrototypeStore): Router {
  const router = Router();

  /**
   * POST /api/route
   * Route a query to an agent, or get a clarification question back
   */
  router.post('/', async (req: Request, res: Response) => {
    const parsed = RouteRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid request body', details: parsed.error.errors });
    }

    // Abort in-flight model and store calls when the client goes away
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    try {
      const result = await queryRouter.route(parsed.data.query, parsed.data.routeHint, {
        signal: controller.signal,
      });
      return res.json(result);
    } catch (error) {
      if (error instanceof RouteCancelledError) {
        logger.info('Route request cancelled by client', { error: error.message });
        return res.status(499).json({ error: 'Request cancelled' });
      }
      logger.error('Failed to route query', { error: getErrorMessage(error) });
      return res.status(500).json({ error: 'Failed to route query' });
    }
  });

  /**
   * GET /api/route/health
   * Router readiness: the prototype table must exist
   */
  router.get('/health', async (_req: Request, res: Response) => {
    try {
      const collection = await store.collectionExists();
      return res.status(collection ? 200 : 503).json({
        status: collection ? 'healthy' : 'unhealthy',
        service: 'query-router',
        collection: collection ? 'ready' : 'missing',
      });
    } catch (error) {
      logger.error('Router health check failed', { error: getErrorMessage(error) });
      return res.status(503).json({
        status: 'unhealthy',
        service: 'query-router',
        collection: 'unreachable',
      });
    }
  });

  return router;
}
