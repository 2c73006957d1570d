import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { QueryRouter } from './router/router.service.js';
import type { PrototypeStore } from './router/prototype.store.js';
import { createRouterRoutes } from './router/router.routes.js';
import logger from './utils/logger.js';

export interface AppDeps {
  queryRouter: QueryRouter;
  store: PrototypeStore;
  corsOrigin: string;

  /** Database reachability for /api/health */
  databaseHealth: () => Promise<boolean>;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.set('trust proxy', 1);

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    hidePoweredBy: true,
  }));

  app.use(cors({
    origin: deps.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));

  // Body parsing
  app.use(express.json({ limit: '16kb' }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.debug(`${req.method} ${req.path}`, {
        status: res.statusCode,
        duration: `${duration}ms`,
      });
    });
    next();
  });

  // Health check endpoint
  app.get('/api/health', async (_req, res) => {
    const [postgres, prototypes] = await Promise.all([
      deps.databaseHealth(),
      deps.store.collectionExists().catch(() => false),
    ]);

    const healthy = postgres && prototypes;

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      services: {
        postgres: postgres ? 'up' : 'down',
        prototypes: prototypes ? 'ready' : 'missing',
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/route', createRouterRoutes(deps.queryRouter, deps.store));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('Unhandled error', { error: err.message, stack: err.stack });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
