// HTTP surface: metrics, liveness and the authenticated engine API
import express from 'express';
import cors from 'cors';
import type { Registry } from 'prom-client';

import buildRoutes from './api/routes.js';
import { buildInfo } from './buildInfo.js';
import { authenticate } from './middleware/auth.js';
import { rateLimiter } from './middleware/rateLimit.js';
import type { DscEngine } from './engine/DscEngine.js';

export function createApp(engine: DscEngine, registry: Registry): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/metrics', async (_req, res) => {
    res.setHeader('Content-Type', registry.contentType);
    res.send(await registry.metrics());
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: engine.isClosed() ? 'closed' : 'ok',
      app: {
        uptimeSeconds: Math.floor(process.uptime()),
        version: buildInfo.version,
        commit: buildInfo.commit,
        startedAt: buildInfo.startedAt
      }
    });
  });

  app.use('/api/v1', rateLimiter, authenticate, buildRoutes(engine));

  return app;
}
