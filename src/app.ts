import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { Config } from './config/index.js';
import type { SegmentTable } from './dataset/segment-table.js';
import type { QueryRouter } from './router/index.js';
import { createChatRouter } from './chat/chat.routes.js';
import logger from './utils/logger.js';

export interface AppDependencies {
  config: Pick<Config, 'cors' | 'rateLimit'>;
  table: SegmentTable;
  queryRouter: QueryRouter;
  aiConfigured: () => boolean;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.set('trust proxy', 1);

  app.use(helmet());

  app.use(cors({
    origin: deps.config.cors.origin,
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
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'healthy',
      dataLoaded: deps.table.size > 0,
      totalSegments: deps.table.size,
      aiConfigured: deps.aiConfigured(),
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/chat', createChatRouter({
    queryRouter: deps.queryRouter,
    table: deps.table,
    rateLimit: deps.config.rateLimit,
  }));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // body-parser marks malformed JSON with a 4xx status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status < 500) {
      res.status(status).json({ error: err.message });
      return;
    }
    logger.error('Unhandled error', { error: err.message, stack: err.stack });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
