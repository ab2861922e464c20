import type { Server } from 'http';
import { config } from './config/index.js';
import logger from './utils/logger.js';
import { createApp } from './app.js';
import { loadSegmentTable } from './dataset/dataset.loader.js';
import { LocalAggregateProvider, QueryRouter, RemoteGenerativeProvider } from './router/index.js';
import * as googleProvider from './llm/providers/google.provider.js';

async function main(): Promise<Server> {
  const table = await loadSegmentTable(config.dataset.path);

  const queryRouter = new QueryRouter({
    local: new LocalAggregateProvider(config.query),
    remote: new RemoteGenerativeProvider({
      complete: googleProvider.createCompletion,
      isConfigured: googleProvider.isConfigured,
      model: config.google.model,
      timeoutMs: config.google.timeoutMs,
    }),
  });

  const app = createApp({
    config,
    table,
    queryRouter,
    aiConfigured: googleProvider.isConfigured,
  });

  return app.listen(config.port, () => {
    logger.info(`Traffic Insights API running on port ${config.port}`, {
      env: config.nodeEnv,
      dataset: config.dataset.path,
      segments: table.size,
      ai: googleProvider.isConfigured() ? 'enabled' : 'disabled',
    });
  });
}

main()
  .then((server) => {
    // Graceful shutdown
    const shutdown = () => {
      logger.info('Shutting down...');
      server.close(() => process.exit(0));
    };
    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
  })
  .catch((error: Error) => {
    logger.error('Startup failed', { error: error.message, name: error.name });
    process.exit(1);
  });
