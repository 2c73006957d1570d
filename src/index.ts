import { loadConfig } from './config/index.js';
import { createPool, healthCheck, closePool } from './db/postgres.js';
import { createOpenAIClient, OpenAICompletionProvider, OpenAIEmbeddingProvider } from './llm/providers/openai.provider.js';
import { CachedEmbeddingProvider } from './llm/embedding-cache.js';
import { PgPrototypeStore, QueryRouter } from './router/index.js';
import { createApp } from './app.js';
import { getErrorMessage } from './utils/errors.js';
import logger from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const pool = createPool(config);
  const openai = createOpenAIClient(config.openai.apiKey);
  const store = new PgPrototypeStore(pool, config.prototypeTable);

  const queryRouter = new QueryRouter(
    {
      embedder: new CachedEmbeddingProvider(new OpenAIEmbeddingProvider(openai, config.openai.embeddingModel)),
      store,
      llm: new OpenAICompletionProvider(openai, config.openai.model),
    },
    config.router
  );

  // Refuse to serve traffic without the prototype corpus
  if (!(await store.collectionExists())) {
    await closePool(pool);
    throw new Error(`Prototype table "${config.prototypeTable}" does not exist`);
  }

  const app = createApp({
    queryRouter,
    store,
    corsOrigin: config.cors.origin,
    databaseHealth: () => healthCheck(pool),
  });

  const server = app.listen(config.port, () => {
    logger.info(`Query router running on port ${config.port}`, {
      env: config.nodeEnv,
      model: config.openai.model,
      embeddingModel: config.openai.embeddingModel,
      table: config.prototypeTable,
    });
  });

  // Graceful shutdown
  async function shutdown() {
    logger.info('Shutting down...');
    server.close();
    try {
      await closePool(pool);
    } catch (error) {
      logger.error('Failed to close PostgreSQL pool', { error: getErrorMessage(error) });
    }
    process.exit(0);
  }

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  logger.error('Failed to start query router', { error: getErrorMessage(error) });
  process.exit(1);
});
