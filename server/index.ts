import 'dotenv/config';
import path from 'node:path';
import { createAdvancedCategorizer } from './categorization/advanced';
import { loadCategoryCatalog } from './categorization/catalog';
import { getPublicConfig, loadConfig } from './config/config';
import { createApp } from './http/app';
import { createLogger, describeError } from './obs/logger';
import { createMemoryArticleStore, type ArticleStore } from './persistence/articleStore';
import { createPgArticleStore } from './persistence/pgStore';
import { createIngestionPipeline } from './pipeline/ingest';
import { createTextExtractor } from './retrieval/extraction';

const config = loadConfig();
const logger = createLogger(config.observability);

logger.info('Config loaded', {
  environment: config.environment,
  persistence: config.persistence.mode,
  maxConcurrency: config.ingestion.maxConcurrency,
  advanced: {
    enabled: config.advanced.enabled,
    hasApiKey: Boolean(config.advanced.apiKey),
    model: config.advanced.model,
  },
});

const openStore = async (): Promise<ArticleStore> => {
  if (config.persistence.mode === 'postgres') {
    return createPgArticleStore(config.persistence, {
      schemaPath: path.join(process.cwd(), 'db', 'schema.sql'),
    });
  }
  return createMemoryArticleStore();
};

const main = async () => {
  const store = await openStore();
  const catalog = loadCategoryCatalog(config.categorization.catalogPath);
  const pipeline = createIngestionPipeline({
    store,
    extractor: createTextExtractor(config.extraction),
    catalog,
    advanced: createAdvancedCategorizer(config, logger),
    logger,
    maxConcurrency: config.ingestion.maxConcurrency,
  });

  const app = createApp({
    pipeline,
    store,
    catalog,
    logger,
    publicConfig: getPublicConfig(config),
    requestLogging: config.observability.logLevel === 'debug',
  });

  const server = app.listen(config.server.port, () => {
    logger.info('Server listening', { port: config.server.port, categories: catalog.length });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Store close failed', describeError(error));
          process.exit(1);
        },
      );
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
};

main().catch((error: unknown) => {
  logger.error('Startup failed', describeError(error));
  process.exit(1);
});
