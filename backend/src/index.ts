import { buildApp } from './app.js';
import { buildAnalysisConfig, loadConfig, loadFilterCatalog } from './config.js';
import { closePool } from './db/connection.js';
import { createAnalysisServices } from './services/factory.js';
import { createLogger } from './utils/logger.js';

async function main() {
  const env = loadConfig();
  const logger = createLogger(env.LOG_LEVEL);

  const filters = env.FILTERS_FILE ? loadFilterCatalog(env.FILTERS_FILE) : loadFilterCatalog();
  const analysis = buildAnalysisConfig(env, filters);

  const services = createAnalysisServices(analysis, logger, {
    database: env.DATABASE_URL
      ? {
          connectionString: env.DATABASE_URL,
          ssl: env.DATABASE_SSL === 'true',
          max: env.DB_POOL_MAX,
        }
      : undefined,
  });
  await services.cache.load();

  const fastify = await buildApp({
    services,
    logLevel: env.LOG_LEVEL,
    corsOrigin: env.CORS_ORIGIN,
  });

  const shutdown = async (signal: string) => {
    fastify.log.info({ signal }, 'Shutting down');
    await fastify.close();
    await closePool();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  // Start server
  try {
    await fastify.listen({ port: env.PORT, host: env.HOST });
  } catch (err) {
    fastify.log.error(err);
    await closePool();
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Fatal startup error:', err);
  process.exit(1);
});
