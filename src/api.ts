/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { createServices } from './app/services.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { createLogger, PRETTY_TRANSPORT } from './infra/logger/index.js';
import {
  createFileGeoReferenceRepo,
  createYamlRegionAliasSource,
  loadRegionAliases,
  reportRegionCoverage,
} from './modules/regions/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server } }, 'Starting API server');

  // Region aliases are startup configuration: a broken file stops the process
  const { aliasesPath } = config.regions;
  const aliasesResult = await loadRegionAliases({
    source:
      aliasesPath !== undefined
        ? createYamlRegionAliasSource({ filePath: aliasesPath })
        : undefined,
  });

  if (aliasesResult.isErr()) {
    logger.fatal({ err: aliasesResult.error, path: aliasesPath }, 'Invalid region alias file');
    throw new Error(aliasesResult.error.message);
  }

  const db = initDatabase(config);
  const services = createServices({
    logger,
    db,
    geoRepo: createFileGeoReferenceRepo({ filePath: config.regions.geojsonPath }),
    aliases: aliasesResult.value,
  });

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: PRETTY_TRANSPORT }),
      },
    },
    deps: { config, ...services },
    version: process.env['APP_VERSION'],
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await db.destroy();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }

  // Warm the caches and report regions that will not join the map
  const coverage = await reportRegionCoverage({ ...services, logger });
  logger.info({ datasets: Object.keys(coverage).length }, 'Region coverage checked');
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
