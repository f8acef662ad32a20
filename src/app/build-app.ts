/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors } from '../infra/plugins/index.js';
import { makeCaseStudyRoutes } from '../modules/case-studies/index.js';
import { makeDatasetRoutes, type TableLoader } from '../modules/datasets/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import { makeRegionRoutes, type GeoReferenceService } from '../modules/regions/index.js';

import type { AppConfig } from '../infra/config/env.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  tableLoader: TableLoader;
  geoReference: GeoReferenceService;
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;
  const { config, tableLoader, geoReference, healthCheckers = [] } = deps;

  if (config === undefined || tableLoader === undefined || geoReference === undefined) {
    throw new Error('Missing required dependencies: config, tableLoader, geoReference');
  }

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);

  // Must be set before the route plugins register; children copy the handlers they see
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      request.log.info({ err: error }, 'Request validation failed');
      return reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
        details: error.validation,
      });
    }

    request.log.error({ err: error }, 'Request error');

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Routes
  // ─────────────────────────────────────────────────────────────────────────────

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: healthCheckers,
    })
  );

  await app.register(makeDatasetRoutes({ tableLoader }));
  await app.register(makeRegionRoutes({ tableLoader, geoReference }));
  await app.register(makeCaseStudyRoutes({ tableLoader, geoReference }));

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
