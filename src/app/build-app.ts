/**
 * Fastify application factory
 * Composition root: wires the dataset provider into health and insights routes
 */

import fastifyLib, {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';

import { makeDatasetHealthChecker, makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import { makeInsightsRoutes } from '../modules/insights/index.js';

import type { ContextProvider } from '../modules/dataset/index.js';

/**
 * Application dependencies
 */
export interface AppDeps {
  contextProvider: ContextProvider;
  /** Extra readiness checks; the dataset check is always registered */
  healthCheckers?: HealthChecker[];
}

export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { contextProvider, healthCheckers = [] } = deps;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Error Handling
  // ─────────────────────────────────────────────────────────────────────────────

  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    if (error.validation != null) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: 'Request validation failed',
        details: error.validation,
      });
    }

    if (error.statusCode != null) {
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
      version,
      checkers: [makeDatasetHealthChecker(contextProvider), ...healthCheckers],
    })
  );

  await app.register(makeInsightsRoutes({ contextProvider }));

  return app;
};

/**
 * Builds the application and waits for every plugin to load
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
