import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import { generateId, isDimensionError, loggerOptions } from '@bankdw/core';
import type {
  DimensionError,
  DimensionErrorCode,
  DimensionRegistry,
  DimensionStore,
  DimensionVersionManager,
} from '@bankdw/core';
import { registerHealthRoutes } from './routes/health.route.js';
import { registerDimensionRoutes } from './routes/dimensions.route.js';
import { registerVersionRoutes } from './routes/versions.route.js';

export interface ServerDeps {
  store: DimensionStore;
  manager: DimensionVersionManager;
  registry: DimensionRegistry;
  /** Fastify logger setting; defaults to the shared pino options. */
  logger?: FastifyServerOptions['logger'];
}

const STATUS_BY_CODE: Record<DimensionErrorCode, number> = {
  VALIDATION_FAILED: 400,
  NOT_FOUND: 404,
  UNKNOWN_DIMENSION: 404,
  AMBIGUOUS_CURRENT_VERSION: 409,
  CONCURRENT_MODIFICATION: 409,
  INVALID_AS_OF_DATE: 422,
  STORE_FAILED: 500,
};

const STATUS_TEXT: Record<number, string> = {
  400: 'Validation Error',
  404: 'Not Found',
  409: 'Conflict',
  422: 'Unprocessable Entity',
  500: 'Internal Server Error',
};

function errorDetails(error: DimensionError): Record<string, unknown> {
  switch (error.code) {
    case 'VALIDATION_FAILED':
      return { field: error.field, details: error.details };
    case 'UNKNOWN_DIMENSION':
      return { dimension_id: error.dimensionId };
    case 'NOT_FOUND':
      return {
        dimension_id: error.dimensionId,
        natural_key: error.naturalKey,
        as_of_date: error.asOfDate,
      };
    case 'INVALID_AS_OF_DATE':
      return {
        dimension_id: error.dimensionId,
        natural_key: error.naturalKey,
        as_of_date: error.asOfDate,
        current_effective_from: error.currentEffectiveFrom,
      };
    case 'AMBIGUOUS_CURRENT_VERSION':
      return {
        dimension_id: error.dimensionId,
        natural_key: error.naturalKey,
        surrogate_keys: error.surrogateKeys,
      };
    case 'CONCURRENT_MODIFICATION':
      return {
        dimension_id: error.dimensionId,
        natural_key: error.naturalKey,
        expected_surrogate_key: error.expectedSurrogateKey,
      };
    case 'STORE_FAILED':
      return {};
  }
}

export function createServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({
    logger: deps.logger ?? loggerOptions,
    genReqId: () => generateId(),
  });

  // Add correlation ID to every request
  app.addHook('onRequest', async (request, reply) => {
    const header = request.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header !== '' ? header : generateId();
    request.headers['x-correlation-id'] = correlationId;
    request.log = request.log.child({ correlation_id: correlationId });
    reply.header('x-correlation-id', correlationId);
  });

  registerHealthRoutes(app, deps.store);
  registerDimensionRoutes(app, deps.manager, deps.registry);
  registerVersionRoutes(app, deps.manager);

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return reply.status(400).send({
        error: 'Validation Error',
        code: 'VALIDATION_FAILED',
        message: error.message,
      });
    }

    if (isDimensionError(error)) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) {
        request.log.error({ err: error }, 'dimension store failure');
        return reply.status(status).send({
          error: STATUS_TEXT[status],
          code: error.code,
          message: 'The dimension store is unavailable',
        });
      }
      return reply.status(status).send({
        error: STATUS_TEXT[status],
        code: error.code,
        message: error.message,
        ...errorDetails(error),
      });
    }

    request.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
    });
  });

  return app;
}
