import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import { nanoid } from 'nanoid';
import {
  serverConfigSchema,
  createErrorResponse,
  ErrorCode,
  type ServerConfig,
} from './types.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerPlanningRoutes } from './routes/planning.js';
import { registerExecutionRoutes } from './routes/executions.js';
import { isPlancraftError } from '../errors.js';
import { createFileServices, type PlancraftServices } from '../services.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server');

/**
 * Server configuration plus the services the routes run against
 */
export interface AppConfig extends Partial<ServerConfig> {
  /**
   * Planning and execution services. Defaults to the JSON document store
   * in the configured data directory.
   */
  services?: PlancraftServices;
}

/**
 * Create and configure a Fastify application instance
 */
export async function createApp(
  config: AppConfig = {}
): Promise<FastifyInstance> {
  const { services: providedServices, ...serverConfig } = config;
  const services = providedServices ?? createFileServices();

  // Validate and apply defaults
  const validatedConfig = serverConfigSchema.parse(serverConfig);

  const app = Fastify({
    logger: validatedConfig.enableLogging
      ? {
          level: 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          },
        }
      : false,
    requestTimeout: validatedConfig.requestTimeout,
    genReqId: () => nanoid(12),
  });

  await app.register(cors, {
    origin: validatedConfig.corsOrigins,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
  });

  // Add request ID to response headers
  app.addHook('onRequest', (request: FastifyRequest, reply, done) => {
    void reply.header('X-Request-ID', request.id);
    done();
  });

  // Global error handler
  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    // Domain errors carry their own status and code
    if (isPlancraftError(error)) {
      logger.warn(
        { code: error.code, message: error.message, requestId: request.id },
        'Request rejected'
      );
      return reply.status(error.status).send(
        createErrorResponse(error.code, error.message, error.details, request.id)
      );
    }

    logger.error({ err: error, requestId: request.id }, 'Request error');

    // Handle validation errors
    if (error.validation) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Validation error',
          { errors: error.validation },
          request.id
        )
      );
    }

    // Malformed bodies and other client errors raised by fastify
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      const code = mapStatusToErrorCode(error.statusCode);
      return reply.status(error.statusCode).send(
        createErrorResponse(code, error.message, undefined, request.id)
      );
    }

    // Generic internal error
    return reply.status(500).send(
      createErrorResponse(
        ErrorCode.INTERNAL_ERROR,
        'An unexpected error occurred',
        undefined,
        request.id
      )
    );
  });

  // Not found handler
  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send(
      createErrorResponse(
        ErrorCode.NOT_FOUND,
        `Route ${request.method} ${request.url} not found`,
        undefined,
        request.id
      )
    );
  });

  registerHealthRoutes(app);
  registerPlanningRoutes(app, services.planning);
  registerExecutionRoutes(app, services.engine, services.executionLog);

  return app;
}

/**
 * Map HTTP status code to error code
 */
function mapStatusToErrorCode(status: number): ErrorCode {
  switch (status) {
    case 404:
      return ErrorCode.NOT_FOUND;
    case 409:
      return ErrorCode.PRECONDITION_FAILED;
    default:
      return ErrorCode.BAD_REQUEST;
  }
}
