import Fastify, { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyRateLimit from '@fastify/rate-limit';
import { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import { Pool } from 'pg';
import { ConfigError, InstanceNotFoundError } from '@contentreview/core';
import { createPool } from '@contentreview/db';
import { getEnv } from './config/env';
import { HealthResponseSchema } from './schemas/common';
import { logger } from './utils/logger';
import { requestLoggerHook, responseLoggerHook } from './middleware/request-logger';
import reviewGatewayPlugin from './plugins/review-gateway';
import { PgReviewGateway, ReviewGateway } from './services/review-gateway';
import reviewRoutes from './routes/reviews/index';
import operationalRoutes from './routes/operational/index';

const SERVICE_NAME = 'review-api';

let pool: Pool | null = null;
let poolConnectionString: string | null = null;

function getPool(): Pool {
  const env = getEnv();
  const connectionString = env.DATABASE_URL;

  if (!pool || poolConnectionString !== connectionString) {
    if (pool) {
      void pool.end();
    }
    poolConnectionString = connectionString;
    pool = createPool({ connectionString, logger });
  }

  return pool;
}

export interface BuildServerOptions {
  /** Defaults to the Postgres gateway over `DATABASE_URL`. */
  gateway?: ReviewGateway;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const env = getEnv();

  const server = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      transport:
        env.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
    },
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    disableRequestLogging: true,
    trustProxy: true,
  }).withTypeProvider<TypeBoxTypeProvider>();

  await server.register(reviewGatewayPlugin, {
    gateway: options.gateway ?? new PgReviewGateway(getPool()),
  });

  server.addHook('onRequest', requestLoggerHook);
  server.addHook('onResponse', responseLoggerHook);

  await registerPlugins(server);
  registerErrorHandler(server);
  await registerRoutes(server);

  return server;
}

async function registerPlugins(server: FastifyInstance): Promise<void> {
  const env = getEnv();

  await server.register(fastifyCors, {
    origin: env.NODE_ENV === 'development' || !env.CORS_ORIGIN ? true : env.CORS_ORIGIN,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Idempotency-Key', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID'],
    maxAge: 86400,
  });

  if (env.NODE_ENV !== 'test') {
    await server.register(fastifyRateLimit, {
      max: env.RATE_LIMIT_MAX,
      timeWindow: env.RATE_LIMIT_WINDOW,
      cache: 10000,
      allowList: ['127.0.0.1', '::1'],
      keyGenerator: (request: FastifyRequest) => {
        return request.ip;
      },
      errorResponseBuilder: (request: FastifyRequest, context) => {
        return {
          error: {
            statusCode: 429,
            message: `Rate limit exceeded. Try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
            requestId: request.id,
            code: 'RATE_LIMIT_EXCEEDED',
          },
        };
      },
    });
  }
}

interface FastifyError extends Error {
  statusCode?: number;
  code?: string;
  validation?: unknown;
}

interface ErrorBody {
  error: {
    statusCode: number;
    message: string;
    requestId: string;
    code?: string;
    details?: Record<string, unknown>;
  };
}

interface DomainErrorMapping {
  statusCode: number;
  code: string;
  details?: Record<string, unknown>;
}

function mapDomainError(err: Error): DomainErrorMapping | null {
  if (err instanceof ConfigError) {
    return { statusCode: 400, code: 'INVALID_CONFIG', details: { issues: err.issues } };
  }
  if (err instanceof InstanceNotFoundError) {
    return { statusCode: 404, code: 'NOT_FOUND' };
  }
  return null;
}

function registerErrorHandler(server: FastifyInstance): void {
  const env = getEnv();

  server.setErrorHandler((err: FastifyError, request, reply) => {
    const domain = mapDomainError(err);
    const statusCode = domain?.statusCode ?? err.statusCode ?? 500;
    const isClientError = statusCode >= 400 && statusCode < 500;

    if (isClientError) {
      request.log.debug(
        {
          err,
          requestId: request.id,
          method: request.method,
          url: request.url,
        },
        'Request rejected'
      );
    } else {
      request.log.error(
        {
          err,
          requestId: request.id,
          method: request.method,
          url: request.url,
        },
        'Request error'
      );
    }

    const response: ErrorBody = {
      error: {
        statusCode,
        message:
          env.NODE_ENV === 'production' && statusCode === 500
            ? 'Internal Server Error'
            : err.message,
        requestId: request.id,
      },
    };

    if (domain) {
      response.error.code = domain.code;
      if (domain.details) {
        response.error.details = domain.details;
      }
    } else if (err.validation) {
      response.error.code = 'VALIDATION_ERROR';
      response.error.details = { validation: err.validation };
    } else if (err.code) {
      response.error.code = err.code;
    }

    void reply.status(statusCode).send(response);
  });

  server.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    void reply.status(404).send({
      error: {
        statusCode: 404,
        message: `Route ${request.method} ${request.url} not found`,
        requestId: request.id,
        code: 'NOT_FOUND',
      },
    });
  });
}

async function registerRoutes(server: FastifyInstance): Promise<void> {
  const env = getEnv();

  server.get(
    '/health',
    {
      schema: {
        response: {
          200: HealthResponseSchema,
          503: HealthResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const startTime = Date.now();

      try {
        await server.reviews.ping();
        const latencyMs = Date.now() - startTime;

        return reply.status(200).send({
          status: 'healthy',
          timestamp: new Date().toISOString(),
          service: SERVICE_NAME,
          version: env.APP_VERSION,
          database: {
            connected: true,
            latencyMs,
          },
        });
      } catch (error) {
        request.log.error({ err: error }, 'Health check failed');

        return reply.status(503).send({
          status: 'unhealthy',
          timestamp: new Date().toISOString(),
          service: SERVICE_NAME,
          version: env.APP_VERSION,
          database: {
            connected: false,
          },
        });
      }
    }
  );

  server.get('/', async (_request, reply) => {
    return reply.status(200).send({
      service: 'Content Review API',
      version: env.APP_VERSION,
      endpoints: {
        health: '/health',
        reviews: '/api/v1/reviews',
        operational: '/api/v1/operational',
      },
    });
  });

  await server.register(
    async (apiV1: FastifyInstance) => {
      await apiV1.register(reviewRoutes, { prefix: '/reviews' });
      await apiV1.register(operationalRoutes, { prefix: '/operational' });
    },
    { prefix: '/api/v1' }
  );
}

export async function startServer(): Promise<FastifyInstance> {
  const env = getEnv();
  const server = await buildServer();

  try {
    await server.listen({ port: env.PORT, host: env.HOST });
    server.log.info(`Server listening on http://${env.HOST}:${String(env.PORT)}`);
    return server;
  } catch (error) {
    server.log.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

export async function closeServer(server: FastifyInstance): Promise<void> {
  await server.close();
  if (pool) {
    await pool.end();
    pool = null;
  }
}
