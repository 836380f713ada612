/**
 * Fastify Server Configuration
 * Security plugins, request logging, the error envelope and route wiring
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { ApiError, ApiResponse } from '@contacts-hub/shared';
import type { Redis } from 'ioredis';
import { ZodError } from 'zod';
import type { AuthService } from '../../application/auth/auth.service.js';
import type { AuthorizationGate } from '../../application/auth/authorization.js';
import type { ContactService } from '../../application/contacts/contact.service.js';
import { ErrorKind, isAppError } from '../../application/errors/app-error.js';
import { isTransientError } from '../../application/resilience/retry.utils.js';
import type { UserService } from '../../application/users/user.service.js';
import { createLogger } from '../logging/logger.js';
import { createAuthGuards } from './middleware/auth.middleware.js';
import { authRoutes } from './routes/auth.routes.js';
import { contactRoutes } from './routes/contacts.routes.js';
import { healthRoutes, type HealthProbe } from './routes/health.routes.js';
import { userRoutes } from './routes/users.routes.js';

const logger = createLogger('http-server');

const API_VERSION = '1.0.0';
const MAX_AVATAR_BYTES = 5 * 1024 * 1024;

export interface AppServices {
  auth: AuthService;
  gate: AuthorizationGate;
  users: UserService;
  contacts: ContactService;
  probes: {
    postgres: HealthProbe;
    redis: HealthProbe;
  };
}

export interface AppOptions {
  env: string;
  corsOrigins: readonly string[];
  /** Serve OpenAPI docs at /docs */
  docs?: boolean;
  /** Global per-client request budget per minute */
  rateLimitMax?: number;
  /** Share rate-limit counters between instances; in-memory when absent */
  rateLimitRedis?: Redis;
}

interface ErrorReply {
  statusCode: number;
  error: ApiError;
}

function formatZodError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'Invalid request data';
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Map anything a handler throws onto a status code and the error envelope
 */
export function toErrorReply(error: FastifyError | Error, env: string): ErrorReply {
  if (isAppError(error)) {
    const hideMessage = env === 'production' && error.statusCode >= 500
      && error.kind !== ErrorKind.EXTERNAL_SERVICE_ERROR;
    return {
      statusCode: error.statusCode,
      error: {
        code: error.kind,
        message: hideMessage ? 'An internal error occurred' : error.message,
      },
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      error: { code: ErrorKind.VALIDATION_ERROR, message: formatZodError(error) },
    };
  }

  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;

  if (statusCode === 429) {
    return {
      statusCode,
      error: { code: 'RATE_LIMIT_EXCEEDED', message: 'Too many requests, please slow down' },
    };
  }

  if (statusCode >= 400 && statusCode < 500) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : 'BAD_REQUEST';
    return { statusCode, error: { code, message: error.message } };
  }

  // Raw driver errors carry hosts and ports; never echo them
  if (isTransientError(error)) {
    return {
      statusCode: 503,
      error: { code: ErrorKind.EXTERNAL_SERVICE_ERROR, message: 'A backing service is unavailable' },
    };
  }

  return {
    statusCode: 500,
    error: {
      code: ErrorKind.INTERNAL_ERROR,
      message: env === 'production' ? 'An internal error occurred' : error.message,
    },
  };
}

export async function buildApp(services: AppServices, options: AppOptions): Promise<FastifyInstance> {
  const server = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    connectionTimeout: 30000,
    keepAliveTimeout: 10000,
    maxParamLength: 1000,
    bodyLimit: 1024 * 1024,
  });

  if (options.docs) {
    await server.register(swagger, {
      openapi: {
        info: {
          title: 'Contacts Hub API',
          description: 'Contacts management with email-verified accounts and token auth',
          version: API_VERSION,
        },
        components: {
          securitySchemes: {
            bearerAuth: {
              type: 'http',
              scheme: 'bearer',
              bearerFormat: 'JWT',
            },
          },
        },
        tags: [
          { name: 'Auth', description: 'Registration, login and token endpoints' },
          { name: 'Users', description: 'Profile and administration' },
          { name: 'Contacts', description: 'Contact book of the current user' },
          { name: 'Health', description: 'Health check endpoints' },
        ],
      },
    });

    await server.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
      },
    });
  }

  // Security middleware
  await server.register(helmet, {
    contentSecurityPolicy: false, // Disable for API-only server
  });

  await server.register(cors, {
    origin: [...options.corsOrigins],
    credentials: true,
  });

  await server.register(rateLimit, {
    global: true,
    max: options.rateLimitMax ?? 300,
    timeWindow: '1 minute',
    errorResponseBuilder: () => ({
      statusCode: 429,
      success: false,
      error: {
        code: 'RATE_LIMIT_EXCEEDED',
        message: 'Too many requests, please slow down',
      },
    }),
    ...(options.rateLimitRedis ? { redis: options.rateLimitRedis, nameSpace: 'rate-limit:' } : {}),
  });

  await server.register(multipart, {
    limits: {
      files: 1,
      fileSize: MAX_AVATAR_BYTES,
    },
  });

  server.addHook('onRequest', async (request) => {
    logger.debug({
      method: request.method,
      url: request.url,
      requestId: request.id,
    }, 'Incoming request');
  });

  server.addHook('onResponse', async (request, reply) => {
    logger.info({
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
    }, 'Request completed');
  });

  server.setErrorHandler((error, request, reply) => {
    const { statusCode, error: body } = toErrorReply(error, options.env);

    if (statusCode >= 500) {
      logger.error({
        error: error.message,
        stack: error.stack,
        cause: error.cause instanceof Error ? error.cause.message : undefined,
        requestId: request.id,
      }, 'Request error');
    } else {
      logger.debug({ code: body.code, requestId: request.id }, 'Request rejected');
    }

    void reply.status(statusCode).send({ success: false, error: body } satisfies ApiResponse<never>);
  });

  server.setNotFoundHandler((request, reply) => {
    void reply.status(404).send({
      success: false,
      error: { code: ErrorKind.NOT_FOUND, message: `Route ${request.method} ${request.url} not found` },
    } satisfies ApiResponse<never>);
  });

  const guards = createAuthGuards(services.gate);

  await server.register(healthRoutes, { prefix: '/api', probes: services.probes, version: API_VERSION });
  await server.register(authRoutes, { prefix: '/api/auth', auth: services.auth, guards });
  await server.register(userRoutes, { prefix: '/api/users', users: services.users, guards });
  await server.register(contactRoutes, { prefix: '/api/contacts', contacts: services.contacts, guards });

  logger.info('Routes registered');
  return server;
}
