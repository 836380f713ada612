/**
 * Health Check Routes
 * Provides system status for monitoring and load balancers
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { HealthCheckResponse, ServiceHealth, ServiceHealthMap } from '@contacts-hub/shared';
import { withTimeout } from '../../../application/resilience/retry.utils.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('health');

const PROBE_TIMEOUT_MS = 2000;

export type HealthProbe = () => Promise<void>;

export interface HealthRoutesOptions {
  probes: Record<keyof ServiceHealthMap, HealthProbe>;
  version: string;
}

async function runProbe(name: string, probe: HealthProbe): Promise<ServiceHealth> {
  const startedAt = Date.now();
  try {
    await withTimeout(probe(), PROBE_TIMEOUT_MS, `${name} health probe`);
    return { status: 'up', latencyMs: Date.now() - startedAt };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn({ service: name, error: message }, 'Health probe failed');
    return { status: 'down', latencyMs: Date.now() - startedAt, message };
  }
}

const serviceHealthSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['up', 'down'] },
    latencyMs: { type: 'number' },
    message: { type: 'string' },
  },
} as const;

const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['healthy', 'degraded', 'unhealthy'] },
    version: { type: 'string' },
    uptime: { type: 'number', description: 'Server uptime in seconds' },
    timestamp: { type: 'string', format: 'date-time' },
    services: {
      type: 'object',
      properties: {
        postgres: serviceHealthSchema,
        redis: serviceHealthSchema,
      },
    },
  },
} as const;

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  fastify: FastifyInstance,
  { probes, version }
): Promise<void> => {
  const checkServices = async (): Promise<ServiceHealthMap> => {
    const [postgres, redis] = await Promise.all([
      runProbe('postgres', probes.postgres),
      runProbe('redis', probes.redis),
    ]);
    return { postgres, redis };
  };

  // GET /health - Full health check
  fastify.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'System health check',
      description: 'Returns the health status of PostgreSQL and Redis.',
      response: {
        200: healthResponseSchema,
        503: healthResponseSchema,
      },
    },
  }, async (_request, reply) => {
    const services = await checkServices();
    // Postgres down means nothing works; Redis down breaks authenticated routes only
    const status: HealthCheckResponse['status'] = services.postgres.status === 'down'
      ? 'unhealthy'
      : services.redis.status === 'down' ? 'degraded' : 'healthy';

    const response: HealthCheckResponse = {
      status,
      version,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      services,
    };

    return reply.status(status === 'unhealthy' ? 503 : 200).send(response);
  });

  // GET /ready - readiness probe
  fastify.get('/ready', {
    schema: {
      tags: ['Health'],
      summary: 'Readiness probe',
      description: 'Ready when both PostgreSQL and Redis answer.',
      response: {
        200: { type: 'object', properties: { ready: { type: 'boolean' } } },
        503: { type: 'object', properties: { ready: { type: 'boolean' } } },
      },
    },
  }, async (_request, reply) => {
    const services = await checkServices();
    const ready = services.postgres.status === 'up' && services.redis.status === 'up';
    return reply.status(ready ? 200 : 503).send({ ready });
  });

  // GET /live - liveness probe
  fastify.get('/live', {
    schema: {
      tags: ['Health'],
      summary: 'Liveness probe',
      description: 'Indicates if the server process is alive.',
      response: {
        200: { type: 'object', properties: { live: { type: 'boolean' } } },
      },
    },
  }, async (_request, reply) => {
    return reply.send({ live: true });
  });
};
