/**
 * Integration Tests: Health Endpoints
 */

import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createTestApp, createTestContext } from '../mocks/context.js';

const down = async (): Promise<void> => {
  throw new Error('connection refused');
};

describe('Health Endpoints', () => {
  let server: FastifyInstance | undefined;

  afterEach(async () => {
    await server?.close();
  });

  it('should report healthy when every dependency answers', async () => {
    server = await createTestApp(createTestContext());

    const response = await server.inject({ method: 'GET', url: '/api/health' });
    const body = JSON.parse(response.body);

    expect(response.statusCode).toBe(200);
    expect(body.status).toBe('healthy');
    expect(body.version).toBe('1.0.0');
    expect(body.services.postgres.status).toBe('up');
    expect(body.services.redis.status).toBe('up');
  });

  it('should report degraded when Redis is down', async () => {
    const ctx = createTestContext();
    ctx.redis.failWith(new Error('connection refused'));
    server = await createTestApp(ctx);

    const response = await server.inject({ method: 'GET', url: '/api/health' });
    const body = JSON.parse(response.body);

    expect(response.statusCode).toBe(200);
    expect(body.status).toBe('degraded');
    expect(body.services.redis).toMatchObject({ status: 'down', message: 'connection refused' });
  });

  it('should report unhealthy when Postgres is down', async () => {
    server = await createTestApp(createTestContext(), { postgres: down });

    const response = await server.inject({ method: 'GET', url: '/api/health' });

    expect(response.statusCode).toBe(503);
    expect(JSON.parse(response.body).status).toBe('unhealthy');
  });

  it('should not be ready while a dependency is down', async () => {
    server = await createTestApp(createTestContext(), { redis: down });

    const response = await server.inject({ method: 'GET', url: '/api/ready' });

    expect(response.statusCode).toBe(503);
    expect(JSON.parse(response.body)).toEqual({ ready: false });
  });

  it('should always be live', async () => {
    server = await createTestApp(createTestContext(), { postgres: down, redis: down });

    const response = await server.inject({ method: 'GET', url: '/api/live' });

    expect(JSON.parse(response.body)).toEqual({ live: true });
  });
});
