/**
 * Redis Client
 * Used for: the authenticated-user session cache and rate limiting
 */

import { Redis, type RedisOptions } from 'ioredis';
import { getRedisUrl, type Config } from '../../config/index.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('redis-client');

/**
 * The subset of Redis commands the application relies on. Tests substitute
 * an in-memory implementation.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

export function createRedisClient(config: Config): Redis {
  const options: RedisOptions = {
    maxRetriesPerRequest: 3,
    retryStrategy(times: number) {
      if (times > 10) {
        logger.error({ attempts: times }, 'Redis connection failed');
        return null;
      }
      const delay = Math.min(times * 200, 5000);
      logger.warn({ attempt: times, delay }, 'Redis connection retry');
      return delay;
    },
    connectTimeout: 10000,
    commandTimeout: config.redis.commandTimeoutMs,
    lazyConnect: true,
    enableReadyCheck: true,
  };

  const client = new Redis(getRedisUrl(config), options);

  client.on('connect', () => {
    logger.debug('Redis TCP connection established');
  });

  client.on('ready', () => {
    logger.info('Redis ready');
  });

  client.on('error', (error: Error) => {
    logger.error({ error: error.message }, 'Redis error');
  });

  client.on('close', () => {
    logger.warn('Redis connection closed');
  });

  client.on('reconnecting', (delay: number) => {
    logger.warn({ delay }, 'Redis reconnecting');
  });

  return client;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Connect to Redis with retries
 */
export async function connectRedisWithRetry(client: Redis, maxRetries = 10): Promise<void> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      if (client.status === 'wait' || client.status === 'end') {
        await client.connect();
      }
      const pingResult = await client.ping();
      if (pingResult !== 'PONG') {
        throw new Error(`Redis ping failed: expected PONG, got ${pingResult}`);
      }
      logger.info('Redis connected');
      return;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.warn({ attempt, maxRetries, error: errorMessage }, 'Redis connection attempt failed');

      if (attempt === maxRetries) {
        throw new Error(`Redis connection failed after ${maxRetries} attempts: ${errorMessage}`);
      }

      await sleep(2000);
    }
  }
}

export async function closeRedisClient(client: Redis): Promise<void> {
  await client.quit();
  logger.info('Redis closed');
}

export const RedisKeys = {
  sessionUser: (email: string) => `auth:user:${email.toLowerCase()}`,
} as const;
