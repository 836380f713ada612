/**
 * Session Cache
 * Authenticated user snapshots in Redis, keyed by email, so the gate does not
 * hit Postgres on every request. Entries are evicted on every user mutation.
 */

import { UserRole, type PublicUser } from '@contacts-hub/shared';
import { z } from 'zod';
import { RedisKeys, type KeyValueStore } from '../../infrastructure/cache/redis.client.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { callExternal, type RetryConfig } from '../resilience/retry.utils.js';

const logger = createLogger('session-cache');

const CachedUserSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  email: z.string(),
  role: z.nativeEnum(UserRole),
  confirmed: z.boolean(),
  avatarUrl: z.string().nullable(),
  createdAt: z.string(),
});

export interface SessionCacheOptions {
  ttlSeconds: number;
  timeoutMs: number;
  retry?: RetryConfig;
}

export class SessionCache {
  constructor(
    private readonly store: KeyValueStore,
    private readonly options: SessionCacheOptions
  ) {}

  private call<T>(operation: () => Promise<T>): Promise<T> {
    return callExternal('session-cache', operation, {
      timeoutMs: this.options.timeoutMs,
      ...(this.options.retry ? { retry: this.options.retry } : {}),
    });
  }

  async get(subject: string): Promise<PublicUser | null> {
    const key = RedisKeys.sessionUser(subject);
    const cached = await this.call(() => this.store.get(key));

    if (!cached) {
      logger.debug({ key }, 'Cache MISS for session user');
      return null;
    }

    const parsed = CachedUserSchema.safeParse(parseJson(cached));
    if (!parsed.success) {
      logger.warn({ key }, 'Discarding malformed session cache entry');
      await this.evict(subject);
      return null;
    }

    logger.debug({ key }, 'Cache HIT for session user');
    return parsed.data;
  }

  async put(subject: string, user: PublicUser, ttlSeconds = this.options.ttlSeconds): Promise<void> {
    const key = RedisKeys.sessionUser(subject);
    await this.call(() => this.store.setex(key, ttlSeconds, JSON.stringify(user)));
  }

  async evict(subject: string): Promise<void> {
    const key = RedisKeys.sessionUser(subject);
    await this.call(() => this.store.del(key));
    logger.debug({ key }, 'Session cache entry evicted');
  }
}

function parseJson(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return null;
  }
}
