/**
 * Contacts Hub Backend - Entry Point
 */

import { AuthService } from './application/auth/auth.service.js';
import { AuthorizationGate } from './application/auth/authorization.js';
import { TokenIssuer } from './application/auth/jwt.service.js';
import { BcryptPasswordHasher } from './application/auth/password.service.js';
import { SessionCache } from './application/auth/session-cache.service.js';
import { CloudinaryAvatarStorage } from './application/avatars/avatar.service.js';
import { ContactService } from './application/contacts/contact.service.js';
import { SmtpEmailSender } from './application/notifications/email.service.js';
import { UserService } from './application/users/user.service.js';
import { loadConfig, validateConfig } from './config/index.js';
import { closeRedisClient, connectRedisWithRetry, createRedisClient } from './infrastructure/cache/redis.client.js';
import { DrizzleContactRepository } from './infrastructure/database/contact.repository.js';
import {
  closePostgresConnection,
  connectPostgresWithRetry,
  createPostgresConnection,
  ensureSchema,
  pingPostgres,
} from './infrastructure/database/postgres.client.js';
import { DrizzleUserRepository } from './infrastructure/database/user.repository.js';
import { buildApp } from './infrastructure/http/server.js';
import { createLogger } from './infrastructure/logging/logger.js';

const logger = createLogger('main');

function formatError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return error.stack ? { message: error.message, stack: error.stack } : { message: error.message };
  }
  return { message: String(error) };
}

async function bootstrap(): Promise<void> {
  try {
    const config = loadConfig();
    const configErrors = validateConfig(config);

    if (configErrors.length > 0) {
      logger.fatal({ errors: configErrors }, 'Configuration errors');
      process.exit(1);
    }

    logger.info({
      env: config.env,
      host: config.server.host,
      port: config.server.port,
    }, 'Starting server');

    const postgres = createPostgresConnection(config);
    await connectPostgresWithRetry(postgres);
    await ensureSchema(postgres);

    const redis = createRedisClient(config);
    await connectRedisWithRetry(redis);

    const userRepository = new DrizzleUserRepository(postgres.db);
    const contactRepository = new DrizzleContactRepository(postgres.db);
    const tokens = new TokenIssuer(config.auth.jwtSecret);
    const sessionCache = new SessionCache(redis, {
      ttlSeconds: config.auth.sessionCacheTtl,
      timeoutMs: config.redis.commandTimeoutMs,
    });

    const server = await buildApp({
      auth: new AuthService({
        users: userRepository,
        tokens,
        passwords: new BcryptPasswordHasher(config.auth.bcryptRounds),
        sessionCache,
        email: new SmtpEmailSender(config.mail, config.appBaseUrl),
        settings: config.auth,
      }),
      gate: new AuthorizationGate(tokens, userRepository, sessionCache),
      users: new UserService(userRepository, sessionCache, new CloudinaryAvatarStorage(config.cloudinary)),
      contacts: new ContactService(contactRepository),
      probes: {
        postgres: () => pingPostgres(postgres),
        redis: async () => {
          await redis.ping();
        },
      },
    }, {
      env: config.env,
      corsOrigins: config.server.corsOrigins,
      docs: config.env !== 'production',
      rateLimitRedis: redis,
    });

    await server.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({
      url: `http://${config.server.host}:${config.server.port}`,
    }, 'Server listening');

    const shutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, 'Shutting down');

      try {
        await server.close();
        await closeRedisClient(redis);
        await closePostgresConnection(postgres);
        logger.info('Shutdown complete');
        process.exit(0);
      } catch (error) {
        logger.error({ err: error }, 'Shutdown error');
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('uncaughtException', (error) => {
      logger.fatal({ err: error }, 'Uncaught exception');
      process.exit(1);
    });
    process.on('unhandledRejection', (reason) => {
      logger.fatal({ err: reason }, 'Unhandled rejection');
      process.exit(1);
    });

  } catch (error) {
    logger.fatal(formatError(error), 'Failed to start server');
    process.exit(1);
  }
}

void bootstrap();
