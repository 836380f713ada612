/**
 * Authentication Middleware
 * Bearer access tokens resolved through the authorization gate
 */

import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import type { PublicUser, UserRole } from '@contacts-hub/shared';
import type { AuthorizationGate } from '../../../application/auth/authorization.js';
import { extractBearerToken } from '../../../application/auth/jwt.service.js';
import { unauthorized } from '../../../application/errors/app-error.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('auth-middleware');

// Extend FastifyRequest to include the authenticated user
declare module 'fastify' {
  interface FastifyRequest {
    user?: PublicUser;
  }
}

export interface AuthGuards {
  requireAuth: preHandlerAsyncHookHandler;
  requireRole(role: UserRole): preHandlerAsyncHookHandler[];
}

export function createAuthGuards(gate: AuthorizationGate): AuthGuards {
  const requireAuth = async function (request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      logger.debug({ hasAuthHeader: !!request.headers.authorization }, 'Authentication failed');
      throw unauthorized('Not authenticated');
    }
    request.user = await gate.authenticate(token);
  };

  return {
    requireAuth,
    requireRole(role: UserRole) {
      const checkRole = async function (request: FastifyRequest, _reply: FastifyReply): Promise<void> {
        gate.authorize(currentUser(request), role);
      };
      return [requireAuth, checkRole];
    },
  };
}

/**
 * The user attached by `requireAuth`
 */
export function currentUser(request: FastifyRequest): PublicUser {
  if (!request.user) {
    throw unauthorized('Not authenticated');
  }
  return request.user;
}
