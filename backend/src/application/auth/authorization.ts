/**
 * Authorization Gate
 * Resolves the caller from an access token (session cache first, Postgres
 * on a miss) and enforces role requirements.
 */

import { UserRole, type PublicUser } from '@contacts-hub/shared';
import type { UserRepository } from '../../infrastructure/database/user.repository.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { forbidden, unauthorized } from '../errors/app-error.js';
import { toPublicUser } from '../users/user.model.js';
import { TokenPurpose, type TokenIssuer } from './jwt.service.js';
import type { SessionCache } from './session-cache.service.js';

const logger = createLogger('authorization');

/** Which requirements each role satisfies */
const ROLE_GRANTS: Record<UserRole, ReadonlySet<UserRole>> = {
  [UserRole.ADMIN]: new Set([UserRole.ADMIN, UserRole.USER]),
  [UserRole.USER]: new Set([UserRole.USER]),
};

export function roleSatisfies(actual: UserRole, required: UserRole): boolean {
  return ROLE_GRANTS[actual].has(required);
}

export class AuthorizationGate {
  constructor(
    private readonly tokens: TokenIssuer,
    private readonly users: Pick<UserRepository, 'findByEmail'>,
    private readonly sessionCache: SessionCache
  ) {}

  async authenticate(accessToken: string): Promise<PublicUser> {
    const { subject } = this.tokens.verify(accessToken, TokenPurpose.ACCESS);

    const cached = await this.sessionCache.get(subject);
    if (cached) {
      return cached;
    }

    const user = await this.users.findByEmail(subject);
    if (!user) {
      logger.debug({ subject }, 'Token subject no longer exists');
      throw unauthorized();
    }

    const snapshot = toPublicUser(user);
    await this.sessionCache.put(subject, snapshot);
    return snapshot;
  }

  authorize(user: PublicUser, requiredRole: UserRole): void {
    if (!roleSatisfies(user.role, requiredRole)) {
      logger.warn({
        userId: user.id,
        role: user.role,
        requiredRole,
      }, 'Insufficient permissions');
      throw forbidden();
    }
  }
}
