/**
 * User Service
 * Current profile, plus the changes that invalidate the session cache:
 * avatar and role.
 */

import type { PublicUser, UserRole } from '@contacts-hub/shared';
import type { UserRepository } from '../../infrastructure/database/user.repository.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import type { SessionCache } from '../auth/session-cache.service.js';
import type { AvatarStorage } from '../avatars/avatar.service.js';
import { notFound } from '../errors/app-error.js';
import { normalizeEmail, toPublicUser } from './user.model.js';

const logger = createLogger('user-service');

export class UserService {
  constructor(
    private readonly users: UserRepository,
    private readonly sessionCache: SessionCache,
    private readonly avatars: AvatarStorage
  ) {}

  /** The caller as resolved by the authorization gate */
  getProfile(user: PublicUser): PublicUser {
    return user;
  }

  async updateAvatar(user: PublicUser, image: Buffer): Promise<PublicUser> {
    const avatarUrl = await this.avatars.upload(user.username, image);

    const updated = await this.users.updateAvatarUrl(user.email, avatarUrl);
    if (!updated) {
      throw notFound('User');
    }
    await this.sessionCache.evict(user.email);

    logger.info({ userId: user.id }, 'Avatar updated');
    return toPublicUser(updated);
  }

  async changeRole(rawEmail: string, role: UserRole): Promise<PublicUser> {
    const email = normalizeEmail(rawEmail);

    const updated = await this.users.updateRole(email, role);
    if (!updated) {
      throw notFound('User');
    }
    await this.sessionCache.evict(email);

    logger.info({ userId: updated.id, role }, 'Role changed');
    return toPublicUser(updated);
  }
}
