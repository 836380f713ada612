/**
 * User repository (credential store)
 */

import type { UserRole } from '@contacts-hub/shared';
import { and, eq } from 'drizzle-orm';
import { conflict } from '../../application/errors/app-error.js';
import { retryTransient, type RetryConfig } from '../../application/resilience/retry.utils.js';
import type { NewUserData, UserRecord } from '../../application/users/user.model.js';
import { isUniqueViolation, type Database } from './postgres.client.js';
import { users } from './schema.js';

export interface UserRepository {
  findByEmail(email: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  /** Throws CONFLICT when email or username is taken */
  create(data: NewUserData): Promise<UserRecord>;
  markConfirmed(email: string): Promise<void>;
  /**
   * Replaces the password hash and drops the active refresh session in one
   * update, only while the stored hash is still `expectedHash`.
   */
  updatePassword(email: string, expectedHash: string, nextHash: string): Promise<boolean>;
  setRefreshTokenHash(email: string, tokenHash: string | null): Promise<void>;
  /**
   * Compare-and-swap of the refresh hash. Returns false when the stored hash
   * is not `expectedHash` (token reused or session gone).
   */
  rotateRefreshTokenHash(email: string, expectedHash: string, nextHash: string): Promise<boolean>;
  updateAvatarUrl(email: string, avatarUrl: string): Promise<UserRecord | null>;
  updateRole(email: string, role: UserRole): Promise<UserRecord | null>;
}

export class DrizzleUserRepository implements UserRepository {
  constructor(
    private readonly db: Database,
    private readonly retry?: RetryConfig
  ) {}

  private query<T>(operation: () => Promise<T>): Promise<T> {
    return retryTransient('postgres', operation, this.retry);
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const [user] = await this.query(async () =>
      this.db.select().from(users).where(eq(users.email, email)).limit(1)
    );
    return user ?? null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const [user] = await this.query(async () =>
      this.db.select().from(users).where(eq(users.username, username)).limit(1)
    );
    return user ?? null;
  }

  async create(data: NewUserData): Promise<UserRecord> {
    try {
      const [user] = await this.query(async () => this.db.insert(users).values(data).returning());
      if (!user) {
        throw new Error('Insert returned no row');
      }
      return user;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw conflict('User with this email or username already exists');
      }
      throw error;
    }
  }

  async markConfirmed(email: string): Promise<void> {
    await this.query(async () =>
      this.db
        .update(users)
        .set({ confirmed: true, updatedAt: new Date() })
        .where(eq(users.email, email))
    );
  }

  async updatePassword(email: string, expectedHash: string, nextHash: string): Promise<boolean> {
    const updated = await this.query(async () =>
      this.db
        .update(users)
        .set({ passwordHash: nextHash, refreshTokenHash: null, updatedAt: new Date() })
        .where(and(eq(users.email, email), eq(users.passwordHash, expectedHash)))
        .returning({ id: users.id })
    );
    return updated.length === 1;
  }

  async setRefreshTokenHash(email: string, tokenHash: string | null): Promise<void> {
    await this.query(async () =>
      this.db
        .update(users)
        .set({ refreshTokenHash: tokenHash })
        .where(eq(users.email, email))
    );
  }

  async rotateRefreshTokenHash(email: string, expectedHash: string, nextHash: string): Promise<boolean> {
    const rotated = await this.query(async () =>
      this.db
        .update(users)
        .set({ refreshTokenHash: nextHash })
        .where(and(eq(users.email, email), eq(users.refreshTokenHash, expectedHash)))
        .returning({ id: users.id })
    );
    return rotated.length === 1;
  }

  async updateAvatarUrl(email: string, avatarUrl: string): Promise<UserRecord | null> {
    const [user] = await this.query(async () =>
      this.db
        .update(users)
        .set({ avatarUrl, updatedAt: new Date() })
        .where(eq(users.email, email))
        .returning()
    );
    return user ?? null;
  }

  async updateRole(email: string, role: UserRole): Promise<UserRecord | null> {
    const [user] = await this.query(async () =>
      this.db
        .update(users)
        .set({ role, updatedAt: new Date() })
        .where(eq(users.email, email))
        .returning()
    );
    return user ?? null;
  }
}
