import type { PublicUser, UserId, UserRole } from '@contacts-hub/shared';

/** Full user record as stored; never leaves the server */
export interface UserRecord {
  readonly id: UserId;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: UserRole;
  readonly confirmed: boolean;
  readonly avatarUrl: string | null;
  readonly refreshTokenHash: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewUserData {
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: UserRole;
  readonly avatarUrl: string | null;
}

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    confirmed: user.confirmed,
    avatarUrl: user.avatarUrl,
    createdAt: user.createdAt.toISOString(),
  };
}

export function normalizeEmail(email: string): string {
  return email.toLowerCase().trim();
}
