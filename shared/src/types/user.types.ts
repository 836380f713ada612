/**
 * User types for account data (stored in PostgreSQL).
 * Authenticated user snapshots are cached in Redis to spare Postgres on every request.
 */

export type UserId = number;

/** User role for authorization */
export enum UserRole {
  USER = 'USER',
  ADMIN = 'ADMIN',
}

/** User as exposed over the API and held in the session cache */
export interface PublicUser {
  readonly id: UserId;
  readonly username: string;
  readonly email: string;
  readonly role: UserRole;
  readonly confirmed: boolean;
  readonly avatarUrl: string | null;
  readonly createdAt: string;
}

/** Registration payload */
export interface RegisterUserPayload {
  readonly email: string;
  readonly password: string;
  readonly username?: string;
}

/** Access + refresh token pair returned by login and refresh */
export interface TokenPair {
  readonly accessToken: string;
  readonly refreshToken: string;
  readonly tokenType: 'bearer';
  readonly expiresIn: number;
}

/** Role change payload (admin only) */
export interface ChangeRolePayload {
  readonly email: string;
  readonly role: UserRole;
}
