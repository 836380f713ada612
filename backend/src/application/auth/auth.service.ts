/**
 * Authentication Service
 * Registration, email confirmation, login, refresh-token rotation, logout
 * and password reset.
 *
 * Each user has at most one refresh session: the SHA-256 of the active
 * refresh token lives on the user row and is swapped on every refresh.
 */

import { UserRole, type PublicUser, type RegisterUserPayload, type TokenPair } from '@contacts-hub/shared';
import crypto from 'crypto';
import type { UserRepository } from '../../infrastructure/database/user.repository.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { gravatarUrl } from '../avatars/avatar.service.js';
import { conflict, invalidToken, isAppError, unauthorized } from '../errors/app-error.js';
import type { EmailSender } from '../notifications/email.service.js';
import { normalizeEmail, toPublicUser } from '../users/user.model.js';
import { hashToken, TokenPurpose, type TokenIssuer } from './jwt.service.js';
import { passwordFingerprint, type PasswordHasher } from './password.service.js';
import type { SessionCache } from './session-cache.service.js';

const logger = createLogger('auth-service');

export interface AuthSettings {
  /** Token lifetimes in seconds */
  accessTokenTtl: number;
  refreshTokenTtl: number;
  emailTokenTtl: number;
  resetTokenTtl: number;
  /** Registering with this email yields an ADMIN account */
  bootstrapAdminEmail?: string | undefined;
}

export interface AuthServiceDeps {
  users: UserRepository;
  tokens: TokenIssuer;
  passwords: PasswordHasher;
  sessionCache: SessionCache;
  email: EmailSender;
  settings: AuthSettings;
}

export interface ConfirmEmailResult {
  alreadyConfirmed: boolean;
}

const RESET_FINGERPRINT_CLAIM = 'pwd';
const MAX_USERNAME_LENGTH = 100;
/** `-` plus six hex characters */
const USERNAME_SUFFIX_LENGTH = 7;

export class AuthService {
  private readonly users: UserRepository;
  private readonly tokens: TokenIssuer;
  private readonly passwords: PasswordHasher;
  private readonly sessionCache: SessionCache;
  private readonly email: EmailSender;
  private readonly settings: AuthSettings;

  constructor(deps: AuthServiceDeps) {
    this.users = deps.users;
    this.tokens = deps.tokens;
    this.passwords = deps.passwords;
    this.sessionCache = deps.sessionCache;
    this.email = deps.email;
    this.settings = deps.settings;
  }

  async register(payload: RegisterUserPayload): Promise<PublicUser> {
    const email = normalizeEmail(payload.email);

    if (await this.users.findByEmail(email)) {
      throw conflict('User with this email already exists');
    }

    const username = await this.resolveUsername(email, payload.username);
    const passwordHash = await this.passwords.hash(payload.password);
    const role = email === this.settings.bootstrapAdminEmail ? UserRole.ADMIN : UserRole.USER;

    const user = await this.users.create({
      username,
      email,
      passwordHash,
      role,
      avatarUrl: gravatarUrl(email),
    });

    logger.info({ userId: user.id, email, role }, 'User registered');

    this.sendVerification(user.email, user.username);

    return toPublicUser(user);
  }

  /**
   * Re-send the verification email. Callers get the same answer whatever the
   * state of the account.
   */
  async requestEmailConfirmation(rawEmail: string): Promise<void> {
    const user = await this.users.findByEmail(normalizeEmail(rawEmail));
    if (user && !user.confirmed) {
      this.sendVerification(user.email, user.username);
    }
  }

  async confirmEmail(token: string): Promise<ConfirmEmailResult> {
    const { subject } = this.tokens.verify(token, TokenPurpose.VERIFY_EMAIL);

    const user = await this.users.findByEmail(subject);
    if (!user) {
      throw invalidToken('Verification error');
    }
    if (user.confirmed) {
      return { alreadyConfirmed: true };
    }

    await this.users.markConfirmed(subject);
    await this.sessionCache.evict(subject);

    logger.info({ userId: user.id }, 'Email confirmed');
    return { alreadyConfirmed: false };
  }

  async login(rawEmail: string, password: string): Promise<TokenPair> {
    const email = normalizeEmail(rawEmail);
    const user = await this.users.findByEmail(email);

    if (!user || !(await this.passwords.verify(password, user.passwordHash))) {
      logger.debug({ email }, 'Login rejected: bad credentials');
      throw unauthorized('Incorrect email or password');
    }
    if (!user.confirmed) {
      throw unauthorized('Email address is not confirmed');
    }

    const pair = this.issueTokenPair(email);
    await this.users.setRefreshTokenHash(email, hashToken(pair.refreshToken));

    logger.info({ userId: user.id }, 'User logged in');
    return pair;
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    let subject: string;
    try {
      ({ subject } = this.tokens.verify(refreshToken, TokenPurpose.REFRESH));
    } catch (error) {
      if (isAppError(error) && error.isTokenError) {
        throw unauthorized('Invalid refresh token');
      }
      throw error;
    }

    const pair = this.issueTokenPair(subject);
    const rotated = await this.users.rotateRefreshTokenHash(
      subject,
      hashToken(refreshToken),
      hashToken(pair.refreshToken)
    );

    if (!rotated) {
      logger.warn({ subject }, 'Refresh rejected: token rotated out or session revoked');
      throw unauthorized('Invalid refresh token');
    }

    return pair;
  }

  async logout(user: PublicUser): Promise<void> {
    await this.users.setRefreshTokenHash(user.email, null);
    await this.sessionCache.evict(user.email);
    logger.info({ userId: user.id }, 'User logged out');
  }

  /**
   * Always resolves the same way so the endpoint does not reveal which
   * emails are registered.
   */
  async requestPasswordReset(rawEmail: string): Promise<void> {
    const email = normalizeEmail(rawEmail);
    const user = await this.users.findByEmail(email);
    if (!user) {
      logger.debug({ email }, 'Password reset requested for unknown email');
      return;
    }

    const token = this.tokens.issue(email, TokenPurpose.RESET_PASSWORD, this.settings.resetTokenTtl, {
      [RESET_FINGERPRINT_CLAIM]: passwordFingerprint(user.passwordHash),
    });

    this.deliverInBackground('password-reset', email, () =>
      this.email.sendPasswordResetEmail(email, user.username, token)
    );
  }

  async resetPassword(token: string, newPassword: string): Promise<void> {
    const verified = this.tokens.verify(token, TokenPurpose.RESET_PASSWORD);

    const user = await this.users.findByEmail(verified.subject);
    if (!user) {
      throw invalidToken();
    }
    // The fingerprint changes with the password, so each token works once
    if (verified.claims[RESET_FINGERPRINT_CLAIM] !== passwordFingerprint(user.passwordHash)) {
      throw invalidToken('Reset token has already been used');
    }

    const passwordHash = await this.passwords.hash(newPassword);
    // A concurrent reset with the same token may have won while we hashed
    if (!(await this.users.updatePassword(user.email, user.passwordHash, passwordHash))) {
      throw invalidToken('Reset token has already been used');
    }
    await this.sessionCache.evict(user.email);

    logger.info({ userId: user.id }, 'Password reset; refresh session revoked');
  }

  private issueTokenPair(subject: string): TokenPair {
    return {
      accessToken: this.tokens.issue(subject, TokenPurpose.ACCESS, this.settings.accessTokenTtl),
      refreshToken: this.tokens.issue(subject, TokenPurpose.REFRESH, this.settings.refreshTokenTtl),
      tokenType: 'bearer',
      expiresIn: this.settings.accessTokenTtl,
    };
  }

  private async resolveUsername(email: string, requested: string | undefined): Promise<string> {
    const explicit = requested?.trim();
    if (explicit) {
      if (await this.users.findByUsername(explicit)) {
        throw conflict('User with this username already exists');
      }
      return explicit;
    }

    // Leave room for the suffix within the username column
    const localPart = (email.split('@')[0] ?? 'user').slice(0, MAX_USERNAME_LENGTH - USERNAME_SUFFIX_LENGTH);
    if (!(await this.users.findByUsername(localPart))) {
      return localPart;
    }
    return `${localPart}-${crypto.randomBytes(3).toString('hex')}`;
  }

  private sendVerification(email: string, username: string): void {
    const token = this.tokens.issue(email, TokenPurpose.VERIFY_EMAIL, this.settings.emailTokenTtl);
    this.deliverInBackground('verification', email, () =>
      this.email.sendVerificationEmail(email, username, token)
    );
  }

  /**
   * Email delivery is best effort: failures are logged, never surfaced
   */
  private deliverInBackground(kind: string, email: string, send: () => Promise<void>): void {
    void send().catch((error: unknown) => {
      logger.warn({
        kind,
        email,
        error: error instanceof Error ? error.message : String(error),
      }, 'Email delivery failed');
    });
  }
}
