/**
 * JWT Service
 * Issues and verifies HS256 tokens for the four token purposes:
 * access, refresh, email verification and password reset.
 */

import crypto from 'crypto';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { expiredToken, invalidToken, purposeMismatch } from '../errors/app-error.js';

const logger = createLogger('jwt-service');

export const TokenPurpose = {
  ACCESS: 'access',
  REFRESH: 'refresh',
  VERIFY_EMAIL: 'verify-email',
  RESET_PASSWORD: 'reset-password',
} as const;

export type TokenPurpose = (typeof TokenPurpose)[keyof typeof TokenPurpose];

const PURPOSES: ReadonlySet<string> = new Set(Object.values(TokenPurpose));

/** Claims a caller may add on top of the standard set */
export type ExtraClaims = Readonly<Record<string, string>>;

export interface VerifiedToken {
  readonly subject: string;
  readonly purpose: TokenPurpose;
  readonly tokenId: string;
  readonly issuedAt: number;
  readonly expiresAt: number;
  readonly claims: ExtraClaims;
}

interface JWTHeader {
  alg: string;
  typ: string;
}

const RESERVED_CLAIMS = new Set(['sub', 'purpose', 'jti', 'iat', 'exp']);

/**
 * Base64Url encode
 */
function base64UrlEncode(data: string): string {
  return Buffer.from(data).toString('base64url');
}

/**
 * Base64Url decode
 */
function base64UrlDecode(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

function isTokenPurpose(value: unknown): value is TokenPurpose {
  return typeof value === 'string' && PURPOSES.has(value);
}

function parseJson(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class TokenIssuer {
  private readonly secret: string;
  private readonly now: () => number;

  /**
   * @param now - clock in milliseconds, replaceable in tests
   */
  constructor(secret: string, now: () => number = Date.now) {
    if (!secret) {
      throw new Error('JWT signing secret is not configured');
    }
    this.secret = secret;
    this.now = now;
  }

  /**
   * Create HMAC-SHA256 signature
   */
  private sign(data: string): string {
    return crypto.createHmac('sha256', this.secret).update(data).digest('base64url');
  }

  /**
   * Generate a signed token for `subject` valid for `ttlSeconds`
   */
  issue(subject: string, purpose: TokenPurpose, ttlSeconds: number, extraClaims: ExtraClaims = {}): string {
    const header: JWTHeader = {
      alg: 'HS256',
      typ: 'JWT',
    };

    const iat = Math.floor(this.now() / 1000);
    const payload = {
      ...extraClaims,
      sub: subject,
      purpose,
      jti: crypto.randomUUID(),
      iat,
      exp: iat + ttlSeconds,
    };

    const encodedHeader = base64UrlEncode(JSON.stringify(header));
    const encodedPayload = base64UrlEncode(JSON.stringify(payload));
    const signature = this.sign(`${encodedHeader}.${encodedPayload}`);

    return `${encodedHeader}.${encodedPayload}.${signature}`;
  }

  /**
   * Verify signature, expiry and purpose. Throws INVALID_TOKEN, EXPIRED_TOKEN
   * or PURPOSE_MISMATCH.
   */
  verify(token: string, expectedPurpose: TokenPurpose): VerifiedToken {
    const parts = token.split('.');
    if (parts.length !== 3) {
      logger.debug('Invalid JWT format');
      throw invalidToken();
    }

    const [encodedHeader, encodedPayload, signature] = parts;
    if (!encodedHeader || !encodedPayload || !signature) {
      throw invalidToken();
    }

    const expected = Buffer.from(this.sign(`${encodedHeader}.${encodedPayload}`));
    const actual = Buffer.from(signature);
    if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
      logger.debug('Invalid JWT signature');
      throw invalidToken();
    }

    const header = parseJson(base64UrlDecode(encodedHeader));
    if (!isRecord(header) || header['alg'] !== 'HS256') {
      throw invalidToken();
    }

    const payload = parseJson(base64UrlDecode(encodedPayload));
    if (!isRecord(payload)) {
      throw invalidToken();
    }

    const { sub, purpose, jti, iat, exp } = payload;
    if (
      typeof sub !== 'string' || sub.length === 0 ||
      typeof jti !== 'string' ||
      typeof iat !== 'number' ||
      typeof exp !== 'number' ||
      !isTokenPurpose(purpose)
    ) {
      throw invalidToken();
    }

    const now = Math.floor(this.now() / 1000);
    if (exp <= now) {
      logger.debug({ exp, now }, 'JWT expired');
      throw expiredToken();
    }

    if (purpose !== expectedPurpose) {
      throw purposeMismatch(expectedPurpose, purpose);
    }

    const claims: Record<string, string> = {};
    for (const [key, value] of Object.entries(payload)) {
      if (!RESERVED_CLAIMS.has(key) && typeof value === 'string') {
        claims[key] = value;
      }
    }

    return {
      subject: sub,
      purpose,
      tokenId: jti,
      issuedAt: iat,
      expiresAt: exp,
      claims,
    };
  }
}

/**
 * Extract token from Authorization header
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }
  const [scheme, token] = authHeader.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !token) {
    return null;
  }
  return token;
}

/**
 * One-way hash for storing tokens server-side
 */
export function hashToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}
