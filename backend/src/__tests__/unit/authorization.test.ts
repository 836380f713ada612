/**
 * Unit Tests: Authorization Gate
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { UserRole, type PublicUser } from '@contacts-hub/shared';
import { roleSatisfies } from '../../application/auth/authorization.js';
import { TokenPurpose } from '../../application/auth/jwt.service.js';
import { createTestContext, signUp, type TestContext } from '../mocks/context.js';

function userWithRole(role: UserRole): PublicUser {
  return {
    id: 7,
    username: 'someone',
    email: 'someone@x.com',
    role,
    confirmed: true,
    avatarUrl: null,
    createdAt: '2024-01-01T00:00:00.000Z',
  };
}

describe('roleSatisfies', () => {
  it.each([
    [UserRole.ADMIN, UserRole.ADMIN, true],
    [UserRole.ADMIN, UserRole.USER, true],
    [UserRole.USER, UserRole.USER, true],
    [UserRole.USER, UserRole.ADMIN, false],
  ])('%s satisfies %s: %s', (actual, required, expected) => {
    expect(roleSatisfies(actual, required)).toBe(expected);
  });
});

describe('AuthorizationGate', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  describe('authenticate', () => {
    it('should resolve the user and populate the cache on a miss', async () => {
      const { tokens } = await signUp(ctx, 'alice@x.com');
      ctx.redis.commands.splice(0);

      const user = await ctx.gate.authenticate(tokens.accessToken);

      expect(user).toMatchObject({ email: 'alice@x.com', role: UserRole.USER, confirmed: true });
      expect(ctx.redis.commands).toEqual(['GET auth:user:alice@x.com', 'SETEX auth:user:alice@x.com']);
      expect(ctx.redis.ttlOf('auth:user:alice@x.com')).toBe(3600);
    });

    it('should serve repeat calls from the cache', async () => {
      const { tokens } = await signUp(ctx, 'alice@x.com');
      const findByEmail = vi.spyOn(ctx.users, 'findByEmail');

      const first = await ctx.gate.authenticate(tokens.accessToken);
      const second = await ctx.gate.authenticate(tokens.accessToken);

      expect(second).toEqual(first);
      expect(findByEmail).toHaveBeenCalledTimes(1);
    });

    it('should not return a stale role after a role change', async () => {
      const { tokens } = await signUp(ctx, 'alice@x.com');
      await ctx.gate.authenticate(tokens.accessToken);

      await ctx.userService.changeRole('alice@x.com', UserRole.ADMIN);

      const user = await ctx.gate.authenticate(tokens.accessToken);
      expect(user.role).toBe(UserRole.ADMIN);
    });

    it('should reject a refresh token', async () => {
      const { tokens } = await signUp(ctx, 'alice@x.com');

      await expect(ctx.gate.authenticate(tokens.refreshToken))
        .rejects.toMatchObject({ kind: 'PURPOSE_MISMATCH', statusCode: 401 });
    });

    it('should reject a token whose subject no longer exists', async () => {
      const token = ctx.tokens.issue('ghost@x.com', TokenPurpose.ACCESS, 60);

      await expect(ctx.gate.authenticate(token))
        .rejects.toMatchObject({ kind: 'UNAUTHORIZED', message: 'Could not validate credentials' });
    });

    it('should surface a cache outage as EXTERNAL_SERVICE_ERROR', async () => {
      const { tokens } = await signUp(ctx, 'alice@x.com');
      ctx.redis.failWith(Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' }));

      await expect(ctx.gate.authenticate(tokens.accessToken))
        .rejects.toMatchObject({ kind: 'EXTERNAL_SERVICE_ERROR', statusCode: 503 });
    });
  });

  describe('authorize', () => {
    it('should let an ADMIN through USER and ADMIN requirements', () => {
      const admin = userWithRole(UserRole.ADMIN);

      expect(() => ctx.gate.authorize(admin, UserRole.USER)).not.toThrow();
      expect(() => ctx.gate.authorize(admin, UserRole.ADMIN)).not.toThrow();
    });

    it('should forbid a USER from ADMIN operations', () => {
      expect(() => ctx.gate.authorize(userWithRole(UserRole.USER), UserRole.ADMIN)).toThrow(
        expect.objectContaining({ kind: 'FORBIDDEN', message: 'Insufficient permissions' })
      );
    });
  });
});
