/**
 * Authentication Routes
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { MessageResponse, TokenPair } from '@contacts-hub/shared';
import { z } from 'zod';
import type { AuthService } from '../../../application/auth/auth.service.js';
import { currentUser, type AuthGuards } from '../middleware/auth.middleware.js';
import { createLogger } from '../../logging/logger.js';
import { errorResponseSchema, successResponseSchema } from './schemas.js';

const logger = createLogger('auth-routes');

export interface AuthRoutesOptions {
  auth: AuthService;
  guards: AuthGuards;
}

// bcrypt only looks at the first 72 bytes of the UTF-8 encoding
const MAX_PASSWORD_BYTES = 72;

const password = z
  .string()
  .min(6, 'Password must be at least 6 characters')
  .refine(
    value => Buffer.byteLength(value, 'utf8') <= MAX_PASSWORD_BYTES,
    `Password must be at most ${MAX_PASSWORD_BYTES} bytes`
  );

const RegisterSchema = z.object({
  email: z.string().trim().email('Invalid email format').max(255, 'Email must be at most 255 characters'),
  password,
  username: z.string().trim().min(2).max(50).optional(),
});

const LoginSchema = z.object({
  email: z.string().trim().email('Invalid email format'),
  password: z.string().min(1, 'Password is required'),
});

const RefreshSchema = z.object({
  refreshToken: z.string().min(1, 'refreshToken is required'),
});

const EmailSchema = z.object({
  email: z.string().trim().email('Invalid email format'),
});

const TokenParamsSchema = z.object({
  token: z.string().min(1),
});

const ResetPasswordSchema = z.object({
  password,
});

const RESET_REQUESTED: MessageResponse = {
  message: 'If the account exists, a password reset email has been sent',
};

const CONFIRMATION_REQUESTED: MessageResponse = {
  message: 'Check your email for confirmation',
};

const tokenPairSchema = {
  type: 'object',
  properties: {
    accessToken: { type: 'string' },
    refreshToken: { type: 'string' },
    tokenType: { type: 'string' },
    expiresIn: { type: 'number', description: 'Access token lifetime in seconds' },
  },
} as const;

export const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (
  fastify: FastifyInstance,
  { auth, guards }
): Promise<void> => {

  // POST /auth/register
  fastify.post('/register', {
    schema: {
      tags: ['Auth'],
      summary: 'Register a new account',
      description: 'Creates an unconfirmed user and emails a verification link.',
      response: { 409: errorResponseSchema },
    },
  }, async (request, reply) => {
    const body = RegisterSchema.parse(request.body);
    const user = await auth.register(body);
    return reply.status(201).send({ success: true, data: user });
  });

  // POST /auth/login
  fastify.post('/login', {
    schema: {
      tags: ['Auth'],
      summary: 'Log in',
      description: 'Exchanges credentials of a confirmed user for an access/refresh token pair.',
      response: { 200: successResponseSchema(tokenPairSchema), 401: errorResponseSchema },
    },
  }, async (request, reply) => {
    const body = LoginSchema.parse(request.body);
    const tokens: TokenPair = await auth.login(body.email, body.password);
    return reply.send({ success: true, data: tokens });
  });

  // POST /auth/refresh
  fastify.post('/refresh', {
    schema: {
      tags: ['Auth'],
      summary: 'Rotate the refresh token',
      description: 'Returns a new token pair. The presented refresh token stops working.',
      response: { 200: successResponseSchema(tokenPairSchema), 401: errorResponseSchema },
    },
  }, async (request, reply) => {
    const body = RefreshSchema.parse(request.body);
    const tokens = await auth.refresh(body.refreshToken);
    return reply.send({ success: true, data: tokens });
  });

  // POST /auth/logout
  fastify.post('/logout', {
    schema: {
      tags: ['Auth'],
      summary: 'Log out',
      description: 'Revokes the refresh session of the caller.',
    },
    preHandler: guards.requireAuth,
  }, async (request, reply) => {
    await auth.logout(currentUser(request));
    return reply.status(204).send();
  });

  // POST|GET /auth/confirm/:token (GET so the emailed link works)
  const confirm = async (rawParams: unknown) => {
    const params = TokenParamsSchema.parse(rawParams);
    const result = await auth.confirmEmail(params.token);
    const message = result.alreadyConfirmed ? 'Your email is already confirmed' : 'Email confirmed';
    return { success: true, data: { message } satisfies MessageResponse };
  };

  fastify.post('/confirm/:token', {
    schema: { tags: ['Auth'], summary: 'Confirm email address' },
  }, async (request) => confirm(request.params));

  fastify.get('/confirm/:token', {
    schema: { tags: ['Auth'], summary: 'Confirm email address (link)' },
  }, async (request) => confirm(request.params));

  // POST /auth/request-email
  fastify.post('/request-email', {
    schema: {
      tags: ['Auth'],
      summary: 'Resend the verification email',
    },
  }, async (request, reply) => {
    const body = EmailSchema.parse(request.body);
    await auth.requestEmailConfirmation(body.email);
    return reply.send({ success: true, data: CONFIRMATION_REQUESTED });
  });

  // POST /auth/reset-request
  fastify.post('/reset-request', {
    schema: {
      tags: ['Auth'],
      summary: 'Request a password reset email',
      description: 'Always answers 202 with the same body.',
    },
  }, async (request, reply) => {
    const body = EmailSchema.parse(request.body);
    await auth.requestPasswordReset(body.email);
    logger.debug('Password reset requested');
    return reply.status(202).send({ success: true, data: RESET_REQUESTED });
  });

  // POST /auth/reset/:token
  fastify.post('/reset/:token', {
    schema: {
      tags: ['Auth'],
      summary: 'Set a new password',
      response: { 401: errorResponseSchema },
    },
  }, async (request, reply) => {
    const params = TokenParamsSchema.parse(request.params);
    const body = ResetPasswordSchema.parse(request.body);
    await auth.resetPassword(params.token, body.password);
    return reply.send({ success: true, data: { message: 'Password has been reset' } satisfies MessageResponse });
  });
};
