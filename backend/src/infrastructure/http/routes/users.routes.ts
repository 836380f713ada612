/**
 * User Routes
 * Profile, avatar upload and role administration
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { UserRole, type ChangeRolePayload } from '@contacts-hub/shared';
import { z } from 'zod';
import type { UserService } from '../../../application/users/user.service.js';
import { validationError } from '../../../application/errors/app-error.js';
import { currentUser, type AuthGuards } from '../middleware/auth.middleware.js';
import { errorResponseSchema } from './schemas.js';

export interface UserRoutesOptions {
  users: UserService;
  guards: AuthGuards;
}

const ChangeRoleSchema = z.object({
  email: z.string().trim().email('Invalid email format'),
  role: z.nativeEnum(UserRole),
}) satisfies z.ZodType<ChangeRolePayload>;

export const userRoutes: FastifyPluginAsync<UserRoutesOptions> = async (
  fastify: FastifyInstance,
  { users, guards }
): Promise<void> => {

  // GET /users/me
  fastify.get('/me', {
    schema: {
      tags: ['Users'],
      summary: 'Current user',
      response: { 401: errorResponseSchema },
    },
    config: {
      rateLimit: { max: 5, timeWindow: '1 minute' },
    },
    preHandler: guards.requireAuth,
  }, async (request, reply) => {
    return reply.send({ success: true, data: users.getProfile(currentUser(request)) });
  });

  // PATCH /users/avatar
  fastify.patch('/avatar', {
    schema: {
      tags: ['Users'],
      summary: 'Upload a new avatar',
      description: 'multipart/form-data with an image in the `file` field. Admin only.',
      consumes: ['multipart/form-data'],
    },
    preHandler: guards.requireRole(UserRole.ADMIN),
  }, async (request, reply) => {
    const file = await request.file();
    if (!file || file.fieldname !== 'file') {
      throw validationError('An image must be sent in the "file" field');
    }
    if (!file.mimetype.startsWith('image/')) {
      throw validationError('Avatar must be an image');
    }

    const image = await file.toBuffer();
    const user = await users.updateAvatar(currentUser(request), image);
    return reply.send({ success: true, data: user });
  });

  // PATCH /users/role
  fastify.patch('/role', {
    schema: {
      tags: ['Users'],
      summary: 'Change the role of a user',
      description: 'Admin only.',
      response: { 404: errorResponseSchema },
    },
    preHandler: guards.requireRole(UserRole.ADMIN),
  }, async (request, reply) => {
    const body = ChangeRoleSchema.parse(request.body);
    const user = await users.changeRole(body.email, body.role);
    return reply.send({ success: true, data: user });
  });
};
