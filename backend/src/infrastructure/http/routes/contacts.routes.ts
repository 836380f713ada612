/**
 * Contact Routes
 * Every route acts on the contacts of the authenticated user
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { ContactService } from '../../../application/contacts/contact.service.js';
import {
  BirthdayQuerySchema,
  ContactIdParamsSchema,
  ContactInputSchema,
  ContactListQuerySchema,
  ContactSearchQuerySchema,
} from '../../../application/contacts/contact.validator.js';
import { currentUser, type AuthGuards } from '../middleware/auth.middleware.js';
import { errorResponseSchema } from './schemas.js';

export interface ContactRoutesOptions {
  contacts: ContactService;
  guards: AuthGuards;
}

export const contactRoutes: FastifyPluginAsync<ContactRoutesOptions> = async (
  fastify: FastifyInstance,
  { contacts, guards }
): Promise<void> => {
  fastify.addHook('preHandler', guards.requireAuth);

  // GET /contacts
  fastify.get('/', {
    schema: {
      tags: ['Contacts'],
      summary: 'List contacts',
      description: 'Optional case-insensitive substring filters on firstName, lastName and email.',
    },
  }, async (request, reply) => {
    const { skip, limit, ...filter } = ContactListQuerySchema.parse(request.query);
    const data = await contacts.list(currentUser(request), filter, { skip, limit });
    return reply.send({ success: true, data });
  });

  // GET /contacts/search
  fastify.get('/search', {
    schema: {
      tags: ['Contacts'],
      summary: 'Search contacts',
      description: 'Matches names, email, phone number and additional data.',
    },
  }, async (request, reply) => {
    const { text, skip, limit } = ContactSearchQuerySchema.parse(request.query);
    const data = await contacts.search(currentUser(request), text, { skip, limit });
    return reply.send({ success: true, data });
  });

  // GET /contacts/birthdays
  fastify.get('/birthdays', {
    schema: {
      tags: ['Contacts'],
      summary: 'Upcoming birthdays',
      description: 'Contacts whose birthday falls within the next `days` days (default 7).',
    },
  }, async (request, reply) => {
    const { days } = BirthdayQuerySchema.parse(request.query);
    const data = await contacts.upcomingBirthdays(currentUser(request), days);
    return reply.send({ success: true, data });
  });

  // GET /contacts/:id
  fastify.get('/:id', {
    schema: {
      tags: ['Contacts'],
      summary: 'Get a contact',
      response: { 404: errorResponseSchema },
    },
  }, async (request, reply) => {
    const { id } = ContactIdParamsSchema.parse(request.params);
    const data = await contacts.get(currentUser(request), id);
    return reply.send({ success: true, data });
  });

  // POST /contacts
  fastify.post('/', {
    schema: {
      tags: ['Contacts'],
      summary: 'Create a contact',
    },
  }, async (request, reply) => {
    const input = ContactInputSchema.parse(request.body);
    const data = await contacts.create(currentUser(request), input);
    return reply.status(201).send({ success: true, data });
  });

  // PUT /contacts/:id
  fastify.put('/:id', {
    schema: {
      tags: ['Contacts'],
      summary: 'Replace a contact',
      response: { 404: errorResponseSchema },
    },
  }, async (request, reply) => {
    const { id } = ContactIdParamsSchema.parse(request.params);
    const input = ContactInputSchema.parse(request.body);
    const data = await contacts.update(currentUser(request), id, input);
    return reply.send({ success: true, data });
  });

  // DELETE /contacts/:id
  fastify.delete('/:id', {
    schema: {
      tags: ['Contacts'],
      summary: 'Delete a contact',
      response: { 404: errorResponseSchema },
    },
  }, async (request, reply) => {
    const { id } = ContactIdParamsSchema.parse(request.params);
    await contacts.remove(currentUser(request), id);
    return reply.status(204).send();
  });
};
