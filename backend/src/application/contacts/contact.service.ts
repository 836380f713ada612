/**
 * Contact Service
 * Owner-scoped contact book: CRUD, filtering, free-text search and the
 * upcoming-birthday window.
 */

import type { Contact, ContactFilter, ContactInput, PublicUser } from '@contacts-hub/shared';
import type { ContactRepository, Page } from '../../infrastructure/database/contact.repository.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { notFound } from '../errors/app-error.js';
import { monthDayOf, upcomingMonthDays } from './birthdays.js';

const logger = createLogger('contact-service');

export class ContactService {
  constructor(
    private readonly contacts: ContactRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  list(owner: PublicUser, filter: ContactFilter, page: Page): Promise<Contact[]> {
    return this.contacts.list(owner.id, filter, page);
  }

  search(owner: PublicUser, text: string, page: Page): Promise<Contact[]> {
    return this.contacts.search(owner.id, text, page);
  }

  async get(owner: PublicUser, contactId: number): Promise<Contact> {
    const contact = await this.contacts.findById(owner.id, contactId);
    if (!contact) {
      throw notFound('Contact');
    }
    return contact;
  }

  async create(owner: PublicUser, input: ContactInput): Promise<Contact> {
    const contact = await this.contacts.create(owner.id, input);
    logger.info({ userId: owner.id, contactId: contact.id }, 'Contact created');
    return contact;
  }

  async update(owner: PublicUser, contactId: number, input: ContactInput): Promise<Contact> {
    const contact = await this.contacts.update(owner.id, contactId, input);
    if (!contact) {
      throw notFound('Contact');
    }
    return contact;
  }

  async remove(owner: PublicUser, contactId: number): Promise<Contact> {
    const contact = await this.contacts.remove(owner.id, contactId);
    if (!contact) {
      throw notFound('Contact');
    }
    logger.info({ userId: owner.id, contactId }, 'Contact deleted');
    return contact;
  }

  /**
   * Contacts with a birthday in the next `days` days, today included,
   * soonest first.
   */
  async upcomingBirthdays(owner: PublicUser, days: number): Promise<Contact[]> {
    const window = upcomingMonthDays(this.now(), days);
    const position = new Map(window.map((monthDay, index) => [monthDay, index]));

    const found = await this.contacts.findByBirthdayMonthDays(owner.id, window);
    return [...found].sort((a, b) =>
      (position.get(monthDayOf(a.birthday)) ?? window.length)
        - (position.get(monthDayOf(b.birthday)) ?? window.length)
      || a.id - b.id
    );
  }
}
