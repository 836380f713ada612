/**
 * In-memory ContactRepository
 */

import type { Contact, ContactFilter, ContactInput, UserId } from '@contacts-hub/shared';
import { monthDayOf } from '../../application/contacts/birthdays.js';
import type { ContactRepository, Page } from '../../infrastructure/database/contact.repository.js';

function contains(value: string | null, text: string): boolean {
  return value !== null && value.toLowerCase().includes(text.toLowerCase());
}

export class InMemoryContactRepository implements ContactRepository {
  private contacts: Contact[] = [];
  private nextId = 1;

  async list(userId: UserId, filter: ContactFilter, page: Page): Promise<Contact[]> {
    return this.paginate(this.owned(userId).filter(contact =>
      (!filter.firstName || contains(contact.firstName, filter.firstName))
      && (!filter.lastName || contains(contact.lastName, filter.lastName))
      && (!filter.email || contains(contact.email, filter.email))
    ), page);
  }

  async search(userId: UserId, text: string, page: Page): Promise<Contact[]> {
    return this.paginate(this.owned(userId).filter(contact =>
      contains(contact.firstName, text)
      || contains(contact.lastName, text)
      || contains(contact.email, text)
      || contains(contact.phoneNumber, text)
      || contains(contact.additionalData, text)
    ), page);
  }

  async findById(userId: UserId, contactId: number): Promise<Contact | null> {
    return this.owned(userId).find(contact => contact.id === contactId) ?? null;
  }

  async create(userId: UserId, input: ContactInput): Promise<Contact> {
    const now = new Date().toISOString();
    const contact: Contact = {
      ...input,
      additionalData: input.additionalData ?? null,
      id: this.nextId++,
      userId,
      createdAt: now,
      updatedAt: now,
    };
    this.contacts.push(contact);
    return contact;
  }

  async update(userId: UserId, contactId: number, input: ContactInput): Promise<Contact | null> {
    const existing = await this.findById(userId, contactId);
    if (!existing) {
      return null;
    }
    const updated: Contact = {
      ...existing,
      ...input,
      additionalData: input.additionalData ?? null,
      updatedAt: new Date().toISOString(),
    };
    this.contacts = this.contacts.map(contact => (contact.id === contactId ? updated : contact));
    return updated;
  }

  async remove(userId: UserId, contactId: number): Promise<Contact | null> {
    const existing = await this.findById(userId, contactId);
    if (existing) {
      this.contacts = this.contacts.filter(contact => contact.id !== contactId);
    }
    return existing;
  }

  async findByBirthdayMonthDays(userId: UserId, monthDays: readonly string[]): Promise<Contact[]> {
    const wanted = new Set(monthDays);
    return this.owned(userId)
      .filter(contact => wanted.has(monthDayOf(contact.birthday)))
      .sort((a, b) => a.birthday.localeCompare(b.birthday));
  }

  private owned(userId: UserId): Contact[] {
    return this.contacts.filter(contact => contact.userId === userId);
  }

  private paginate(contacts: Contact[], page: Page): Contact[] {
    return contacts.slice(page.skip, page.skip + page.limit);
  }
}
