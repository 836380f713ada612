/**
 * Contact repository. Every query is scoped by owner.
 */

import type { Contact, ContactFilter, ContactInput, UserId } from '@contacts-hub/shared';
import { and, asc, eq, ilike, inArray, or, sql, type SQL } from 'drizzle-orm';
import { retryTransient, type RetryConfig } from '../../application/resilience/retry.utils.js';
import type { Database } from './postgres.client.js';
import { contacts, type ContactRow } from './schema.js';

export interface Page {
  readonly skip: number;
  readonly limit: number;
}

export interface ContactRepository {
  list(userId: UserId, filter: ContactFilter, page: Page): Promise<Contact[]>;
  search(userId: UserId, text: string, page: Page): Promise<Contact[]>;
  findById(userId: UserId, contactId: number): Promise<Contact | null>;
  create(userId: UserId, input: ContactInput): Promise<Contact>;
  update(userId: UserId, contactId: number, input: ContactInput): Promise<Contact | null>;
  remove(userId: UserId, contactId: number): Promise<Contact | null>;
  /** Contacts whose birthday `MM-DD` is one of `monthDays` */
  findByBirthdayMonthDays(userId: UserId, monthDays: readonly string[]): Promise<Contact[]>;
}

/**
 * Escape LIKE wildcards so user text matches literally
 */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, match => `\\${match}`);
}

function containsPattern(text: string): string {
  return `%${escapeLikePattern(text)}%`;
}

function toContact(row: ContactRow): Contact {
  return {
    id: row.id,
    userId: row.userId,
    firstName: row.firstName,
    lastName: row.lastName,
    email: row.email,
    phoneNumber: row.phoneNumber,
    birthday: row.birthday,
    additionalData: row.additionalData,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export class DrizzleContactRepository implements ContactRepository {
  constructor(
    private readonly db: Database,
    private readonly retry?: RetryConfig
  ) {}

  private query<T>(operation: () => Promise<T>): Promise<T> {
    return retryTransient('postgres', operation, this.retry);
  }

  async list(userId: UserId, filter: ContactFilter, page: Page): Promise<Contact[]> {
    const conditions: SQL[] = [eq(contacts.userId, userId)];
    if (filter.firstName) conditions.push(ilike(contacts.firstName, containsPattern(filter.firstName)));
    if (filter.lastName) conditions.push(ilike(contacts.lastName, containsPattern(filter.lastName)));
    if (filter.email) conditions.push(ilike(contacts.email, containsPattern(filter.email)));

    const rows = await this.query(async () =>
      this.db
        .select()
        .from(contacts)
        .where(and(...conditions))
        .orderBy(asc(contacts.id))
        .offset(page.skip)
        .limit(page.limit)
    );
    return rows.map(toContact);
  }

  async search(userId: UserId, text: string, page: Page): Promise<Contact[]> {
    const pattern = containsPattern(text);
    const rows = await this.query(async () =>
      this.db
        .select()
        .from(contacts)
        .where(and(
          eq(contacts.userId, userId),
          or(
            ilike(contacts.firstName, pattern),
            ilike(contacts.lastName, pattern),
            ilike(contacts.email, pattern),
            ilike(contacts.phoneNumber, pattern),
            ilike(contacts.additionalData, pattern),
          ),
        ))
        .orderBy(asc(contacts.id))
        .offset(page.skip)
        .limit(page.limit)
    );
    return rows.map(toContact);
  }

  async findById(userId: UserId, contactId: number): Promise<Contact | null> {
    const [row] = await this.query(async () =>
      this.db
        .select()
        .from(contacts)
        .where(and(eq(contacts.userId, userId), eq(contacts.id, contactId)))
        .limit(1)
    );
    return row ? toContact(row) : null;
  }

  async create(userId: UserId, input: ContactInput): Promise<Contact> {
    const [row] = await this.query(async () =>
      this.db
        .insert(contacts)
        .values({ ...input, additionalData: input.additionalData ?? null, userId })
        .returning()
    );
    if (!row) {
      throw new Error('Insert returned no row');
    }
    return toContact(row);
  }

  async update(userId: UserId, contactId: number, input: ContactInput): Promise<Contact | null> {
    const [row] = await this.query(async () =>
      this.db
        .update(contacts)
        .set({ ...input, additionalData: input.additionalData ?? null, updatedAt: new Date() })
        .where(and(eq(contacts.userId, userId), eq(contacts.id, contactId)))
        .returning()
    );
    return row ? toContact(row) : null;
  }

  async remove(userId: UserId, contactId: number): Promise<Contact | null> {
    const [row] = await this.query(async () =>
      this.db
        .delete(contacts)
        .where(and(eq(contacts.userId, userId), eq(contacts.id, contactId)))
        .returning()
    );
    return row ? toContact(row) : null;
  }

  async findByBirthdayMonthDays(userId: UserId, monthDays: readonly string[]): Promise<Contact[]> {
    if (monthDays.length === 0) {
      return [];
    }
    const rows = await this.query(async () =>
      this.db
        .select()
        .from(contacts)
        .where(and(
          eq(contacts.userId, userId),
          inArray(sql<string>`to_char(${contacts.birthday}, 'MM-DD')`, [...monthDays]),
        ))
        .orderBy(asc(contacts.birthday))
    );
    return rows.map(toContact);
  }
}
