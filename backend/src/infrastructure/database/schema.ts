/**
 * Drizzle table definitions. Mirrors sql/schema.sql.
 */

import { UserRole } from '@contacts-hub/shared';
import { boolean, date, index, integer, pgEnum, pgTable, serial, timestamp, varchar } from 'drizzle-orm/pg-core';

export const userRoleEnum = pgEnum('user_role', [UserRole.USER, UserRole.ADMIN]);

export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  username: varchar('username', { length: 100 }).notNull().unique(),
  email: varchar('email', { length: 255 }).notNull().unique(),
  passwordHash: varchar('password_hash', { length: 255 }).notNull(),
  role: userRoleEnum('role').notNull().default(UserRole.USER),
  confirmed: boolean('confirmed').notNull().default(false),
  avatarUrl: varchar('avatar_url', { length: 512 }),
  // SHA-256 of the single active refresh token; null when logged out
  refreshTokenHash: varchar('refresh_token_hash', { length: 64 }),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
});

export const contacts = pgTable('contacts', {
  id: serial('id').primaryKey(),
  firstName: varchar('first_name', { length: 50 }).notNull(),
  lastName: varchar('last_name', { length: 50 }).notNull(),
  email: varchar('email', { length: 100 }).notNull(),
  phoneNumber: varchar('phone_number', { length: 20 }).notNull(),
  birthday: date('birthday', { mode: 'string' }).notNull(),
  additionalData: varchar('additional_data', { length: 150 }),
  userId: integer('user_id')
    .notNull()
    .references(() => users.id, { onDelete: 'cascade' }),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  userIdx: index('contacts_user_id_idx').on(table.userId),
}));

export type ContactRow = typeof contacts.$inferSelect;
