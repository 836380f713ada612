/**
 * Contact Validation
 * zod schemas for contact payloads and list queries
 */

import type { ContactInput } from '@contacts-hub/shared';
import { z } from 'zod';
import { isoDate } from './birthdays.js';

export const MAX_PAGE_SIZE = 1000;
export const MAX_BIRTHDAY_WINDOW_DAYS = 366;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const PHONE = /^\+?[\d\s().-]+$/;

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && isoDate(parsed) === value;
}

const name = (field: string) => z
  .string()
  .trim()
  .min(2, `${field} must be at least 2 characters`)
  .max(50, `${field} must be at most 50 characters`);

export const ContactInputSchema = z.object({
  firstName: name('firstName'),
  lastName: name('lastName'),
  email: z.string().trim().email('Invalid email format').max(100),
  phoneNumber: z
    .string()
    .trim()
    .min(6, 'phoneNumber must be at least 6 characters')
    .max(20, 'phoneNumber must be at most 20 characters')
    .regex(PHONE, 'phoneNumber may contain digits, spaces and + ( ) . -'),
  birthday: z
    .string()
    .regex(ISO_DATE, 'birthday must be YYYY-MM-DD')
    .refine(isCalendarDate, 'birthday is not a valid date')
    .refine(value => value <= isoDate(new Date()), 'birthday cannot be in the future'),
  additionalData: z.string().max(150, 'additionalData must be at most 150 characters').nullish(),
}) satisfies z.ZodType<ContactInput>;

export const PageQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(100),
});

export const ContactListQuerySchema = PageQuerySchema.extend({
  firstName: z.string().trim().min(1).optional(),
  lastName: z.string().trim().min(1).optional(),
  email: z.string().trim().min(1).optional(),
});

export const ContactSearchQuerySchema = PageQuerySchema.extend({
  text: z.string().trim().min(1, 'text is required'),
});

export const BirthdayQuerySchema = z.object({
  days: z.coerce.number().int().min(0).max(MAX_BIRTHDAY_WINDOW_DAYS).default(7),
});

export const ContactIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});
