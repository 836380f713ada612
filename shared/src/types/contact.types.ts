/**
 * Contact types. Every contact belongs to exactly one user.
 */

import type { UserId } from './user.types.js';

export type ContactId = number;

/** Contact fields accepted on create and update */
export interface ContactInput {
  readonly firstName: string;
  readonly lastName: string;
  readonly email: string;
  readonly phoneNumber: string;
  /** Calendar date, `YYYY-MM-DD` */
  readonly birthday: string;
  readonly additionalData?: string | null;
}

/** Stored contact */
export interface Contact {
  readonly id: ContactId;
  readonly userId: UserId;
  readonly firstName: string;
  readonly lastName: string;
  readonly email: string;
  readonly phoneNumber: string;
  readonly birthday: string;
  readonly additionalData: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** Field filters for listing contacts */
export interface ContactFilter {
  readonly firstName?: string;
  readonly lastName?: string;
  readonly email?: string;
}
