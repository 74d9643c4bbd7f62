/**
 * Email address helpers shared by the linking flow and the stores.
 */

import { z } from 'zod';

/**
 * Minimal structural check: one "@", a non-empty local part and a dotted domain,
 * no whitespace anywhere.
 */
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export const emailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(EMAIL_PATTERN, 'Invalid email address');

/**
 * Canonical form used for storage and lookups
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Parse user input into a normalized email, or null when it is not one
 */
export function parseEmail(input: string): string | null {
  const result = emailSchema.safeParse(input);
  return result.success ? result.data : null;
}

/**
 * Mask an email for logs: "bob@example.com" -> "b**@example.com"
 */
export function maskEmail(email: string): string {
  const at = email.indexOf('@');
  if (at <= 0) return '***';
  const local = email.slice(0, at);
  return `${local[0]}${'*'.repeat(Math.max(local.length - 1, 2))}${email.slice(at)}`;
}
