import { z } from 'zod';

/**
 * Zod schema for PMS entity IDs (guestId, roomId, reservationId).
 * Upstream IDs are opaque; we only bound their length.
 */
export const entityIdSchema = z
  .string()
  .trim()
  .min(1, 'ID must not be empty')
  .max(64, 'ID too long');

/**
 * Lookups distinguish "the PMS has no such record" from failures:
 * a 404 becomes { found: false }, never an exception.
 */
export type Lookup<T> = { found: true; data: T } | { found: false };
