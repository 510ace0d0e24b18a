/**
 * Zod schemas for PMS API payloads.
 * Every remote response goes through these before it becomes a domain object;
 * the defaults here are the documented fallbacks for fields upstream omits.
 */
import { z } from 'zod';
import { DEFAULT_CURRENCY, PAYMENT_METHODS, ROOM_STATUSES } from '../types/pms';
import type { RoomStatus } from '../types/pms';

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

const idField = z.union([z.string().min(1), z.number()]).transform(String);
const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);
const money = z.coerce.number().nonnegative();
const count = z.coerce.number().int().nonnegative();
const timestamp = z.string().min(1);
const now = (): string => new Date().toISOString();

const roomStatusField = z
  .string()
  .transform((v) => v.trim().toUpperCase())
  .pipe(z.enum(ROOM_STATUSES));

// ---------------------------------------------------------------------------
// Guests
// ---------------------------------------------------------------------------

export const guestPayloadSchema = z.object({
  guestId: idField,
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  email: optionalText,
  phone: optionalText,
  address: optionalText,
  city: optionalText,
  country: optionalText,
  loyaltyTier: optionalText,
  vipStatus: z.boolean().default(false),
  preferences: z.array(z.string()).default([]),
  notes: optionalText,
});

// ---------------------------------------------------------------------------
// Rooms
// ---------------------------------------------------------------------------

export const roomPayloadSchema = z.object({
  roomId: idField,
  roomNumber: idField,
  roomType: z.string().min(1),
  roomTypeName: z.string().min(1),
  floor: z.coerce.number().int().nullish().transform((v) => v ?? undefined),
  status: roomStatusField.default('AVAILABLE'),
  features: z.array(z.string()).default([]),
  maxOccupancy: count.default(2),
  currentOccupancy: count.default(0),
});

/** GET /rooms answers either a bare array or an envelope. */
export const roomListPayloadSchema = z.union([
  z.array(roomPayloadSchema),
  z.object({ rooms: z.array(roomPayloadSchema).default([]) }).transform((v) => v.rooms),
]);

/**
 * Housekeeping vocabulary from the status endpoint. Deliberately separate from
 * the room schema: this endpoint reports lowercase housekeeping states and
 * defaults to "clean".
 */
const HOUSEKEEPING_STATUS: Record<string, RoomStatus> = {
  clean: 'AVAILABLE',
  inspected: 'AVAILABLE',
  vacant: 'AVAILABLE',
  dirty: 'DIRTY',
  occupied: 'OCCUPIED',
};

export const roomStatusPayloadSchema = z
  .object({ status: z.string().default('clean') })
  .transform((v, ctx) => {
    const raw = v.status.trim();
    const mapped = HOUSEKEEPING_STATUS[raw.toLowerCase()];
    if (mapped) return mapped;

    const parsed = z.enum(ROOM_STATUSES).safeParse(raw.toUpperCase());
    if (parsed.success) return parsed.data;

    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['status'],
      message: `Unknown room status "${raw}"`,
    });
    return z.NEVER;
  });

// ---------------------------------------------------------------------------
// Front desk
// ---------------------------------------------------------------------------

export function checkInPayloadSchema(reservationId: string, roomId: string) {
  return z.object({
    success: z.boolean().default(true),
    reservationId: idField.default(reservationId),
    roomId: idField.default(roomId),
    roomNumber: idField,
    guestName: z.string().min(1),
    checkInTime: timestamp.default(now),
    keyCardsIssued: count.default(2),
    message: optionalText,
  });
}

export function checkOutPayloadSchema(reservationId: string) {
  return z.object({
    success: z.boolean().default(true),
    reservationId: idField.default(reservationId),
    roomId: idField,
    roomNumber: idField,
    guestName: z.string().min(1),
    checkOutTime: timestamp.default(now),
    totalCharges: money.default(0),
    paymentsReceived: money.default(0),
    // May be negative when the guest overpaid.
    balanceDue: z.coerce.number().default(0),
    invoiceNumber: optionalText,
  });
}

// ---------------------------------------------------------------------------
// Billing
// ---------------------------------------------------------------------------

export function folioPayloadSchema(reservationId: string) {
  const charge = z.object({
    chargeId: idField,
    reservationId: idField.default(reservationId),
    description: z.string(),
    amount: money,
    currency: z.string().min(1).default(DEFAULT_CURRENCY),
    category: z.string().min(1),
    postedAt: timestamp,
    postedBy: optionalText,
  });

  const payment = z.object({
    paymentId: idField,
    reservationId: idField.default(reservationId),
    amount: money,
    currency: z.string().min(1).default(DEFAULT_CURRENCY),
    method: z
      .string()
      .transform((v) => v.trim().toUpperCase())
      .pipe(z.enum(PAYMENT_METHODS)),
    reference: optionalText,
    processedAt: timestamp,
  });

  // Totals are taken as upstream reports them, not recomputed.
  return z.object({
    folioId: idField.default(`FOLIO-${reservationId}`),
    reservationId: idField.default(reservationId),
    guestName: z.string().min(1),
    roomNumber: idField,
    charges: z.array(charge).default([]),
    payments: z.array(payment).default([]),
    totalCharges: z.coerce.number().default(0),
    totalPayments: z.coerce.number().default(0),
    balance: z.coerce.number().default(0),
  });
}

// ---------------------------------------------------------------------------
// OAuth
// ---------------------------------------------------------------------------

// Only access_token is read; token_type, expires_in and the rest vary by server.
export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
});
