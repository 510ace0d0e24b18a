/**
 * Domain value types returned by the PMS client. Every object is a snapshot of
 * one call and is never mutated afterwards. Timestamps are ISO-8601 strings.
 */

export const ROOM_STATUSES = [
  'AVAILABLE',
  'OCCUPIED',
  'RESERVED',
  'OUT_OF_ORDER',
  'DIRTY',
  'CLEANING',
] as const;
export type RoomStatus = (typeof ROOM_STATUSES)[number];

export const PAYMENT_METHODS = ['CREDIT_CARD', 'DEBIT_CARD', 'CASH', 'INVOICE', 'PREPAID'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export interface Guest {
  readonly guestId: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly email?: string;
  readonly phone?: string;
  readonly address?: string;
  readonly city?: string;
  /** ISO country code */
  readonly country?: string;
  readonly loyaltyTier?: string;
  readonly vipStatus: boolean;
  readonly preferences: readonly string[];
  readonly notes?: string;
}

export interface Room {
  readonly roomId: string;
  readonly roomNumber: string;
  /** Room type code, e.g. "DLX" */
  readonly roomType: string;
  readonly roomTypeName: string;
  readonly floor?: number;
  readonly status: RoomStatus;
  readonly features: readonly string[];
  readonly maxOccupancy: number;
  // Not enforced to be <= maxOccupancy; upstream data is passed through.
  readonly currentOccupancy: number;
}

export interface CheckInResult {
  readonly success: boolean;
  readonly reservationId: string;
  readonly roomId: string;
  readonly roomNumber: string;
  readonly guestName: string;
  readonly checkInTime: string;
  readonly keyCardsIssued: number;
  readonly message?: string;
}

export interface CheckOutResult {
  readonly success: boolean;
  readonly reservationId: string;
  readonly roomId: string;
  readonly roomNumber: string;
  readonly guestName: string;
  readonly checkOutTime: string;
  readonly totalCharges: number;
  readonly paymentsReceived: number;
  readonly balanceDue: number;
  readonly invoiceNumber?: string;
}

export interface Charge {
  readonly chargeId: string;
  readonly reservationId: string;
  readonly description: string;
  readonly amount: number;
  readonly currency: string;
  /** e.g. ROOM, F&B, MINIBAR */
  readonly category: string;
  readonly postedAt: string;
  /** Staff member who posted the charge */
  readonly postedBy?: string;
}

export interface Payment {
  readonly paymentId: string;
  readonly reservationId: string;
  readonly amount: number;
  readonly currency: string;
  readonly method: PaymentMethod;
  readonly reference?: string;
  readonly processedAt: string;
}

/**
 * Itemized bill for one reservation.
 * totalCharges, totalPayments and balance are rounded to cents.
 */
export interface Folio {
  readonly folioId: string;
  readonly reservationId: string;
  readonly guestName: string;
  readonly roomNumber: string;
  readonly charges: readonly Charge[];
  readonly payments: readonly Payment[];
  readonly totalCharges: number;
  readonly totalPayments: number;
  readonly balance: number;
}

export const DEFAULT_CURRENCY = 'USD';

export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/** Folio with totals computed from its line items. */
export function buildFolio(
  fields: Omit<Folio, 'totalCharges' | 'totalPayments' | 'balance'>,
): Folio {
  const totalCharges = fields.charges.reduce((sum, c) => sum + c.amount, 0);
  const totalPayments = fields.payments.reduce((sum, p) => sum + p.amount, 0);

  return {
    ...fields,
    totalCharges: roundMoney(totalCharges),
    totalPayments: roundMoney(totalPayments),
    balance: roundMoney(totalCharges - totalPayments),
  };
}
