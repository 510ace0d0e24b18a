import { v4 as uuid } from 'uuid';
import { logger } from '../../config/logger';
import { buildFolio, roundMoney, ROOM_STATUSES } from '../../types/pms';
import type {
  Charge,
  CheckInResult,
  CheckOutResult,
  Folio,
  Guest,
  Payment,
  Room,
  RoomStatus,
} from '../../types/pms';
import type { IPmsBackend } from '../interfaces/pms';

/** Returns a float in [0, 1). Injected so tests can pin the draws. */
export type RandomSource = () => number;

const MOCK_GUEST_NAME = 'John Doe';
const AVAILABLE_ROOM_CANDIDATES = 10;

/**
 * Mock PMS backend. Produces schema-valid, randomized domain objects with no
 * network activity. Shapes are fixed; only the content varies.
 */
export class MockPmsBackend implements IPmsBackend {
  readonly backendName = 'MockPMS';

  constructor(private readonly random: RandomSource = Math.random) {}

  async getGuest(guestId: string): Promise<Guest | null> {
    return {
      guestId,
      firstName: 'John',
      lastName: 'Doe',
      email: 'john.doe@example.com',
      phone: '+1-555-0100',
      address: '123 Main Street',
      city: 'New York',
      country: 'US',
      loyaltyTier: 'Gold',
      vipStatus: this.random() > 0.8,
      preferences: ['High floor', 'Non-smoking'],
    };
  }

  async getRoom(roomId: string): Promise<Room | null> {
    return this.mockRoom(roomId);
  }

  async getRoomStatus(roomId: string): Promise<RoomStatus | null> {
    return this.mockRoom(roomId).status;
  }

  async listAvailableRooms(): Promise<Room[]> {
    const rooms: Room[] = [];
    for (let i = 1; i <= AVAILABLE_ROOM_CANDIDATES; i++) {
      if (this.random() <= 0.3) continue;
      const room = this.mockRoom(`ROOM${String(i).padStart(3, '0')}`);
      rooms.push({ ...room, status: 'AVAILABLE', currentOccupancy: 0 });
    }
    return rooms;
  }

  async checkIn(reservationId: string, roomId: string): Promise<CheckInResult> {
    return {
      success: true,
      reservationId,
      roomId,
      roomNumber: this.mockRoomNumber().roomNumber,
      guestName: MOCK_GUEST_NAME,
      checkInTime: new Date().toISOString(),
      keyCardsIssued: 2,
      message: 'Welcome! Your room is ready.',
    };
  }

  async checkOut(reservationId: string): Promise<CheckOutResult> {
    const total = this.uniform(200, 800);
    const paid = total * this.uniform(0.5, 1.0);

    return {
      success: true,
      reservationId,
      roomId: 'ROOM001',
      roomNumber: '305',
      guestName: MOCK_GUEST_NAME,
      checkOutTime: new Date().toISOString(),
      totalCharges: roundMoney(total),
      paymentsReceived: roundMoney(paid),
      balanceDue: roundMoney(total - paid),
      invoiceNumber: `INV-${this.randomInt(10000, 99999)}`,
    };
  }

  async getFolio(reservationId: string): Promise<Folio> {
    const postedAt = new Date().toISOString();

    const charges: Charge[] = [0, 1, 2].map((i) => ({
      chargeId: `CHG${String(i).padStart(3, '0')}`,
      reservationId,
      description: 'Room Charge',
      amount: 199.99,
      currency: 'USD',
      category: 'ROOM',
      postedAt,
    }));

    const payments: Payment[] = [
      {
        paymentId: 'PAY001',
        reservationId,
        amount: 200.0,
        currency: 'USD',
        method: 'CREDIT_CARD',
        reference: `AUTH-${uuid().slice(0, 8).toUpperCase()}`,
        processedAt: postedAt,
      },
    ];

    return buildFolio({
      folioId: `FOLIO-${reservationId}`,
      reservationId,
      guestName: MOCK_GUEST_NAME,
      roomNumber: '305',
      charges,
      payments,
    });
  }

  close(): void {
    logger.debug({ backend: this.backendName }, 'Mock backend closed');
  }

  // ---------------------------------------------------------------------------
  // Draws
  // ---------------------------------------------------------------------------

  private mockRoom(roomId: string): Room {
    const { roomNumber, floor } = this.mockRoomNumber();
    return {
      roomId,
      roomNumber,
      roomType: 'DLX',
      roomTypeName: 'Deluxe Room',
      floor,
      status: this.pick(ROOM_STATUSES),
      features: ['WiFi', 'Mini Bar', 'Safe', 'Iron'],
      maxOccupancy: 2,
      currentOccupancy: this.randomInt(0, 2),
    };
  }

  /** Floor 1-10 followed by a two-digit unit 01-20, e.g. "101" .. "1020". */
  private mockRoomNumber(): { roomNumber: string; floor: number } {
    const floor = this.randomInt(1, 10);
    const unit = this.randomInt(1, 20);
    return { roomNumber: `${floor}${String(unit).padStart(2, '0')}`, floor };
  }

  /** Inclusive on both ends. */
  private randomInt(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  private uniform(min: number, max: number): number {
    return min + this.random() * (max - min);
  }

  private pick<T>(values: readonly T[]): T {
    const value = values[this.randomInt(0, values.length - 1)];
    if (value === undefined) throw new Error('Cannot pick from an empty list');
    return value;
  }
}
