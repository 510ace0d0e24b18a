import type {
  CheckInResult,
  CheckOutResult,
  Folio,
  Guest,
  Room,
  RoomStatus,
} from '../../types/pms';

/**
 * Capability interface for a Property Management System backend.
 * The client picks one implementation at construction (mock or remote);
 * callers never branch on the mode themselves.
 *
 * Lookups resolve to null when the PMS has no such record. Mutations and the
 * folio always resolve to a populated result or reject with a PmsApiError.
 */
export interface IPmsBackend {
  /** Human-readable name of this backend (e.g. "MockPMS", "RemotePMS") */
  readonly backendName: string;

  getGuest(guestId: string): Promise<Guest | null>;

  getRoom(roomId: string): Promise<Room | null>;

  getRoomStatus(roomId: string): Promise<RoomStatus | null>;

  listAvailableRooms(): Promise<Room[]>;

  checkIn(reservationId: string, roomId: string): Promise<CheckInResult>;

  checkOut(reservationId: string): Promise<CheckOutResult>;

  getFolio(reservationId: string): Promise<Folio>;

  /** Release pooled connections. Safe to call more than once. */
  close(): void;
}
