import { logger } from '../config/logger';
import type { PmsSettings } from '../config/settings';
import { MockPmsBackend, RemotePmsBackend, type RandomSource } from '../integrations/adapters';
import type { PmsHttpClientOptions } from '../integrations/http/pms-http-client';
import type { IPmsBackend } from '../integrations/interfaces';
import { startTimer } from '../telemetry/timing';
import type {
  CheckInResult,
  CheckOutResult,
  Folio,
  Guest,
  Room,
  RoomStatus,
} from '../types/pms';

export interface PmsClientOptions extends PmsHttpClientOptions {
  /** Random source for the mock backend. */
  random?: RandomSource;
}

/** Chooses the backend once, from settings.mockMode. */
export function createPmsBackend(settings: PmsSettings, options: PmsClientOptions = {}): IPmsBackend {
  if (settings.mockMode) return new MockPmsBackend(options.random);
  return new RemotePmsBackend(settings, options);
}

/**
 * Entry point for every PMS capability used by the tool layer.
 * Logs intent, times the call and delegates to the selected backend.
 * Errors from the backend propagate unchanged as PmsApiError.
 */
export class PmsClient {
  private readonly backend: IPmsBackend;

  constructor(
    private readonly settings: PmsSettings,
    backendOrOptions: IPmsBackend | PmsClientOptions = {},
  ) {
    this.backend = isBackend(backendOrOptions)
      ? backendOrOptions
      : createPmsBackend(settings, backendOrOptions);
  }

  get mockMode(): boolean {
    return this.settings.mockMode;
  }

  get backendName(): string {
    return this.backend.backendName;
  }

  async getGuest(guestId: string): Promise<Guest | null> {
    logger.info({ guestId, mockMode: this.mockMode }, 'Getting guest');
    return this.timed('pms.getGuest', { guestId }, () => this.backend.getGuest(guestId));
  }

  async getRoom(roomId: string): Promise<Room | null> {
    logger.info({ roomId, mockMode: this.mockMode }, 'Getting room');
    return this.timed('pms.getRoom', { roomId }, () => this.backend.getRoom(roomId));
  }

  async getRoomStatus(roomId: string): Promise<RoomStatus | null> {
    logger.info({ roomId, mockMode: this.mockMode }, 'Getting room status');
    return this.timed('pms.getRoomStatus', { roomId }, () => this.backend.getRoomStatus(roomId));
  }

  async listAvailableRooms(): Promise<Room[]> {
    logger.info({ mockMode: this.mockMode }, 'Listing available rooms');
    return this.timed('pms.listAvailableRooms', {}, () => this.backend.listAvailableRooms());
  }

  async checkIn(reservationId: string, roomId: string): Promise<CheckInResult> {
    logger.info({ reservationId, roomId, mockMode: this.mockMode }, 'Checking in guest');
    return this.timed('pms.checkIn', { reservationId, roomId }, () =>
      this.backend.checkIn(reservationId, roomId),
    );
  }

  async checkOut(reservationId: string): Promise<CheckOutResult> {
    logger.info({ reservationId, mockMode: this.mockMode }, 'Checking out guest');
    return this.timed('pms.checkOut', { reservationId }, () =>
      this.backend.checkOut(reservationId),
    );
  }

  async getFolio(reservationId: string): Promise<Folio> {
    logger.info({ reservationId, mockMode: this.mockMode }, 'Getting folio');
    return this.timed('pms.getFolio', { reservationId }, () =>
      this.backend.getFolio(reservationId),
    );
  }

  close(): void {
    this.backend.close();
  }

  private async timed<T>(
    label: string,
    context: Record<string, unknown>,
    run: () => Promise<T>,
  ): Promise<T> {
    const timer = startTimer(label, context);
    let ok = false;
    try {
      const result = await run();
      ok = true;
      return result;
    } finally {
      timer.stop({ ok });
    }
  }
}

function isBackend(value: IPmsBackend | PmsClientOptions): value is IPmsBackend {
  return 'backendName' in value;
}
