import type { z } from 'zod';
import type { PmsSettings } from '../../config/settings';
import type {
  CheckInResult,
  CheckOutResult,
  Folio,
  Guest,
  Room,
  RoomStatus,
} from '../../types/pms';
import { UpstreamContractError } from '../errors';
import { PmsHttpClient, type PmsHttpClientOptions } from '../http/pms-http-client';
import type { IPmsBackend } from '../interfaces/pms';
import {
  checkInPayloadSchema,
  checkOutPayloadSchema,
  folioPayloadSchema,
  guestPayloadSchema,
  roomListPayloadSchema,
  roomPayloadSchema,
  roomStatusPayloadSchema,
} from '../validation';

/**
 * PMS backend backed by the OAuth2-protected REST API.
 * Every query is scoped to settings.propertyId.
 */
export class RemotePmsBackend implements IPmsBackend {
  readonly backendName = 'RemotePMS';
  private readonly client: PmsHttpClient;

  constructor(
    private readonly settings: PmsSettings,
    options: PmsHttpClientOptions = {},
  ) {
    this.client = new PmsHttpClient(settings, options);
  }

  async getGuest(guestId: string): Promise<Guest | null> {
    const result = await this.client.makeAuthenticatedRequest('GET', `/guests/${encode(guestId)}`, {
      params: this.propertyScope(),
    });
    if (!result.found) return null;
    return mapPayload(guestPayloadSchema, result.data, 'guest');
  }

  async getRoom(roomId: string): Promise<Room | null> {
    const result = await this.client.makeAuthenticatedRequest('GET', `/rooms/${encode(roomId)}`, {
      params: this.propertyScope(),
    });
    if (!result.found) return null;
    return mapPayload(roomPayloadSchema, result.data, 'room');
  }

  async getRoomStatus(roomId: string): Promise<RoomStatus | null> {
    const result = await this.client.makeAuthenticatedRequest(
      'GET',
      `/rooms/${encode(roomId)}/status`,
      { params: this.propertyScope() },
    );
    if (!result.found) return null;
    return mapPayload(roomStatusPayloadSchema, result.data, 'room status');
  }

  async listAvailableRooms(): Promise<Room[]> {
    const result = await this.client.makeAuthenticatedRequest('GET', '/rooms', {
      params: { ...this.propertyScope(), status: 'available' },
    });
    if (!result.found) return [];
    return mapPayload(roomListPayloadSchema, result.data, 'room list');
  }

  async checkIn(reservationId: string, roomId: string): Promise<CheckInResult> {
    const result = await this.client.makeAuthenticatedRequest(
      'POST',
      `/reservations/${encode(reservationId)}/checkin`,
      { body: { roomId, propertyId: this.settings.propertyId } },
    );
    if (!result.found) throw missing('check-in', reservationId);
    return mapPayload(checkInPayloadSchema(reservationId, roomId), result.data, 'check-in');
  }

  async checkOut(reservationId: string): Promise<CheckOutResult> {
    const result = await this.client.makeAuthenticatedRequest(
      'POST',
      `/reservations/${encode(reservationId)}/checkout`,
      { body: { propertyId: this.settings.propertyId } },
    );
    if (!result.found) throw missing('check-out', reservationId);
    return mapPayload(checkOutPayloadSchema(reservationId), result.data, 'check-out');
  }

  async getFolio(reservationId: string): Promise<Folio> {
    const result = await this.client.makeAuthenticatedRequest(
      'GET',
      `/reservations/${encode(reservationId)}/folio`,
      { params: this.propertyScope() },
    );
    if (!result.found) throw missing('folio', reservationId);
    return mapPayload(folioPayloadSchema(reservationId), result.data, 'folio');
  }

  close(): void {
    this.client.close();
  }

  private propertyScope(): Record<string, string> {
    return { propertyId: this.settings.propertyId };
  }
}

function encode(segment: string): string {
  return encodeURIComponent(segment);
}

// Mutations and billing must produce a representation; a 404 there means the
// upstream broke its contract rather than "no such record".
function missing(operation: string, reservationId: string): UpstreamContractError {
  return new UpstreamContractError(
    `PMS returned no ${operation} result for reservation ${reservationId}`,
    { reservationId },
  );
}

function mapPayload<S extends z.ZodTypeAny>(schema: S, data: unknown, entity: string): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new UpstreamContractError(`Malformed ${entity} payload from PMS`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
