/**
 * PMS tool layer. Wraps each client operation in a uniform response envelope.
 * This is the only place where PmsApiError becomes user-visible text.
 */
import { z } from 'zod';
import { logger } from '../config/logger';
import { isPmsApiError } from '../integrations/errors';
import type { PmsClient } from '../services/pms-client.service';
import { entityIdSchema } from '../types/common';
import type { Folio, Guest, Room } from '../types/pms';

export interface ToolResponse {
  success: boolean;
  message: string;
  data?: Record<string, unknown>;
  error?: string;
  nextSteps?: string[];
}

interface StringProperty {
  type: 'string';
  description: string;
}

/** JSON Schema advertised to MCP clients in tools/list. */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, StringProperty>;
  required: string[];
}

export interface PmsTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  /** Rejects with a ZodError when args do not match the tool's schema. */
  handler: (args: unknown) => Promise<ToolResponse>;
}

type PmsOperations = Pick<
  PmsClient,
  | 'getGuest'
  | 'getRoom'
  | 'getRoomStatus'
  | 'listAvailableRooms'
  | 'checkIn'
  | 'checkOut'
  | 'getFolio'
>;

function defineTool<S extends z.ZodTypeAny>(def: {
  name: string;
  description: string;
  properties: Record<string, string>;
  args: S;
  run: (args: z.output<S>) => Promise<ToolResponse>;
}): PmsTool {
  const properties: Record<string, StringProperty> = {};
  for (const [key, description] of Object.entries(def.properties)) {
    properties[key] = { type: 'string', description };
  }

  return {
    name: def.name,
    description: def.description,
    inputSchema: { type: 'object', properties, required: Object.keys(def.properties) },
    handler: async (args) => def.run(def.args.parse(args ?? {})),
  };
}

/** Runs an operation and turns any failure into an error envelope. */
async function guard(
  failureMessage: string,
  run: () => Promise<ToolResponse>,
): Promise<ToolResponse> {
  try {
    return await run();
  } catch (err) {
    if (isPmsApiError(err)) {
      logger.warn({ err: err.toJSON() }, failureMessage);
      return { success: false, message: failureMessage, error: err.message };
    }
    logger.error({ err }, failureMessage);
    return {
      success: false,
      message: failureMessage,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function guestData(guest: Guest): Record<string, unknown> {
  return {
    guestId: guest.guestId,
    firstName: guest.firstName,
    lastName: guest.lastName,
    email: guest.email,
    phone: guest.phone,
    loyaltyTier: guest.loyaltyTier,
    vipStatus: guest.vipStatus,
    preferences: guest.preferences,
  };
}

function roomData(room: Room): Record<string, unknown> {
  return {
    roomId: room.roomId,
    roomNumber: room.roomNumber,
    roomType: room.roomType,
    roomTypeName: room.roomTypeName,
    floor: room.floor,
    status: room.status,
    features: room.features,
    maxOccupancy: room.maxOccupancy,
    currentOccupancy: room.currentOccupancy,
  };
}

function folioData(folio: Folio): Record<string, unknown> {
  return {
    folioId: folio.folioId,
    guestName: folio.guestName,
    roomNumber: folio.roomNumber,
    charges: folio.charges.map((c) => ({
      description: c.description,
      amount: c.amount,
      category: c.category,
    })),
    payments: folio.payments.map((p) => ({ amount: p.amount, method: p.method })),
    totalCharges: folio.totalCharges,
    totalPayments: folio.totalPayments,
    balance: folio.balance,
  };
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export function buildPmsTools(client: PmsOperations): PmsTool[] {
  return [
    defineTool({
      name: 'get_guest',
      description: 'Get guest profile information (contact details, loyalty tier, VIP flag, preferences) by guest ID.',
      properties: { guestId: 'Guest identifier' },
      args: z.object({ guestId: entityIdSchema }),
      run: ({ guestId }) =>
        guard('Failed to get guest', async () => {
          const guest = await client.getGuest(guestId);
          if (!guest) {
            return {
              success: false,
              message: `Guest ${guestId} not found`,
              nextSteps: ['Verify the guest ID is correct'],
            };
          }
          return {
            success: true,
            message: `Found guest: ${guest.firstName} ${guest.lastName}`,
            data: { guest: guestData(guest) },
            nextSteps: ['Use check_in to check in the guest', 'Use get_folio to view billing'],
          };
        }),
    }),

    defineTool({
      name: 'get_room',
      description: 'Get room details (number, type, floor, status, features, occupancy) by room ID.',
      properties: { roomId: 'Room identifier' },
      args: z.object({ roomId: entityIdSchema }),
      run: ({ roomId }) =>
        guard('Failed to get room', async () => {
          const room = await client.getRoom(roomId);
          if (!room) {
            return { success: false, message: `Room ${roomId} not found` };
          }
          return {
            success: true,
            message: `Room ${room.roomNumber} (${room.roomTypeName}) status: ${room.status}`,
            data: { room: roomData(room) },
            nextSteps: [
              'Use check_in if room is available',
              'Use check_out if room is occupied',
            ],
          };
        }),
    }),

    defineTool({
      name: 'get_room_status',
      description: 'Get the current housekeeping/occupancy status of a room.',
      properties: { roomId: 'Room identifier' },
      args: z.object({ roomId: entityIdSchema }),
      run: ({ roomId }) =>
        guard('Failed to get room status', async () => {
          const status = await client.getRoomStatus(roomId);
          if (!status) {
            return { success: false, message: `Room ${roomId} not found` };
          }
          return {
            success: true,
            message: `Room ${roomId} status: ${status}`,
            data: { roomId, status },
            nextSteps:
              status === 'AVAILABLE'
                ? ['Use check_in to assign this room']
                : ['Use list_available_rooms to find another room'],
          };
        }),
    }),

    defineTool({
      name: 'list_available_rooms',
      description: 'List rooms that are currently available for check-in at the configured property.',
      properties: {},
      args: z.object({}),
      run: () =>
        guard('Failed to list available rooms', async () => {
          const rooms = await client.listAvailableRooms();
          return {
            success: true,
            message: `Found ${rooms.length} available rooms`,
            data: { count: rooms.length, rooms: rooms.map(roomData) },
            nextSteps:
              rooms.length > 0
                ? ['Use check_in with one of these room IDs']
                : ['Check again later or review out-of-order rooms'],
          };
        }),
    }),

    defineTool({
      name: 'check_in',
      description: 'Check in a guest for a reservation and assign a room.',
      properties: { reservationId: 'Reservation identifier', roomId: 'Room to assign' },
      args: z.object({ reservationId: entityIdSchema, roomId: entityIdSchema }),
      run: ({ reservationId, roomId }) =>
        guard('Check-in failed', async () => {
          const result = await client.checkIn(reservationId, roomId);
          return {
            success: true,
            message: `Checked in ${result.guestName} to room ${result.roomNumber}`,
            data: {
              reservationId: result.reservationId,
              roomId: result.roomId,
              roomNumber: result.roomNumber,
              checkInTime: result.checkInTime,
              keyCardsIssued: result.keyCardsIssued,
              message: result.message,
            },
            nextSteps: [
              'Issue key cards to guest',
              'Inform guest of amenities',
              'Use get_folio to track charges',
            ],
          };
        }),
    }),

    defineTool({
      name: 'check_out',
      description: 'Check out a guest and return the billing summary.',
      properties: { reservationId: 'Reservation identifier' },
      args: z.object({ reservationId: entityIdSchema }),
      run: ({ reservationId }) =>
        guard('Check-out failed', async () => {
          const result = await client.checkOut(reservationId);
          return {
            success: true,
            message: `Checked out ${result.guestName} from room ${result.roomNumber}`,
            data: {
              reservationId: result.reservationId,
              roomNumber: result.roomNumber,
              checkOutTime: result.checkOutTime,
              totalCharges: result.totalCharges,
              paymentsReceived: result.paymentsReceived,
              balanceDue: result.balanceDue,
              invoiceNumber: result.invoiceNumber,
            },
            nextSteps: [
              'Process any remaining balance',
              'Return key cards',
              'Mark room for cleaning',
            ],
          };
        }),
    }),

    defineTool({
      name: 'get_folio',
      description: 'Get the guest folio (itemized charges, payments and balance) for a reservation.',
      properties: { reservationId: 'Reservation identifier' },
      args: z.object({ reservationId: entityIdSchema }),
      run: ({ reservationId }) =>
        guard('Failed to get folio', async () => {
          const folio = await client.getFolio(reservationId);
          return {
            success: true,
            message: `Folio for ${folio.guestName} - Balance: $${folio.balance.toFixed(2)}`,
            data: folioData(folio),
            nextSteps: [
              'Review charges with guest',
              'Process payment if balance due',
              'Print invoice',
            ],
          };
        }),
    }),
  ];
}
