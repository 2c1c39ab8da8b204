// Message types for the reading broadcast channel (JSON over WebSocket)
import { z } from 'zod';
import type { RangingReading } from '../../ranging-math';
import type { EnhancementState, SessionError, SessionState } from '../../ranging-management';

export const MESSAGE_TYPES = {
  // System messages (0x01-0x0F)
  ERROR: 0x02,

  // READINGS_UPDATE (0x40) - Server→Client broadcast of every live session
  READINGS_UPDATE: 0x40,

  // Snapshot query (0x50-0x5F)
  GET_READINGS_REQUEST: 0x50,

  // Internal protocol (0xF0-0xFF)
  PING: 0xF1,
  PONG: 0xF2,
} as const;

export type MessageType = typeof MESSAGE_TYPES[keyof typeof MESSAGE_TYPES];

export interface BroadcastDevice {
  deviceId: string;
  name: string;
  state: SessionState;
  stateDisplayName: string;
  enhancement: EnhancementState;
  error: SessionError | null;
  lastActivity: number;
  reading: RangingReading | null;
}

export interface ReadingsUpdateMessage {
  type: typeof MESSAGE_TYPES.READINGS_UPDATE;
  timestamp: number;
  devices: BroadcastDevice[];
}

export interface PongMessage {
  type: typeof MESSAGE_TYPES.PONG;
  timestamp: number;
  requestId?: number;
}

export interface ErrorMessage {
  type: typeof MESSAGE_TYPES.ERROR;
  timestamp: number;
  error: string;
  requestId?: number;
}

export type ServerMessage = ReadingsUpdateMessage | PongMessage | ErrorMessage;

// Client → server
export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal(MESSAGE_TYPES.PING), requestId: z.number().int().optional() }),
  z.object({ type: z.literal(MESSAGE_TYPES.GET_READINGS_REQUEST), requestId: z.number().int().optional() }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
