// WebSocket Bridge - reading broadcasts for UI clients
export { ReadingBroadcastServer } from './ReadingBroadcastServer';
export type { ReadingSource, BroadcastServerConfig } from './ReadingBroadcastServer';
export { MESSAGE_TYPES, ClientMessageSchema } from './types/MessageTypes';
export type {
  MessageType,
  BroadcastDevice,
  ReadingsUpdateMessage,
  PongMessage,
  ErrorMessage,
  ServerMessage,
  ClientMessage,
} from './types/MessageTypes';
