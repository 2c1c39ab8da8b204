/**
 * Ranging Management Module
 *
 * Per-device session state machines and the registry that owns them.
 */

// Types
export {
  SessionState,
  SessionInvalidationReason,
  ErrorReason,
  ObjectRemovalReason,
  EnhancementState,
  TerminationCause,
  TRANSITION_RULES,
  ENGINE_SESSION_STATES,
  HANDSHAKE_STATES,
  RANGING_CONFIG,
  DEFAULT_SESSION_SETTINGS,
} from './types';

export type {
  SessionSettings,
  DeviceIdentity,
  SessionHandle,
  SessionError,
  SessionSnapshot,
  SendResult,
  RangingDescriptor,
  ConfigResult,
  SessionPorts,
  SessionStateChange,
  ReadingUpdate,
  SessionTermination,
  RegistryEvents,
} from './types';

// Errors
export {
  InvalidTransitionError,
  SessionNotFoundError,
  TransportError,
  ConfigError,
  toErrorMessage,
} from './errors';

// Building blocks
export { SessionTimers } from './SessionTimers';
export { SessionMailbox } from './SessionMailbox';
export type { MailboxTask, MailboxErrorHandler } from './SessionMailbox';
export { DeviceSession } from './DeviceSession';
export type { SessionListener, DeviceSessionOptions } from './DeviceSession';

// Registry
export { SessionRegistry } from './SessionRegistry';
export type { SessionRegistryOptions } from './SessionRegistry';

// Display
export { getStateDisplayName, formatReading, formatSession } from './display';
