/**
 * Ranging Session Types
 * States, transition rules, configuration and snapshots for device sessions
 */

import type { Calibration, Capability, ConvergenceStatus, RangingReading } from '../ranging-math';
import { NO_CALIBRATION } from '../ranging-math';
import type { ConfigError, TransportError } from './errors';

// ─────────────────────────────────────────────────────────────────────────────
// State Machine Enums
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Per-device protocol state
 * Forms a state machine with defined transitions
 */
export enum SessionState {
  IDLE = 'idle',
  AWAITING_CONFIG = 'awaiting_config',
  CONFIGURING_RANGING_ENGINE = 'configuring_ranging_engine',
  AWAITING_SHAREABLE_CONFIG = 'awaiting_shareable_config',
  STARTING = 'starting',
  RANGING = 'ranging',
  STOPPING = 'stopping',
  DISCONNECTED = 'disconnected',
  ERROR = 'error',
}

/**
 * Why the ranging engine invalidated a session
 */
export enum SessionInvalidationReason {
  PERMISSION_DENIED = 'permission_denied',
  INVALID_CONFIGURATION = 'invalid_configuration',
  RESOURCE_TIMEOUT = 'resource_timeout',
  TOO_MANY_ACTIVE_SESSIONS = 'too_many_active_sessions',
  UNKNOWN = 'unknown',
}

/**
 * Reason recorded on a session in ERROR
 */
export enum ErrorReason {
  PERMISSION_DENIED = 'permission_denied',
  INVALID_CONFIGURATION = 'invalid_configuration',
  RESOURCE_TIMEOUT = 'resource_timeout',
  TOO_MANY_ACTIVE_SESSIONS = 'too_many_active_sessions',
  UNKNOWN = 'unknown',
  CONFIG_EXHAUSTED = 'config_exhausted',
  HANDSHAKE_EXHAUSTED = 'handshake_exhausted',
}

export enum ObjectRemovalReason {
  TIMEOUT = 'timeout',
  PEER_ENDED = 'peer_ended',
}

/**
 * Optional enhancement link (e.g. camera assistance) attached to a ranging session
 */
export enum EnhancementState {
  DETACHED = 'detached',
  PENDING = 'pending',
  ATTACHED = 'attached',
  FAILED = 'failed',
}

/**
 * Why a session left the registry
 */
export enum TerminationCause {
  DISCONNECTED = 'disconnected',
  REQUESTED = 'requested',
  STOPPED = 'stopped',
  ERROR = 'error',
  TRANSPORT_FAILURE = 'transport_failure',
  REPLACED = 'replaced',
  SHUTDOWN = 'shutdown',
}

// ─────────────────────────────────────────────────────────────────────────────
// State Machine Transitions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Valid state transitions
 * Any transition not in this map is invalid and will throw
 */
export const TRANSITION_RULES: Record<SessionState, SessionState[]> = {
  [SessionState.IDLE]: [
    SessionState.AWAITING_CONFIG,
    SessionState.DISCONNECTED,
    SessionState.ERROR,
  ],
  [SessionState.AWAITING_CONFIG]: [
    SessionState.CONFIGURING_RANGING_ENGINE,
    SessionState.DISCONNECTED,
    SessionState.ERROR,
  ],
  [SessionState.CONFIGURING_RANGING_ENGINE]: [
    SessionState.AWAITING_SHAREABLE_CONFIG,
    SessionState.AWAITING_CONFIG,  // Engine rejected the payload, retry
    SessionState.DISCONNECTED,
    SessionState.ERROR,
  ],
  [SessionState.AWAITING_SHAREABLE_CONFIG]: [
    SessionState.STARTING,
    SessionState.RANGING,          // Accessory started before we sent ConfigureAndStart
    SessionState.AWAITING_CONFIG,  // Handshake watchdog
    SessionState.DISCONNECTED,
    SessionState.ERROR,
  ],
  [SessionState.STARTING]: [
    SessionState.RANGING,
    SessionState.AWAITING_CONFIG,
    SessionState.DISCONNECTED,
    SessionState.ERROR,
  ],
  [SessionState.RANGING]: [
    SessionState.STOPPING,
    SessionState.AWAITING_CONFIG,  // Peer timed out
    SessionState.DISCONNECTED,
    SessionState.ERROR,
  ],
  [SessionState.STOPPING]: [
    SessionState.AWAITING_CONFIG,  // Unexpected stop, re-armed
    SessionState.DISCONNECTED,
    SessionState.ERROR,
  ],
  [SessionState.DISCONNECTED]: [],
  [SessionState.ERROR]: [
    SessionState.IDLE,             // Recoverable invalidation
    SessionState.DISCONNECTED,
  ],
};

/**
 * States in which the ranging engine holds a session for the device
 */
export const ENGINE_SESSION_STATES: readonly SessionState[] = [
  SessionState.AWAITING_SHAREABLE_CONFIG,
  SessionState.STARTING,
  SessionState.RANGING,
];

/**
 * States covered by the handshake watchdog
 */
export const HANDSHAKE_STATES: readonly SessionState[] = [
  SessionState.AWAITING_CONFIG,
  SessionState.CONFIGURING_RANGING_ENGINE,
  SessionState.AWAITING_SHAREABLE_CONFIG,
  SessionState.STARTING,
];

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Constants
// ─────────────────────────────────────────────────────────────────────────────

export const RANGING_CONFIG = {
  // Handshake bounds (per connection)
  maxConfigAttempts: 3,
  maxHandshakeCycles: 3,

  // Retry delays (ms)
  configRetryDelayMs: 1000,
  invalidConfigRetryDelayMs: 2000,
  releaseRetryDelayMs: 1000,

  // Give up on a handshake that never reaches RANGING
  handshakeTimeoutMs: 30000,

  // Enhancement link is attached once ranging has settled
  enhancementAttachDelayMs: 1500,

  broadcast: {
    debounceMs: 50,
  },
} as const;

/**
 * Tunables a session runs with; defaults come from RANGING_CONFIG
 */
export interface SessionSettings {
  maxConfigAttempts: number;
  maxHandshakeCycles: number;
  configRetryDelayMs: number;
  invalidConfigRetryDelayMs: number;
  releaseRetryDelayMs: number;
  handshakeTimeoutMs: number;
  enhancementAttachDelayMs: number;
  autoAttachEnhancement: boolean;
  calibration: Calibration;
}

export const DEFAULT_SESSION_SETTINGS: Readonly<SessionSettings> = Object.freeze({
  maxConfigAttempts: RANGING_CONFIG.maxConfigAttempts,
  maxHandshakeCycles: RANGING_CONFIG.maxHandshakeCycles,
  configRetryDelayMs: RANGING_CONFIG.configRetryDelayMs,
  invalidConfigRetryDelayMs: RANGING_CONFIG.invalidConfigRetryDelayMs,
  releaseRetryDelayMs: RANGING_CONFIG.releaseRetryDelayMs,
  handshakeTimeoutMs: RANGING_CONFIG.handshakeTimeoutMs,
  enhancementAttachDelayMs: RANGING_CONFIG.enhancementAttachDelayMs,
  autoAttachEnhancement: false,
  calibration: NO_CALIBRATION,
});

// ─────────────────────────────────────────────────────────────────────────────
// Identity & Snapshots
// ─────────────────────────────────────────────────────────────────────────────

export interface DeviceIdentity {
  readonly id: string;
  readonly name: string;
}

export interface SessionHandle {
  readonly deviceId: string;
  /** Unique per connection; a reconnect gets a new handle */
  readonly handleId: string;
  readonly createdAt: number;
}

export interface SessionError {
  reason: ErrorReason;
  message: string;
  timestamp: number;
}

/**
 * Read-only view of a device session
 */
export interface SessionSnapshot {
  readonly identity: DeviceIdentity;
  readonly handle: SessionHandle;
  readonly state: SessionState;
  readonly previousState: SessionState | null;
  readonly stateChangedAt: number;
  readonly configAttempts: number;
  readonly handshakeCycles: number;
  readonly discoveryToken: string | null;
  readonly capability: Capability;
  readonly convergence: ConvergenceStatus;
  readonly lastReading: RangingReading | null;
  readonly lastActivity: number;
  readonly error: Readonly<SessionError> | null;
  readonly enhancement: EnhancementState;
  readonly stopRequested: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Collaborator Results
// ─────────────────────────────────────────────────────────────────────────────

export type SendResult =
  | { success: true }
  | { success: false; error: TransportError };

/**
 * Engine-specific description of a ranging configuration
 */
export interface RangingDescriptor {
  readonly descriptorId: string;
  readonly accessoryConfig: Uint8Array;
}

export type ConfigResult =
  | { success: true; descriptor: RangingDescriptor }
  | { success: false; error: ConfigError };

/**
 * What a session needs from the outside world
 * Wired to the transport, ranging engine, heading and enhancement providers by the facade
 */
export interface SessionPorts {
  send(deviceId: string, bytes: Uint8Array): Promise<SendResult>;
  createRangingConfiguration(deviceId: string, payload: Uint8Array): Promise<ConfigResult>;
  /** Returns the engine's session token */
  runRangingSession(deviceId: string, descriptor: RangingDescriptor, discoveryToken: string): string;
  invalidateSession(sessionToken: string): void;
  currentHeadingDegrees(): number | null;
  attachEnhancement(deviceId: string, sessionToken: string): Promise<boolean>;
  detachEnhancement(deviceId: string): void;
  releaseEnhancements(): void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

export interface SessionStateChange {
  deviceId: string;
  deviceName: string;
  previousState: SessionState;
  newState: SessionState;
  error: Readonly<SessionError> | null;
  timestamp: number;
}

export interface ReadingUpdate {
  deviceId: string;
  deviceName: string;
  reading: RangingReading;
}

export interface SessionTermination {
  deviceId: string;
  cause: TerminationCause;
  snapshot: SessionSnapshot;
}

export interface RegistryEvents {
  sessionStateChanged: SessionStateChange;
  readingUpdated: ReadingUpdate;
  sessionTerminated: SessionTermination;
}
