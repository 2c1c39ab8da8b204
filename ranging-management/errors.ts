/**
 * Ranging Session Errors
 */

import type { SessionState } from './types';

export class InvalidTransitionError extends Error {
  constructor(
    public readonly deviceId: string,
    public readonly fromState: SessionState,
    public readonly toState: SessionState
  ) {
    super(`Invalid transition for device ${deviceId}: ${fromState} → ${toState}`);
    this.name = 'InvalidTransitionError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(public readonly deviceId: string) {
    super(`Session not found: ${deviceId}`);
    this.name = 'SessionNotFoundError';
  }
}

/**
 * A send over the control link failed; the device is treated as disconnected
 */
export class TransportError extends Error {
  constructor(
    public readonly deviceId: string,
    message: string,
    cause?: unknown
  ) {
    super(`Transport failure for ${deviceId}: ${message}`, { cause });
    this.name = 'TransportError';
  }
}

/**
 * The ranging engine could not build a configuration from the accessory payload
 */
export class ConfigError extends Error {
  constructor(
    public readonly deviceId: string,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
