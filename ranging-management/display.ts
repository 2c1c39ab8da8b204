/**
 * Display Helpers
 * String representations for logs and the demo console
 */

import type { RangingReading } from '../ranging-math';
import { SessionState, SessionSnapshot } from './types';

const STATE_NAMES: Record<SessionState, string> = {
  [SessionState.IDLE]: 'Idle',
  [SessionState.AWAITING_CONFIG]: 'Awaiting Config',
  [SessionState.CONFIGURING_RANGING_ENGINE]: 'Configuring',
  [SessionState.AWAITING_SHAREABLE_CONFIG]: 'Awaiting Shareable Config',
  [SessionState.STARTING]: 'Starting',
  [SessionState.RANGING]: 'Ranging',
  [SessionState.STOPPING]: 'Stopping',
  [SessionState.DISCONNECTED]: 'Disconnected',
  [SessionState.ERROR]: 'Error',
};

export function getStateDisplayName(state: SessionState): string {
  return STATE_NAMES[state];
}

/**
 * Format a reading as e.g. "1.25 m, az 42.0°, el 3.5°"
 */
export function formatReading(reading: RangingReading | null): string {
  if (!reading) return 'no reading';

  const parts: string[] = [
    reading.distanceMeters !== null ? `${reading.distanceMeters.toFixed(2)} m` : '-- m',
  ];

  if (reading.azimuthDeg !== null) {
    parts.push(`az ${reading.azimuthDeg.toFixed(1)}°`);
  }

  const elevation = reading.elevation;
  if (elevation?.kind === 'angle') {
    parts.push(`el ${elevation.degrees.toFixed(1)}°`);
  } else if (elevation?.kind === 'vertical') {
    parts.push(`vertical ${elevation.estimate}`);
  }

  if (reading.relativeBearingDeg !== null) {
    parts.push(`bearing ${reading.relativeBearingDeg.toFixed(1)}°`);
  }

  if (reading.isStale) parts.push('(stale)');
  return parts.join(', ');
}

export function formatSession(snapshot: SessionSnapshot): string {
  const state = getStateDisplayName(snapshot.state);
  const error = snapshot.error ? ` [${snapshot.error.reason}]` : '';
  return `${snapshot.identity.name}: ${state}${error} | ${formatReading(snapshot.lastReading)}`;
}
