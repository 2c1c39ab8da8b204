/**
 * Simulated Ranging Engine
 * Stands in for the host's UWB framework: hands out descriptors and session
 * tokens, produces shareable configurations, and emits samples on demand or
 * from a motion loop that walks each accessory around the host.
 */

import { v4 as uuidv4 } from 'uuid';
import type { IRangingEngine, RangingEngineEvents } from '../ranging-bridge/interfaces/IRangingEngine';
import {
  Capability,
  ConvergenceStatus,
  RangingSample,
  VerticalEstimate,
} from '../ranging-math';
import {
  ConfigError,
  ConfigResult,
  ObjectRemovalReason,
  RangingDescriptor,
  SessionInvalidationReason,
} from '../ranging-management';
import { createLogger } from '../shared/RangingLogger';
import { TypedEventEmitter } from '../shared/TypedEventEmitter';
import { deliverLater } from './deliverLater';

const log = createLogger('Simulation');

// Prefix of every shareable configuration this engine produces
const SHAREABLE_HEADER = [0x53, 0x43] as const;

export interface SimulatedRangingEngineOptions {
  capability?: Capability;
}

export interface SimulatedEngineSession {
  readonly deviceId: string;
  readonly sessionToken: string;
  readonly discoveryToken: string;
  readonly descriptor: RangingDescriptor;
  /** Motion loop phase, radians */
  phase: number;
}

export class SimulatedRangingEngine extends TypedEventEmitter<RangingEngineEvents> implements IRangingEngine {
  readonly capability: Capability;

  private sessions = new Map<string, SimulatedEngineSession>();
  private rejectCounts = new Map<string, number>();
  private emptyShareable = new Set<string>();
  private invalidatedTokens: string[] = [];
  private motionTimer: NodeJS.Timeout | null = null;

  constructor(options: SimulatedRangingEngineOptions = {}) {
    super();
    this.capability = options.capability ?? Capability.FULL_DIRECTION;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // IRangingEngine
  // ───────────────────────────────────────────────────────────────────────────

  async createRangingConfiguration(deviceId: string, payload: Uint8Array): Promise<ConfigResult> {
    const rejections = this.rejectCounts.get(deviceId) ?? 0;
    if (rejections > 0) {
      this.rejectCounts.set(deviceId, rejections - 1);
      return { success: false, error: new ConfigError(deviceId, 'Simulated engine rejected the accessory configuration') };
    }

    return {
      success: true,
      descriptor: { descriptorId: uuidv4(), accessoryConfig: payload.slice() },
    };
  }

  runRangingSession(deviceId: string, descriptor: RangingDescriptor, discoveryToken: string): string {
    const sessionToken = uuidv4();
    const session: SimulatedEngineSession = { deviceId, sessionToken, discoveryToken, descriptor, phase: 0 };
    this.sessions.set(deviceId, session);
    log.debug(`Engine session ${sessionToken} running for ${deviceId}`);

    const config = this.emptyShareable.has(deviceId)
      ? new Uint8Array(0)
      : Uint8Array.from([...SHAREABLE_HEADER, ...descriptor.accessoryConfig]);

    deliverLater(`shareable config for ${deviceId}`, () => {
      if (this.sessions.get(deviceId)?.sessionToken !== sessionToken) return;
      this.emit('shareableConfigReady', { deviceId, sessionToken, config });
    });

    return sessionToken;
  }

  invalidateSession(sessionToken: string): void {
    this.invalidatedTokens.push(sessionToken);
    for (const [deviceId, session] of this.sessions) {
      if (session.sessionToken === sessionToken) {
        this.sessions.delete(deviceId);
        log.debug(`Engine session ${sessionToken} invalidated by host`);
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Fault injection
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * The next `count` configuration requests for the device fail
   */
  rejectNextConfigurations(deviceId: string, count = 1): void {
    this.rejectCounts.set(deviceId, count);
  }

  setEmptyShareableConfig(deviceId: string, empty: boolean): void {
    if (empty) {
      this.emptyShareable.add(deviceId);
    } else {
      this.emptyShareable.delete(deviceId);
    }
  }

  /**
   * Invalidate the device's engine session from the engine side
   */
  invalidate(deviceId: string, reason: SessionInvalidationReason): void {
    const session = this.sessions.get(deviceId);
    if (!session) return;
    this.sessions.delete(deviceId);
    this.emit('sessionInvalidated', { deviceId, sessionToken: session.sessionToken, reason });
  }

  removeObject(deviceId: string, reason: ObjectRemovalReason): void {
    const session = this.sessions.get(deviceId);
    if (!session) return;
    this.emit('objectRemoved', { deviceId, sessionToken: session.sessionToken, reason });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Sample generation
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Emit one sample for the device's current session; the discovery token is filled in
   * @returns false when the device has no engine session
   */
  emitSample(deviceId: string, sample: Omit<RangingSample, 'discoveryToken'>): boolean {
    const session = this.sessions.get(deviceId);
    if (!session) return false;
    this.emit('sampleUpdated', {
      deviceId,
      sessionToken: session.sessionToken,
      sample: { ...sample, discoveryToken: session.discoveryToken },
    });
    return true;
  }

  emitConvergence(deviceId: string, status: ConvergenceStatus): boolean {
    const session = this.sessions.get(deviceId);
    if (!session) return false;
    this.emit('convergenceChanged', { deviceId, sessionToken: session.sessionToken, status });
    return true;
  }

  /**
   * Walk every accessory around the host, one sample per session per tick
   */
  startMotion(intervalMs: number, radiansPerTick = Math.PI / 36): void {
    this.stopMotion();
    this.motionTimer = setInterval(() => {
      for (const session of this.sessions.values()) {
        session.phase += radiansPerTick;
        this.emitSample(session.deviceId, this.motionSample(session.phase));
      }
    }, intervalMs);
  }

  stopMotion(): void {
    if (this.motionTimer) {
      clearInterval(this.motionTimer);
      this.motionTimer = null;
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Inspection
  // ───────────────────────────────────────────────────────────────────────────

  getSession(deviceId: string): SimulatedEngineSession | null {
    return this.sessions.get(deviceId) ?? null;
  }

  get activeSessionCount(): number {
    return this.sessions.size;
  }

  get invalidated(): readonly string[] {
    return this.invalidatedTokens;
  }

  private motionSample(phase: number): Omit<RangingSample, 'discoveryToken'> {
    const distanceMeters = 2 + Math.sin(phase * 0.5);

    if (this.capability === Capability.FULL_DIRECTION) {
      return {
        distanceMeters,
        directionVector: { x: Math.sin(phase), y: 0.2 * Math.sin(phase * 0.3), z: Math.cos(phase) },
      };
    }

    const horizontalAngleRad = Math.atan2(Math.sin(phase), Math.cos(phase));
    const verticalEstimate = Math.sin(phase * 0.3) > 0.1
      ? VerticalEstimate.ABOVE
      : Math.sin(phase * 0.3) < -0.1 ? VerticalEstimate.BELOW : VerticalEstimate.SAME;
    return { distanceMeters, horizontalAngleRad, verticalEstimate };
  }
}
