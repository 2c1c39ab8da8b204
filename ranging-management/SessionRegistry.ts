/**
 * Session Registry
 * Single owner of every device session; routes transport and engine events
 * to the right session and publishes state and reading changes.
 */

import type { Capability, ConvergenceStatus, RangingReading, RangingSample } from '../ranging-math';
import { createLogger } from '../shared/RangingLogger';
import { TypedEventEmitter } from '../shared/TypedEventEmitter';
import { DeviceSession, SessionListener } from './DeviceSession';
import { SessionNotFoundError } from './errors';
import {
  DeviceIdentity,
  ObjectRemovalReason,
  RegistryEvents,
  SessionHandle,
  SessionInvalidationReason,
  SessionPorts,
  SessionSettings,
  SessionSnapshot,
  SessionState,
  TerminationCause,
  DEFAULT_SESSION_SETTINGS,
} from './types';

const log = createLogger('Registry');

export interface SessionRegistryOptions {
  ports: SessionPorts;
  capability: Capability;
  settings?: Partial<SessionSettings>;
  now?: () => number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Registry Implementation
// ─────────────────────────────────────────────────────────────────────────────

export class SessionRegistry extends TypedEventEmitter<RegistryEvents> {
  private sessions = new Map<string, DeviceSession>();
  private terminated = new Map<string, SessionSnapshot>();

  private readonly ports: SessionPorts;
  private readonly capability: Capability;
  private readonly settings: SessionSettings;
  private readonly now: () => number;
  private readonly listener: SessionListener;

  constructor(options: SessionRegistryOptions) {
    super();
    this.ports = options.ports;
    this.capability = options.capability;
    this.settings = { ...DEFAULT_SESSION_SETTINGS, ...options.settings };
    this.now = options.now ?? (() => Date.now());

    this.listener = {
      onStateChanged: (_session, change) => this.emit('sessionStateChanged', change),
      onReading: (session, reading) => this.emit('readingUpdated', {
        deviceId: session.id,
        deviceName: session.identity.name,
        reading,
      }),
      onTerminal: (session, cause) => this.terminate(session, cause),
    };
  }

  protected onHandlerError(event: string, error: unknown): void {
    log.error(`Listener for ${event} threw:`, error);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Transport events
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Create the session for a freshly connected device and start its handshake.
   * A session already held for the identity is replaced.
   */
  onConnected(identity: DeviceIdentity): SessionHandle {
    const existing = this.sessions.get(identity.id);
    if (existing) {
      log.warn(`[${identity.name}] Reconnected while a session was live, replacing it`);
      this.terminate(existing, TerminationCause.REPLACED);
    }

    this.terminated.delete(identity.id);

    const session = new DeviceSession({
      identity,
      capability: this.capability,
      settings: this.settings,
      ports: this.ports,
      listener: this.listener,
      now: this.now,
    });
    this.sessions.set(identity.id, session);

    log.info(`[${identity.name}] Session created (${this.sessions.size} active)`);
    void session.start();
    return session.handle;
  }

  onDisconnected(deviceId: string): void {
    const session = this.sessions.get(deviceId);
    if (!session) {
      log.debug(`Disconnect for untracked device ${deviceId}`);
      return;
    }
    this.terminate(session, TerminationCause.DISCONNECTED);
  }

  onMessage(deviceId: string, bytes: Uint8Array): Promise<void> {
    return this.route(deviceId, 'message', session => session.receive(bytes));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Ranging engine events
  // ───────────────────────────────────────────────────────────────────────────

  onRangingSample(deviceId: string, sample: RangingSample): Promise<void> {
    return this.route(deviceId, 'sample', session => session.rangingSample(sample));
  }

  onRangingConvergence(deviceId: string, sessionToken: string, status: ConvergenceStatus): Promise<void> {
    return this.route(deviceId, 'convergence', session => session.convergenceChanged(sessionToken, status));
  }

  onShareableConfig(deviceId: string, sessionToken: string, config: Uint8Array): Promise<void> {
    return this.route(deviceId, 'shareable config', session => session.shareableConfigReady(sessionToken, config));
  }

  onObjectRemoved(deviceId: string, sessionToken: string, reason: ObjectRemovalReason): Promise<void> {
    return this.route(deviceId, 'object removal', session => session.objectRemoved(sessionToken, reason));
  }

  onSessionInvalidated(deviceId: string, sessionToken: string, reason: SessionInvalidationReason): Promise<void> {
    return this.route(deviceId, 'invalidation', session => session.sessionInvalidated(sessionToken, reason));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Consumer commands
  // ───────────────────────────────────────────────────────────────────────────

  requestStop(deviceId: string): Promise<void> {
    return this.route(deviceId, 'stop request', session => session.requestStop());
  }

  /**
   * Drop the session right away
   * @returns false if no session was held for the device
   */
  requestDisconnect(deviceId: string): boolean {
    const session = this.sessions.get(deviceId);
    if (!session) {
      log.debug(`Disconnect requested for untracked device ${deviceId}`);
      return false;
    }
    this.terminate(session, TerminationCause.REQUESTED);
    return true;
  }

  attachEnhancement(deviceId: string): Promise<void> {
    return this.route(deviceId, 'enhancement attach', session => session.attachEnhancement());
  }

  detachEnhancement(deviceId: string): Promise<void> {
    return this.route(deviceId, 'enhancement detach', session => session.detachEnhancement());
  }

  /**
   * Terminate every session
   */
  clear(cause: TerminationCause = TerminationCause.SHUTDOWN): void {
    for (const session of Array.from(this.sessions.values())) {
      this.terminate(session, cause);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────────

  getReading(deviceId: string): RangingReading | null {
    return this.sessions.get(deviceId)?.reading ?? null;
  }

  /**
   * Latest reading of every live session that has produced one
   */
  allReadings(): ReadonlyMap<string, RangingReading> {
    const readings = new Map<string, RangingReading>();
    for (const [deviceId, session] of this.sessions) {
      const reading = session.reading;
      if (reading) readings.set(deviceId, reading);
    }
    return readings;
  }

  getSession(deviceId: string): SessionSnapshot | null {
    return this.sessions.get(deviceId)?.snapshot() ?? null;
  }

  /**
   * @throws SessionNotFoundError if no session is live for the device
   */
  requireSession(deviceId: string): SessionSnapshot {
    const snapshot = this.getSession(deviceId);
    if (!snapshot) {
      throw new SessionNotFoundError(deviceId);
    }
    return snapshot;
  }

  /**
   * Final snapshot of a session that has left the registry
   */
  getTerminated(deviceId: string): SessionSnapshot | null {
    return this.terminated.get(deviceId) ?? null;
  }

  listSessions(): SessionSnapshot[] {
    return Array.from(this.sessions.values()).map(session => session.snapshot());
  }

  getSessionsByState(state: SessionState): SessionSnapshot[] {
    return this.listSessions().filter(snapshot => snapshot.state === state);
  }

  /**
   * Live sessions with no activity for longer than maxAgeMs
   */
  listStale(now: number, maxAgeMs: number): SessionSnapshot[] {
    return this.listSessions().filter(snapshot => now - snapshot.lastActivity > maxAgeMs);
  }

  has(deviceId: string): boolean {
    return this.sessions.has(deviceId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Resolves once every session's mailbox has drained
   */
  async whenIdle(): Promise<void> {
    for (;;) {
      const sessions = Array.from(this.sessions.values());
      await Promise.all(sessions.map(session => session.whenIdle()));
      if (sessions.every(session => session.pendingWork === 0)) return;
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private route(
    deviceId: string,
    event: string,
    deliver: (session: DeviceSession) => Promise<void>
  ): Promise<void> {
    const session = this.sessions.get(deviceId);
    if (!session) {
      log.debug(`Dropping ${event} for untracked device ${deviceId}`);
      return Promise.resolve();
    }
    return deliver(session);
  }

  private terminate(session: DeviceSession, cause: TerminationCause): void {
    // Only the registered instance may be terminated; a replaced one is already gone
    if (this.sessions.get(session.id) !== session) return;

    this.sessions.delete(session.id);
    session.close(cause);

    const snapshot = session.snapshot();
    this.terminated.set(session.id, snapshot);

    log.info(`[${session.identity.name}] Session terminated (${cause}), ${this.sessions.size} active`);
    this.emit('sessionTerminated', { deviceId: session.id, cause, snapshot });
  }
}
