/**
 * Device Session
 *
 * Protocol state machine for one connected accessory. Every event for the
 * device goes through the session's mailbox; retries and the handshake
 * watchdog run on the session's own timers and post back into the mailbox.
 *
 * Handshake:
 *   IDLE → AWAITING_CONFIG (Initialize sent)
 *        → CONFIGURING_RANGING_ENGINE (ConfigurationData received)
 *        → AWAITING_SHAREABLE_CONFIG (engine session running)
 *        → STARTING (ConfigureAndStart sent)
 *        → RANGING (RangingStarted received)
 *
 * Failures during the handshake are bounded by maxConfigAttempts; recoverable
 * engine invalidations restart the handshake at most maxHandshakeCycles times
 * per connection.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  MessageCodec,
  ControlMessageKind,
  Messages,
  DecodeError,
  HostMessage,
  AccessoryMessage,
} from '../uwb-protocol';
import {
  computeReading,
  Capability,
  ConvergenceStatus,
  CONVERGENCE_NOT_STARTED,
  RangingReading,
  RangingSample,
} from '../ranging-math';
import { createLogger, toHex } from '../shared/RangingLogger';
import { InvalidTransitionError, TransportError, toErrorMessage } from './errors';
import { SessionMailbox } from './SessionMailbox';
import { SessionTimers } from './SessionTimers';
import {
  SessionState,
  SessionInvalidationReason,
  ErrorReason,
  ObjectRemovalReason,
  EnhancementState,
  TerminationCause,
  TRANSITION_RULES,
  ENGINE_SESSION_STATES,
  HANDSHAKE_STATES,
  DeviceIdentity,
  SessionHandle,
  SessionError,
  SessionSnapshot,
  SessionSettings,
  SessionPorts,
  SessionStateChange,
  SendResult,
  ConfigResult,
} from './types';

const log = createLogger('Session');

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

const TIMER = {
  CONFIG_RETRY: 'configRetry',
  HANDSHAKE_WATCHDOG: 'handshakeWatchdog',
  RECOVER: 'recover',
  ENHANCEMENT_ATTACH: 'enhancementAttach',
} as const;

/**
 * Receives everything a session reports upward; implemented by the registry
 */
export interface SessionListener {
  onStateChanged(session: DeviceSession, change: SessionStateChange): void;
  onReading(session: DeviceSession, reading: RangingReading): void;
  /** The session ended itself (terminal error, clean stop, failed send) */
  onTerminal(session: DeviceSession, cause: TerminationCause): void;
}

export interface DeviceSessionOptions {
  identity: DeviceIdentity;
  capability: Capability;
  settings: SessionSettings;
  ports: SessionPorts;
  listener: SessionListener;
  now?: () => number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Device Session Implementation
// ─────────────────────────────────────────────────────────────────────────────

export class DeviceSession {
  readonly identity: DeviceIdentity;
  readonly handle: SessionHandle;
  readonly capability: Capability;

  private readonly settings: SessionSettings;
  private readonly ports: SessionPorts;
  private readonly listener: SessionListener;
  private readonly now: () => number;

  private readonly timers = new SessionTimers();
  private readonly mailbox: SessionMailbox;

  // State machine
  private state = SessionState.IDLE;
  private previousState: SessionState | null = null;
  private stateChangedAt: number;
  private error: SessionError | null = null;

  // Handshake bookkeeping; configAttempts spans the whole connection
  private configAttempts = 0;
  private handshakeCycles = 0;
  private stopRequested = false;
  private rearmUsed = false;
  private releaseRetryUsed = false;

  // Engine session
  private discoveryToken: string | null = null;
  private engineSessionToken: string | null = null;
  private convergence: ConvergenceStatus = CONVERGENCE_NOT_STARTED;
  private enhancement = EnhancementState.DETACHED;

  // Readings
  private lastReading: RangingReading | null = null;
  private lastActivity: number;

  private closed = false;

  constructor(options: DeviceSessionOptions) {
    this.identity = Object.freeze({ id: options.identity.id, name: options.identity.name });
    this.capability = options.capability;
    this.settings = options.settings;
    this.ports = options.ports;
    this.listener = options.listener;
    this.now = options.now ?? (() => Date.now());

    const createdAt = this.now();
    this.handle = Object.freeze({ deviceId: this.identity.id, handleId: uuidv4(), createdAt });
    this.stateChangedAt = createdAt;
    this.lastActivity = createdAt;

    this.mailbox = new SessionMailbox((label, error) => {
      log.error(`${this.tag} ${label} handler failed:`, error);
    });
  }

  private get tag(): string {
    return `[${this.identity.name}]`;
  }

  get id(): string {
    return this.identity.id;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get reading(): RangingReading | null {
    return this.lastReading;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Inbound events (each goes through the mailbox)
  // ───────────────────────────────────────────────────────────────────────────

  start(): Promise<void> {
    return this.mailbox.post('connected', () => this.beginHandshake());
  }

  receive(bytes: Uint8Array): Promise<void> {
    return this.mailbox.post('message', () => this.handleBytes(bytes));
  }

  rangingSample(sample: RangingSample): Promise<void> {
    return this.mailbox.post('sample', () => this.handleSample(sample));
  }

  convergenceChanged(sessionToken: string, status: ConvergenceStatus): Promise<void> {
    return this.mailbox.post('convergence', () => this.handleConvergence(sessionToken, status));
  }

  shareableConfigReady(sessionToken: string, config: Uint8Array): Promise<void> {
    return this.mailbox.post('shareableConfig', () => this.handleShareableConfig(sessionToken, config));
  }

  objectRemoved(sessionToken: string, reason: ObjectRemovalReason): Promise<void> {
    return this.mailbox.post('objectRemoved', () => this.handleObjectRemoved(sessionToken, reason));
  }

  sessionInvalidated(sessionToken: string, reason: SessionInvalidationReason): Promise<void> {
    return this.mailbox.post('sessionInvalidated', () => this.handleInvalidation(sessionToken, reason));
  }

  /**
   * Ask the accessory to stop ranging. The session then waits in STOPPING for
   * RangingStopped or a disconnect; there is no timeout, so a consumer whose
   * accessory never answers should follow up with requestDisconnect.
   */
  requestStop(): Promise<void> {
    return this.mailbox.post('requestStop', () => this.handleStopRequest());
  }

  attachEnhancement(): Promise<void> {
    return this.mailbox.post('attachEnhancement', () => this.handleAttachEnhancement());
  }

  detachEnhancement(): Promise<void> {
    return this.mailbox.post('detachEnhancement', () => this.handleDetachEnhancement());
  }

  whenIdle(): Promise<void> {
    return this.mailbox.whenIdle();
  }

  get pendingWork(): number {
    return this.mailbox.size;
  }

  /**
   * Tear the session down immediately: timers cancelled, queued work dropped,
   * engine session invalidated. A terminal error keeps its ERROR state;
   * anything else ends in DISCONNECTED.
   */
  close(cause: TerminationCause): void {
    if (this.closed) return;
    this.closed = true;

    this.timers.cancelAll();
    this.mailbox.close();
    this.releaseEngineSession();
    this.dropEnhancement();

    const keepError = cause === TerminationCause.ERROR && this.state === SessionState.ERROR;
    if (!keepError && this.state !== SessionState.DISCONNECTED) {
      this.moveTo(SessionState.DISCONNECTED);
    }
  }

  snapshot(): SessionSnapshot {
    return Object.freeze({
      identity: this.identity,
      handle: this.handle,
      state: this.state,
      previousState: this.previousState,
      stateChangedAt: this.stateChangedAt,
      configAttempts: this.configAttempts,
      handshakeCycles: this.handshakeCycles,
      discoveryToken: this.discoveryToken,
      capability: this.capability,
      convergence: this.convergence,
      lastReading: this.lastReading,
      lastActivity: this.lastActivity,
      error: this.error ? Object.freeze({ ...this.error }) : null,
      enhancement: this.enhancement,
      stopRequested: this.stopRequested,
    });
  }

  pendingTimers(): string[] {
    return this.timers.pending();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // State Machine Core
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Transition with validation; same-state moves are no-ops
   * @throws InvalidTransitionError if the transition is not in TRANSITION_RULES
   */
  private moveTo(next: SessionState): void {
    const previous = this.state;
    if (previous === next) return;

    if (!TRANSITION_RULES[previous].includes(next)) {
      throw new InvalidTransitionError(this.id, previous, next);
    }

    const now = this.now();
    this.previousState = previous;
    this.state = next;
    this.stateChangedAt = now;

    if (previous === SessionState.ERROR) {
      this.error = null;
    }

    log.info(`${this.tag} ${previous} → ${next}`);
    this.listener.onStateChanged(this, {
      deviceId: this.id,
      deviceName: this.identity.name,
      previousState: previous,
      newState: next,
      error: this.error,
      timestamp: now,
    });
  }

  private enterError(reason: ErrorReason, message: string): void {
    this.timers.cancelAll();
    this.error = { reason, message, timestamp: this.now() };
    log.warn(`${this.tag} Error (${reason}): ${message}`);
    this.moveTo(SessionState.ERROR);
  }

  /**
   * Terminal error: the registry removes the session
   */
  private fail(reason: ErrorReason, message: string): void {
    this.enterError(reason, message);
    this.listener.onTerminal(this, TerminationCause.ERROR);
  }

  private ignore(event: string): void {
    log.debug(`${this.tag} Ignoring ${event} in ${this.state}`);
  }

  private touch(): void {
    this.lastActivity = this.now();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Outbound messages
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * @returns false when the send failed and the session was torn down
   */
  private async sendMessage(message: HostMessage): Promise<boolean> {
    const bytes = MessageCodec.encode(message);
    log.debug(`${this.tag} TX ${MessageCodec.describe(message)} | ${toHex(bytes)}`);

    let result: SendResult;
    try {
      result = await this.ports.send(this.id, bytes);
    } catch (error) {
      result = { success: false, error: new TransportError(this.id, toErrorMessage(error), error) };
    }

    if (this.closed) return false;

    if (!result.success) {
      log.error(`${this.tag} ${result.error.message}`);
      this.listener.onTerminal(this, TerminationCause.TRANSPORT_FAILURE);
      return false;
    }
    return true;
  }

  private async sendInitialize(): Promise<void> {
    this.armWatchdog();
    await this.sendMessage(Messages.initialize());
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Handshake
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Start a new handshake cycle from IDLE
   */
  private async beginHandshake(): Promise<void> {
    if (this.state !== SessionState.IDLE) {
      this.ignore('connected');
      return;
    }

    this.handshakeCycles++;
    log.info(`${this.tag} Handshake cycle ${this.handshakeCycles}/${this.settings.maxHandshakeCycles}`);

    this.moveTo(SessionState.AWAITING_CONFIG);
    await this.sendInitialize();
  }

  /**
   * Re-run the handshake on the same connection (peer timeout, unexpected stop)
   */
  private async restartHandshake(): Promise<void> {
    this.releaseEngineSession();
    this.dropEnhancement();
    this.timers.cancel(TIMER.CONFIG_RETRY);
    this.moveTo(SessionState.AWAITING_CONFIG);
    await this.sendInitialize();
  }

  private armWatchdog(): void {
    this.timers.schedule(TIMER.HANDSHAKE_WATCHDOG, this.settings.handshakeTimeoutMs, () => {
      void this.mailbox.post('handshakeTimeout', () => this.handleHandshakeTimeout());
    });
  }

  private async handleHandshakeTimeout(): Promise<void> {
    if (!HANDSHAKE_STATES.includes(this.state)) {
      this.ignore('handshake timeout');
      return;
    }
    this.configFailure(`handshake did not reach ranging within ${this.settings.handshakeTimeoutMs}ms`);
  }

  /**
   * Count a failed configuration attempt; retry Initialize or give up
   */
  private configFailure(message: string): void {
    this.timers.cancel(TIMER.HANDSHAKE_WATCHDOG);
    this.releaseEngineSession();
    this.configAttempts++;

    const { maxConfigAttempts } = this.settings;
    if (this.configAttempts >= maxConfigAttempts) {
      this.fail(ErrorReason.CONFIG_EXHAUSTED, `${message} (attempt ${this.configAttempts}/${maxConfigAttempts})`);
      return;
    }

    log.warn(
      `${this.tag} Configuration attempt ${this.configAttempts}/${maxConfigAttempts} failed: ${message}; ` +
      `retrying in ${this.settings.configRetryDelayMs}ms`
    );
    this.moveTo(SessionState.AWAITING_CONFIG);
    this.timers.schedule(TIMER.CONFIG_RETRY, this.settings.configRetryDelayMs, () => {
      void this.mailbox.post('configRetry', () => this.handleConfigRetry());
    });
  }

  private async handleConfigRetry(): Promise<void> {
    if (this.state !== SessionState.AWAITING_CONFIG) {
      this.ignore('config retry');
      return;
    }
    await this.sendInitialize();
  }

  private async handleBytes(bytes: Uint8Array): Promise<void> {
    this.touch();
    const result = MessageCodec.decode(bytes);

    if (!result.success) {
      this.handleDecodeError(result.error, bytes);
      return;
    }

    const message = result.message;
    log.debug(`${this.tag} RX ${MessageCodec.describe(message)} | ${toHex(bytes)}`);

    switch (message.kind) {
      case ControlMessageKind.CONFIGURATION_DATA:
      case ControlMessageKind.RANGING_STARTED:
      case ControlMessageKind.RANGING_STOPPED:
        await this.handleAccessoryMessage(message);
        return;
      default:
        this.ignore(`host message ${MessageCodec.describe(message)}`);
    }
  }

  private handleDecodeError(error: DecodeError, bytes: Uint8Array): void {
    log.warn(`${this.tag} Undecodable message (${error.kind}): ${error.message} | ${toHex(bytes)}`);

    if (this.state === SessionState.AWAITING_CONFIG) {
      this.configFailure(error.message);
    }
  }

  private async handleAccessoryMessage(message: AccessoryMessage): Promise<void> {
    switch (message.kind) {
      case ControlMessageKind.CONFIGURATION_DATA:
        if (this.state !== SessionState.AWAITING_CONFIG) {
          this.ignore('ConfigurationData');
          return;
        }
        await this.configureRangingEngine(message.payload);
        return;

      case ControlMessageKind.RANGING_STARTED:
        this.handleRangingStarted();
        return;

      case ControlMessageKind.RANGING_STOPPED:
        await this.handleRangingStopped();
        return;
    }
  }

  private async configureRangingEngine(payload: Uint8Array): Promise<void> {
    this.timers.cancel(TIMER.CONFIG_RETRY);
    this.moveTo(SessionState.CONFIGURING_RANGING_ENGINE);

    let result: ConfigResult | null;
    try {
      result = await this.ports.createRangingConfiguration(this.id, payload);
    } catch (error) {
      log.error(`${this.tag} Ranging engine threw while configuring:`, error);
      result = null;
    }

    // Disconnected (or replaced) while the engine was working
    if (this.closed || this.state !== SessionState.CONFIGURING_RANGING_ENGINE) return;

    if (!result || !result.success) {
      this.configFailure(result ? result.error.message : 'ranging engine failed to configure');
      return;
    }

    const discoveryToken = uuidv4();
    let sessionToken: string;
    try {
      sessionToken = this.ports.runRangingSession(this.id, result.descriptor, discoveryToken);
    } catch (error) {
      this.configFailure(`ranging session did not start: ${toErrorMessage(error)}`);
      return;
    }

    this.discoveryToken = discoveryToken;
    this.engineSessionToken = sessionToken;
    this.convergence = CONVERGENCE_NOT_STARTED;
    log.info(`${this.tag} Ranging engine configured (descriptor ${result.descriptor.descriptorId})`);
    this.moveTo(SessionState.AWAITING_SHAREABLE_CONFIG);
  }

  private async handleShareableConfig(sessionToken: string, config: Uint8Array): Promise<void> {
    if (sessionToken !== this.engineSessionToken) {
      log.debug(`${this.tag} Dropping shareable config for stale engine session`);
      return;
    }
    if (this.state !== SessionState.AWAITING_SHAREABLE_CONFIG) {
      this.ignore('shareable config');
      return;
    }
    if (config.length === 0) {
      this.configFailure('ranging engine produced an empty shareable configuration');
      return;
    }

    const sent = await this.sendMessage(Messages.configureAndStart(config));
    if (!sent || this.state !== SessionState.AWAITING_SHAREABLE_CONFIG) return;
    this.moveTo(SessionState.STARTING);
  }

  private handleRangingStarted(): void {
    if (this.state === SessionState.RANGING) {
      this.ignore('duplicate RangingStarted');
      return;
    }
    if (this.state !== SessionState.STARTING && this.state !== SessionState.AWAITING_SHAREABLE_CONFIG) {
      this.ignore('RangingStarted');
      return;
    }

    this.timers.cancel(TIMER.HANDSHAKE_WATCHDOG);
    this.timers.cancel(TIMER.CONFIG_RETRY);
    this.convergence = CONVERGENCE_NOT_STARTED;
    this.moveTo(SessionState.RANGING);

    if (this.settings.autoAttachEnhancement) {
      this.timers.schedule(TIMER.ENHANCEMENT_ATTACH, this.settings.enhancementAttachDelayMs, () => {
        void this.mailbox.post('enhancementAttach', () => this.handleAttachEnhancement());
      });
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Stop handling
  // ───────────────────────────────────────────────────────────────────────────

  private async handleStopRequest(): Promise<void> {
    if (this.state !== SessionState.RANGING) {
      log.info(`${this.tag} Stop requested in ${this.state}, nothing to stop`);
      return;
    }

    this.stopRequested = true;
    const sent = await this.sendMessage(Messages.stop());
    if (!sent || this.state !== SessionState.RANGING) return;
    this.moveTo(SessionState.STOPPING);
  }

  private async handleRangingStopped(): Promise<void> {
    if (this.state === SessionState.STOPPING) {
      this.finishStopped();
      return;
    }
    if (this.state !== SessionState.RANGING) {
      this.ignore('RangingStopped');
      return;
    }

    this.moveTo(SessionState.STOPPING);

    if (this.stopRequested) {
      this.finishStopped();
      return;
    }

    if (!this.rearmUsed) {
      this.rearmUsed = true;
      log.warn(`${this.tag} Accessory stopped ranging unexpectedly, re-arming`);
      await this.restartHandshake();
      return;
    }

    log.warn(`${this.tag} Accessory stopped ranging again, giving up on this connection`);
    this.finishStopped();
  }

  private finishStopped(): void {
    this.releaseEngineSession();
    this.dropEnhancement();
    this.timers.cancelAll();
    this.moveTo(SessionState.DISCONNECTED);
    this.listener.onTerminal(this, TerminationCause.STOPPED);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Ranging engine events
  // ───────────────────────────────────────────────────────────────────────────

  private handleSample(sample: RangingSample): void {
    if (this.state !== SessionState.RANGING) {
      this.ignore('ranging sample');
      return;
    }
    if (sample.discoveryToken !== this.discoveryToken) {
      log.debug(`${this.tag} Dropping sample with foreign discovery token`);
      return;
    }

    const now = this.now();
    const reading = computeReading({
      sample,
      capability: this.capability,
      convergence: this.convergence,
      calibration: this.settings.calibration,
      previous: this.lastReading,
      headingDeg: this.ports.currentHeadingDegrees(),
      capturedAt: now,
    });

    this.lastReading = reading;
    this.lastActivity = now;
    this.listener.onReading(this, reading);
  }

  private handleConvergence(sessionToken: string, status: ConvergenceStatus): void {
    if (sessionToken !== this.engineSessionToken) {
      log.debug(`${this.tag} Dropping convergence update for stale engine session`);
      return;
    }
    this.convergence = status;
    log.debug(`${this.tag} Convergence: ${status.state}`);
  }

  private async handleObjectRemoved(sessionToken: string, reason: ObjectRemovalReason): Promise<void> {
    if (sessionToken !== this.engineSessionToken) {
      log.debug(`${this.tag} Dropping object removal for stale engine session`);
      return;
    }

    if (reason === ObjectRemovalReason.PEER_ENDED) {
      log.info(`${this.tag} Peer ended the ranging session`);
      return;
    }

    if (this.state !== SessionState.RANGING) {
      this.ignore('object removal');
      return;
    }

    log.warn(`${this.tag} Lost the accessory (timeout), restarting handshake`);
    await this.restartHandshake();
  }

  private handleInvalidation(sessionToken: string, reason: SessionInvalidationReason): void {
    if (sessionToken !== this.engineSessionToken) {
      log.debug(`${this.tag} Dropping invalidation for stale engine session`);
      return;
    }
    if (!ENGINE_SESSION_STATES.includes(this.state)) {
      this.ignore(`invalidation (${reason})`);
      return;
    }

    // The engine already tore its session down
    this.engineSessionToken = null;
    this.discoveryToken = null;
    this.dropEnhancement();

    switch (reason) {
      case SessionInvalidationReason.PERMISSION_DENIED:
        this.fail(ErrorReason.PERMISSION_DENIED, 'Ranging permission denied');
        return;

      case SessionInvalidationReason.RESOURCE_TIMEOUT:
        this.fail(ErrorReason.RESOURCE_TIMEOUT, 'Ranging resources timed out');
        return;

      case SessionInvalidationReason.UNKNOWN:
        this.fail(ErrorReason.UNKNOWN, 'Ranging session invalidated for an unknown reason');
        return;

      case SessionInvalidationReason.INVALID_CONFIGURATION:
        if (!this.hasHandshakeCycleLeft()) {
          this.fail(
            ErrorReason.HANDSHAKE_EXHAUSTED,
            `Configuration rejected after ${this.handshakeCycles} handshake cycles`
          );
          return;
        }
        this.enterError(ErrorReason.INVALID_CONFIGURATION, 'Ranging engine rejected the configuration');
        this.scheduleRecovery(this.settings.invalidConfigRetryDelayMs);
        return;

      case SessionInvalidationReason.TOO_MANY_ACTIVE_SESSIONS:
        if (this.releaseRetryUsed || !this.hasHandshakeCycleLeft()) {
          this.fail(ErrorReason.TOO_MANY_ACTIVE_SESSIONS, 'Too many active ranging sessions');
          return;
        }
        this.releaseRetryUsed = true;
        this.enterError(ErrorReason.TOO_MANY_ACTIVE_SESSIONS, 'Too many active ranging sessions, releasing enhancements');
        this.ports.releaseEnhancements();
        this.scheduleRecovery(this.settings.releaseRetryDelayMs);
        return;
    }
  }

  private hasHandshakeCycleLeft(): boolean {
    return this.handshakeCycles < this.settings.maxHandshakeCycles;
  }

  private scheduleRecovery(delayMs: number): void {
    log.info(`${this.tag} Retrying handshake in ${delayMs}ms`);
    this.timers.schedule(TIMER.RECOVER, delayMs, () => {
      void this.mailbox.post('recover', () => this.handleRecover());
    });
  }

  private async handleRecover(): Promise<void> {
    if (this.state !== SessionState.ERROR) {
      this.ignore('recovery');
      return;
    }
    this.moveTo(SessionState.IDLE);
    await this.beginHandshake();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Enhancement link
  // ───────────────────────────────────────────────────────────────────────────

  private async handleAttachEnhancement(): Promise<void> {
    const sessionToken = this.engineSessionToken;
    if (this.state !== SessionState.RANGING || sessionToken === null) {
      log.info(`${this.tag} Enhancement can only attach while ranging`);
      return;
    }
    if (this.enhancement === EnhancementState.ATTACHED || this.enhancement === EnhancementState.PENDING) {
      return;
    }

    this.timers.cancel(TIMER.ENHANCEMENT_ATTACH);
    this.enhancement = EnhancementState.PENDING;

    let attached: boolean;
    try {
      attached = await this.ports.attachEnhancement(this.id, sessionToken);
    } catch (error) {
      log.warn(`${this.tag} Enhancement attach threw:`, error);
      attached = false;
    }

    if (this.closed) return;

    // Ranging moved on while attaching
    if (this.enhancement !== EnhancementState.PENDING || sessionToken !== this.engineSessionToken) {
      if (attached) this.ports.detachEnhancement(this.id);
      return;
    }

    this.enhancement = attached ? EnhancementState.ATTACHED : EnhancementState.FAILED;
    if (attached) {
      log.info(`${this.tag} Enhancement attached`);
    } else {
      log.warn(`${this.tag} Enhancement unavailable, ranging continues without it`);
    }
  }

  private handleDetachEnhancement(): void {
    this.timers.cancel(TIMER.ENHANCEMENT_ATTACH);
    if (this.enhancement === EnhancementState.DETACHED) return;
    this.dropEnhancement();
    log.info(`${this.tag} Enhancement detached`);
  }

  private dropEnhancement(): void {
    this.timers.cancel(TIMER.ENHANCEMENT_ATTACH);
    if (this.enhancement === EnhancementState.ATTACHED || this.enhancement === EnhancementState.PENDING) {
      try {
        this.ports.detachEnhancement(this.id);
      } catch (error) {
        log.warn(`${this.tag} Enhancement detach threw:`, error);
      }
    }
    this.enhancement = EnhancementState.DETACHED;
  }

  private releaseEngineSession(): void {
    const sessionToken = this.engineSessionToken;
    this.engineSessionToken = null;
    this.discoveryToken = null;
    this.convergence = CONVERGENCE_NOT_STARTED;

    if (sessionToken !== null) {
      try {
        this.ports.invalidateSession(sessionToken);
      } catch (error) {
        log.warn(`${this.tag} Failed to invalidate engine session:`, error);
      }
    }
  }
}
