/**
 * UWB Ranging Service
 *
 * Entry point for consumers. Subscribes to the transport and ranging engine,
 * feeds their events into the session registry, and exposes readings and
 * session status. Sessions that end on their own (stop, terminal error,
 * failed send) get their transport connection closed here.
 */

import type { RangingReading } from '../ranging-math';
import {
  SessionRegistry,
  SessionSettings,
  SessionSnapshot,
  SessionPorts,
  SessionTermination,
  RegistryEvents,
  DeviceIdentity,
  TerminationCause,
} from '../ranging-management';
import { createLogger } from '../shared/RangingLogger';
import { EventHandler, TypedEventEmitter } from '../shared/TypedEventEmitter';
import type { ITransport, TransportEvents } from './interfaces/ITransport';
import type { IRangingEngine, RangingEngineEvents } from './interfaces/IRangingEngine';
import type { IHeadingProvider } from './interfaces/IHeadingProvider';
import type { IEnhancementProvider } from './interfaces/IEnhancementProvider';

const log = createLogger('Service');

// Causes where the accessory link is still up and has to be closed by us
const DISCONNECT_ON: ReadonlySet<TerminationCause> = new Set([
  TerminationCause.REQUESTED,
  TerminationCause.STOPPED,
  TerminationCause.ERROR,
  TerminationCause.TRANSPORT_FAILURE,
  TerminationCause.SHUTDOWN,
]);

export interface UwbRangingServiceOptions {
  transport: ITransport;
  engine: IRangingEngine;
  heading?: IHeadingProvider;
  enhancement?: IEnhancementProvider;
  settings?: Partial<SessionSettings>;
  now?: () => number;
}

export interface DeviceStatus {
  /** false once the session has left the registry */
  active: boolean;
  snapshot: SessionSnapshot;
}

const TRANSPORT_EVENTS = ['connected', 'disconnected', 'dataReceived'] as const satisfies ReadonlyArray<keyof TransportEvents>;

const ENGINE_EVENTS = [
  'shareableConfigReady',
  'sampleUpdated',
  'convergenceChanged',
  'objectRemoved',
  'sessionInvalidated',
] as const satisfies ReadonlyArray<keyof RangingEngineEvents>;

type TransportHandlers = { [E in keyof TransportEvents]: EventHandler<TransportEvents[E]> };
type EngineHandlers = { [E in keyof RangingEngineEvents]: EventHandler<RangingEngineEvents[E]> };

export class UwbRangingService extends TypedEventEmitter<RegistryEvents> {
  private readonly transport: ITransport;
  private readonly engine: IRangingEngine;
  private readonly registry: SessionRegistry;

  private readonly pendingDisconnects = new Set<Promise<void>>();
  private running = false;

  private readonly transportHandlers: TransportHandlers = {
    connected: identity => {
      this.registry.onConnected(identity);
    },
    disconnected: ({ deviceId, reason }) => {
      if (reason) log.info(`Transport dropped ${deviceId}: ${reason}`);
      this.registry.onDisconnected(deviceId);
    },
    dataReceived: ({ deviceId, bytes }) => {
      void this.registry.onMessage(deviceId, bytes);
    },
  };

  private readonly engineHandlers: EngineHandlers = {
    shareableConfigReady: ({ deviceId, sessionToken, config }) => {
      void this.registry.onShareableConfig(deviceId, sessionToken, config);
    },
    sampleUpdated: ({ deviceId, sample }) => {
      void this.registry.onRangingSample(deviceId, sample);
    },
    convergenceChanged: ({ deviceId, sessionToken, status }) => {
      void this.registry.onRangingConvergence(deviceId, sessionToken, status);
    },
    objectRemoved: ({ deviceId, sessionToken, reason }) => {
      void this.registry.onObjectRemoved(deviceId, sessionToken, reason);
    },
    sessionInvalidated: ({ deviceId, sessionToken, reason }) => {
      void this.registry.onSessionInvalidated(deviceId, sessionToken, reason);
    },
  };

  constructor(options: UwbRangingServiceOptions) {
    super();
    this.transport = options.transport;
    this.engine = options.engine;

    const { transport, engine, heading, enhancement } = options;
    const ports: SessionPorts = {
      send: (deviceId, bytes) => transport.send(deviceId, bytes),
      createRangingConfiguration: (deviceId, payload) => engine.createRangingConfiguration(deviceId, payload),
      runRangingSession: (deviceId, descriptor, discoveryToken) =>
        engine.runRangingSession(deviceId, descriptor, discoveryToken),
      invalidateSession: sessionToken => engine.invalidateSession(sessionToken),
      currentHeadingDegrees: () => heading?.currentHeadingDegrees() ?? null,
      attachEnhancement: (deviceId, sessionToken) =>
        enhancement ? enhancement.attach(deviceId, sessionToken) : Promise.resolve(false),
      detachEnhancement: deviceId => enhancement?.detach(deviceId),
      releaseEnhancements: () => enhancement?.releaseAll(),
    };

    this.registry = new SessionRegistry({
      ports,
      capability: engine.capability,
      settings: options.settings,
      now: options.now,
    });

    this.registry.on('sessionStateChanged', change => this.emit('sessionStateChanged', change));
    this.registry.on('readingUpdated', update => this.emit('readingUpdated', update));
    this.registry.on('sessionTerminated', termination => this.handleTermination(termination));
  }

  protected onHandlerError(event: string, error: unknown): void {
    log.error(`Listener for ${event} threw:`, error);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Subscribe to transport and engine events
   */
  start(): void {
    if (this.running) return;
    this.running = true;

    for (const event of TRANSPORT_EVENTS) {
      this.subscribeTransport(event);
    }
    for (const event of ENGINE_EVENTS) {
      this.subscribeEngine(event);
    }

    log.info(`Ranging service started (capability: ${this.engine.capability})`);
  }

  /**
   * Terminate every session, close their links and stop listening
   */
  async shutdown(): Promise<void> {
    if (!this.running) return;

    log.info(`Shutting down ${this.registry.size} session(s)`);
    this.registry.clear(TerminationCause.SHUTDOWN);
    await this.flushDisconnects();

    for (const event of TRANSPORT_EVENTS) {
      this.unsubscribeTransport(event);
    }
    for (const event of ENGINE_EVENTS) {
      this.unsubscribeEngine(event);
    }
    this.running = false;
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Commands
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Ask the transport to connect; the session starts on its `connected` event
   */
  connect(identity: DeviceIdentity): Promise<void> {
    return this.transport.connect(identity);
  }

  /**
   * Send Stop to a ranging accessory. The session stays in STOPPING until the
   * accessory confirms; call requestDisconnect if it never does.
   */
  requestStop(deviceId: string): Promise<void> {
    return this.registry.requestStop(deviceId);
  }

  /**
   * @returns false if no session was held for the device
   */
  requestDisconnect(deviceId: string): boolean {
    return this.registry.requestDisconnect(deviceId);
  }

  enableEnhancement(deviceId: string): Promise<void> {
    return this.registry.attachEnhancement(deviceId);
  }

  disableEnhancement(deviceId: string): Promise<void> {
    return this.registry.detachEnhancement(deviceId);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────────

  allReadings(): ReadonlyMap<string, RangingReading> {
    return this.registry.allReadings();
  }

  getReading(deviceId: string): RangingReading | null {
    return this.registry.getReading(deviceId);
  }

  /**
   * Live session status, else the final snapshot of a terminated one
   */
  getStatus(deviceId: string): DeviceStatus | null {
    const live = this.registry.getSession(deviceId);
    if (live) return { active: true, snapshot: live };

    const terminated = this.registry.getTerminated(deviceId);
    return terminated ? { active: false, snapshot: terminated } : null;
  }

  listSessions(): SessionSnapshot[] {
    return this.registry.listSessions();
  }

  listStale(maxAgeMs: number, now: number = Date.now()): SessionSnapshot[] {
    return this.registry.listStale(now, maxAgeMs);
  }

  /**
   * Resolves once every session has processed its queued events and every
   * disconnect issued so far has settled
   */
  async whenIdle(): Promise<void> {
    await this.registry.whenIdle();
    await this.flushDisconnects();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private handleTermination(termination: SessionTermination): void {
    const { deviceId, cause } = termination;

    if (DISCONNECT_ON.has(cause)) {
      const pending = this.transport.disconnect(deviceId).catch(error => {
        log.warn(`Transport disconnect of ${deviceId} failed:`, error);
      });
      this.pendingDisconnects.add(pending);
      void pending.finally(() => this.pendingDisconnects.delete(pending));
    }

    this.emit('sessionTerminated', termination);
  }

  private async flushDisconnects(): Promise<void> {
    while (this.pendingDisconnects.size > 0) {
      await Promise.all(Array.from(this.pendingDisconnects));
    }
  }

  private subscribeTransport<E extends keyof TransportEvents>(event: E): void {
    this.transport.on(event, this.transportHandlers[event]);
  }

  private unsubscribeTransport<E extends keyof TransportEvents>(event: E): void {
    this.transport.off(event, this.transportHandlers[event]);
  }

  private subscribeEngine<E extends keyof RangingEngineEvents>(event: E): void {
    this.engine.on(event, this.engineHandlers[event]);
  }

  private unsubscribeEngine<E extends keyof RangingEngineEvents>(event: E): void {
    this.engine.off(event, this.engineHandlers[event]);
  }
}
