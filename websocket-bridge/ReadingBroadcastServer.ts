/**
 * Reading Broadcast Server
 *
 * Pushes the state and latest reading of every live session to WebSocket
 * clients. A full READINGS_UPDATE goes out on connect, on request,
 * debounced after state changes and readings, and at once on termination.
 */

import { WebSocketServer as WSServer, WebSocket as WSWebSocket, RawData } from 'ws';
import {
  getStateDisplayName,
  RegistryEvents,
  SessionSnapshot,
  RANGING_CONFIG,
} from '../ranging-management';
import { createLogger } from '../shared/RangingLogger';
import type { EventSubscriber } from '../shared/TypedEventEmitter';
import {
  BroadcastDevice,
  ClientMessageSchema,
  MESSAGE_TYPES,
  ReadingsUpdateMessage,
  ServerMessage,
} from './types/MessageTypes';

const log = createLogger('Broadcast');

/**
 * Anything that publishes registry events and can list live sessions
 * (UwbRangingService, SessionRegistry)
 */
export interface ReadingSource extends EventSubscriber<RegistryEvents> {
  listSessions(): SessionSnapshot[];
}

export interface BroadcastServerConfig {
  host: string;
  debounceMs: number;
  maxConnections: number;
}

const DEFAULT_CONFIG: BroadcastServerConfig = {
  host: '0.0.0.0',
  debounceMs: RANGING_CONFIG.broadcast.debounceMs,
  maxConnections: 10,
};

export class ReadingBroadcastServer {
  private server: WSServer | null = null;
  private clients = new Map<string, WSWebSocket>();
  private nextClientId = 1;
  private broadcastTimer: NodeJS.Timeout | null = null;
  private messagesSent = 0;

  private readonly config: BroadcastServerConfig;

  private readonly onChange = (): void => this.queueBroadcast();
  private readonly onTerminated = (): void => this.forceBroadcast();

  constructor(
    private readonly source: ReadingSource,
    config: Partial<BroadcastServerConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Start listening; port 0 picks a free port
   * @returns the bound port
   */
  async start(port: number): Promise<number> {
    if (this.server) {
      throw new Error('Broadcast server already running');
    }

    const server = new WSServer({
      host: this.config.host,
      port,
      maxPayload: 16 * 1024,
      perMessageDeflate: false,
    });
    this.server = server;

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('listening', () => resolve());
        server.once('error', reject);
      });
    } catch (error) {
      this.server = null;
      throw new Error(`Failed to start broadcast server: ${error instanceof Error ? error.message : String(error)}`);
    }

    server.on('connection', socket => this.handleConnection(socket));
    server.on('error', error => log.error('Server error:', error));

    this.source.on('sessionStateChanged', this.onChange);
    this.source.on('readingUpdated', this.onChange);
    this.source.on('sessionTerminated', this.onTerminated);

    const address = server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    log.info(`Broadcast server listening on ${this.config.host}:${boundPort}`);
    return boundPort;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    this.source.off('sessionStateChanged', this.onChange);
    this.source.off('readingUpdated', this.onChange);
    this.source.off('sessionTerminated', this.onTerminated);

    if (this.broadcastTimer) {
      clearTimeout(this.broadcastTimer);
      this.broadcastTimer = null;
    }

    for (const socket of this.clients.values()) {
      socket.close(1000, 'Server shutting down');
    }
    this.clients.clear();

    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    log.info('Broadcast server stopped');
  }

  get clientCount(): number {
    return this.clients.size;
  }

  get sentCount(): number {
    return this.messagesSent;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Broadcast System
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Queue a broadcast (debounced)
   */
  queueBroadcast(): void {
    if (!this.server || this.broadcastTimer !== null) return;
    this.broadcastTimer = setTimeout(() => this.flushBroadcast(), this.config.debounceMs);
  }

  /**
   * Broadcast now, dropping any queued one
   */
  forceBroadcast(): void {
    if (this.broadcastTimer) {
      clearTimeout(this.broadcastTimer);
      this.broadcastTimer = null;
    }
    this.flushBroadcast();
  }

  /**
   * Serialize every live session into a READINGS_UPDATE message
   */
  serializeReadings(): ReadingsUpdateMessage {
    const devices: BroadcastDevice[] = this.source.listSessions().map(snapshot => ({
      deviceId: snapshot.identity.id,
      name: snapshot.identity.name,
      state: snapshot.state,
      stateDisplayName: getStateDisplayName(snapshot.state),
      enhancement: snapshot.enhancement,
      error: snapshot.error ? { ...snapshot.error } : null,
      lastActivity: snapshot.lastActivity,
      reading: snapshot.lastReading,
    }));

    return {
      type: MESSAGE_TYPES.READINGS_UPDATE,
      timestamp: Date.now(),
      devices,
    };
  }

  private flushBroadcast(): void {
    this.broadcastTimer = null;
    if (this.clients.size === 0) return;

    const payload = JSON.stringify(this.serializeReadings());
    for (const [clientId, socket] of this.clients) {
      this.sendRaw(clientId, socket, payload);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Clients
  // ───────────────────────────────────────────────────────────────────────────

  private handleConnection(socket: WSWebSocket): void {
    if (this.clients.size >= this.config.maxConnections) {
      socket.close(1008, 'Server at maximum capacity');
      return;
    }

    const clientId = `client_${this.nextClientId++}`;
    this.clients.set(clientId, socket);
    log.info(`Client connected: ${clientId} (${this.clients.size} total)`);

    socket.on('message', data => this.handleMessage(clientId, socket, data));
    socket.on('close', code => {
      this.clients.delete(clientId);
      log.info(`Client disconnected: ${clientId} (${code})`);
    });
    socket.on('error', error => log.warn(`Socket error for ${clientId}:`, error));

    this.send(clientId, socket, this.serializeReadings());
  }

  private handleMessage(clientId: string, socket: WSWebSocket, data: RawData): void {
    let raw: unknown;
    try {
      raw = JSON.parse(rawDataToString(data));
    } catch {
      this.sendError(clientId, socket, 'Message is not valid JSON');
      return;
    }

    const parsed = ClientMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.sendError(clientId, socket, `Unsupported message: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case MESSAGE_TYPES.PING:
        this.send(clientId, socket, { type: MESSAGE_TYPES.PONG, timestamp: Date.now(), requestId: message.requestId });
        return;
      case MESSAGE_TYPES.GET_READINGS_REQUEST:
        this.send(clientId, socket, this.serializeReadings());
        return;
    }
  }

  private sendError(clientId: string, socket: WSWebSocket, error: string): void {
    this.send(clientId, socket, { type: MESSAGE_TYPES.ERROR, timestamp: Date.now(), error });
  }

  private send(clientId: string, socket: WSWebSocket, message: ServerMessage): void {
    this.sendRaw(clientId, socket, JSON.stringify(message));
  }

  private sendRaw(clientId: string, socket: WSWebSocket, payload: string): void {
    if (socket.readyState !== WSWebSocket.OPEN) return;
    try {
      socket.send(payload);
      this.messagesSent++;
    } catch (error) {
      log.error(`Failed to send to ${clientId}:`, error);
    }
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}
