/**
 * In-Memory Transport
 * Control link to simulated accessories; bytes are delivered after the
 * sender's current job so replies never re-enter it.
 */

import type { ITransport, TransportEvents } from '../ranging-bridge/interfaces/ITransport';
import { DeviceIdentity, SendResult, TransportError } from '../ranging-management';
import { createLogger } from '../shared/RangingLogger';
import { TypedEventEmitter } from '../shared/TypedEventEmitter';
import { deliverLater } from './deliverLater';

const log = createLogger('Simulation');

/**
 * Accessory side of a link
 */
export interface LinkEndpoint {
  readonly identity: DeviceIdentity;
  /** Called when the host connects; `reply` sends bytes back to the host */
  onLinkUp(reply: (bytes: Uint8Array) => void): void;
  onLinkDown(): void;
  onHostBytes(bytes: Uint8Array): void;
}

export class InMemoryTransport extends TypedEventEmitter<TransportEvents> implements ITransport {
  private endpoints = new Map<string, LinkEndpoint>();
  private connected = new Set<string>();
  private failingSends = new Map<string, number>();
  private sentLog: Array<{ deviceId: string; bytes: Uint8Array }> = [];

  /**
   * Make an accessory reachable by `connect`
   */
  register(endpoint: LinkEndpoint): void {
    this.endpoints.set(endpoint.identity.id, endpoint);
  }

  async connect(identity: DeviceIdentity): Promise<void> {
    const endpoint = this.endpoints.get(identity.id);
    if (!endpoint) {
      throw new Error(`No simulated accessory registered for ${identity.id}`);
    }
    if (this.connected.has(identity.id)) return;

    this.connected.add(identity.id);
    endpoint.onLinkUp(bytes => this.deliverToHost(identity.id, bytes));
    log.info(`[${identity.name}] Link up`);
    this.emit('connected', identity);
  }

  async disconnect(deviceId: string): Promise<void> {
    this.dropLink(deviceId);
  }

  async send(deviceId: string, bytes: Uint8Array): Promise<SendResult> {
    const endpoint = this.endpoints.get(deviceId);
    if (!endpoint || !this.connected.has(deviceId)) {
      return { success: false, error: new TransportError(deviceId, 'not connected') };
    }

    const failures = this.failingSends.get(deviceId) ?? 0;
    if (failures > 0) {
      this.failingSends.set(deviceId, failures - 1);
      return { success: false, error: new TransportError(deviceId, 'simulated write failure') };
    }

    const copy = bytes.slice();
    this.sentLog.push({ deviceId, bytes: copy });
    deliverLater(`TX to ${deviceId}`, () => {
      if (this.connected.has(deviceId)) endpoint.onHostBytes(copy);
    });
    return { success: true };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Fault injection & inspection
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Link loss initiated by the accessory side
   */
  dropLink(deviceId: string, reason?: string): void {
    if (!this.connected.delete(deviceId)) return;
    this.endpoints.get(deviceId)?.onLinkDown();
    this.emit('disconnected', reason === undefined ? { deviceId } : { deviceId, reason });
  }

  /**
   * The next `count` sends to the device fail
   */
  failNextSends(deviceId: string, count = 1): void {
    this.failingSends.set(deviceId, count);
  }

  isConnected(deviceId: string): boolean {
    return this.connected.has(deviceId);
  }

  sent(deviceId: string): Uint8Array[] {
    return this.sentLog.filter(entry => entry.deviceId === deviceId).map(entry => entry.bytes);
  }

  private deliverToHost(deviceId: string, bytes: Uint8Array): void {
    const copy = bytes.slice();
    deliverLater(`RX from ${deviceId}`, () => {
      if (this.connected.has(deviceId)) this.emit('dataReceived', { deviceId, bytes: copy });
    });
  }
}
