/**
 * Transport Interface
 * Low-bandwidth control link to each accessory (BLE in production)
 */

import type { EventSubscriber } from '../../shared/TypedEventEmitter';
import type { DeviceIdentity, SendResult } from '../../ranging-management';

export interface TransportEvents {
  connected: DeviceIdentity;
  disconnected: { deviceId: string; reason?: string };
  dataReceived: { deviceId: string; bytes: Uint8Array };
}

export interface ITransport extends EventSubscriber<TransportEvents> {
  connect(identity: DeviceIdentity): Promise<void>;
  disconnect(deviceId: string): Promise<void>;
  /** Never rejects; failures come back as { success: false } */
  send(deviceId: string, bytes: Uint8Array): Promise<SendResult>;
}
