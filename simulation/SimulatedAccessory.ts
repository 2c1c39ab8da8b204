/**
 * Simulated Accessory
 * Speaks the accessory side of the control protocol over an InMemoryTransport.
 */

import {
  AccessoryMessage,
  ControlMessageKind,
  MESSAGE_TAGS,
  MessageCodec,
  Messages,
} from '../uwb-protocol';
import type { DeviceIdentity } from '../ranging-management';
import { createLogger, toHex } from '../shared/RangingLogger';
import type { LinkEndpoint } from './InMemoryTransport';

const log = createLogger('Simulation');

/**
 * How the accessory answers Initialize
 * - valid: ConfigurationData with the configured payload
 * - empty: ConfigurationData tag without payload bytes
 * - garbage: an unknown tag
 * - silent: no answer at all
 */
export type ConfigReply = 'valid' | 'empty' | 'garbage' | 'silent';

export interface SimulatedAccessoryOptions {
  identity: DeviceIdentity;
  /** Accessory configuration blob sent in ConfigurationData */
  configPayload?: Uint8Array;
  /** Replies to the first Initialize messages, in order; 'valid' afterwards */
  configReplies?: ConfigReply[];
  /** Whether ConfigureAndStart is answered with RangingStarted */
  autoStart?: boolean;
}

export type AccessoryState = 'offline' | 'idle' | 'configured' | 'ranging';

const DEFAULT_CONFIG_PAYLOAD = Uint8Array.of(0x55, 0x57, 0x42, 0x01, 0x00, 0x10);

export class SimulatedAccessory implements LinkEndpoint {
  readonly identity: DeviceIdentity;

  private readonly configPayload: Uint8Array;
  private readonly configReplies: ConfigReply[];
  private readonly autoStart: boolean;

  private reply: ((bytes: Uint8Array) => void) | null = null;
  private state: AccessoryState = 'offline';
  private initializeCount = 0;
  private received: ControlMessageKind[] = [];
  private lastShareableConfig: Uint8Array | null = null;

  constructor(options: SimulatedAccessoryOptions) {
    this.identity = options.identity;
    this.configPayload = options.configPayload ?? DEFAULT_CONFIG_PAYLOAD;
    this.configReplies = [...(options.configReplies ?? [])];
    this.autoStart = options.autoStart ?? true;
  }

  get currentState(): AccessoryState {
    return this.state;
  }

  /** Host messages received so far, in order */
  get receivedKinds(): readonly ControlMessageKind[] {
    return this.received;
  }

  /** Payload of the last ConfigureAndStart */
  get shareableConfig(): Uint8Array | null {
    return this.lastShareableConfig;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Link callbacks
  // ───────────────────────────────────────────────────────────────────────────

  onLinkUp(reply: (bytes: Uint8Array) => void): void {
    this.reply = reply;
    this.state = 'idle';
  }

  onLinkDown(): void {
    this.reply = null;
    this.state = 'offline';
  }

  onHostBytes(bytes: Uint8Array): void {
    const result = MessageCodec.decode(bytes);
    if (!result.success) {
      log.warn(`[${this.identity.name}] Accessory could not decode ${toHex(bytes)}: ${result.error.message}`);
      return;
    }

    const message = result.message;
    this.received.push(message.kind);

    switch (message.kind) {
      case ControlMessageKind.INITIALIZE:
        this.state = 'idle';
        this.answerInitialize();
        return;

      case ControlMessageKind.CONFIGURE_AND_START:
        this.lastShareableConfig = message.payload;
        this.state = 'configured';
        if (this.autoStart) this.startRanging();
        return;

      case ControlMessageKind.STOP:
        this.state = 'idle';
        this.send(Messages.rangingStopped());
        return;

      default:
        log.warn(`[${this.identity.name}] Accessory ignoring ${MessageCodec.describe(message)}`);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Scripted behavior
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Report RangingStarted (used with autoStart off)
   */
  startRanging(): void {
    this.state = 'ranging';
    this.send(Messages.rangingStarted());
  }

  /**
   * Stop ranging without being asked
   */
  stopUnexpectedly(): void {
    this.state = 'idle';
    this.send(Messages.rangingStopped());
  }

  /**
   * Push raw bytes to the host
   */
  sendRaw(bytes: Uint8Array): void {
    this.reply?.(bytes);
  }

  private answerInitialize(): void {
    this.initializeCount++;
    const behavior = this.configReplies.shift() ?? 'valid';

    switch (behavior) {
      case 'valid':
        this.send(Messages.configurationData(this.configPayload));
        return;
      case 'empty':
        this.sendRaw(Uint8Array.of(MESSAGE_TAGS.CONFIGURATION_DATA));
        return;
      case 'garbage':
        this.sendRaw(Uint8Array.of(0xff, 0x00));
        return;
      case 'silent':
        log.info(`[${this.identity.name}] Accessory ignoring Initialize #${this.initializeCount}`);
        return;
    }
  }

  private send(message: AccessoryMessage): void {
    this.sendRaw(MessageCodec.encode(message));
  }
}
