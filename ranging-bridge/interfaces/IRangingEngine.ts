/**
 * Ranging Engine Interface
 * The host's UWB ranging framework: turns accessory configuration into
 * ranging sessions and streams samples for them.
 */

import type { EventSubscriber } from '../../shared/TypedEventEmitter';
import type { Capability, ConvergenceStatus, RangingSample } from '../../ranging-math';
import type {
  ConfigResult,
  ObjectRemovalReason,
  RangingDescriptor,
  SessionInvalidationReason,
} from '../../ranging-management';

// Every engine event names the device and the engine session it belongs to
interface EngineEvent {
  deviceId: string;
  sessionToken: string;
}

export interface RangingEngineEvents {
  shareableConfigReady: EngineEvent & { config: Uint8Array };
  sampleUpdated: EngineEvent & { sample: RangingSample };
  convergenceChanged: EngineEvent & { status: ConvergenceStatus };
  objectRemoved: EngineEvent & { reason: ObjectRemovalReason };
  sessionInvalidated: EngineEvent & { reason: SessionInvalidationReason };
}

export interface IRangingEngine extends EventSubscriber<RangingEngineEvents> {
  /** Direction support of this host, fixed for the process lifetime */
  readonly capability: Capability;

  createRangingConfiguration(deviceId: string, payload: Uint8Array): Promise<ConfigResult>;
  /** Starts ranging for the descriptor; returns the engine session token */
  runRangingSession(deviceId: string, descriptor: RangingDescriptor, discoveryToken: string): string;
  invalidateSession(sessionToken: string): void;
}
