/**
 * Ranging Bridge Module - service facade, collaborator interfaces and configuration
 */

export { UwbRangingService } from './UwbRangingService';
export type { UwbRangingServiceOptions, DeviceStatus } from './UwbRangingService';
export { loadEngineConfig, ConfigValidationError, EngineEnvSchema } from './EngineConfig';
export type { EngineConfig, BroadcastSettings, EnvSource } from './EngineConfig';

export type { ITransport, TransportEvents } from './interfaces/ITransport';
export type { IRangingEngine, RangingEngineEvents } from './interfaces/IRangingEngine';
export type { IHeadingProvider } from './interfaces/IHeadingProvider';
export type { IEnhancementProvider } from './interfaces/IEnhancementProvider';
