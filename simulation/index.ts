/**
 * Simulation Module - in-process stand-ins for the radio, the accessory and the ranging engine
 */

export { InMemoryTransport } from './InMemoryTransport';
export type { LinkEndpoint } from './InMemoryTransport';
export { SimulatedAccessory } from './SimulatedAccessory';
export type { ConfigReply, AccessoryState, SimulatedAccessoryOptions } from './SimulatedAccessory';
export { SimulatedRangingEngine } from './SimulatedRangingEngine';
export type { SimulatedRangingEngineOptions, SimulatedEngineSession } from './SimulatedRangingEngine';
export { ManualHeadingProvider } from './ManualHeadingProvider';
export { SimulatedEnhancementProvider } from './SimulatedEnhancementProvider';
