/**
 * UWB ranging hub
 * Accessory handshake, per-device session state machines and ranging math
 */

export * from './uwb-protocol';
export * from './ranging-math';
export * from './ranging-management';
export * from './ranging-bridge';
export * from './websocket-bridge';
export * from './simulation';
export { createLogger, configureLogging, getLogPath, parseLogLevel, toHex } from './shared/RangingLogger';
export type { LogLevel, LevelOption, LoggingOptions, RangingLog } from './shared/RangingLogger';
export { TypedEventEmitter } from './shared/TypedEventEmitter';
export type { EventHandler, EventSubscriber } from './shared/TypedEventEmitter';
