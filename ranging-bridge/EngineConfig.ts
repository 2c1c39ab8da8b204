/**
 * Engine Configuration
 * Defaults from RANGING_CONFIG, overridden by UWB_* and LOG_* environment variables
 */

import { z } from 'zod';
import { DEFAULT_SESSION_SETTINGS, RANGING_CONFIG, SessionSettings } from '../ranging-management';
import { LoggingOptions, parseLogLevel } from '../shared/RangingLogger';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface BroadcastSettings {
  /** WebSocket port for reading broadcasts; null keeps the server off */
  port: number | null;
  debounceMs: number;
}

export interface EngineConfig {
  session: SessionSettings;
  broadcast: BroadcastSettings;
  logging: LoggingOptions;
}

export type EnvSource = Record<string, string | undefined>;

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

// Unset and empty variables both mean "use the default"
function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === '' ? undefined : value), schema.optional());
}

const delayMs = z.coerce.number().int().min(0);
const positiveCount = z.coerce.number().int().min(1);
const logLevel = z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly', 'off', 'false']);
const flag = z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1');

export const EngineEnvSchema = z.object({
  UWB_MAX_CONFIG_ATTEMPTS: optionalEnv(positiveCount),
  UWB_MAX_HANDSHAKE_CYCLES: optionalEnv(positiveCount),
  UWB_CONFIG_RETRY_DELAY_MS: optionalEnv(delayMs),
  UWB_INVALID_CONFIG_RETRY_DELAY_MS: optionalEnv(delayMs),
  UWB_RELEASE_RETRY_DELAY_MS: optionalEnv(delayMs),
  UWB_HANDSHAKE_TIMEOUT_MS: optionalEnv(z.coerce.number().int().min(1)),
  UWB_ENHANCEMENT_ATTACH_DELAY_MS: optionalEnv(delayMs),
  UWB_ENHANCEMENT_AUTO_ATTACH: optionalEnv(flag),
  UWB_AZIMUTH_OFFSET_DEG: optionalEnv(z.coerce.number().min(-180).max(180)),
  UWB_DISTANCE_OFFSET_M: optionalEnv(z.coerce.number().finite()),
  UWB_BROADCAST_PORT: optionalEnv(z.coerce.number().int().min(0).max(65535)),
  UWB_BROADCAST_DEBOUNCE_MS: optionalEnv(delayMs),
  LOG_LEVEL: optionalEnv(logLevel),
  LOG_FILE_LEVEL: optionalEnv(logLevel),
  LOG_DIR: optionalEnv(z.string()),
});

// ─────────────────────────────────────────────────────────────────────────────
// Loader
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build the engine configuration from environment variables
 * @throws ConfigValidationError listing every invalid variable
 */
export function loadEngineConfig(env: EnvSource = process.env): EngineConfig {
  const parsed = EngineEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const defaults = DEFAULT_SESSION_SETTINGS;
  const isTest = env.NODE_ENV === 'test';

  return {
    session: {
      maxConfigAttempts: vars.UWB_MAX_CONFIG_ATTEMPTS ?? defaults.maxConfigAttempts,
      maxHandshakeCycles: vars.UWB_MAX_HANDSHAKE_CYCLES ?? defaults.maxHandshakeCycles,
      configRetryDelayMs: vars.UWB_CONFIG_RETRY_DELAY_MS ?? defaults.configRetryDelayMs,
      invalidConfigRetryDelayMs: vars.UWB_INVALID_CONFIG_RETRY_DELAY_MS ?? defaults.invalidConfigRetryDelayMs,
      releaseRetryDelayMs: vars.UWB_RELEASE_RETRY_DELAY_MS ?? defaults.releaseRetryDelayMs,
      handshakeTimeoutMs: vars.UWB_HANDSHAKE_TIMEOUT_MS ?? defaults.handshakeTimeoutMs,
      enhancementAttachDelayMs: vars.UWB_ENHANCEMENT_ATTACH_DELAY_MS ?? defaults.enhancementAttachDelayMs,
      autoAttachEnhancement: vars.UWB_ENHANCEMENT_AUTO_ATTACH ?? defaults.autoAttachEnhancement,
      calibration: {
        azimuthOffsetDeg: vars.UWB_AZIMUTH_OFFSET_DEG ?? defaults.calibration.azimuthOffsetDeg,
        distanceOffsetMeters: vars.UWB_DISTANCE_OFFSET_M ?? defaults.calibration.distanceOffsetMeters,
      },
    },
    broadcast: {
      port: vars.UWB_BROADCAST_PORT ?? null,
      debounceMs: vars.UWB_BROADCAST_DEBOUNCE_MS ?? RANGING_CONFIG.broadcast.debounceMs,
    },
    logging: {
      consoleLevel: parseLogLevel(vars.LOG_LEVEL, isTest ? 'warn' : 'info'),
      fileLevel: parseLogLevel(vars.LOG_FILE_LEVEL, false),
      fileDir: vars.LOG_DIR ?? null,
    },
  };
}
