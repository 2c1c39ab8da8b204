/**
 * Enhancement Provider Interface
 * Optional resource (e.g. camera assistance) that sharpens a running ranging
 * session. Failures here never affect ranging itself.
 */

export interface IEnhancementProvider {
  /** @returns false when the enhancement is unavailable */
  attach(deviceId: string, sessionToken: string): Promise<boolean>;
  detach(deviceId: string): void;
  /** Free every attached resource, e.g. when the engine runs out of sessions */
  releaseAll(): void;
}
