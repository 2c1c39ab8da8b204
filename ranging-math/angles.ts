/**
 * Angle helpers shared by the ranging math
 */

import { Vector3, VerticalEstimate } from './types';

const DEG_PER_RAD = 180 / Math.PI;

/** Converts radians to degrees. */
export function toDegrees(radians: number): number {
  return radians * DEG_PER_RAD;
}

/** Wraps an angle in degrees into (-180, 180]. */
export function normalizeAngleDeg(angle: number): number {
  let wrapped = angle % 360;
  if (wrapped <= -180) {
    wrapped += 360;
  } else if (wrapped > 180) {
    wrapped -= 360;
  }
  // Avoid handing out -0
  return wrapped === 0 ? 0 : wrapped;
}

/** Target azimuth relative to the host heading, in (-180, 180]. */
export function relativeBearing(azimuthDeg: number, headingDeg: number): number {
  return normalizeAngleDeg(azimuthDeg - headingDeg);
}

/** Unit direction in the horizontal plane for a horizontal angle. */
export function directionFromHorizontalAngle(angleRad: number): Vector3 {
  return { x: Math.sin(angleRad), y: 0, z: Math.cos(angleRad) };
}

/** Discrete elevation level for a vertical estimate; null when unknown. */
export function verticalEstimateLevel(estimate: VerticalEstimate): -1 | 0 | 1 | null {
  switch (estimate) {
    case VerticalEstimate.ABOVE:
      return 1;
    case VerticalEstimate.SAME:
      return 0;
    case VerticalEstimate.BELOW:
      return -1;
    case VerticalEstimate.UNKNOWN:
      return null;
  }
}

export function isFiniteVector(v: Vector3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}
