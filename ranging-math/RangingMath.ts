/**
 * Ranging Math
 *
 * Turns one raw ranging sample into a consumable reading. Pure: the previous
 * reading and the host heading come in through the input, nothing is cached.
 *
 * Branches, in order:
 * 1. FULL_DIRECTION with a direction vector → azimuth/elevation from the vector
 *    (used whatever the convergence state).
 * 2. HORIZONTAL_ANGLE_ONLY, converged, with a horizontal angle → synthetic
 *    horizontal vector, azimuth from the angle, discrete vertical elevation.
 * 3. Anything else → stale: angular fields carried from the previous reading,
 *    distance still refreshed.
 */

import {
  Calibration,
  Capability,
  ConvergenceStatus,
  ElevationSignal,
  RangingReading,
  RangingSample,
  ReadingInput,
  Vector3,
  VerticalEstimate,
} from './types';
import {
  directionFromHorizontalAngle,
  isFiniteVector,
  normalizeAngleDeg,
  relativeBearing,
  toDegrees,
  verticalEstimateLevel,
} from './angles';

interface AngularSolution {
  directionVector: Vector3;
  horizontalAngleRad: number | null;
  verticalEstimate: VerticalEstimate | null;
  azimuthDeg: number;
  elevation: ElevationSignal;
}

function finiteOrNull(value: number | undefined): number | null {
  return value !== undefined && Number.isFinite(value) ? value : null;
}

function solveFromVector(sample: RangingSample): AngularSolution | null {
  const vector = sample.directionVector;
  if (!vector || !isFiniteVector(vector)) return null;
  // A zero vector carries no direction
  if (vector.x === 0 && vector.y === 0 && vector.z === 0) return null;

  const azimuthDeg = toDegrees(Math.atan2(vector.x, vector.z));
  const elevationDeg = toDegrees(Math.atan2(vector.y, Math.hypot(vector.x, vector.z)));
  if (!Number.isFinite(azimuthDeg) || !Number.isFinite(elevationDeg)) return null;

  return {
    directionVector: { x: vector.x, y: vector.y, z: vector.z },
    horizontalAngleRad: finiteOrNull(sample.horizontalAngleRad),
    verticalEstimate: sample.verticalEstimate ?? null,
    azimuthDeg,
    elevation: { kind: 'angle', degrees: elevationDeg },
  };
}

function solveFromHorizontalAngle(
  sample: RangingSample,
  convergence: ConvergenceStatus
): AngularSolution | null {
  if (convergence.state !== 'converged') return null;
  const angle = finiteOrNull(sample.horizontalAngleRad);
  if (angle === null) return null;

  const azimuthDeg = toDegrees(angle);
  if (!Number.isFinite(azimuthDeg)) return null;

  const estimate = sample.verticalEstimate ?? VerticalEstimate.UNKNOWN;
  return {
    directionVector: directionFromHorizontalAngle(angle),
    horizontalAngleRad: angle,
    verticalEstimate: estimate,
    azimuthDeg,
    elevation: { kind: 'vertical', estimate, level: verticalEstimateLevel(estimate) },
  };
}

/**
 * Picks the angular branch for a device capability; null means no usable
 * angular data this cycle.
 */
export function solveAngles(
  sample: RangingSample,
  capability: Capability,
  convergence: ConvergenceStatus
): AngularSolution | null {
  switch (capability) {
    case Capability.FULL_DIRECTION:
      return solveFromVector(sample);
    case Capability.HORIZONTAL_ANGLE_ONLY:
      return solveFromHorizontalAngle(sample, convergence);
  }
}

/** Adds the distance offset, never going below zero. */
export function applyDistanceCalibration(distanceMeters: number, calibration: Calibration): number {
  return Math.max(0, distanceMeters + calibration.distanceOffsetMeters);
}

/** Adds the azimuth offset and re-wraps into (-180, 180]. */
export function applyAzimuthCalibration(azimuthDeg: number, calibration: Calibration): number {
  return normalizeAngleDeg(azimuthDeg + calibration.azimuthOffsetDeg);
}

export function computeReading(input: ReadingInput): RangingReading {
  const { sample, capability, convergence, calibration, previous, headingDeg, capturedAt } = input;

  const freshDistance = finiteOrNull(sample.distanceMeters);
  const distanceMeters = freshDistance !== null
    ? applyDistanceCalibration(Math.max(0, freshDistance), calibration)
    : previous?.distanceMeters ?? null;

  const solution = solveAngles(sample, capability, convergence);

  const angular = solution
    ? {
        directionVector: Object.freeze(solution.directionVector),
        horizontalAngleRad: solution.horizontalAngleRad,
        verticalEstimate: solution.verticalEstimate,
        azimuthDeg: applyAzimuthCalibration(solution.azimuthDeg, calibration),
        elevation: Object.freeze(solution.elevation),
      }
    : {
        directionVector: previous?.directionVector ?? null,
        horizontalAngleRad: previous?.horizontalAngleRad ?? null,
        verticalEstimate: previous?.verticalEstimate ?? null,
        azimuthDeg: previous?.azimuthDeg ?? null,
        elevation: previous?.elevation ?? null,
      };

  const bearing = angular.azimuthDeg !== null && headingDeg !== null && Number.isFinite(headingDeg)
    ? relativeBearing(angular.azimuthDeg, headingDeg)
    : null;

  return Object.freeze({
    distanceMeters,
    ...angular,
    relativeBearingDeg: bearing,
    isStale: solution === null,
    isValid: distanceMeters !== null,
    capturedAt,
  });
}
