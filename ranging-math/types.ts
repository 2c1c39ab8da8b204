/**
 * Ranging data types
 * Raw samples from the ranging engine and the readings derived from them
 */

/**
 * Direction support of the host's ranging hardware, detected once per process
 */
export enum Capability {
  FULL_DIRECTION = 'full_direction',
  HORIZONTAL_ANGLE_ONLY = 'horizontal_angle_only',
}

export enum VerticalEstimate {
  ABOVE = 'above',
  BELOW = 'below',
  SAME = 'same',
  UNKNOWN = 'unknown',
}

export type ConvergenceStatus =
  | { state: 'notStarted' }
  | { state: 'converging'; reasons: string[] }
  | { state: 'converged' };

export const CONVERGENCE_NOT_STARTED: ConvergenceStatus = Object.freeze({ state: 'notStarted' });

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/**
 * One ranging update as delivered by the ranging engine
 */
export interface RangingSample {
  /** Correlates the sample with the session that requested it */
  discoveryToken: string;
  distanceMeters?: number;
  directionVector?: Vector3;
  horizontalAngleRad?: number;
  verticalEstimate?: VerticalEstimate;
}

export type ElevationSignal =
  | { kind: 'angle'; degrees: number }
  | { kind: 'vertical'; estimate: VerticalEstimate; level: -1 | 0 | 1 | null };

export interface RangingReading {
  readonly distanceMeters: number | null;
  readonly directionVector: Readonly<Vector3> | null;
  readonly horizontalAngleRad: number | null;
  readonly verticalEstimate: VerticalEstimate | null;
  /** Degrees in (-180, 180]; null until angular data has been seen */
  readonly azimuthDeg: number | null;
  readonly elevation: ElevationSignal | null;
  /** Azimuth relative to the host heading, (-180, 180] */
  readonly relativeBearingDeg: number | null;
  /** No fresh angular data this cycle */
  readonly isStale: boolean;
  /** A distance is known */
  readonly isValid: boolean;
  readonly capturedAt: number;
}

export interface Calibration {
  azimuthOffsetDeg: number;
  distanceOffsetMeters: number;
}

export const NO_CALIBRATION: Calibration = Object.freeze({
  azimuthOffsetDeg: 0,
  distanceOffsetMeters: 0,
});

export interface ReadingInput {
  sample: RangingSample;
  capability: Capability;
  convergence: ConvergenceStatus;
  calibration: Calibration;
  /** Last published reading, carried into stale cycles */
  previous: RangingReading | null;
  /** Host heading in degrees, null when no heading is available */
  headingDeg: number | null;
  capturedAt: number;
}
