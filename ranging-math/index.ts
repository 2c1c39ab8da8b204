/**
 * Ranging Math Module - samples to distance/azimuth/elevation readings
 */

export {
  computeReading,
  solveAngles,
  applyDistanceCalibration,
  applyAzimuthCalibration,
} from './RangingMath';

export {
  toDegrees,
  normalizeAngleDeg,
  relativeBearing,
  directionFromHorizontalAngle,
  verticalEstimateLevel,
  isFiniteVector,
} from './angles';

export {
  Capability,
  VerticalEstimate,
  CONVERGENCE_NOT_STARTED,
  NO_CALIBRATION,
} from './types';

export type {
  ConvergenceStatus,
  Vector3,
  RangingSample,
  ElevationSignal,
  RangingReading,
  Calibration,
  ReadingInput,
} from './types';
