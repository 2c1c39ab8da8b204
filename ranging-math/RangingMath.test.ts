/**
 * Ranging Math Tests
 */

import { computeReading } from './RangingMath';
import {
  directionFromHorizontalAngle,
  normalizeAngleDeg,
  relativeBearing,
  verticalEstimateLevel,
} from './angles';
import {
  Capability,
  CONVERGENCE_NOT_STARTED,
  ConvergenceStatus,
  NO_CALIBRATION,
  RangingReading,
  RangingSample,
  ReadingInput,
  VerticalEstimate,
} from './types';

// ─────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────

const TOKEN = 'token-a';
const CONVERGED: ConvergenceStatus = { state: 'converged' };

function input(sample: Partial<RangingSample>, overrides: Partial<ReadingInput> = {}): ReadingInput {
  return {
    sample: { discoveryToken: TOKEN, ...sample },
    capability: Capability.FULL_DIRECTION,
    convergence: CONVERGENCE_NOT_STARTED,
    calibration: NO_CALIBRATION,
    previous: null,
    headingDeg: null,
    capturedAt: 1000,
    ...overrides,
  };
}

/** A fresh reading pointing 30° right of the host at 4 m */
function readingAt30(): RangingReading {
  const rad = (30 * Math.PI) / 180;
  return computeReading(input({
    distanceMeters: 4,
    directionVector: { x: Math.sin(rad), y: 0, z: Math.cos(rad) },
  }));
}

// ─────────────────────────────────────────────────────────────────
// Angle helpers
// ─────────────────────────────────────────────────────────────────

describe('normalizeAngleDeg', () => {
  test.each([
    [0, 0],
    [180, 180],
    [-180, 180],
    [190, -170],
    [-190, 170],
    [540, 180],
    [-360, 0],
    [725, 5],
  ])('%p wraps to %p', (angle, expected) => {
    expect(normalizeAngleDeg(angle)).toBe(expected);
  });
});

describe('relativeBearing', () => {
  test('subtracts the heading and wraps', () => {
    expect(relativeBearing(90, 120)).toBe(-30);
    expect(relativeBearing(-170, 20)).toBe(170);
  });
});

describe('verticalEstimateLevel', () => {
  test('maps each estimate to its level', () => {
    expect(verticalEstimateLevel(VerticalEstimate.ABOVE)).toBe(1);
    expect(verticalEstimateLevel(VerticalEstimate.SAME)).toBe(0);
    expect(verticalEstimateLevel(VerticalEstimate.BELOW)).toBe(-1);
    expect(verticalEstimateLevel(VerticalEstimate.UNKNOWN)).toBeNull();
  });
});

describe('directionFromHorizontalAngle', () => {
  test('lies in the horizontal plane', () => {
    const v = directionFromHorizontalAngle(Math.PI / 2);
    expect(v.x).toBeCloseTo(1, 10);
    expect(v.y).toBe(0);
    expect(v.z).toBeCloseTo(0, 10);
  });
});

// ─────────────────────────────────────────────────────────────────
// computeReading: full direction
// ─────────────────────────────────────────────────────────────────

describe('computeReading with full direction', () => {
  test('unit X vector gives 90° azimuth and 0° elevation', () => {
    const reading = computeReading(input({ distanceMeters: 2, directionVector: { x: 1, y: 0, z: 0 } }));

    expect(reading.azimuthDeg).toBeCloseTo(90, 10);
    expect(reading.elevation).toEqual({ kind: 'angle', degrees: 0 });
    expect(reading.distanceMeters).toBe(2);
    expect(reading.isStale).toBe(false);
    expect(reading.isValid).toBe(true);
    expect(reading.capturedAt).toBe(1000);
  });

  test('vector behind and left gives -135° azimuth', () => {
    const reading = computeReading(input({ directionVector: { x: -1, y: 0, z: -1 } }));
    expect(reading.azimuthDeg).toBeCloseTo(-135, 10);
  });

  test('elevation follows the vertical component', () => {
    const reading = computeReading(input({ directionVector: { x: 0, y: 1, z: 1 } }));
    expect(reading.azimuthDeg).toBe(0);
    expect(reading.elevation?.kind).toBe('angle');
    if (reading.elevation?.kind === 'angle') {
      expect(reading.elevation.degrees).toBeCloseTo(45, 10);
    }
  });

  test('vector is used regardless of convergence', () => {
    const reading = computeReading(input(
      { directionVector: { x: 1, y: 0, z: 0 } },
      { convergence: { state: 'converging', reasons: ['insufficientMovement'] } }
    ));
    expect(reading.isStale).toBe(false);
    expect(reading.azimuthDeg).toBeCloseTo(90, 10);
  });

  test('non-finite vector falls back to a stale reading', () => {
    const reading = computeReading(input({ distanceMeters: 1.5, directionVector: { x: NaN, y: 0, z: 1 } }));

    expect(reading.isStale).toBe(true);
    expect(reading.azimuthDeg).toBeNull();
    expect(reading.directionVector).toBeNull();
    expect(reading.distanceMeters).toBe(1.5);
    expect(reading.isValid).toBe(true);
  });

  test('zero vector carries no direction', () => {
    const reading = computeReading(input({ directionVector: { x: 0, y: 0, z: 0 } }));
    expect(reading.isStale).toBe(true);
    expect(reading.azimuthDeg).toBeNull();
  });

  test('readings are frozen', () => {
    const reading = computeReading(input({ directionVector: { x: 1, y: 0, z: 0 } }));
    expect(Object.isFrozen(reading)).toBe(true);
    expect(Object.isFrozen(reading.directionVector)).toBe(true);
  });
});

// ─────────────────────────────────────────────────────────────────
// computeReading: horizontal angle only
// ─────────────────────────────────────────────────────────────────

describe('computeReading with horizontal angle only', () => {
  test('converged angle produces a synthetic horizontal direction', () => {
    const reading = computeReading(input(
      { distanceMeters: 3, horizontalAngleRad: Math.PI / 2, verticalEstimate: VerticalEstimate.ABOVE },
      { capability: Capability.HORIZONTAL_ANGLE_ONLY, convergence: CONVERGED }
    ));

    expect(reading.isStale).toBe(false);
    expect(reading.azimuthDeg).toBeCloseTo(90, 10);
    expect(reading.directionVector?.x).toBeCloseTo(1, 10);
    expect(reading.directionVector?.y).toBe(0);
    expect(reading.elevation).toEqual({ kind: 'vertical', estimate: VerticalEstimate.ABOVE, level: 1 });
  });

  test('missing vertical estimate is reported as unknown', () => {
    const reading = computeReading(input(
      { horizontalAngleRad: 0 },
      { capability: Capability.HORIZONTAL_ANGLE_ONLY, convergence: CONVERGED }
    ));
    expect(reading.elevation).toEqual({ kind: 'vertical', estimate: VerticalEstimate.UNKNOWN, level: null });
  });

  test('before convergence the reading is stale, keeps the prior azimuth and refreshes distance', () => {
    const previous = readingAt30();
    const reading = computeReading(input(
      { distanceMeters: 3.5, horizontalAngleRad: 1.2 },
      { capability: Capability.HORIZONTAL_ANGLE_ONLY, previous }
    ));

    expect(reading.isStale).toBe(true);
    expect(reading.azimuthDeg).toBe(previous.azimuthDeg);
    expect(reading.elevation).toBe(previous.elevation);
    expect(reading.distanceMeters).toBe(3.5);
    expect(reading.isValid).toBe(true);
  });

  test('direction vector is ignored without full direction support', () => {
    const reading = computeReading(input(
      { directionVector: { x: 1, y: 0, z: 0 } },
      { capability: Capability.HORIZONTAL_ANGLE_ONLY, convergence: CONVERGED }
    ));
    expect(reading.isStale).toBe(true);
    expect(reading.azimuthDeg).toBeNull();
  });
});

// ─────────────────────────────────────────────────────────────────
// Distance, calibration and bearing
// ─────────────────────────────────────────────────────────────────

describe('computeReading distance handling', () => {
  test('non-finite distance is treated as absent', () => {
    const previous = readingAt30();
    const reading = computeReading(input({ distanceMeters: Infinity }, { previous }));
    expect(reading.distanceMeters).toBe(4);
  });

  test('no distance ever seen leaves the reading invalid', () => {
    const reading = computeReading(input({ directionVector: { x: 1, y: 0, z: 0 } }));
    expect(reading.distanceMeters).toBeNull();
    expect(reading.isValid).toBe(false);
    expect(reading.isStale).toBe(false);
  });
});

describe('computeReading calibration', () => {
  test('azimuth offset is added and re-wrapped', () => {
    const reading = computeReading(input(
      { directionVector: { x: 1, y: 0, z: 0 } },
      { calibration: { azimuthOffsetDeg: 100, distanceOffsetMeters: 0 } }
    ));
    expect(reading.azimuthDeg).toBeCloseTo(-170, 10);
  });

  test('distance offset is clamped at zero', () => {
    const reading = computeReading(input(
      { distanceMeters: 2 },
      { calibration: { azimuthOffsetDeg: 0, distanceOffsetMeters: -5 } }
    ));
    expect(reading.distanceMeters).toBe(0);
  });

  test('carried values are not calibrated again', () => {
    const previous = readingAt30();
    const reading = computeReading(input(
      {},
      { previous, calibration: { azimuthOffsetDeg: 10, distanceOffsetMeters: 1 } }
    ));
    expect(reading.azimuthDeg).toBe(previous.azimuthDeg);
    expect(reading.distanceMeters).toBe(4);
  });
});

describe('computeReading relative bearing', () => {
  test('is azimuth minus heading', () => {
    const reading = computeReading(input({ directionVector: { x: 1, y: 0, z: 0 } }, { headingDeg: 120 }));
    expect(reading.relativeBearingDeg).toBeCloseTo(-30, 10);
  });

  test('is null without a heading', () => {
    const reading = computeReading(input({ directionVector: { x: 1, y: 0, z: 0 } }));
    expect(reading.relativeBearingDeg).toBeNull();
  });

  test('uses the carried azimuth on stale cycles', () => {
    const previous = readingAt30();
    const reading = computeReading(input({}, { previous, headingDeg: 0 }));
    expect(reading.relativeBearingDeg).toBeCloseTo(30, 10);
  });
});
