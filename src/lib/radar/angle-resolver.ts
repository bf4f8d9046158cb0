/**
 * Inverse mapping from screen angles to category indices.
 */

import type { Point } from "../../types/radar";
import { sliceAngleDegrees } from "./slice-geometry";

const RAD_TO_DEG = 180 / Math.PI;

/**
 * Map any angle into [0, 360).
 *
 * Non-finite input maps to 0.
 */
export function normalizeAngle(degrees: number): number {
  if (!Number.isFinite(degrees)) {
    return 0;
  }
  const wrapped = degrees % 360;
  const positive = wrapped < 0 ? wrapped + 360 : wrapped;
  // -1e-15 + 360 rounds to 360; -0 must read as 0
  if (positive >= 360 || positive === 0) {
    return 0;
  }
  return positive;
}

/** Upper boundary used when resolving which slice an angle falls in. */
export function referenceAngle(index: number, sliceAngle: number): number {
  return sliceAngle * (index + 1) - sliceAngle / 2;
}

/**
 * Category index whose slice contains a screen angle.
 *
 * Returns the first index whose reference angle is strictly greater
 * than the rotation-adjusted angle, so a boundary angle belongs to
 * the next index. Angles past the last reference angle wrap to 0.
 *
 * @param absoluteAngleDegrees - Screen angle of the pointer
 * @param rotationDegrees - Chart rotation
 * @param entryCount - Number of categories
 * @returns `0` when there are no entries
 */
export function indexForAngle(
  absoluteAngleDegrees: number,
  rotationDegrees: number,
  entryCount: number,
): number {
  if (entryCount <= 0) {
    return 0;
  }

  const angle = normalizeAngle(absoluteAngleDegrees - rotationDegrees);
  const slice = sliceAngleDegrees(entryCount);

  for (let i = 0; i < entryCount; i++) {
    if (referenceAngle(i, slice) > angle) {
      return i;
    }
  }

  return 0;
}

/** Screen angle of a point around a centre, in [0, 360). */
export function angleForPoint(point: Point, center: Point): number {
  return normalizeAngle(Math.atan2(point.y - center.y, point.x - center.x) * RAD_TO_DEG);
}

/** Euclidean distance between a point and the chart centre. */
export function distanceToCenter(point: Point, center: Point): number {
  return Math.hypot(point.x - center.x, point.y - center.y);
}
