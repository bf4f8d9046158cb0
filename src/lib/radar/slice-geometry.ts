/**
 * Forward mapping from (category index, value) to screen points.
 *
 * Angles are in degrees in screen space: 0° points right and angles
 * grow clockwise because +y points down. A rotation of 270° puts
 * category 0 at the top.
 */

import type { AxisRange, ChartGeometry, Point } from "../../types/radar";

const DEG_TO_RAD = Math.PI / 180;

/**
 * Angular width of one category slice.
 *
 * @returns `0` when there are no entries
 */
export function sliceAngleDegrees(entryCount: number): number {
  if (entryCount <= 0) {
    return 0;
  }
  return 360 / entryCount;
}

/** Outer radius of the chart: half the content rect's shorter side. */
export function outerRadius(geometry: ChartGeometry): number {
  return Math.min(geometry.contentRect.width, geometry.contentRect.height) / 2;
}

/** Absolute screen angle of a category's spoke. */
export function entryAngleDegrees(
  index: number,
  sliceAngle: number,
  rotationDegrees: number,
): number {
  return sliceAngle * index + rotationDegrees;
}

/** Distance from the centre at which a value is drawn. */
export function radiusForValue(value: number, axisRange: AxisRange, scale: number): number {
  return (value - axisRange.minimum) * scale;
}

/**
 * Move from a centre point by a distance along a screen angle.
 *
 * @param angleDegrees - 0 = right, clockwise
 */
export function polarOffset(center: Point, radius: number, angleDegrees: number): Point {
  const angleRad = angleDegrees * DEG_TO_RAD;
  return {
    x: center.x + radius * Math.cos(angleRad),
    y: center.y + radius * Math.sin(angleRad),
  };
}

/**
 * Screen point of a value on a category's spoke.
 *
 * @param index - Category index
 * @param value - Data value on the radial axis
 * @param center - Chart centre
 * @param axisRange - Calibrated radial axis
 * @param scale - Pixels per axis unit
 * @param rotationDegrees - Chart rotation
 * @param sliceAngle - Angular width of one slice
 */
export function pointForEntry(
  index: number,
  value: number,
  center: Point,
  axisRange: AxisRange,
  scale: number,
  rotationDegrees: number,
  sliceAngle: number,
): Point {
  const radius = radiusForValue(value, axisRange, scale);
  return polarOffset(center, radius, entryAngleDegrees(index, sliceAngle, rotationDegrees));
}
