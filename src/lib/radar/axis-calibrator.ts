/**
 * Radial axis calibration.
 *
 * Turns the observed extrema of a dataset (or a forced override)
 * into the axis range every other geometry query scales against.
 */

import type { AxisOverride, AxisRange, RadarChartData, Rect } from "../../types/radar";

/** Observed extrema of a dataset. */
export interface DataExtent {
  readonly min: number;
  readonly max: number;
}

/** Axis range of a chart with no entries. */
export const EMPTY_AXIS_RANGE: AxisRange = { minimum: 0, maximum: 0, range: 0 };

/**
 * Build an axis range from two bounds.
 *
 * A maximum below the minimum collapses onto the minimum, leaving
 * an empty range.
 */
export function createAxisRange(minimum: number, maximum: number): AxisRange {
  const upper = maximum < minimum ? minimum : maximum;
  return { minimum, maximum: upper, range: upper - minimum };
}

/**
 * Minimum and maximum of every finite value across all datasets.
 *
 * @returns `{ min: 0, max: 0 }` when the data holds no finite value
 */
export function dataExtent(data: RadarChartData): DataExtent {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (const dataSet of data.dataSets) {
    for (const value of dataSet.values) {
      if (!Number.isFinite(value)) continue;
      if (value < min) min = value;
      if (value > max) max = value;
    }
  }

  if (min > max) {
    return { min: 0, max: 0 };
  }
  return { min, max };
}

/**
 * Calibrate the radial axis.
 *
 * @param datasetMin - Observed minimum across all series
 * @param datasetMax - Observed maximum across all series
 * @param override - Forced bounds; each one wins over the observed value
 */
export function calibrate(
  datasetMin: number,
  datasetMax: number,
  override: AxisOverride = {},
): AxisRange {
  const minimum = override.minimum ?? datasetMin;
  const maximum = override.maximum ?? datasetMax;
  return createAxisRange(minimum, maximum);
}

/**
 * Pixels per axis unit for a content rectangle.
 *
 * @returns `null` when the axis range is empty and nothing can be scaled
 */
export function scaleFactor(contentRect: Rect, axisRange: AxisRange): number | null {
  if (!(axisRange.range > 0) || !Number.isFinite(axisRange.range)) {
    return null;
  }
  return Math.min(contentRect.width, contentRect.height) / 2 / axisRange.range;
}

/** Round a raw step to 1, 2, 5 or 10 times a power of ten. */
function niceStep(rawStep: number): number {
  const magnitude = Math.pow(10, Math.floor(Math.log10(rawStep)));
  const normalized = rawStep / magnitude;

  let niceNorm: number;
  if (normalized <= 1) niceNorm = 1;
  else if (normalized <= 2) niceNorm = 2;
  else if (normalized <= 5) niceNorm = 5;
  else niceNorm = 10;

  return niceNorm * magnitude;
}

/**
 * Values at which concentric web rings and axis labels are drawn.
 *
 * Ring values are multiples of a "nice" step lying inside the axis
 * range, bounds included.
 *
 * @param labelCount - Desired number of intervals
 */
export function axisRingValues(axisRange: AxisRange, labelCount: number): number[] {
  if (!(axisRange.range > 0) || !Number.isFinite(axisRange.range) || labelCount <= 0) {
    return [];
  }

  const step = niceStep(axisRange.range / labelCount);
  const first = Math.ceil(axisRange.minimum / step) * step;
  const limit = axisRange.maximum + step * 1e-9;
  const values: number[] = [];

  for (let k = 0; first + k * step <= limit; k++) {
    // toPrecision strips accumulated binary noise such as 0.30000000000000004
    values.push(Number.parseFloat((first + k * step).toPrecision(12)));
  }

  return values;
}
