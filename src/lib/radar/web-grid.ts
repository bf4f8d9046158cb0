/**
 * Web (grid) planning: which spokes are drawn, and where spokes and
 * concentric rings end up on screen.
 */

import type { AxisRange, Point } from "../../types/radar";
import { pointForEntry } from "./slice-geometry";

/** A spoke from the centre to the outer edge. */
export interface WebSpoke {
  readonly index: number;
  readonly end: Point;
}

/** A concentric ring through every category at one axis value. */
export interface WebRing {
  readonly value: number;
  readonly vertices: readonly Point[];
}

/** Screen positions of the whole web. */
export interface WebLayout {
  readonly spokes: readonly WebSpoke[];
  readonly rings: readonly WebRing[];
}

/** Inputs for laying out the web of one frame. */
export interface WebLayoutInput {
  readonly center: Point;
  readonly axisRange: AxisRange;
  readonly scale: number;
  readonly rotationDegrees: number;
  readonly sliceAngle: number;
  readonly entryCount: number;
  readonly skipCount: number;
  readonly ringValues: readonly number[];
}

/**
 * Whether the spoke of a category is a candidate for drawing.
 *
 * With a skip count of k, every (k + 1)-th spoke is eligible.
 */
export function isSpokeEligible(index: number, skipCount: number): boolean {
  return skipCount === 0 || index % (skipCount + 1) === 0;
}

/** Clamp a requested skip count to a non-negative integer. */
export function clampSkipCount(count: number): number {
  if (!Number.isFinite(count)) {
    return 0;
  }
  return Math.max(0, Math.trunc(count));
}

/** Radius of the bullet drawn at the end of each web spoke. */
export function innerLineHoleRadius(webLineWidth: number): number {
  return webLineWidth * 3;
}

/** Indices of the spokes eligible for drawing. */
export function eligibleSpokes(entryCount: number, skipCount: number): number[] {
  const indices: number[] = [];
  for (let i = 0; i < entryCount; i++) {
    if (isSpokeEligible(i, skipCount)) {
      indices.push(i);
    }
  }
  return indices;
}

/**
 * Lay out spokes and rings.
 *
 * Spokes run to the axis maximum. Rings at or below the axis minimum
 * have no extent and are left out.
 */
export function layoutWeb(input: WebLayoutInput): WebLayout {
  const { center, axisRange, scale, rotationDegrees, sliceAngle, entryCount } = input;

  const spokes = eligibleSpokes(entryCount, input.skipCount).map((index) => ({
    index,
    end: pointForEntry(index, axisRange.maximum, center, axisRange, scale, rotationDegrees, sliceAngle),
  }));

  const rings = input.ringValues
    .filter((value) => value > axisRange.minimum)
    .map((value) => ({
      value,
      vertices: Array.from({ length: entryCount }, (_, index) =>
        pointForEntry(index, value, center, axisRange, scale, rotationDegrees, sliceAngle),
      ),
    }));

  return { spokes, rings };
}
