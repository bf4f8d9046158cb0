import type { HoleSpec } from "../../types/radar";

/**
 * Radius of the centre cut-out.
 *
 * `radiusPercent` is not clamped; values above 1 give a hole larger
 * than the chart.
 */
export function holeRadius(outerRadius: number, radiusPercent: number): number {
  return outerRadius * radiusPercent;
}

/** Hole radius for a spec, or `null` when the hole is not drawn. */
export function resolveHoleRadius(spec: HoleSpec, outerRadius: number): number | null {
  return spec.enabled ? holeRadius(outerRadius, spec.radiusPercent) : null;
}
