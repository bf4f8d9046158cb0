/**
 * Pure helpers for SVG radar rendering.
 *
 * Turns layout points into SVG attribute strings and maps pointer
 * events back into chart coordinates.
 */

import type { Point, Size } from "../../types/radar";

/**
 * Convert points to an SVG `points` attribute.
 *
 * @param points - Polygon or polyline vertices
 * @returns Space-separated "x,y" pairs
 */
export function toPointString(points: readonly Point[]): string {
  return points.map((point) => `${formatCoordinate(point.x)},${formatCoordinate(point.y)}`).join(" ");
}

/** Round a coordinate to two decimals for compact markup. */
export function formatCoordinate(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/**
 * Format a number for display.
 *
 * @param value - Number to format
 * @param decimals - Decimal places (default 0)
 * @returns Formatted string
 */
export function formatNumber(value: number, decimals: number = 0): string {
  return value.toFixed(decimals);
}

/** Axis value label: integers as-is, fractions with one decimal. */
export function formatAxisValue(value: number): string {
  return formatNumber(value, Number.isInteger(value) ? 0 : 1);
}

/**
 * Map a client-space pointer position into the chart's viewBox.
 *
 * When the element has no rendered size (e.g. in a headless DOM)
 * the offset from its top-left corner is used unscaled.
 */
export function clientToChartPoint(
  clientX: number,
  clientY: number,
  bounds: Pick<DOMRect, "left" | "top" | "width" | "height">,
  viewBox: Size,
): Point {
  const scaleX = bounds.width > 0 ? viewBox.width / bounds.width : 1;
  const scaleY = bounds.height > 0 ? viewBox.height / bounds.height : 1;
  return {
    x: (clientX - bounds.left) * scaleX,
    y: (clientY - bounds.top) * scaleY,
  };
}
