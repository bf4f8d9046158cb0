/**
 * Radar chart defaults.
 *
 * Centralizes the configuration every chart starts from. Per-chart
 * overrides are passed as RadarChartOptions and merged on top.
 */

/** Web (grid) line defaults. */
export const WEB_CONFIG = {
  drawWeb: true,
  lineWidth: 1.5,
  innerLineWidth: 0.75,
  color: "#7a7a7a",
  innerColor: "#7a7a7a",
  alpha: 150 / 255,
  skipLineCount: 0,
} as const;

/** Centre hole defaults. */
export const HOLE_CONFIG = {
  enabled: true,
  radiusPercent: 0.5,
  color: "#ffffff",
} as const;

/** Radial axis defaults. */
export const AXIS_CONFIG = {
  /** Puts category 0 at the top of the chart */
  rotationDegrees: 270,
  labelCount: 5,
  fontPointSize: 9,
  labelColor: "#64748b",
} as const;

/** Category label defaults. */
export const X_AXIS_CONFIG = {
  enabled: true,
  labelsEnabled: true,
  labelRotationDegrees: 0,
  fontPointSize: 10,
  labelColor: "#334155",
} as const;

/** Legend defaults. */
export const LEGEND_CONFIG = {
  enabled: true,
  position: "bottom",
  fontPointSize: 11,
  maxSizePercent: 0.95,
} as const;

/** Layout constants used by the offset estimator. */
export const OFFSET_CONFIG = {
  /** Inset used when category labels are not drawn */
  baseFallback: 10,
  /** Legend inset per point of legend font size */
  legendPerPoint: 4,
  /** Average glyph advance as a fraction of the font size */
  glyphWidthRatio: 0.6,
  lineHeightRatio: 1.2,
} as const;

/** Dataset colours, cycled by dataset index. */
export const DATASET_PALETTE: readonly string[] = [
  "#06b6d4",
  "#f59e0b",
  "#22c55e",
  "#ef4444",
  "#8b5cf6",
  "#ec4899",
];

/** Opacity of the filled data polygons. */
export const DATA_FILL_OPACITY = 0.25;
