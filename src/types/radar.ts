/**
 * Radar chart type definitions.
 *
 * Shared shapes for the geometry core, the chart model and the
 * SVG renderer. All coordinates are in the chart's local SVG space
 * (origin top-left, +y down).
 */

/** Point in 2D space. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Axis-aligned rectangle. */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/** Width and height of a drawing surface or a label. */
export interface Size {
  readonly width: number;
  readonly height: number;
}

/** Calibrated extent of the radial (value) axis. */
export interface AxisRange {
  readonly minimum: number;
  readonly maximum: number;
  /** Always `maximum - minimum`, never negative */
  readonly range: number;
}

/** Manual override of the calibrated axis bounds. */
export interface AxisOverride {
  readonly minimum?: number;
  readonly maximum?: number;
}

/** Layout inputs shared by every geometry query of one frame. */
export interface ChartGeometry {
  readonly contentRect: Rect;
  readonly rotationDegrees: number;
}

/** Optional circular cut-out at the chart's centre. */
export interface HoleSpec {
  readonly enabled: boolean;
  /** Fraction of the outer radius; not clamped */
  readonly radiusPercent: number;
}

/** One overlaid series: a value per category. */
export interface RadarDataSet {
  readonly label: string;
  readonly values: readonly number[];
  /** Stroke/fill colour; falls back to the default palette */
  readonly color?: string;
  /** Hidden datasets still count for calibration but are not drawn */
  readonly visible?: boolean;
}

/** Categories and their series. */
export interface RadarChartData {
  readonly labels: readonly string[];
  readonly dataSets: readonly RadarDataSet[];
}

/** Category and dataset selected by a pointer. */
export interface RadarHighlight {
  readonly index: number;
  readonly label: string;
  readonly dataSetIndex: number;
  readonly dataSetLabel: string;
  readonly value: number;
  /** Vertex of the highlighted value */
  readonly point: Point;
}

/** Side of the chart the legend occupies. */
export type LegendPosition = "top" | "bottom" | "left" | "right";

/** Measures a label in the host's font; returns its unrotated size. */
export type LabelMeasurer = (text: string, fontPointSize: number) => Size;

/** Callback invoked when the chart cannot draw its current state. */
export type WarningCallback = (message: string) => void;
