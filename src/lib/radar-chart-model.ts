/**
 * Radar chart model.
 *
 * Framework-agnostic owner of one chart's dataset, options and
 * cached axis calibration. Produces a per-frame layout for a
 * renderer and resolves pointer positions to highlights.
 */

import type {
  AxisOverride,
  AxisRange,
  ChartGeometry,
  HoleSpec,
  LabelMeasurer,
  LegendPosition,
  Point,
  RadarChartData,
  RadarHighlight,
  Rect,
  Size,
  WarningCallback,
} from "../types/radar";
import {
  AXIS_CONFIG,
  DATASET_PALETTE,
  HOLE_CONFIG,
  LEGEND_CONFIG,
  WEB_CONFIG,
  X_AXIS_CONFIG,
} from "../constants/radar";
import {
  EMPTY_AXIS_RANGE,
  axisRingValues,
  calibrate,
  dataExtent,
  scaleFactor,
} from "./radar/axis-calibrator";
import {
  entryAngleDegrees,
  outerRadius,
  polarOffset,
  pointForEntry,
  sliceAngleDegrees,
} from "./radar/slice-geometry";
import { angleForPoint, distanceToCenter, indexForAngle, normalizeAngle } from "./radar/angle-resolver";
import { clampSkipCount, innerLineHoleRadius, layoutWeb } from "./radar/web-grid";
import type { WebLayout } from "./radar/web-grid";
import { resolveHoleRadius } from "./radar/center-hole";
import {
  baseOffset,
  contentRectForFrame,
  estimateLabelSize,
  legendRect,
  rotatedSize,
} from "./radar/offsets";
import type { LegendInset } from "./radar/offsets";

/** Category label options. */
export interface XAxisOptions {
  readonly enabled: boolean;
  readonly labelsEnabled: boolean;
  readonly labelRotationDegrees: number;
  readonly fontPointSize: number;
}

/** Legend options. */
export interface LegendOptions {
  readonly enabled: boolean;
  readonly position: LegendPosition;
  readonly fontPointSize: number;
  readonly maxSizePercent: number;
}

/** Per-chart configuration; every field falls back to a default. */
export interface RadarChartOptions {
  readonly rotationDegrees?: number;
  /** Spokes skipped between two drawn spokes; clamped to >= 0 */
  readonly skipWebLineCount?: number;
  readonly drawWeb?: boolean;
  readonly webLineWidth?: number;
  readonly innerWebLineWidth?: number;
  readonly webColor?: string;
  readonly innerWebColor?: string;
  /** Opacity of the web, 0..1 */
  readonly webAlpha?: number;
  readonly drawHoleEnabled?: boolean;
  /** Hole radius as a fraction of the chart radius; not clamped */
  readonly holeRadiusPercent?: number;
  readonly holeColor?: string;
  readonly forcedAxisMinimum?: number;
  readonly forcedAxisMaximum?: number;
  /** Desired number of ring intervals */
  readonly axisLabelCount?: number;
  readonly xAxis?: Partial<XAxisOptions>;
  readonly legend?: Partial<LegendOptions>;
  /** Text measurement supplied by the host; defaults to an estimate */
  readonly measureLabel?: LabelMeasurer;
  /** Called when a recalculation leaves nothing to draw */
  readonly onWarning?: WarningCallback;
}

/** Options with every default applied. */
export interface ResolvedRadarChartOptions {
  readonly rotationDegrees: number;
  readonly skipWebLineCount: number;
  readonly drawWeb: boolean;
  readonly webLineWidth: number;
  readonly innerWebLineWidth: number;
  readonly webColor: string;
  readonly innerWebColor: string;
  readonly webAlpha: number;
  readonly drawHoleEnabled: boolean;
  readonly holeRadiusPercent: number;
  readonly holeColor: string;
  readonly axisOverride: AxisOverride;
  readonly axisLabelCount: number;
  readonly xAxis: XAxisOptions;
  readonly legend: LegendOptions;
  readonly measureLabel: LabelMeasurer;
  readonly onWarning: WarningCallback | null;
}

/** One drawn vertex of a dataset. */
export interface SeriesVertex {
  readonly index: number;
  readonly value: number;
  readonly point: Point;
}

/** Screen geometry of one visible dataset. */
export interface SeriesLayout {
  readonly dataSetIndex: number;
  readonly label: string;
  readonly color: string;
  readonly vertices: readonly SeriesVertex[];
}

/** Category label anchor. */
export interface CategoryLabelLayout {
  readonly index: number;
  readonly text: string;
  readonly position: Point;
}

/** Ring value label anchor. */
export interface AxisLabelLayout {
  readonly value: number;
  readonly position: Point;
}

/** One legend entry with its label measured in the legend font. */
export interface LegendEntryLayout {
  readonly label: string;
  readonly color: string;
  readonly size: Size;
}

/** Legend entry and band. */
export interface LegendLayout {
  readonly rect: Rect;
  readonly position: LegendPosition;
  readonly fontPointSize: number;
  readonly entries: readonly LegendEntryLayout[];
}

/** Everything a renderer needs to paint one frame. */
export interface RadarLayout extends ChartGeometry {
  readonly frame: Rect;
  readonly center: Point;
  readonly radius: number;
  readonly sliceAngle: number;
  readonly scale: number;
  readonly axisRange: AxisRange;
  readonly entryCount: number;
  readonly series: readonly SeriesLayout[];
  readonly web: WebLayout;
  readonly holeRadius: number | null;
  readonly webLineHoleRadius: number;
  readonly categoryLabels: readonly CategoryLabelLayout[];
  readonly axisLabels: readonly AxisLabelLayout[];
  readonly legend: LegendLayout | null;
}

/** Drawing capabilities supplied by the host. */
export interface RadarRenderer<T> {
  drawExtras(layout: RadarLayout): T;
  drawData(layout: RadarLayout): T;
  drawHighlighted(layout: RadarLayout, highlights: readonly RadarHighlight[]): T;
}

const EMPTY_DATA: RadarChartData = { labels: [], dataSets: [] };

/** Keep a forced bound only when it is a finite number. */
function finiteOrUndefined(value: number | undefined): number | undefined {
  return value !== undefined && Number.isFinite(value) ? value : undefined;
}

/** Apply defaults to chart options. */
export function resolveOptions(options: RadarChartOptions = {}): ResolvedRadarChartOptions {
  return {
    rotationDegrees: normalizeAngle(options.rotationDegrees ?? AXIS_CONFIG.rotationDegrees),
    skipWebLineCount: clampSkipCount(options.skipWebLineCount ?? WEB_CONFIG.skipLineCount),
    drawWeb: options.drawWeb ?? WEB_CONFIG.drawWeb,
    webLineWidth: options.webLineWidth ?? WEB_CONFIG.lineWidth,
    innerWebLineWidth: options.innerWebLineWidth ?? WEB_CONFIG.innerLineWidth,
    webColor: options.webColor ?? WEB_CONFIG.color,
    innerWebColor: options.innerWebColor ?? WEB_CONFIG.innerColor,
    webAlpha: options.webAlpha ?? WEB_CONFIG.alpha,
    drawHoleEnabled: options.drawHoleEnabled ?? HOLE_CONFIG.enabled,
    holeRadiusPercent: options.holeRadiusPercent ?? HOLE_CONFIG.radiusPercent,
    holeColor: options.holeColor ?? HOLE_CONFIG.color,
    axisOverride: {
      minimum: finiteOrUndefined(options.forcedAxisMinimum),
      maximum: finiteOrUndefined(options.forcedAxisMaximum),
    },
    axisLabelCount: options.axisLabelCount ?? AXIS_CONFIG.labelCount,
    xAxis: {
      enabled: options.xAxis?.enabled ?? X_AXIS_CONFIG.enabled,
      labelsEnabled: options.xAxis?.labelsEnabled ?? X_AXIS_CONFIG.labelsEnabled,
      labelRotationDegrees: options.xAxis?.labelRotationDegrees ?? X_AXIS_CONFIG.labelRotationDegrees,
      fontPointSize: options.xAxis?.fontPointSize ?? X_AXIS_CONFIG.fontPointSize,
    },
    legend: {
      enabled: options.legend?.enabled ?? LEGEND_CONFIG.enabled,
      position: options.legend?.position ?? LEGEND_CONFIG.position,
      fontPointSize: options.legend?.fontPointSize ?? LEGEND_CONFIG.fontPointSize,
      maxSizePercent: options.legend?.maxSizePercent ?? LEGEND_CONFIG.maxSizePercent,
    },
    measureLabel: options.measureLabel ?? estimateLabelSize,
    onWarning: options.onWarning ?? null,
  };
}

/** Colour of a dataset: its own, or the palette entry for its index. */
export function dataSetColor(data: RadarChartData, dataSetIndex: number): string {
  const own = data.dataSets[dataSetIndex]?.color;
  if (own) return own;
  return DATASET_PALETTE[dataSetIndex % DATASET_PALETTE.length] ?? WEB_CONFIG.color;
}

/**
 * Paint a frame in the chart's draw order.
 *
 * The web comes first (when enabled), then the data, then the
 * highlight (when there is one).
 *
 * @returns The renderer's results in draw order
 */
export function renderRadar<T>(
  renderer: RadarRenderer<T>,
  layout: RadarLayout,
  highlights: readonly RadarHighlight[],
  drawWeb: boolean,
): T[] {
  const output: T[] = [];
  if (drawWeb) {
    output.push(renderer.drawExtras(layout));
  }
  output.push(renderer.drawData(layout));
  if (highlights.length > 0) {
    output.push(renderer.drawHighlighted(layout, highlights));
  }
  return output;
}

/**
 * State of one radar chart.
 *
 * The axis range is cached and recomputed on every call to
 * notifyDataSetChanged(); everything else is derived on demand.
 * Instances are not safe to share between concurrent callers.
 */
export class RadarChartModel {
  private data: RadarChartData = EMPTY_DATA;
  private cachedAxisRange: AxisRange = EMPTY_AXIS_RANGE;
  private cachedRingValues: readonly number[] = [];
  private axisOverride: AxisOverride;
  private skipCount: number;
  private rotation: number;
  private lastWarning: string | null = null;
  private warningListener: WarningCallback | null;
  private revisionCount = 0;

  private readonly options: ResolvedRadarChartOptions;

  constructor(options: RadarChartOptions = {}, data?: RadarChartData) {
    this.options = resolveOptions(options);
    this.axisOverride = this.options.axisOverride;
    this.skipCount = this.options.skipWebLineCount;
    this.rotation = this.options.rotationDegrees;
    this.warningListener = this.options.onWarning;

    if (data) {
      this.setData(data);
    }
  }

  /** Resolved options this chart was created with. */
  get config(): ResolvedRadarChartOptions {
    return this.options;
  }

  /** Current dataset. */
  get chartData(): RadarChartData {
    return this.data;
  }

  /** Number of categories: the longest dataset's value count. */
  get entryCount(): number {
    return this.data.dataSets.reduce((count, dataSet) => Math.max(count, dataSet.values.length), 0);
  }

  /** Angular width of one slice, or 0 with no entries. */
  get sliceAngle(): number {
    return sliceAngleDegrees(this.entryCount);
  }

  /** Calibrated radial axis from the last recalculation. */
  get axisRange(): AxisRange {
    return this.cachedAxisRange;
  }

  /** Ring values from the last recalculation. */
  get ringValues(): readonly number[] {
    return this.cachedRingValues;
  }

  /** Message from the last recalculation that left nothing to draw. */
  get warning(): string | null {
    return this.lastWarning;
  }

  /** Increases on every recalculation and setter; layouts cached by an older value are stale. */
  get revision(): number {
    return this.revisionCount;
  }

  get skipWebLineCount(): number {
    return this.skipCount;
  }

  /** Negative counts clamp to 0. */
  set skipWebLineCount(count: number) {
    this.skipCount = clampSkipCount(count);
    this.revisionCount++;
  }

  get rotationDegrees(): number {
    return this.rotation;
  }

  set rotationDegrees(degrees: number) {
    this.rotation = normalizeAngle(degrees);
    this.revisionCount++;
  }

  get holeSpec(): HoleSpec {
    return { enabled: this.options.drawHoleEnabled, radiusPercent: this.options.holeRadiusPercent };
  }

  /** Radius of the bullet at the end of each web spoke. */
  get webLineHoleRadius(): number {
    return innerLineHoleRadius(this.options.webLineWidth);
  }

  /** Replace the dataset and recalibrate. */
  setData(data: RadarChartData): void {
    this.data = data;
    this.notifyDataSetChanged();
  }

  /** Replace the forced axis bounds and recalibrate. */
  setAxisOverride(override: AxisOverride): void {
    this.axisOverride = {
      minimum: finiteOrUndefined(override.minimum),
      maximum: finiteOrUndefined(override.maximum),
    };
    this.notifyDataSetChanged();
  }

  /**
   * Recompute the cached axis range and ring values.
   *
   * Call after mutating the dataset in place.
   */
  notifyDataSetChanged(): void {
    const extent = dataExtent(this.data);
    this.cachedAxisRange = calibrate(extent.min, extent.max, this.axisOverride);
    this.cachedRingValues = axisRingValues(this.cachedAxisRange, this.options.axisLabelCount);
    this.lastWarning = null;
    this.revisionCount++;

    const minimum = this.axisOverride.minimum ?? extent.min;
    const maximum = this.axisOverride.maximum ?? extent.max;
    if (this.entryCount === 0) {
      this.report("Chart has no entries; nothing is drawn");
    } else if (maximum < minimum) {
      this.report(`Axis maximum ${maximum} is below minimum ${minimum}; range collapsed`);
    } else if (this.cachedAxisRange.range === 0) {
      this.report("Axis range is empty; nothing is drawn");
    }
  }

  /** Replace the callback that receives warnings from later recalculations. */
  setWarningListener(listener: WarningCallback | null): void {
    this.warningListener = listener;
  }

  /** Category index for a screen angle, taking rotation into account. */
  indexForAngle(angleDegrees: number): number {
    return indexForAngle(angleDegrees, this.rotation, this.entryCount);
  }

  /**
   * Lay out one frame.
   *
   * @param size - Size of the drawing surface
   * @returns `null` when there is nothing to draw
   */
  computeLayout(size: Size): RadarLayout | null {
    const entryCount = this.entryCount;
    if (entryCount === 0) {
      return null;
    }

    const { xAxis } = this.options;
    const frame: Rect = { x: 0, y: 0, width: size.width, height: size.height };
    const labelWidth = xAxis.enabled && xAxis.labelsEnabled ? this.maxRotatedLabelWidth() : 0;
    const legend = this.legendInset();
    const contentRect = contentRectForFrame(frame, {
      baseOffset: baseOffset(xAxis.enabled, xAxis.labelsEnabled, labelWidth),
      legend: legend ?? undefined,
    });

    const scale = scaleFactor(contentRect, this.cachedAxisRange);
    if (scale === null || contentRect.width === 0 || contentRect.height === 0) {
      return null;
    }

    const axisRange = this.cachedAxisRange;
    const rotation = this.rotation;
    const sliceAngle = sliceAngleDegrees(entryCount);
    const radius = outerRadius({ contentRect, rotationDegrees: rotation });
    const center: Point = {
      x: contentRect.x + contentRect.width / 2,
      y: contentRect.y + contentRect.height / 2,
    };

    const series: SeriesLayout[] = [];
    this.data.dataSets.forEach((dataSet, dataSetIndex) => {
      if (dataSet.visible === false) return;
      const vertices: SeriesVertex[] = [];
      dataSet.values.forEach((value, index) => {
        if (!Number.isFinite(value)) return;
        vertices.push({
          index,
          value,
          point: pointForEntry(index, value, center, axisRange, scale, rotation, sliceAngle),
        });
      });
      series.push({
        dataSetIndex,
        label: dataSet.label,
        color: dataSetColor(this.data, dataSetIndex),
        vertices,
      });
    });

    const labelRadius = axisRange.range * scale + labelWidth / 2;
    const categoryLabels = xAxis.enabled && xAxis.labelsEnabled
      ? Array.from({ length: entryCount }, (_, index) => ({
          index,
          text: this.categoryLabel(index),
          position: polarOffset(center, labelRadius, entryAngleDegrees(index, sliceAngle, rotation)),
        }))
      : [];

    const axisLabels = this.cachedRingValues.map((value) => ({
      value,
      position: polarOffset(center, (value - axisRange.minimum) * scale, rotation),
    }));

    return {
      frame,
      contentRect,
      center,
      radius,
      rotationDegrees: rotation,
      sliceAngle,
      scale,
      axisRange,
      entryCount,
      series,
      web: layoutWeb({
        center,
        axisRange,
        scale,
        rotationDegrees: rotation,
        sliceAngle,
        entryCount,
        skipCount: this.skipCount,
        ringValues: this.cachedRingValues,
      }),
      holeRadius: resolveHoleRadius(this.holeSpec, radius),
      webLineHoleRadius: this.webLineHoleRadius,
      categoryLabels,
      axisLabels,
      legend: legend
        ? {
            rect: legendRect(frame, legend),
            position: legend.position,
            fontPointSize: legend.fontPointSize,
            entries: this.legendEntries(),
          }
        : null,
    };
  }

  /**
   * Resolve a pointer position to a highlighted value.
   *
   * Outside the chart radius nothing is highlighted. Inside, the
   * category comes from the pointer's angle, and among visible
   * datasets the one whose value is closest to the value under the
   * pointer wins; ties go to the lower dataset index.
   */
  highlightAt(layout: RadarLayout, point: Point): RadarHighlight | null {
    const distance = distanceToCenter(point, layout.center);
    if (distance > layout.radius) {
      return null;
    }

    const index = indexForAngle(angleForPoint(point, layout.center), layout.rotationDegrees, layout.entryCount);
    const valueAtPointer = distance / layout.scale + layout.axisRange.minimum;

    let best: RadarHighlight | null = null;
    let bestGap = Number.POSITIVE_INFINITY;

    for (const series of layout.series) {
      const vertex = series.vertices.find((candidate) => candidate.index === index);
      if (!vertex) continue;

      const gap = Math.abs(vertex.value - valueAtPointer);
      if (gap < bestGap) {
        bestGap = gap;
        best = {
          index,
          label: this.categoryLabel(index),
          dataSetIndex: series.dataSetIndex,
          dataSetLabel: series.label,
          value: vertex.value,
          point: vertex.point,
        };
      }
    }

    return best;
  }

  // --- Private Methods ---

  private categoryLabel(index: number): string {
    return this.data.labels[index] ?? String(index);
  }

  private maxRotatedLabelWidth(): number {
    const { fontPointSize, labelRotationDegrees } = this.options.xAxis;
    let width = 0;
    for (let i = 0; i < this.entryCount; i++) {
      const size = this.options.measureLabel(this.categoryLabel(i), fontPointSize);
      width = Math.max(width, rotatedSize(size, labelRotationDegrees).width);
    }
    return width;
  }

  private legendEntries(): LegendEntryLayout[] {
    const { legend, measureLabel } = this.options;
    return this.data.dataSets.map((dataSet, index) => ({
      label: dataSet.label,
      color: dataSetColor(this.data, index),
      size: measureLabel(dataSet.label, legend.fontPointSize),
    }));
  }

  /** Legend band measured as one row (top/bottom) or one column (left/right). */
  private legendInset(): LegendInset | null {
    const { legend, measureLabel } = this.options;
    if (!legend.enabled || this.data.dataSets.length === 0) {
      return null;
    }

    const sizes = this.data.dataSets.map((dataSet) => measureLabel(dataSet.label, legend.fontPointSize));
    const vertical = legend.position === "top" || legend.position === "bottom";
    const swatch = legend.fontPointSize * 2;
    const size = vertical
      ? Math.max(...sizes.map((labelSize) => labelSize.height))
      : Math.max(...sizes.map((labelSize) => labelSize.width)) + swatch;

    return {
      position: legend.position,
      size,
      fontPointSize: legend.fontPointSize,
      maxSizePercent: legend.maxSizePercent,
    };
  }

  private report(message: string): void {
    this.lastWarning = message;
    this.warningListener?.(message);
  }
}
