/**
 * SVG radar ("spider-web") chart.
 *
 * Paints the layout produced by RadarChartModel through a renderer
 * with the drawExtras / drawData / drawHighlighted capabilities, and
 * turns mouse positions into highlights.
 */

import { useMemo } from "react";
import type { MouseEvent } from "react";
import type { RadarHighlight } from "../../types/radar";
import { renderRadar } from "../../lib/radar-chart-model";
import type {
  RadarChartModel,
  RadarLayout,
  RadarRenderer,
  ResolvedRadarChartOptions,
} from "../../lib/radar-chart-model";
import { AXIS_CONFIG, DATA_FILL_OPACITY, X_AXIS_CONFIG } from "../../constants/radar";
import { RadarLegend } from "./RadarLegend";
import { clientToChartPoint, formatAxisValue, toPointString } from "./RadarUtils";

/** Props for the RadarChart component. */
interface RadarChartProps {
  /** Chart state: data, options and calibration */
  readonly model: RadarChartModel;
  /** Width of the SVG viewBox */
  readonly width: number;
  /** Height of the SVG viewBox */
  readonly height: number;
  /** Currently highlighted value, if any */
  readonly highlight?: RadarHighlight | null;
  /** Called with the value under the pointer, or null when there is none */
  readonly onHighlight?: (highlight: RadarHighlight | null) => void;
  /** Replaces the default SVG renderer */
  readonly renderer?: RadarRenderer<React.ReactElement>;
  /** Accessible name of the chart */
  readonly title?: string;
  /** Shown instead of the chart when there is nothing to draw */
  readonly emptyMessage?: string;
}

/**
 * Build the default SVG renderer for a chart's options.
 *
 * The web layer holds rings, spokes, spoke-end bullets and the
 * centre hole; the data layer one filled polygon per dataset; the
 * highlight layer a spoke and ring marker per highlighted vertex.
 */
export function createSvgRenderer(
  config: ResolvedRadarChartOptions,
): RadarRenderer<React.ReactElement> {
  return {
    drawExtras(layout: RadarLayout): React.ReactElement {
      const { center, web } = layout;
      return (
        <g key="web" data-layer="web" opacity={config.webAlpha}>
          {web.rings.map((ring) => (
            <polygon
              key={`ring-${ring.value}`}
              data-ring={ring.value}
              points={toPointString(ring.vertices)}
              fill="none"
              stroke={config.innerWebColor}
              strokeWidth={config.innerWebLineWidth}
            />
          ))}
          {web.spokes.map((spoke) => (
            <g key={`spoke-${spoke.index}`} data-spoke={spoke.index}>
              <line
                x1={center.x}
                y1={center.y}
                x2={spoke.end.x}
                y2={spoke.end.y}
                stroke={config.webColor}
                strokeWidth={config.webLineWidth}
              />
              <circle
                cx={spoke.end.x}
                cy={spoke.end.y}
                r={layout.webLineHoleRadius}
                fill="none"
                stroke={config.webColor}
                strokeWidth={config.webLineWidth}
              />
            </g>
          ))}
          {layout.holeRadius !== null && (
            <circle
              data-hole
              cx={center.x}
              cy={center.y}
              r={layout.holeRadius}
              fill={config.holeColor}
            />
          )}
        </g>
      );
    },

    drawData(layout: RadarLayout): React.ReactElement {
      return (
        <g key="data" data-layer="data">
          {layout.series.map((series) => (
            <g key={series.dataSetIndex} data-series={series.label}>
              <polygon
                points={toPointString(series.vertices.map((vertex) => vertex.point))}
                fill={series.color}
                fillOpacity={DATA_FILL_OPACITY}
                stroke={series.color}
                strokeWidth={2}
                strokeLinejoin="round"
              />
              {series.vertices.map((vertex) => (
                <circle
                  key={vertex.index}
                  cx={vertex.point.x}
                  cy={vertex.point.y}
                  r={2.5}
                  fill={series.color}
                />
              ))}
            </g>
          ))}
        </g>
      );
    },

    drawHighlighted(layout: RadarLayout, highlights: readonly RadarHighlight[]): React.ReactElement {
      return (
        <g key="highlight" data-layer="highlight" pointerEvents="none">
          {highlights.map((highlight) => (
            <g key={`${highlight.dataSetIndex}-${highlight.index}`} data-highlight={highlight.index}>
              <line
                x1={layout.center.x}
                y1={layout.center.y}
                x2={highlight.point.x}
                y2={highlight.point.y}
                stroke="#0f172a"
                strokeOpacity={0.5}
                strokeDasharray="3 3"
              />
              <circle
                cx={highlight.point.x}
                cy={highlight.point.y}
                r={layout.webLineHoleRadius}
                fill="#ffffff"
                stroke="#0f172a"
                strokeWidth={2}
              />
            </g>
          ))}
        </g>
      );
    },
  };
}

/**
 * Radar chart rendered as a single SVG.
 *
 * Moving or clicking the mouse reports the value under the pointer
 * through onHighlight; leaving the chart clears it.
 */
export function RadarChart({
  model,
  width,
  height,
  highlight = null,
  onHighlight,
  renderer,
  title = "Radar chart",
  emptyMessage = "No data to display",
}: RadarChartProps): React.ReactElement {
  // The model mutates in place; its revision marks a stale layout
  const revision = model.revision;
  const layout = useMemo(
    () => model.computeLayout({ width, height }),
    [model, revision, width, height],
  );
  const activeRenderer = useMemo(
    () => renderer ?? createSvgRenderer(model.config),
    [renderer, model],
  );

  if (layout === null) {
    return (
      <div className="glass-card p-4 flex items-center justify-center" role="status">
        <span className="text-sm text-chart-muted">{emptyMessage}</span>
      </div>
    );
  }

  const handlePointer = (event: MouseEvent<SVGSVGElement>): void => {
    if (!onHighlight) return;
    const point = clientToChartPoint(
      event.clientX,
      event.clientY,
      event.currentTarget.getBoundingClientRect(),
      { width, height },
    );
    onHighlight(model.highlightAt(layout, point));
  };

  const layers = renderRadar(
    activeRenderer,
    layout,
    highlight ? [highlight] : [],
    model.config.drawWeb,
  );

  return (
    <svg
      viewBox={`0 0 ${width} ${height}`}
      className="w-full h-auto select-none"
      role="img"
      aria-label={title}
      onMouseMove={handlePointer}
      onClick={handlePointer}
      onMouseLeave={() => onHighlight?.(null)}
    >
      {layers}

      {/* Ring values along the rotation axis */}
      {layout.axisLabels.map((label) => (
        <text
          key={`axis-${label.value}`}
          x={label.position.x + 4}
          y={label.position.y - 4}
          fill={AXIS_CONFIG.labelColor}
          style={{ fontSize: `${AXIS_CONFIG.fontPointSize}px` }}
        >
          {formatAxisValue(label.value)}
        </text>
      ))}

      {/* Category labels just outside the web */}
      {layout.categoryLabels.map((label) => (
        <text
          key={`category-${label.index}`}
          x={label.position.x}
          y={label.position.y}
          textAnchor="middle"
          dominantBaseline="central"
          fill={X_AXIS_CONFIG.labelColor}
          transform={
            model.config.xAxis.labelRotationDegrees !== 0
              ? `rotate(${model.config.xAxis.labelRotationDegrees} ${label.position.x} ${label.position.y})`
              : undefined
          }
          style={{ fontSize: `${model.config.xAxis.fontPointSize}px` }}
        >
          {label.text}
        </text>
      ))}

      {layout.legend && <RadarLegend legend={layout.legend} />}
    </svg>
  );
}
