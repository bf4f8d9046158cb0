/**
 * SVG legend band for the radar chart.
 *
 * Lays the dataset entries out in the band the chart model reserved:
 * one row for top/bottom legends, one column for left/right.
 */

import type { LegendLayout } from "../../lib/radar-chart-model";

/** Props for the RadarLegend component. */
interface RadarLegendProps {
  /** Legend band and entries from the chart layout */
  readonly legend: LegendLayout;
}

/** Gap between the swatch and its label, and between entries, in font sizes. */
const ENTRY_GAP = 0.5;
const ENTRY_SPACING = 1.5;

/**
 * Dataset legend drawn inside the chart's SVG.
 *
 * Each entry is a square swatch in the dataset colour followed by
 * the dataset label, vertically centred in the band.
 */
export function RadarLegend({ legend }: RadarLegendProps): React.ReactElement {
  const { rect, fontPointSize, entries } = legend;
  const horizontal = legend.position === "top" || legend.position === "bottom";
  const swatch = fontPointSize;

  let cursor = horizontal ? rect.x + fontPointSize : rect.y + fontPointSize;

  const items = entries.map((entry, index) => {
    const x = horizontal ? cursor : rect.x + fontPointSize / 2;
    const y = horizontal ? rect.y + rect.height / 2 : cursor;
    cursor += horizontal
      ? swatch + fontPointSize * (ENTRY_GAP + ENTRY_SPACING) + entry.size.width
      : entry.size.height + fontPointSize * ENTRY_GAP;

    return (
      <g key={`${index}-${entry.label}`} data-legend-entry={entry.label}>
        <rect
          x={x}
          y={y - swatch / 2}
          width={swatch}
          height={swatch}
          rx={2}
          fill={entry.color}
        />
        <text
          x={x + swatch + fontPointSize * ENTRY_GAP}
          y={y}
          dominantBaseline="central"
          fill="#475569"
          style={{ fontSize: `${fontPointSize}px` }}
        >
          {entry.label}
        </text>
      </g>
    );
  });

  return (
    <g className="radar-legend" aria-label="Legend">
      {items}
    </g>
  );
}
