/**
 * Readout of the highlighted radar value.
 *
 * Compact pill showing which category and dataset the pointer is
 * on, with the value. Shows a hint while nothing is highlighted.
 */

import type { RadarHighlight } from "../../types/radar";
import { formatAxisValue } from "../radar/RadarUtils";

/** Props for the HighlightReadout component. */
interface HighlightReadoutProps {
  /** Highlighted value, or null */
  readonly highlight: RadarHighlight | null;
  /** Colour of the highlighted dataset's dot */
  readonly color?: string;
  /** Text shown when nothing is highlighted */
  readonly hint?: string;
}

export function HighlightReadout({
  highlight,
  color = "#94a3b8",
  hint = "Hover a category to inspect its values",
}: HighlightReadoutProps): React.ReactElement {
  if (highlight === null) {
    return (
      <div className="glass-card px-3 py-1.5 text-[11px] text-chart-muted" aria-live="polite">
        {hint}
      </div>
    );
  }

  return (
    <div
      className="glass-card px-3 py-1.5 flex items-center gap-2 animate-slide-in"
      aria-live="polite"
    >
      <span className="w-2 h-2 rounded-full" style={{ backgroundColor: color }} />
      <span className="text-[11px] font-medium text-chart-secondary tracking-wide">
        {highlight.label}
      </span>
      <span className="text-[11px] text-chart-muted">{highlight.dataSetLabel}</span>
      <span className="text-sm font-semibold tabular-nums text-chart-text">
        {formatAxisValue(highlight.value)}
      </span>
    </div>
  );
}
