/**
 * React hook owning a radar chart model.
 *
 * Rebuilds the model whenever the data or the options change and
 * keeps the highlight state alongside it.
 */

import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import type { RadarChartData, RadarHighlight } from "../types/radar";
import { RadarChartModel } from "../lib/radar-chart-model";
import type { RadarChartOptions } from "../lib/radar-chart-model";

/** Return type of the useRadarChart hook. */
export interface UseRadarChartResult {
  /** Model for the current data and options */
  readonly model: RadarChartModel;
  /** Highlighted value, or null */
  readonly highlight: RadarHighlight | null;
  /** Update or clear the highlight */
  readonly setHighlight: (highlight: RadarHighlight | null) => void;
  /** Diagnostic from the last recalculation, or null */
  readonly warning: string | null;
}

/** A highlight and the model whose indices it refers to. */
interface HighlightState {
  readonly model: RadarChartModel;
  readonly highlight: RadarHighlight;
}

/**
 * Hook that builds a RadarChartModel for a dataset.
 *
 * Options are compared by value, so an inline object literal does
 * not rebuild the model on every render. `onWarning` is called after
 * commit, once per recalculation, and follows the latest callback.
 *
 * @param data - Categories and datasets; keep the reference stable
 * @param options - Chart options
 * @returns Model, highlight state and warning
 */
export function useRadarChart(
  data: RadarChartData,
  options: RadarChartOptions = {},
): UseRadarChartResult {
  const [highlightState, setHighlightState] = useState<HighlightState | null>(null);
  const reportedModel = useRef<RadarChartModel | null>(null);
  const optionsKey = JSON.stringify(options);
  const onWarning = options.onWarning ?? null;

  // Render may run more than once per commit; warnings wait for the effect
  const model = useMemo(
    () => new RadarChartModel({ ...options, onWarning: undefined }, data),
    [data, optionsKey],
  );

  useEffect(() => {
    model.setWarningListener(onWarning);
    if (reportedModel.current !== model) {
      reportedModel.current = model;
      if (model.warning !== null) {
        onWarning?.(model.warning);
      }
    }
  }, [model, onWarning]);

  const setHighlight = useCallback(
    (next: RadarHighlight | null) => {
      setHighlightState(next === null ? null : { model, highlight: next });
    },
    [model],
  );

  // A highlight from an older model has indices that no longer apply
  const highlight = highlightState?.model === model ? highlightState.highlight : null;

  return { model, highlight, setHighlight, warning: model.warning };
}
