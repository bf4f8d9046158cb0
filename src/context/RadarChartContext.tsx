/**
 * React context for sharing one radar chart between components.
 *
 * Wraps the useRadarChart hook so the chart, the readout and the
 * shell can read the same model and highlight.
 */

import { createContext, useContext, type ReactNode } from "react";
import type { RadarChartData } from "../types/radar";
import type { RadarChartOptions } from "../lib/radar-chart-model";
import { useRadarChart } from "../hooks/useRadarChart";
import type { UseRadarChartResult } from "../hooks/useRadarChart";

/** Shape of the radar chart context value. */
export type RadarChartContextValue = UseRadarChartResult;

/** React context for radar chart state. */
export const RadarChartContext = createContext<RadarChartContextValue | null>(null);

/** Props for RadarChartProvider. */
interface RadarChartProviderProps {
  /** Child components to provide context to */
  readonly children: ReactNode;
  /** Categories and datasets */
  readonly data: RadarChartData;
  /** Chart options */
  readonly options?: RadarChartOptions;
}

/**
 * Provider component that owns a radar chart model.
 *
 * Wrap the chart and its companions with this component; they read
 * the shared state through useRadarChartContext.
 */
export function RadarChartProvider({
  children,
  data,
  options,
}: RadarChartProviderProps): React.ReactElement {
  const chartState = useRadarChart(data, options);

  return (
    <RadarChartContext.Provider value={chartState}>
      {children}
    </RadarChartContext.Provider>
  );
}

/**
 * Read the radar chart state from context.
 *
 * @returns Model, highlight state and warning
 */
export function useRadarChartContext(): RadarChartContextValue {
  const context = useContext(RadarChartContext);
  if (!context) {
    throw new Error("useRadarChartContext must be used within a RadarChartProvider");
  }
  return context;
}
