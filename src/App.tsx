/**
 * Root application component for the radar chart demo.
 *
 * Wires sample skill profiles through the radar chart provider
 * into the chart shell, the SVG chart and the highlight readout.
 */

import { RadarChartProvider, useRadarChartContext } from "./context/RadarChartContext";
import type { RadarChartData } from "./types/radar";
import type { RadarChartOptions } from "./lib/radar-chart-model";
import { dataSetColor } from "./lib/radar-chart-model";
import { ChartShell } from "./components/layout/ChartShell";
import { RadarChart } from "./components/radar/RadarChart";
import { HighlightReadout } from "./components/status/HighlightReadout";

const SAMPLE_DATA: RadarChartData = {
  labels: ["Speed", "Power", "Agility", "Stamina", "Accuracy", "Defense"],
  dataSets: [
    { label: "Profile A", values: [72, 64, 88, 55, 91, 47] },
    { label: "Profile B", values: [58, 83, 61, 79, 66, 74] },
  ],
};

const CHART_OPTIONS: RadarChartOptions = {
  forcedAxisMinimum: 0,
  forcedAxisMaximum: 100,
  drawHoleEnabled: false,
  skipWebLineCount: 0,
};

const CHART_SIZE = 480;

/** Chart, readout and shell reading the shared chart state. */
function RadarDashboard(): React.ReactElement {
  const { model, highlight, setHighlight, warning } = useRadarChartContext();
  const color = highlight ? dataSetColor(model.chartData, highlight.dataSetIndex) : undefined;

  return (
    <ChartShell
      title="Profile comparison"
      description="Six attributes per profile on a shared 0–100 scale."
      warning={warning}
      footer={<HighlightReadout highlight={highlight} color={color} />}
    >
      <RadarChart
        model={model}
        width={CHART_SIZE}
        height={CHART_SIZE}
        highlight={highlight}
        onHighlight={setHighlight}
        title="Profile comparison radar chart"
      />
    </ChartShell>
  );
}

/**
 * Main application component.
 *
 * Provides the radar chart state to the dashboard.
 */
export default function App(): React.ReactElement {
  return (
    <RadarChartProvider data={SAMPLE_DATA} options={CHART_OPTIONS}>
      <RadarDashboard />
    </RadarChartProvider>
  );
}
