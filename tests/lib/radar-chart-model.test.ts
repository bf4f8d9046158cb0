/**
 * Tests for the radar chart model.
 */

import { describe, it, expect, vi } from "vitest";
import {
  RadarChartModel,
  dataSetColor,
  renderRadar,
  resolveOptions,
} from "../../src/lib/radar-chart-model";
import type { RadarLayout, RadarRenderer } from "../../src/lib/radar-chart-model";
import type { RadarHighlight } from "../../src/types/radar";
import { DATA, PLAIN, SIZE } from "../fixtures/radar-data";

function layoutFor(model: RadarChartModel): RadarLayout {
  const layout = model.computeLayout(SIZE);
  if (layout === null) {
    throw new Error("expected a layout");
  }
  return layout;
}

describe("resolveOptions", () => {
  it("applies defaults", () => {
    const options = resolveOptions();
    expect(options.rotationDegrees).toBe(270);
    expect(options.skipWebLineCount).toBe(0);
    expect(options.drawWeb).toBe(true);
    expect(options.drawHoleEnabled).toBe(true);
    expect(options.holeRadiusPercent).toBe(0.5);
    expect(options.axisOverride).toEqual({ minimum: undefined, maximum: undefined });
    expect(options.legend.position).toBe("bottom");
    expect(options.onWarning).toBeNull();
  });

  it("normalizes rotation and clamps the skip count", () => {
    const options = resolveOptions({ rotationDegrees: -90, skipWebLineCount: -4 });
    expect(options.rotationDegrees).toBe(270);
    expect(options.skipWebLineCount).toBe(0);
  });

  it("drops non-finite forced bounds", () => {
    const options = resolveOptions({ forcedAxisMinimum: Number.NaN, forcedAxisMaximum: 10 });
    expect(options.axisOverride).toEqual({ minimum: undefined, maximum: 10 });
  });
});

describe("dataSetColor", () => {
  it("prefers the dataset's own colour", () => {
    const data = { labels: [], dataSets: [{ label: "X", values: [], color: "#123456" }] };
    expect(dataSetColor(data, 0)).toBe("#123456");
  });

  it("falls back to the palette", () => {
    expect(dataSetColor(DATA, 0)).toBe("#06b6d4");
    expect(dataSetColor(DATA, 1)).toBe("#f59e0b");
  });
});

describe("renderRadar", () => {
  const renderer: RadarRenderer<string> = {
    drawExtras: () => "web",
    drawData: () => "data",
    drawHighlighted: () => "highlight",
  };
  const layout = layoutFor(new RadarChartModel(PLAIN, DATA));
  const highlight: RadarHighlight = {
    index: 0,
    label: "A",
    dataSetIndex: 0,
    dataSetLabel: "S1",
    value: 100,
    point: { x: 210, y: 110 },
  };

  it("draws web, then data, then highlight", () => {
    expect(renderRadar(renderer, layout, [highlight], true)).toEqual(["web", "data", "highlight"]);
  });

  it("skips the web when disabled and the highlight when empty", () => {
    expect(renderRadar(renderer, layout, [highlight], false)).toEqual(["data", "highlight"]);
    expect(renderRadar(renderer, layout, [], true)).toEqual(["web", "data"]);
  });
});

describe("RadarChartModel", () => {
  describe("calibration", () => {
    it("calibrates against the data and the forced minimum", () => {
      const model = new RadarChartModel(PLAIN, DATA);
      expect(model.axisRange).toEqual({ minimum: 0, maximum: 100, range: 100 });
      expect(model.ringValues).toEqual([0, 20, 40, 60, 80, 100]);
      expect(model.warning).toBeNull();
    });

    it("uses the observed extrema without an override", () => {
      const model = new RadarChartModel({}, DATA);
      expect(model.axisRange).toEqual({ minimum: 20, maximum: 100, range: 80 });
    });

    it("counts entries by the longest dataset", () => {
      const model = new RadarChartModel({}, {
        labels: [],
        dataSets: [
          { label: "short", values: [1, 2] },
          { label: "long", values: [1, 2, 3, 4, 5] },
        ],
      });
      expect(model.entryCount).toBe(5);
      expect(model.sliceAngle).toBe(72);
    });

    it("keeps the cached range until notifyDataSetChanged", () => {
      const values = [10, 20, 30];
      const model = new RadarChartModel({}, { labels: [], dataSets: [{ label: "S", values }] });
      expect(model.axisRange).toEqual({ minimum: 10, maximum: 30, range: 20 });

      values.push(60);
      expect(model.axisRange.maximum).toBe(30);

      model.notifyDataSetChanged();
      expect(model.axisRange).toEqual({ minimum: 10, maximum: 60, range: 50 });
    });
  });

  describe("warnings", () => {
    it("reports an empty chart", () => {
      const onWarning = vi.fn();
      const model = new RadarChartModel({ onWarning }, { labels: [], dataSets: [] });
      expect(model.warning).toBe("Chart has no entries; nothing is drawn");
      expect(onWarning).toHaveBeenCalledWith("Chart has no entries; nothing is drawn");
      expect(model.computeLayout(SIZE)).toBeNull();
    });

    it("collapses an inverted override onto the minimum", () => {
      const onWarning = vi.fn();
      const model = new RadarChartModel({ onWarning }, DATA);
      model.setAxisOverride({ minimum: 50, maximum: 10 });

      expect(model.axisRange).toEqual({ minimum: 50, maximum: 50, range: 0 });
      expect(onWarning).toHaveBeenLastCalledWith(
        "Axis maximum 10 is below minimum 50; range collapsed",
      );
      expect(model.computeLayout(SIZE)).toBeNull();
    });

    it("reports a flat dataset", () => {
      const model = new RadarChartModel({}, { labels: [], dataSets: [{ label: "S", values: [5, 5, 5] }] });
      expect(model.warning).toBe("Axis range is empty; nothing is drawn");
      expect(model.computeLayout(SIZE)).toBeNull();
    });

    it("clears the warning once the data is drawable", () => {
      const model = new RadarChartModel(PLAIN, { labels: [], dataSets: [] });
      model.setData(DATA);
      expect(model.warning).toBeNull();
    });
  });

  describe("revision", () => {
    it("increases on every recalculation and setter", () => {
      const model = new RadarChartModel(PLAIN, DATA);
      const start = model.revision;

      model.notifyDataSetChanged();
      expect(model.revision).toBe(start + 1);
      model.setData(DATA);
      expect(model.revision).toBe(start + 2);
      model.setAxisOverride({ maximum: 200 });
      expect(model.revision).toBe(start + 3);
      model.rotationDegrees = 90;
      expect(model.revision).toBe(start + 4);
      model.skipWebLineCount = 1;
      expect(model.revision).toBe(start + 5);
    });
  });

  describe("warning listener", () => {
    it("sends later warnings to the replacement listener", () => {
      const first = vi.fn();
      const second = vi.fn();
      const model = new RadarChartModel({ onWarning: first }, DATA);

      model.setWarningListener(second);
      model.setData({ labels: [], dataSets: [] });

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledWith("Chart has no entries; nothing is drawn");
    });
  });

  describe("rotation and skip count", () => {
    it("normalizes the rotation setter", () => {
      const model = new RadarChartModel(PLAIN, DATA);
      model.rotationDegrees = -90;
      expect(model.rotationDegrees).toBe(270);
      expect(model.indexForAngle(270)).toBe(0);
      expect(model.indexForAngle(0)).toBe(1);
    });

    it("clamps the skip count and thins the spokes", () => {
      const model = new RadarChartModel(PLAIN, DATA);
      model.skipWebLineCount = -3;
      expect(model.skipWebLineCount).toBe(0);

      model.skipWebLineCount = 2;
      expect(layoutFor(model).web.spokes.map((spoke) => spoke.index)).toEqual([0, 3]);
    });
  });

  describe("computeLayout", () => {
    it("centres the chart in the content rect", () => {
      const layout = layoutFor(new RadarChartModel(PLAIN, DATA));
      expect(layout.contentRect).toEqual({ x: 10, y: 10, width: 200, height: 200 });
      expect(layout.center).toEqual({ x: 110, y: 110 });
      expect(layout.radius).toBe(100);
      expect(layout.scale).toBe(1);
      expect(layout.sliceAngle).toBe(90);
      expect(layout.entryCount).toBe(4);
    });

    it("places every vertex on its spoke", () => {
      const layout = layoutFor(new RadarChartModel(PLAIN, DATA));
      const s1 = layout.series[0];
      expect(s1?.label).toBe("S1");
      expect(s1?.color).toBe("#06b6d4");
      expect(s1?.vertices[0]?.point).toEqual({ x: 210, y: 110 });
      expect(s1?.vertices[1]?.point.x).toBeCloseTo(110, 10);
      expect(s1?.vertices[1]?.point.y).toBeCloseTo(160, 10);
    });

    it("lays out the web, hole and spoke bullets", () => {
      const layout = layoutFor(new RadarChartModel(PLAIN, DATA));
      expect(layout.web.spokes).toHaveLength(4);
      expect(layout.web.rings.map((ring) => ring.value)).toEqual([20, 40, 60, 80, 100]);
      expect(layout.holeRadius).toBe(50);
      expect(layout.webLineHoleRadius).toBe(4.5);
    });

    it("omits the hole when disabled", () => {
      const layout = layoutFor(new RadarChartModel({ ...PLAIN, drawHoleEnabled: false }, DATA));
      expect(layout.holeRadius).toBeNull();
    });

    it("places ring labels along the rotation axis", () => {
      const layout = layoutFor(new RadarChartModel(PLAIN, DATA));
      expect(layout.axisLabels.map((label) => label.value)).toEqual([0, 20, 40, 60, 80, 100]);
      expect(layout.axisLabels[1]?.position).toEqual({ x: 130, y: 110 });
    });

    it("skips hidden datasets and non-finite values", () => {
      const model = new RadarChartModel(PLAIN, {
        labels: DATA.labels,
        dataSets: [
          { label: "S1", values: [100, Number.NaN, 100, 50] },
          { label: "S2", values: [20, 80, 40, 60], visible: false },
        ],
      });
      const layout = layoutFor(model);
      expect(layout.series).toHaveLength(1);
      expect(layout.series[0]?.vertices.map((vertex) => vertex.index)).toEqual([0, 2, 3]);
    });

    it("insets for category labels and places them past the web", () => {
      const model = new RadarChartModel(
        {
          ...PLAIN,
          xAxis: { enabled: true },
          measureLabel: () => ({ width: 6, height: 4 }),
        },
        DATA,
      );
      const layout = layoutFor(model);

      expect(layout.contentRect).toEqual({ x: 6, y: 6, width: 208, height: 208 });
      expect(layout.scale).toBeCloseTo(1.04, 10);
      expect(layout.categoryLabels.map((label) => label.text)).toEqual(["A", "B", "C", "D"]);
      expect(layout.categoryLabels[0]?.position.x).toBeCloseTo(217, 10);
      expect(layout.categoryLabels[0]?.position.y).toBeCloseTo(110, 10);
    });

    it("falls back to the index for missing category labels", () => {
      const model = new RadarChartModel(
        { ...PLAIN, xAxis: { enabled: true } },
        { labels: ["only"], dataSets: [{ label: "S", values: [1, 2, 3] }] },
      );
      expect(layoutFor(model).categoryLabels.map((label) => label.text)).toEqual(["only", "1", "2"]);
    });

    it("reserves a legend band at the bottom", () => {
      const model = new RadarChartModel({ ...PLAIN, legend: { enabled: true } }, DATA);
      const layout = layoutFor(model);

      expect(layout.contentRect.height).toBeCloseTo(152.8, 10);
      expect(layout.radius).toBeCloseTo(76.4, 10);
      expect(layout.legend?.rect.y).toBeCloseTo(162.8, 10);
      expect(layout.legend?.entries.map(({ label, color }) => ({ label, color }))).toEqual([
        { label: "S1", color: "#06b6d4" },
        { label: "S2", color: "#f59e0b" },
      ]);
    });

    it("measures legend entries with the host's measurer", () => {
      const measureLabel = (text: string) => ({ width: text.length * 20, height: 14 });
      const model = new RadarChartModel(
        { ...PLAIN, legend: { enabled: true }, measureLabel },
        { labels: DATA.labels, dataSets: [{ label: "Long", values: [1, 2, 3, 4] }] },
      );
      expect(layoutFor(model).legend?.entries[0]?.size).toEqual({ width: 80, height: 14 });
    });
  });

  describe("highlightAt", () => {
    const model = new RadarChartModel(PLAIN, DATA);
    const layout = layoutFor(model);

    it("picks the dataset closest to the pointer", () => {
      expect(model.highlightAt(layout, { x: 200, y: 110 })).toMatchObject({
        index: 0,
        label: "A",
        dataSetLabel: "S1",
        value: 100,
      });
      expect(model.highlightAt(layout, { x: 135, y: 110 })).toMatchObject({
        index: 0,
        dataSetLabel: "S2",
        value: 20,
      });
    });

    it("resolves the category from the pointer angle", () => {
      expect(model.highlightAt(layout, { x: 110, y: 180 })).toMatchObject({
        index: 1,
        label: "B",
        dataSetIndex: 1,
        value: 80,
      });
    });

    it("returns null outside the chart radius", () => {
      expect(model.highlightAt(layout, { x: 110, y: 5 })).toBeNull();
    });

    it("breaks ties towards the lower dataset index", () => {
      expect(model.highlightAt(layout, { x: 170, y: 110 })?.dataSetIndex).toBe(0);
    });
  });
});
