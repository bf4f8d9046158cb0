/**
 * Tests for the HighlightReadout component.
 */

import { describe, it, expect } from "vitest";
import { render, screen } from "@testing-library/react";
import { HighlightReadout } from "../../src/components/status/HighlightReadout";

describe("HighlightReadout", () => {
  it("shows the hint when nothing is highlighted", () => {
    render(<HighlightReadout highlight={null} />);
    expect(screen.getByText("Hover a category to inspect its values")).toBeInTheDocument();
  });

  it("shows a custom hint", () => {
    render(<HighlightReadout highlight={null} hint="Nothing selected" />);
    expect(screen.getByText("Nothing selected")).toBeInTheDocument();
  });

  it("shows the highlighted category, dataset and value", () => {
    render(
      <HighlightReadout
        highlight={{
          index: 2,
          label: "Agility",
          dataSetIndex: 1,
          dataSetLabel: "Profile B",
          value: 72.5,
          point: { x: 0, y: 0 },
        }}
      />,
    );
    expect(screen.getByText("Agility")).toBeInTheDocument();
    expect(screen.getByText("Profile B")).toBeInTheDocument();
    expect(screen.getByText("72.5")).toBeInTheDocument();
  });
});
