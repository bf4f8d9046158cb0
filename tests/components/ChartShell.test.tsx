/**
 * Tests for the ChartShell layout.
 */

import { describe, it, expect } from "vitest";
import { render, screen } from "@testing-library/react";
import { ChartShell } from "../../src/components/layout/ChartShell";

describe("ChartShell", () => {
  it("renders the title and children", () => {
    render(
      <ChartShell title="Profiles" description="Two profiles">
        <span>chart body</span>
      </ChartShell>,
    );
    expect(screen.getByRole("heading", { name: "Profiles" })).toBeInTheDocument();
    expect(screen.getByText("Two profiles")).toBeInTheDocument();
    expect(screen.getByText("chart body")).toBeInTheDocument();
  });

  it("shows a warning as an alert", () => {
    render(
      <ChartShell title="Profiles" warning="Axis range is empty; nothing is drawn">
        <span />
      </ChartShell>,
    );
    expect(screen.getByRole("alert")).toHaveTextContent("Axis range is empty; nothing is drawn");
  });

  it("has no alert without a warning", () => {
    render(
      <ChartShell title="Profiles" warning={null} footer={<span>readout</span>}>
        <span />
      </ChartShell>,
    );
    expect(screen.queryByRole("alert")).toBeNull();
    expect(screen.getByText("readout")).toBeInTheDocument();
  });
});
