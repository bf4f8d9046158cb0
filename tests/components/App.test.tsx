/**
 * Tests for the App component.
 */

import { describe, it, expect } from "vitest";
import { render, screen, fireEvent } from "@testing-library/react";
import App from "../../src/App";

describe("App", () => {
  it("renders the profile comparison chart", () => {
    render(<App />);
    expect(screen.getByRole("heading", { name: "Profile comparison" })).toBeInTheDocument();
    expect(screen.getByRole("img", { name: "Profile comparison radar chart" })).toBeInTheDocument();
    expect(screen.getByText("Hover a category to inspect its values")).toBeInTheDocument();
  });

  it("shows the readout for the value under the pointer", () => {
    render(<App />);
    // Centre is (240, 235.4) at 1.874 px per unit; "Speed" points straight up
    fireEvent.mouseMove(screen.getByRole("img"), { clientX: 240, clientY: 150 });
    expect(screen.queryByText("Hover a category to inspect its values")).toBeNull();
    expect(screen.getByText("58")).toBeInTheDocument();
  });
});
