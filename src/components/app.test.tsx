import React from "react";
import { render, screen, fireEvent } from "@testing-library/react";
import { App } from "./app";

// Mock the LifeCanvas since PixiJS requires a real canvas context
jest.mock("./life-canvas", () => ({
  LifeCanvas: () => <div data-testid="life-canvas" />,
}));

describe("App component", () => {
  it("renders controls and canvas", () => {
    render(<App />);
    expect(screen.getByText("Play")).toBeDefined();
    expect(screen.getByText("Step")).toBeDefined();
    expect(screen.getByText(/Speed:/)).toBeDefined();
    expect(screen.getByText(/Pattern:/)).toBeDefined();
    expect(screen.getByText(/View:/)).toBeDefined();
    expect(screen.getByText("Generation: 0")).toBeDefined();
    expect(screen.getByTestId("life-canvas")).toBeDefined();
  });

  it("steps one generation while paused", () => {
    render(<App />);
    fireEvent.click(screen.getByText("Step"));
    expect(screen.getByText("Generation: 1")).toBeDefined();
  });

  it("toggles between Play and Pause and disables Step while running", () => {
    render(<App />);
    fireEvent.click(screen.getByText("Play"));
    expect(screen.getByText("Pause")).toBeDefined();
    expect(screen.getByText("Step")).toHaveProperty("disabled", true);
  });

  it("resets the generation when a pattern is chosen", () => {
    render(<App />);
    fireEvent.click(screen.getByText("Step"));
    fireEvent.change(screen.getByDisplayValue("Demo"), { target: { value: "glider" } });
    expect(screen.getByText("Generation: 0")).toBeDefined();
    expect(screen.getByDisplayValue("Glider")).toBeDefined();
  });
});
