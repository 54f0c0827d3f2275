import { describe, it, expect, vi } from "vitest";
import { render, screen, fireEvent } from "@testing-library/react";
import type { Route } from "@/types";
import { RouteList } from "./RouteList";

const routes: Route[] = [
  { uuid: "a", name: "Warm Up", grade: 2, angle: "40", ascents: 310, position: null },
  { uuid: "b", name: "Mystery", grade: 6, angle: "Unknown", ascents: null, position: null },
];

describe("RouteList", () => {
  it("lists routes with grade and details", () => {
    render(
      <RouteList routes={routes} selectedUuid="a" onSelectRoute={vi.fn()} caption="Showing 2 routes" />
    );

    expect(screen.getByText("Showing 2 routes")).toBeInTheDocument();
    expect(screen.getByText("V2")).toBeInTheDocument();
    expect(screen.getByText("310 ascents")).toBeInTheDocument();
    expect(screen.getByText("40°")).toBeInTheDocument();
    expect(screen.getByText("Any angle")).toBeInTheDocument();
    expect(screen.getByRole("button", { name: /Warm Up/ })).toHaveAttribute(
      "aria-pressed",
      "true"
    );
  });

  it("selects the clicked route", () => {
    const onSelectRoute = vi.fn();
    render(
      <RouteList routes={routes} selectedUuid={null} onSelectRoute={onSelectRoute} caption="" />
    );

    fireEvent.click(screen.getByRole("button", { name: /Mystery/ }));

    expect(onSelectRoute).toHaveBeenCalledWith("b");
  });

  it("shows an empty state", () => {
    render(<RouteList routes={[]} selectedUuid={null} onSelectRoute={vi.fn()} caption="" />);
    expect(screen.getByText("No routes match these filters.")).toBeInTheDocument();
  });
});
