import { describe, it, expect, vi } from "vitest";
import { render, screen, fireEvent } from "@testing-library/react";
import type { RouteFilters as Filters } from "@/types";
import { RouteFilters } from "./RouteFilters";

const filters: Filters = { gradeRange: [3, 7], nameIncludes: "" };

describe("RouteFilters", () => {
  it("shows the current range", () => {
    render(<RouteFilters filters={filters} bounds={[0, 10]} onChange={vi.fn()} />);
    expect(screen.getByText("3–7")).toBeInTheDocument();
  });

  it("reports name searches", () => {
    const onChange = vi.fn();
    render(<RouteFilters filters={filters} bounds={[0, 10]} onChange={onChange} />);

    fireEvent.change(screen.getByLabelText("Search Route Name"), {
      target: { value: "jedi" },
    });

    expect(onChange).toHaveBeenCalledWith({ gradeRange: [3, 7], nameIncludes: "jedi" });
  });

  it("keeps the minimum from passing the maximum", () => {
    const onChange = vi.fn();
    render(<RouteFilters filters={filters} bounds={[0, 10]} onChange={onChange} />);

    fireEvent.change(screen.getByLabelText("Minimum grade"), {
      target: { value: "9" },
    });

    expect(onChange).toHaveBeenCalledWith({ gradeRange: [7, 7], nameIncludes: "" });
  });

  it("keeps the maximum from dropping below the minimum", () => {
    const onChange = vi.fn();
    render(<RouteFilters filters={filters} bounds={[0, 10]} onChange={onChange} />);

    fireEvent.change(screen.getByLabelText("Maximum grade"), {
      target: { value: "1" },
    });

    expect(onChange).toHaveBeenCalledWith({ gradeRange: [3, 3], nameIncludes: "" });
  });
});
