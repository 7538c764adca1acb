// @vitest-environment jsdom
import { describe, it, expect, vi } from "vitest";
import { render, screen, fireEvent } from "@testing-library/react";
import { SettingsTable } from "./SettingsTable";
import { createDefaultForm } from "../lib/settings-form";

describe("SettingsTable", () => {
  it("renders 24 rows with unit-aware headers", () => {
    render(<SettingsTable value={createDefaultForm()} onChange={() => {}} />);

    expect(screen.getAllByRole("row")).toHaveLength(25);
    expect(screen.getByText("Correction Factor (1:mmol/L)")).toBeInTheDocument();
    expect(screen.getByText("Target BG (mmol/L)")).toBeInTheDocument();
    expect(screen.getByLabelText("Target BG 00:00")).toHaveValue("5.6");
    expect(screen.getByText("23:00")).toBeInTheDocument();
  });

  it("reports edits to a single cell", () => {
    const onChange = vi.fn();
    render(<SettingsTable value={createDefaultForm()} onChange={onChange} />);

    fireEvent.change(screen.getByLabelText("Carb ratio 07:00"), { target: { value: "1:12" } });

    const next = onChange.mock.calls[0][0];
    expect(next.timedSettings[7].carbRatio).toBe("1:12");
    expect(next.timedSettings[6].carbRatio).toBe("1:10");
  });

  it("switches units", () => {
    const onChange = vi.fn();
    render(<SettingsTable value={createDefaultForm()} onChange={onChange} />);

    fireEvent.click(screen.getByLabelText("mg/dL"));

    const next = onChange.mock.calls[0][0];
    expect(next.units).toBe("mg/dL");
    expect(next.timedSettings[0].targetBg).toBe("100");
  });
});
