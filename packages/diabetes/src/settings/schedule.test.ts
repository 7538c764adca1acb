import { describe, it, expect } from "vitest";
import {
  createDefaultSchedule,
  parseRatio,
  validatePumpSettings,
  toPromptSettings,
} from "./schedule.js";

function rows(overrides: Record<number, Record<string, unknown>> = {}) {
  return Array.from({ length: 24 }, (_, hour) => ({
    timeRange: `${String(hour).padStart(2, "0")}:00`,
    basalRate: 0.8,
    correctionFactor: "1:3.0",
    carbRatio: "1:10",
    targetBg: 5.6,
    ...overrides[hour],
  }));
}

describe("createDefaultSchedule", () => {
  it("builds 24 hourly rows with mmol/L defaults", () => {
    const schedule = createDefaultSchedule();

    expect(schedule.units).toBe("mmol/L");
    expect(schedule.timedSettings).toHaveLength(24);
    expect(schedule.timedSettings[0]).toEqual({
      timeRange: "00:00",
      basalRate: 0,
      correctionFactor: "1:3.0",
      carbRatio: "1:10",
      targetBg: 5.6,
    });
    expect(schedule.timedSettings[23].timeRange).toBe("23:00");
  });

  it("uses mg/dL defaults for mg/dL schedules", () => {
    const row = createDefaultSchedule("mg/dL").timedSettings[7];

    expect(row).toEqual({
      timeRange: "07:00",
      basalRate: 0,
      correctionFactor: "1:54",
      carbRatio: "1:10",
      targetBg: 100,
    });
  });
});

describe("parseRatio", () => {
  it("reads 1:x ratios and bare numbers", () => {
    expect(parseRatio("1:3.0")).toBe(3);
    expect(parseRatio(" 1 : 12 ")).toBe(12);
    expect(parseRatio("8.5")).toBe(8.5);
  });

  it("rejects other shapes", () => {
    expect(parseRatio("2:10")).toBeNull();
    expect(parseRatio("1:")).toBeNull();
    expect(parseRatio("ten")).toBeNull();
    expect(parseRatio("-3")).toBeNull();
  });
});

describe("validatePumpSettings", () => {
  it("accepts a complete schedule", () => {
    const result = validatePumpSettings({ units: "mmol/L", timedSettings: rows() });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.settings.timedSettings[5]).toEqual({
        timeRange: "05:00",
        basalRate: 0.8,
        correctionFactor: "1:3.0",
        carbRatio: "1:10",
        targetBg: 5.6,
      });
    }
  });

  it("fills blank fields with the unit's defaults and reads numeric strings", () => {
    const result = validatePumpSettings({
      units: "mg/dL",
      timedSettings: rows({
        2: { basalRate: "", correctionFactor: undefined, targetBg: null },
        3: { basalRate: "1.25", targetBg: "110" },
      }),
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.settings.timedSettings[2]).toMatchObject({
        basalRate: 0,
        correctionFactor: "1:54",
        targetBg: 100,
      });
      expect(result.settings.timedSettings[3]).toMatchObject({ basalRate: 1.25, targetBg: 110 });
    }
  });

  it("defaults units to mmol/L", () => {
    const result = validatePumpSettings({ timedSettings: rows() });

    expect(result.ok && result.settings.units).toBe("mmol/L");
  });

  it("rejects non-objects and wrong row counts", () => {
    expect(validatePumpSettings("nope")).toEqual({
      ok: false,
      errors: ["Settings must be an object"],
    });
    expect(validatePumpSettings({ units: "mmol/L", timedSettings: rows().slice(0, 23) })).toEqual({
      ok: false,
      errors: ["Expected 24 timed settings"],
    });
  });

  it("reports every invalid field", () => {
    const result = validatePumpSettings({
      units: "mmol/L",
      timedSettings: rows({
        0: { timeRange: "01:00" },
        4: { basalRate: 12 },
        6: { carbRatio: "1:0" },
        9: { correctionFactor: "abc" },
        12: { targetBg: 40 },
      }),
    });

    expect(result).toEqual({
      ok: false,
      errors: [
        'Row 00:00: time range must be "00:00"',
        "Row 04:00: basal rate must be between 0 and 10 U/hr",
        'Row 06:00: carb ratio must be a ratio like "1:10"',
        'Row 09:00: correction factor must be a ratio like "1:10"',
        "Row 12:00: target BG is outside the physiological range",
      ],
    });
  });

  it("checks target BG after converting to mg/dL", () => {
    // 400 is fine in mg/dL but 7207 mg/dL as mmol/L
    expect(validatePumpSettings({ units: "mg/dL", timedSettings: rows({ 1: { targetBg: 400 } }) }).ok).toBe(true);
    expect(validatePumpSettings({ units: "mmol/L", timedSettings: rows({ 1: { targetBg: 400 } }) }).ok).toBe(false);
  });

  it("rejects unknown units", () => {
    const result = validatePumpSettings({ units: "mg", timedSettings: rows() });

    expect(result).toEqual({ ok: false, errors: ["Units must be one of mmol/L, mg/dL"] });
  });
});

describe("toPromptSettings", () => {
  it("renames fields to snake case", () => {
    const prompt = toPromptSettings(createDefaultSchedule());

    expect(prompt.timed_settings).toHaveLength(24);
    expect(prompt.timed_settings[1]).toEqual({
      time_range: "01:00",
      basal_rate: 0,
      correction_factor: "1:3.0",
      carb_ratio: "1:10",
      target_bg: 5.6,
    });
  });
});
