/**
 * Hourly pump settings schedule: defaults, validation, prompt shape
 */

import type { GlucoseUnit, PumpSettings, TimedSetting } from "../models/index.js";
import { VALIDATION, isValidGlucose } from "../parsers/validation.js";
import { toMgdl } from "../analysis/units.js";

export const HOURS_PER_DAY = 24;

export const GLUCOSE_UNITS: readonly GlucoseUnit[] = ["mmol/L", "mg/dL"];

/**
 * Row defaults per unit, as the settings form pre-fills them
 */
export const SETTING_DEFAULTS: Record<
  GlucoseUnit,
  Omit<TimedSetting, "timeRange">
> = {
  "mmol/L": { basalRate: 0.0, correctionFactor: "1:3.0", carbRatio: "1:10", targetBg: 5.6 },
  "mg/dL": { basalRate: 0.0, correctionFactor: "1:54", carbRatio: "1:10", targetBg: 100 },
};

export function isGlucoseUnit(value: unknown): value is GlucoseUnit {
  return value === "mmol/L" || value === "mg/dL";
}

/** "HH:00" for an hour 0-23 */
export function hourLabel(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}

export function createDefaultSchedule(units: GlucoseUnit = "mmol/L"): PumpSettings {
  const defaults = SETTING_DEFAULTS[units];
  return {
    units,
    timedSettings: Array.from({ length: HOURS_PER_DAY }, (_, hour) => ({
      timeRange: hourLabel(hour),
      ...defaults,
    })),
  };
}

/**
 * Read the amount from a ratio as entered: "1:3.0" → 3, "10" → 10.
 * Returns null for anything else.
 */
export function parseRatio(value: string): number | null {
  const match = value.trim().match(/^(?:1\s*:\s*)?(\d+(?:\.\d+)?|\.\d+)$/);
  if (!match) return null;
  return parseFloat(match[1]);
}

export type SettingsValidation =
  | { ok: true; settings: PumpSettings }
  | { ok: false; errors: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === "";
}

/**
 * Numbers may arrive as strings from form inputs
 */
function readNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return null;
    const num = Number(trimmed);
    return Number.isFinite(num) ? num : null;
  }
  return null;
}

function validateRow(
  raw: unknown,
  hour: number,
  units: GlucoseUnit,
  errors: string[]
): TimedSetting {
  const label = hourLabel(hour);
  const defaults = SETTING_DEFAULTS[units];
  const row: Record<string, unknown> = isRecord(raw) ? raw : {};
  const prefix = `Row ${label}`;

  if (!isRecord(raw)) {
    errors.push(`${prefix}: expected an object`);
  }

  if (!isBlank(row.timeRange) && row.timeRange !== label) {
    errors.push(`${prefix}: time range must be "${label}"`);
  }

  let basalRate = defaults.basalRate;
  if (!isBlank(row.basalRate)) {
    const value = readNumber(row.basalRate);
    if (value === null || value < 0 || value > VALIDATION.INSULIN_BASAL_RATE_MAX) {
      errors.push(
        `${prefix}: basal rate must be between 0 and ${VALIDATION.INSULIN_BASAL_RATE_MAX} U/hr`
      );
    } else {
      basalRate = value;
    }
  }

  const ratio = (field: "correctionFactor" | "carbRatio", name: string): string => {
    const value = row[field];
    if (isBlank(value)) return defaults[field];
    const text = typeof value === "number" ? String(value) : value;
    if (typeof text !== "string") {
      errors.push(`${prefix}: ${name} must be a ratio like "1:10"`);
      return defaults[field];
    }
    const amount = parseRatio(text);
    if (amount === null || amount <= 0) {
      errors.push(`${prefix}: ${name} must be a ratio like "1:10"`);
      return defaults[field];
    }
    return text.trim();
  };

  const correctionFactor = ratio("correctionFactor", "correction factor");
  const carbRatio = ratio("carbRatio", "carb ratio");

  let targetBg = defaults.targetBg;
  if (!isBlank(row.targetBg)) {
    const value = readNumber(row.targetBg);
    if (value === null || !isValidGlucose(toMgdl(value, units))) {
      errors.push(`${prefix}: target BG is outside the physiological range`);
    } else {
      targetBg = value;
    }
  }

  return { timeRange: label, basalRate, correctionFactor, carbRatio, targetBg };
}

/**
 * Validate settings received from a client. Blank fields take the row
 * default for the chosen unit.
 */
export function validatePumpSettings(input: unknown): SettingsValidation {
  if (!isRecord(input)) {
    return { ok: false, errors: ["Settings must be an object"] };
  }

  const errors: string[] = [];
  let units: GlucoseUnit = "mmol/L";
  if (isGlucoseUnit(input.units)) {
    units = input.units;
  } else if (!isBlank(input.units)) {
    errors.push(`Units must be one of ${GLUCOSE_UNITS.join(", ")}`);
  }

  const rows = input.timedSettings;
  if (!Array.isArray(rows) || rows.length !== HOURS_PER_DAY) {
    errors.push(`Expected ${HOURS_PER_DAY} timed settings`);
    return { ok: false, errors };
  }

  const timedSettings = rows.map((row: unknown, hour) => validateRow(row, hour, units, errors));

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, settings: { units, timedSettings } };
}

/**
 * Snake-case rows embedded in the prompt as JSON
 */
export interface PromptSettings {
  timed_settings: Array<{
    time_range: string;
    basal_rate: number;
    correction_factor: string;
    carb_ratio: string;
    target_bg: number;
  }>;
}

export function toPromptSettings(settings: PumpSettings): PromptSettings {
  return {
    timed_settings: settings.timedSettings.map((s) => ({
      time_range: s.timeRange,
      basal_rate: s.basalRate,
      correction_factor: s.correctionFactor,
      carb_ratio: s.carbRatio,
      target_bg: s.targetBg,
    })),
  };
}
