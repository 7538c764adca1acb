import { SETTING_DEFAULTS, createDefaultSchedule } from "@pump-advisor/diabetes/settings";
import type { GlucoseUnit } from "@pump-advisor/diabetes";
import type { SettingsForm, SettingsFormRow } from "../api/client";

export type EditableField = Exclude<keyof SettingsFormRow, "timeRange">;

/** Basal rates keep two decimals so "0.00" reads as a rate */
function formatBasal(rate: number): string {
  return rate.toFixed(2);
}

export function createDefaultForm(units: GlucoseUnit = "mmol/L"): SettingsForm {
  const schedule = createDefaultSchedule(units);
  return {
    units,
    timedSettings: schedule.timedSettings.map((row) => ({
      timeRange: row.timeRange,
      basalRate: formatBasal(row.basalRate),
      correctionFactor: row.correctionFactor,
      carbRatio: row.carbRatio,
      targetBg: String(row.targetBg),
    })),
  };
}

/**
 * Switch units. Unit-dependent fields still at the old unit's default move
 * to the new default; anything the user typed is left alone.
 */
export function changeUnits(form: SettingsForm, units: GlucoseUnit): SettingsForm {
  if (form.units === units) return form;

  const from = SETTING_DEFAULTS[form.units];
  const to = SETTING_DEFAULTS[units];

  return {
    units,
    timedSettings: form.timedSettings.map((row) => ({
      ...row,
      correctionFactor:
        row.correctionFactor === from.correctionFactor ? to.correctionFactor : row.correctionFactor,
      targetBg: row.targetBg === String(from.targetBg) ? String(to.targetBg) : row.targetBg,
    })),
  };
}

export function updateRow(
  form: SettingsForm,
  index: number,
  field: EditableField,
  value: string
): SettingsForm {
  return {
    ...form,
    timedSettings: form.timedSettings.map((row, i) => (i === index ? { ...row, [field]: value } : row)),
  };
}
