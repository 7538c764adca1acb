/**
 * Pump settings entered by the user alongside an export
 */

/**
 * Unit used for glucose values in the settings form and the prompt
 */
export type GlucoseUnit = "mmol/L" | "mg/dL";

/**
 * One hourly row of the settings schedule
 */
export interface TimedSetting {
  /** Start of the hour, "HH:00" */
  timeRange: string;
  /** Basal rate (U/hr) */
  basalRate: number;
  /** Correction factor as entered, e.g. "1:3.0" (1U lowers BG by 3.0) */
  correctionFactor: string;
  /** Carb ratio as entered, e.g. "1:10" (1U per 10g) */
  carbRatio: string;
  /** Target BG in the schedule's unit */
  targetBg: number;
}

/**
 * Full 24-hour pump settings schedule
 */
export interface PumpSettings {
  units: GlucoseUnit;
  /** Exactly 24 rows, hour 0 first */
  timedSettings: TimedSetting[];
}
