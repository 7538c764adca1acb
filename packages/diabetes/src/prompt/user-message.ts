/**
 * User prompt builder
 *
 * Lays out the settings schedule, computed glucose summaries and the raw
 * export tables as plain text. Glucose is shown in the schedule's unit and
 * timestamps in the export timezone.
 */

import type {
  AlarmRecord,
  BasalRecord,
  BolusRecord,
  CgmReading,
  DiabetesRecord,
  GlucoseUnit,
  PumpSettings,
} from "../models/index.js";
import { recordsOfType } from "../models/index.js";
import { filterAlarms } from "../parsers/glooko.js";
import { calculateGlucoseStats, TARGET } from "../analysis/glucose-stats.js";
import { buildHourlyProfile } from "../analysis/hourly-profile.js";
import { fromMgdl } from "../analysis/units.js";
import { hourLabel, toPromptSettings } from "../settings/schedule.js";
import { DEFAULT_EXPORT_TIMEZONE, formatDateTimeInTimezone } from "../time.js";
import { formatTable, takeMostRecent, EMPTY_TABLE } from "./table.js";

export const DEFAULT_MAX_ROWS_PER_TABLE = 2000;

export interface PromptInput {
  settings: PumpSettings;
  records: DiabetesRecord[];
}

export interface PromptOptions {
  /** Timezone the export was written in */
  timezone?: string;
  /** Most recent rows kept per raw table */
  maxRowsPerTable?: number;
}

interface TableSpec<T> {
  title: string;
  columns: string[];
  records: readonly T[];
  toRow: (record: T) => string[];
}

function section(title: string, body: string): string {
  return `${title}\n${body}`;
}

function glucoseSummary(cgm: readonly CgmReading[], unit: GlucoseUnit): string {
  if (cgm.length === 0) return EMPTY_TABLE;

  const stats = calculateGlucoseStats(cgm);
  const g = (mgdl: number) => fromMgdl(mgdl, unit);
  const low = g(TARGET.LOW);
  const high = g(TARGET.HIGH);

  return [
    `Readings: ${stats.readingCount}`,
    `Mean: ${g(stats.mean)}`,
    `Min: ${g(stats.min)}`,
    `Max: ${g(stats.max)}`,
    `Standard deviation: ${g(stats.stdDev)}`,
    `Coefficient of variation: ${stats.cv}%`,
    `Time in range (${low}-${high}): ${stats.tir}%`,
    `Time below range (<${low}): ${stats.tbr}%`,
    `Time above range (>${high}): ${stats.tar}%`,
    `GMI: ${stats.gmi}%`,
  ].join("\n");
}

function hourlyProfile(cgm: readonly CgmReading[], unit: GlucoseUnit, timezone: string): string {
  if (cgm.length === 0) return EMPTY_TABLE;

  const rows = buildHourlyProfile(cgm, timezone).map((b) => {
    const g = (mgdl: number) => (b.readingCount > 0 ? String(fromMgdl(mgdl, unit)) : "-");
    return [
      hourLabel(b.hour),
      String(b.readingCount),
      g(b.mean),
      g(b.min),
      g(b.max),
      String(b.lowCount),
      String(b.highCount),
    ];
  });

  return formatTable(["Hour", "Readings", "Mean", "Min", "Max", "Lows", "Highs"], rows);
}

function rawTable<T extends { timestamp: number }>(spec: TableSpec<T>, maxRows: number): string {
  const { rows, total } = takeMostRecent(spec.records, maxRows);
  const lines = [spec.title];
  if (rows.length < total) {
    lines.push(`(showing last ${rows.length} of ${total} rows)`);
  }
  lines.push(formatTable(spec.columns, rows.map(spec.toRow)));
  return lines.join("\n");
}

/**
 * Build the user turn of the analysis request
 */
export function buildUserMessage(input: PromptInput, options: PromptOptions = {}): string {
  const timezone = options.timezone ?? DEFAULT_EXPORT_TIMEZONE;
  const maxRows = options.maxRowsPerTable ?? DEFAULT_MAX_ROWS_PER_TABLE;
  const unit = input.settings.units;
  const records = filterAlarms(input.records);

  const cgm = recordsOfType(records, "cgm");
  const time = (timestamp: number) => formatDateTimeInTimezone(timestamp, timezone);
  const glucose = (mgdl: number) => (mgdl > 0 ? String(fromMgdl(mgdl, unit)) : "-");

  const alarms: TableSpec<AlarmRecord> = {
    title: "Alarms Data:",
    columns: ["Timestamp", "Alarm/Event"],
    records: recordsOfType(records, "alarm"),
    toRow: (a) => [time(a.timestamp), a.event],
  };

  const cgmTable: TableSpec<CgmReading> = {
    title: "CGM Data:",
    columns: ["Timestamp", `Glucose (${unit})`],
    records: cgm,
    toRow: (r) => [time(r.timestamp), glucose(r.glucoseMgDl)],
  };

  const bolus: TableSpec<BolusRecord> = {
    title: "Bolus Data:",
    columns: ["Timestamp", "Insulin Delivered (U)", "Carbs Input (g)", `BG Input (${unit})`, "Carb Ratio"],
    records: recordsOfType(records, "bolus"),
    toRow: (b) => [
      time(b.timestamp),
      String(b.insulinDeliveredUnits),
      String(b.carbsInputGrams),
      glucose(b.bgInputMgDl),
      b.carbRatio > 0 ? String(b.carbRatio) : "-",
    ],
  };

  const basal: TableSpec<BasalRecord> = {
    title: "Basal Data:",
    columns: ["Timestamp", "Basal Type", "Rate (U/hr)", "Duration (min)"],
    records: recordsOfType(records, "basal"),
    toRow: (b) => [time(b.timestamp), b.basalType, String(b.rate ?? 0), String(b.durationMinutes)],
  };

  return [
    section(
      "Current Insulin Pump Settings:",
      JSON.stringify(toPromptSettings(input.settings), null, 2)
    ),
    section(`Glucose Summary (${unit}):`, glucoseSummary(cgm, unit)),
    section(`Hourly Glucose Profile (${unit}):`, hourlyProfile(cgm, unit, timezone)),
    rawTable(alarms, maxRows),
    rawTable(cgmTable, maxRows),
    rawTable(bolus, maxRows),
    rawTable(basal, maxRows),
  ].join("\n\n");
}
