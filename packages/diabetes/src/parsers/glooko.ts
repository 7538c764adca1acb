/**
 * Glooko CSV parser
 *
 * Parses the CSV tables of a Glooko export into strongly-typed records.
 * Each file starts with a metadata row ("Name:...,Date Range:...") that is
 * skipped before the header.
 */

import type {
  DiabetesRecord,
  DiabetesRecordType,
  CgmReading,
  BgReading,
  BolusRecord,
  BasalRecord,
  DailyInsulinSummary,
  AlarmRecord,
  BolusType,
} from "../models/index.js";
import { MissingDataError } from "../errors.js";
import { DEFAULT_EXPORT_TIMEZONE, formatDateInTimezone } from "../time.js";
import {
  parseCsvLine,
  splitLines,
  findHeaderAndDataStart,
  parseTimestamp,
  parseFloat0,
  createColumnMap,
  getColumn,
  getGlucoseMgDl,
} from "./csv-utils.js";
import {
  isValidGlucose,
  isValidInsulinBolus,
  isValidBasalRate,
  isValidCarbs,
} from "./validation.js";

/**
 * Extracted CSV file from an export archive
 */
export interface ExtractedCsv {
  fileName: string;
  content: string;
}

/**
 * Parse result
 */
export interface ParseResult {
  records: DiabetesRecord[];
  errors: string[];
  counts: Partial<Record<DiabetesRecordType, number>>;
}

export interface ParseOptions {
  /** Timezone naive timestamps were written in */
  timezone?: string;
  /** Override the import time stamped on every record */
  importedAt?: number;
}

/**
 * Alarm events that carry no signal for settings review
 */
export const NOISE_ALARM_EVENTS = [
  "tandem_cgm_sensor_expiring",
  "tandem_cgm_replace_sensor",
  "Cartridge Loaded",
  "Resume Pump Alarm (18A)",
] as const;

/**
 * Tables an analysis cannot run without
 */
export const REQUIRED_TABLES = ["cgm", "bolus", "basal"] as const;

const REQUIRED_TABLE_LABELS: Record<(typeof REQUIRED_TABLES)[number], string> = {
  cgm: "CGM data (cgm_data_1.csv)",
  bolus: "bolus data (Insulin data/bolus_data_1.csv)",
  basal: "basal data (Insulin data/basal_data_1.csv)",
};

interface RowContext {
  row: string[];
  colMap: Map<string, number>;
  timestamp: number;
  fileName: string;
  importedAt: number;
  timezone: string;
}

/**
 * Shared row loop: locate header, parse timestamp, hand each row to `mapRow`.
 * Rows without a timestamp or rejected by `mapRow` (null) are skipped.
 */
function parseRows<T>(
  content: string,
  fileName: string,
  importedAt: number,
  timezone: string,
  mapRow: (ctx: RowContext) => T | null
): T[] {
  const records: T[] = [];
  const lines = splitLines(content);
  const { headerIdx, dataStartIdx } = findHeaderAndDataStart(lines);
  if (lines.length <= dataStartIdx) return records;

  const colMap = createColumnMap(parseCsvLine(lines[headerIdx]));

  for (let i = dataStartIdx; i < lines.length; i++) {
    const row = parseCsvLine(lines[i]);
    const timestamp = parseTimestamp(
      getColumn(row, colMap, "timestamp", "datetime", "time"),
      timezone
    );
    if (!timestamp) continue;

    const record = mapRow({ row, colMap, timestamp, fileName, importedAt, timezone });
    if (record) records.push(record);
  }

  return records;
}

function serial(ctx: RowContext): string | undefined {
  return getColumn(ctx.row, ctx.colMap, "serialnumber") || undefined;
}

function toCgm(ctx: RowContext): CgmReading | null {
  const glucose = getGlucoseMgDl(
    ctx.row,
    ctx.colMap,
    ["cgmglucosevaluemgdl", "glucosevaluemgdl", "glucosevalue", "glucose"],
    ["cgmglucosevaluemmoll", "glucosevaluemmoll"]
  );
  if (!isValidGlucose(glucose)) return null;

  return {
    type: "cgm",
    timestamp: ctx.timestamp,
    glucoseMgDl: glucose,
    deviceSerial: serial(ctx),
    sourceFile: ctx.fileName,
    importedAt: ctx.importedAt,
  };
}

function toBg(ctx: RowContext): BgReading | null {
  const glucose = getGlucoseMgDl(
    ctx.row,
    ctx.colMap,
    ["glucosevaluemgdl", "glucosevalue", "glucose"],
    ["glucosevaluemmoll"]
  );
  if (!isValidGlucose(glucose)) return null;

  const manualFlag = getColumn(ctx.row, ctx.colMap, "manualreading", "manual");

  return {
    type: "bg",
    timestamp: ctx.timestamp,
    glucoseMgDl: glucose,
    isManual: manualFlag.toUpperCase() === "M" || manualFlag === "true",
    deviceSerial: serial(ctx),
    sourceFile: ctx.fileName,
    importedAt: ctx.importedAt,
  };
}

function toBolusType(value: string): BolusType {
  const lower = value.toLowerCase();
  if (lower.includes("extend")) return "Extended";
  if (lower.includes("combo")) return "Combo";
  return "Normal";
}

function toBolus(ctx: RowContext): BolusRecord | null {
  const { row, colMap } = ctx;
  const insulinDelivered = parseFloat0(
    getColumn(row, colMap, "insulindeliveredu", "insulindelivered", "delivered")
  );
  const carbsInput = parseFloat0(getColumn(row, colMap, "carbsinputg", "carbsinput", "carbs"));

  // A carbs-only entry (0U delivered) is still a meal the prompt should see
  const validInsulin = isValidInsulinBolus(insulinDelivered);
  const validCarbs = isValidCarbs(carbsInput);
  if (!validInsulin && !validCarbs) return null;

  const bgInput = getGlucoseMgDl(
    row,
    colMap,
    ["bloodglucoseinputmgdl", "bginput"],
    ["bloodglucoseinputmmoll"]
  );

  return {
    type: "bolus",
    timestamp: ctx.timestamp,
    bolusType: toBolusType(getColumn(row, colMap, "insulintype", "bolustype", "type")),
    bgInputMgDl: isValidGlucose(bgInput) ? bgInput : 0,
    carbsInputGrams: validCarbs ? carbsInput : 0,
    carbRatio: parseFloat0(getColumn(row, colMap, "carbsratio", "carbratio", "ratio")),
    insulinDeliveredUnits: validInsulin ? insulinDelivered : 0,
    initialDeliveryUnits:
      parseFloat0(getColumn(row, colMap, "initialdeliveryu", "initialdelivery")) || undefined,
    extendedDeliveryUnits:
      parseFloat0(getColumn(row, colMap, "extendeddeliveryu", "extendeddelivery")) || undefined,
    deviceSerial: serial(ctx),
    sourceFile: ctx.fileName,
    importedAt: ctx.importedAt,
  };
}

function toBasal(ctx: RowContext): BasalRecord | null {
  const { row, colMap } = ctx;
  const rate = parseFloat0(getColumn(row, colMap, "rate", "rateuhr"));
  if (!isValidBasalRate(rate)) return null;

  const insulinDelivered = parseFloat0(getColumn(row, colMap, "insulindeliveredu", "delivered"));

  return {
    type: "basal",
    timestamp: ctx.timestamp,
    basalType: getColumn(row, colMap, "insulintype", "basaltype", "type") || "Scheduled",
    durationMinutes: parseFloat0(getColumn(row, colMap, "durationminutes", "duration")),
    rate: rate || undefined,
    insulinDeliveredUnits: insulinDelivered || undefined,
    deviceSerial: serial(ctx),
    sourceFile: ctx.fileName,
    importedAt: ctx.importedAt,
  };
}

function toDailyInsulin(ctx: RowContext): DailyInsulinSummary {
  const { row, colMap } = ctx;
  return {
    type: "daily_insulin",
    timestamp: ctx.timestamp,
    date: formatDateInTimezone(ctx.timestamp, ctx.timezone),
    totalBolusUnits: parseFloat0(getColumn(row, colMap, "totalbolusu", "totalbolus", "bolus")),
    totalBasalUnits: parseFloat0(getColumn(row, colMap, "totalbasalu", "totalbasal", "basal")),
    totalInsulinUnits: parseFloat0(
      getColumn(row, colMap, "totalinsulinu", "totalinsulin", "total")
    ),
    deviceSerial: serial(ctx),
    sourceFile: ctx.fileName,
    importedAt: ctx.importedAt,
  };
}

function toAlarm(ctx: RowContext): AlarmRecord | null {
  const event = getColumn(ctx.row, ctx.colMap, "alarmevent", "alarm", "event");
  if (!event) return null;

  return {
    type: "alarm",
    timestamp: ctx.timestamp,
    event,
    deviceSerial: serial(ctx),
    sourceFile: ctx.fileName,
    importedAt: ctx.importedAt,
  };
}

const ROW_MAPPERS: { [K in DiabetesRecordType]: (ctx: RowContext) => Extract<DiabetesRecord, { type: K }> | null } = {
  cgm: toCgm,
  bg: toBg,
  bolus: toBolus,
  basal: toBasal,
  daily_insulin: toDailyInsulin,
  alarm: toAlarm,
};

/**
 * Determine file type from filename (path inside the archive included)
 */
export function getFileType(fileName: string): DiabetesRecordType | "unknown" {
  const lower = fileName.toLowerCase();
  const base = lower.split("/").pop() ?? lower;

  if (base.includes("cgm_data") || base.includes("cgm-data")) return "cgm";
  if (base.includes("bg_data") || base.includes("bg-data")) return "bg";
  if (base.includes("bolus_data") || base.includes("bolus-data")) return "bolus";
  if (base.includes("basal_data") || base.includes("basal-data")) return "basal";
  if (
    (base.includes("insulin_data") || base.includes("insulin-data")) &&
    !base.includes("manual")
  ) {
    return "daily_insulin";
  }
  if (base.includes("alarms_data") || base.includes("alarm")) return "alarm";

  return "unknown";
}

/**
 * Parse all CSV files from a Glooko export
 */
export function parseGlookoExport(
  csvFiles: ExtractedCsv[],
  options: ParseOptions = {}
): ParseResult {
  const importedAt = options.importedAt ?? Date.now();
  const timezone = options.timezone ?? DEFAULT_EXPORT_TIMEZONE;
  const records: DiabetesRecord[] = [];
  const errors: string[] = [];
  const counts: Partial<Record<DiabetesRecordType, number>> = {};

  for (const { fileName, content } of csvFiles) {
    const fileType = getFileType(fileName);

    // Summary files and other tables are not used
    if (fileType === "unknown") continue;

    try {
      const parsed = parseRows<DiabetesRecord>(
        content,
        fileName,
        importedAt,
        timezone,
        ROW_MAPPERS[fileType]
      );

      if (parsed.length > 0) {
        records.push(...parsed);
        counts[fileType] = (counts[fileType] || 0) + parsed.length;
        console.log(`Parsed ${parsed.length} ${fileType} records from ${fileName}`);
      }
    } catch (error) {
      const errorMsg = `Error parsing ${fileName}: ${error instanceof Error ? error.message : String(error)}`;
      errors.push(errorMsg);
      console.error(errorMsg);
    }
  }

  console.log(`Total: ${records.length} records parsed from ${csvFiles.length} files`);

  return { records, errors, counts };
}

/**
 * Drop alarm events listed in `exclude` (case-insensitive); other records pass through
 */
export function filterAlarms(
  records: DiabetesRecord[],
  exclude: readonly string[] = NOISE_ALARM_EVENTS
): DiabetesRecord[] {
  const excluded = new Set(exclude.map((e) => e.toLowerCase()));
  return records.filter(
    (r) => r.type !== "alarm" || !excluded.has(r.event.toLowerCase())
  );
}

/**
 * Throw MissingDataError when a required table parsed to zero records
 */
export function requireExportTables(result: ParseResult): void {
  const missing = REQUIRED_TABLES.filter((type) => !result.counts[type]).map(
    (type) => REQUIRED_TABLE_LABELS[type]
  );
  if (missing.length > 0) {
    throw new MissingDataError(missing);
  }
}
