/**
 * @pump-advisor/diabetes - Models
 *
 * Type definitions for diabetes records and pump settings
 */

// Base types
export type { BaseRecord } from "./base.js";

// Glucose types
export type { CgmReading, BgReading, GlucoseReading } from "./glucose.js";

// Insulin types
export type {
  BolusType,
  BolusRecord,
  BasalRecord,
  DailyInsulinSummary,
  InsulinRecord,
} from "./insulin.js";

// Alarms
export type { AlarmRecord } from "./alarm.js";

// Union types
export type { DiabetesRecord, DiabetesRecordType } from "./records.js";
export { RECORD_TYPES, recordsOfType } from "./records.js";

// Pump settings
export type { GlucoseUnit, TimedSetting, PumpSettings } from "./settings.js";
