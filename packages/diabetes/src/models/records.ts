/**
 * Union types and helpers for all diabetes records
 */

import type { CgmReading, BgReading } from "./glucose.js";
import type { BolusRecord, BasalRecord, DailyInsulinSummary } from "./insulin.js";
import type { AlarmRecord } from "./alarm.js";

/**
 * All possible diabetes record types
 */
export type DiabetesRecord =
  | CgmReading
  | BgReading
  | BolusRecord
  | BasalRecord
  | DailyInsulinSummary
  | AlarmRecord;

/**
 * Record type discriminator
 */
export type DiabetesRecordType = DiabetesRecord["type"];

/**
 * All record types as a const array for iteration
 */
export const RECORD_TYPES = [
  "cgm",
  "bg",
  "bolus",
  "basal",
  "daily_insulin",
  "alarm",
] as const;

/**
 * Narrow a record list to a single type
 */
export function recordsOfType<T extends DiabetesRecordType>(
  records: DiabetesRecord[],
  type: T
): Extract<DiabetesRecord, { type: T }>[] {
  return records.filter(
    (r): r is Extract<DiabetesRecord, { type: T }> => r.type === type
  );
}
