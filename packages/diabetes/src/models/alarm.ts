import type { BaseRecord } from "./base.js";

/**
 * Device alarm or event
 * Source: alarms_data_1.csv
 */
export interface AlarmRecord extends BaseRecord {
  type: "alarm";
  /** Alarm/event description as exported, e.g. "Cartridge Loaded" */
  event: string;
}
