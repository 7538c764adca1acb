/**
 * Insulin delivery totals over the export window
 */

import type { BolusRecord, BasalRecord } from "../models/index.js";
import { DEFAULT_EXPORT_TIMEZONE, formatDateInTimezone } from "../time.js";

export interface InsulinSummary {
  /** Distinct local dates with any bolus or basal record */
  days: number;
  totalBolusUnits: number;
  totalBasalUnits: number;
  bolusCount: number;
  avgDailyBolus: number;
  avgDailyBasal: number;
  avgDailyCarbs: number;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Units delivered by a basal segment. Falls back to rate x duration when
 * the export left the delivered column empty.
 */
export function basalUnitsDelivered(basal: BasalRecord): number {
  if (basal.insulinDeliveredUnits !== undefined) {
    return basal.insulinDeliveredUnits;
  }
  return ((basal.rate ?? 0) * basal.durationMinutes) / 60;
}

export function summarizeInsulin(
  boluses: readonly BolusRecord[],
  basals: readonly BasalRecord[],
  timezone: string = DEFAULT_EXPORT_TIMEZONE
): InsulinSummary {
  const dates = new Set<string>();
  let totalBolus = 0;
  let totalBasal = 0;
  let totalCarbs = 0;

  for (const bolus of boluses) {
    dates.add(formatDateInTimezone(bolus.timestamp, timezone));
    totalBolus += bolus.insulinDeliveredUnits;
    totalCarbs += bolus.carbsInputGrams;
  }

  for (const basal of basals) {
    dates.add(formatDateInTimezone(basal.timestamp, timezone));
    totalBasal += basalUnitsDelivered(basal);
  }

  const days = dates.size;
  const perDay = (total: number) => (days > 0 ? round1(total / days) : 0);

  return {
    days,
    totalBolusUnits: round1(totalBolus),
    totalBasalUnits: round1(totalBasal),
    bolusCount: boluses.filter((b) => b.insulinDeliveredUnits > 0).length,
    avgDailyBolus: perDay(totalBolus),
    avgDailyBasal: perDay(totalBasal),
    avgDailyCarbs: perDay(totalCarbs),
  };
}
