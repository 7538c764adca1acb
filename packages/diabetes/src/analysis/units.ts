/**
 * Glucose unit conversion
 */

import type { GlucoseUnit } from "../models/index.js";
import { MGDL_PER_MMOL } from "../parsers/csv-utils.js";

/** mg/dL to mmol/L, one decimal place */
export function mgdlToMmol(value: number): number {
  return Math.round((value / MGDL_PER_MMOL) * 10) / 10;
}

/** mmol/L to whole mg/dL */
export function mmolToMgdl(value: number): number {
  return Math.round(value * MGDL_PER_MMOL);
}

/**
 * Express an internal mg/dL value in the display unit
 */
export function fromMgdl(value: number, unit: GlucoseUnit): number {
  return unit === "mmol/L" ? mgdlToMmol(value) : Math.round(value);
}

/**
 * Convert a value entered in `unit` to mg/dL
 */
export function toMgdl(value: number, unit: GlucoseUnit): number {
  return unit === "mmol/L" ? mmolToMgdl(value) : value;
}
