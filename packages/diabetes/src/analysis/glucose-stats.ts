/**
 * Glucose statistical analysis functions
 */

/**
 * Target range constants (mg/dL)
 */
export const TARGET = {
  LOW: 70,
  HIGH: 180,
  TIGHT_HIGH: 140,
  URGENT_LOW: 54,
  VERY_HIGH: 250,
} as const;

export type GlucoseClass = "urgent_low" | "low" | "normal" | "high" | "very_high";

/**
 * Anything carrying a glucose value in mg/dL
 */
export interface GlucoseValue {
  glucoseMgDl: number;
}

/**
 * Glucose statistics result
 */
export interface GlucoseStats {
  /** Minimum glucose value */
  min: number;
  /** Maximum glucose value */
  max: number;
  /** Mean glucose value */
  mean: number;
  /** Standard deviation */
  stdDev: number;
  /** Coefficient of variation (stdDev/mean * 100) */
  cv: number;
  /** Time in range percentage (70-180 mg/dL) */
  tir: number;
  /** Time below range percentage (<70 mg/dL) */
  tbr: number;
  /** Time above range percentage (>180 mg/dL) */
  tar: number;
  /** Time in tight range percentage (70-140 mg/dL) */
  titr: number;
  /** Number of readings analyzed */
  readingCount: number;
  /** Estimated A1C from mean glucose */
  estimatedA1c: number;
  /** Glucose Management Indicator (GMI) */
  gmi: number;
}

export const EMPTY_GLUCOSE_STATS: Readonly<GlucoseStats> = {
  min: 0,
  max: 0,
  mean: 0,
  stdDev: 0,
  cv: 0,
  tir: 0,
  tbr: 0,
  tar: 0,
  titr: 0,
  readingCount: 0,
  estimatedA1c: 0,
  gmi: 0,
};

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Calculate glucose statistics from readings (all values mg/dL)
 */
export function calculateGlucoseStats(readings: readonly GlucoseValue[]): GlucoseStats {
  const n = readings.length;
  if (n === 0) {
    return { ...EMPTY_GLUCOSE_STATS };
  }

  // Single pass; exports run to tens of thousands of CGM rows
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  let inRange = 0;
  let belowRange = 0;
  let aboveRange = 0;
  let inTightRange = 0;

  for (const { glucoseMgDl: v } of readings) {
    if (v < min) min = v;
    if (v > max) max = v;
    sum += v;
    if (v < TARGET.LOW) belowRange++;
    else if (v > TARGET.HIGH) aboveRange++;
    else inRange++;
    if (v >= TARGET.LOW && v <= TARGET.TIGHT_HIGH) inTightRange++;
  }

  const mean = sum / n;

  let squaredDiffs = 0;
  for (const { glucoseMgDl: v } of readings) {
    squaredDiffs += (v - mean) ** 2;
  }
  const stdDev = Math.sqrt(squaredDiffs / n);
  const cv = mean > 0 ? (stdDev / mean) * 100 : 0;

  // ADAG: A1C = (mean + 46.7) / 28.7
  const estimatedA1c = (mean + 46.7) / 28.7;
  const gmi = 3.31 + 0.02392 * mean;

  return {
    min: Math.round(min),
    max: Math.round(max),
    mean: round1(mean),
    stdDev: round1(stdDev),
    cv: round1(cv),
    tir: round1((inRange / n) * 100),
    tbr: round1((belowRange / n) * 100),
    tar: round1((aboveRange / n) * 100),
    titr: round1((inTightRange / n) * 100),
    readingCount: n,
    estimatedA1c: round1(estimatedA1c),
    gmi: round1(gmi),
  };
}

/**
 * Percentage of readings within [lowThreshold, highThreshold]
 */
export function calculateTimeInRange(
  readings: readonly GlucoseValue[],
  lowThreshold: number = TARGET.LOW,
  highThreshold: number = TARGET.HIGH
): number {
  if (readings.length === 0) return 0;

  const inRange = readings.filter(
    (r) => r.glucoseMgDl >= lowThreshold && r.glucoseMgDl <= highThreshold
  ).length;

  return Math.round((inRange / readings.length) * 1000) / 10;
}

/**
 * Classify a glucose value
 */
export function classifyGlucose(value: number): GlucoseClass {
  if (value < TARGET.URGENT_LOW) return "urgent_low";
  if (value < TARGET.LOW) return "low";
  if (value <= TARGET.HIGH) return "normal";
  if (value <= TARGET.VERY_HIGH) return "high";
  return "very_high";
}
