/**
 * Hour-of-day glucose profile
 */

import type { CgmReading } from "../models/index.js";
import { DEFAULT_EXPORT_TIMEZONE, getHourInTimezone } from "../time.js";
import { TARGET } from "./glucose-stats.js";

export interface HourlyBucket {
  /** Local hour 0-23 */
  hour: number;
  readingCount: number;
  /** mg/dL, one decimal; 0 when the bucket is empty */
  mean: number;
  min: number;
  max: number;
  /** Readings below 70 mg/dL */
  lowCount: number;
  /** Readings above 180 mg/dL */
  highCount: number;
}

/**
 * Bucket readings by local hour in `timezone`. Always returns 24 buckets.
 */
export function buildHourlyProfile(
  readings: readonly Pick<CgmReading, "timestamp" | "glucoseMgDl">[],
  timezone: string = DEFAULT_EXPORT_TIMEZONE
): HourlyBucket[] {
  const sums = new Array<number>(24).fill(0);
  const buckets: HourlyBucket[] = Array.from({ length: 24 }, (_, hour) => ({
    hour,
    readingCount: 0,
    mean: 0,
    min: 0,
    max: 0,
    lowCount: 0,
    highCount: 0,
  }));

  for (const { timestamp, glucoseMgDl } of readings) {
    const hour = getHourInTimezone(timestamp, timezone);
    const bucket = buckets[hour];

    if (bucket.readingCount === 0) {
      bucket.min = glucoseMgDl;
      bucket.max = glucoseMgDl;
    } else {
      bucket.min = Math.min(bucket.min, glucoseMgDl);
      bucket.max = Math.max(bucket.max, glucoseMgDl);
    }
    bucket.readingCount++;
    sums[hour] += glucoseMgDl;

    if (glucoseMgDl < TARGET.LOW) bucket.lowCount++;
    else if (glucoseMgDl > TARGET.HIGH) bucket.highCount++;
  }

  for (const bucket of buckets) {
    if (bucket.readingCount > 0) {
      bucket.mean = Math.round((sums[bucket.hour] / bucket.readingCount) * 10) / 10;
    }
  }

  return buckets;
}
