/**
 * @pump-advisor/diabetes - Analysis
 *
 * Descriptive statistics fed into the prompt
 */

// Glucose statistics
export {
  TARGET,
  EMPTY_GLUCOSE_STATS,
  calculateGlucoseStats,
  calculateTimeInRange,
  classifyGlucose,
  type GlucoseClass,
  type GlucoseValue,
  type GlucoseStats,
} from "./glucose-stats.js";

// Hour-of-day profile
export { buildHourlyProfile, type HourlyBucket } from "./hourly-profile.js";

// Insulin totals
export {
  summarizeInsulin,
  basalUnitsDelivered,
  type InsulinSummary,
} from "./insulin-summary.js";

// Units
export { mgdlToMmol, mmolToMgdl, fromMgdl, toMgdl } from "./units.js";

// Export window
export { getDataRange, type DataRange } from "./data-range.js";
