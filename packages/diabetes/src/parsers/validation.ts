/**
 * Medical value validation for diabetes data
 */

/**
 * Physiological limits for medical values.
 * Values outside these ranges are treated as device or entry errors.
 */
export const VALIDATION = {
  /** Glucose (mg/dL); below is sensor error, above is meter "HI" */
  GLUCOSE_MIN: 20,
  GLUCOSE_MAX: 600,
  /** Single bolus (units) */
  INSULIN_BOLUS_MAX: 100,
  /** Basal rate (U/hr) */
  INSULIN_BASAL_RATE_MAX: 10,
  /** Carbs per entry (grams) */
  CARBS_MAX: 500,
} as const;

export function isValidGlucose(value: number): boolean {
  return value >= VALIDATION.GLUCOSE_MIN && value <= VALIDATION.GLUCOSE_MAX;
}

export function isValidInsulinBolus(value: number): boolean {
  return value > 0 && value <= VALIDATION.INSULIN_BOLUS_MAX;
}

/**
 * Zero is valid: suspended delivery exports a 0 U/hr rate
 */
export function isValidBasalRate(value: number): boolean {
  return value >= 0 && value <= VALIDATION.INSULIN_BASAL_RATE_MAX;
}

export function isValidCarbs(value: number): boolean {
  return value > 0 && value <= VALIDATION.CARBS_MAX;
}
