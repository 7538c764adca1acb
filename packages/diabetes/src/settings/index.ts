export {
  HOURS_PER_DAY,
  GLUCOSE_UNITS,
  SETTING_DEFAULTS,
  isGlucoseUnit,
  hourLabel,
  createDefaultSchedule,
  parseRatio,
  validatePumpSettings,
  toPromptSettings,
  type SettingsValidation,
  type PromptSettings,
} from "./schedule.js";
