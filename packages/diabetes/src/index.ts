/**
 * @pump-advisor/diabetes
 *
 * Export parsing, pump settings and prompt building for settings analysis
 *
 * @example
 * ```typescript
 * import {
 *   extractCsvFilesFromZip,
 *   parseGlookoExport,
 *   requireExportTables,
 *   buildCompletionRequest,
 * } from "@pump-advisor/diabetes";
 *
 * const parsed = parseGlookoExport(extractCsvFilesFromZip(zipBuffer));
 * requireExportTables(parsed);
 * const request = buildCompletionRequest({ settings, records: parsed.records });
 * ```
 */

// Models - Type definitions
export * from "./models/index.js";

// Errors
export { ZipFormatError, MissingDataError } from "./errors.js";

// Timezone helpers
export {
  DEFAULT_EXPORT_TIMEZONE,
  formatDateInTimezone,
  formatDateTimeInTimezone,
  getHourInTimezone,
  assertValidTimezone,
} from "./time.js";

// Parsers - ZIP and CSV
export * from "./parsers/index.js";

// Pump settings schedule
export * from "./settings/index.js";

// Analysis - Computed metrics
export * from "./analysis/index.js";

// Prompt building
export * from "./prompt/index.js";

// Model output
export * from "./recommendation/index.js";
