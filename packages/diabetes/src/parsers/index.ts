/**
 * @pump-advisor/diabetes - Parsers
 *
 * ZIP extraction and Glooko CSV parsing
 */

// Glooko parser
export {
  parseGlookoExport,
  getFileType,
  filterAlarms,
  requireExportTables,
  NOISE_ALARM_EVENTS,
  REQUIRED_TABLES,
  type ExtractedCsv,
  type ParseResult,
  type ParseOptions,
} from "./glooko.js";

// ZIP extraction
export {
  extractCsvFilesFromZip,
  DEFAULT_MAX_UNCOMPRESSED_BYTES,
  type ZipExtractOptions,
} from "./zip.js";

// CSV utilities (for custom parsers)
export {
  MGDL_PER_MMOL,
  parseCsvLine,
  parseTimestamp,
  parseFloat0,
  createColumnMap,
  getColumn,
} from "./csv-utils.js";

// Validation utilities
export {
  VALIDATION,
  isValidGlucose,
  isValidInsulinBolus,
  isValidBasalRate,
  isValidCarbs,
} from "./validation.js";
