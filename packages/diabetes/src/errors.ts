/**
 * Errors raised while reading an export
 */

/**
 * The uploaded archive could not be read as a ZIP file
 */
export class ZipFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ZipFormatError";
  }
}

/**
 * The export parsed but lacks tables the analysis needs
 */
export class MissingDataError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required data: ${missing.join(", ")}`);
    this.name = "MissingDataError";
    this.missing = missing;
  }
}
