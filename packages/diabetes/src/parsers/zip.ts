/**
 * Extract CSV files from an export ZIP held in memory.
 *
 * Entries are located through the central directory rather than by walking
 * local headers, so archives written with data descriptors (sizes zeroed in
 * the local header) still extract.
 */

import { inflateRawSync } from "zlib";
import { ZipFormatError } from "../errors.js";
import type { ExtractedCsv } from "./glooko.js";

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const LOCAL_HEADER_SIGNATURE = 0x04034b50;

const EOCD_MIN_SIZE = 22;
const MAX_COMMENT_LENGTH = 0xffff;

const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

/** Default cap on the summed uncompressed size of extracted CSVs */
export const DEFAULT_MAX_UNCOMPRESSED_BYTES = 50 * 1024 * 1024;

export interface ZipExtractOptions {
  maxUncompressedBytes?: number;
}

interface CentralEntry {
  fileName: string;
  compressionMethod: number;
  compressedSize: number;
  uncompressedSize: number;
  localHeaderOffset: number;
}

function findEndOfCentralDirectory(buffer: Buffer): number {
  const lowest = Math.max(0, buffer.length - EOCD_MIN_SIZE - MAX_COMMENT_LENGTH);
  for (let offset = buffer.length - EOCD_MIN_SIZE; offset >= lowest; offset--) {
    if (buffer.readUInt32LE(offset) === EOCD_SIGNATURE) {
      return offset;
    }
  }
  return -1;
}

function readCentralDirectory(buffer: Buffer): CentralEntry[] {
  if (buffer.length < EOCD_MIN_SIZE) {
    throw new ZipFormatError("Not a ZIP archive");
  }

  const eocd = findEndOfCentralDirectory(buffer);
  if (eocd < 0) {
    throw new ZipFormatError("Not a ZIP archive");
  }

  const entryCount = buffer.readUInt16LE(eocd + 10);
  let offset = buffer.readUInt32LE(eocd + 16);
  const entries: CentralEntry[] = [];

  for (let i = 0; i < entryCount; i++) {
    if (offset + 46 > buffer.length || buffer.readUInt32LE(offset) !== CENTRAL_HEADER_SIGNATURE) {
      throw new ZipFormatError("Corrupt ZIP central directory");
    }

    const compressionMethod = buffer.readUInt16LE(offset + 10);
    const compressedSize = buffer.readUInt32LE(offset + 20);
    const uncompressedSize = buffer.readUInt32LE(offset + 24);
    const fileNameLength = buffer.readUInt16LE(offset + 28);
    const extraFieldLength = buffer.readUInt16LE(offset + 30);
    const commentLength = buffer.readUInt16LE(offset + 32);
    const localHeaderOffset = buffer.readUInt32LE(offset + 42);
    const fileName = buffer.toString("utf-8", offset + 46, offset + 46 + fileNameLength);

    entries.push({
      fileName,
      compressionMethod,
      compressedSize,
      uncompressedSize,
      localHeaderOffset,
    });

    offset += 46 + fileNameLength + extraFieldLength + commentLength;
  }

  return entries;
}

function readEntryData(buffer: Buffer, entry: CentralEntry): Buffer {
  const offset = entry.localHeaderOffset;
  if (offset + 30 > buffer.length || buffer.readUInt32LE(offset) !== LOCAL_HEADER_SIGNATURE) {
    throw new ZipFormatError(`Corrupt ZIP entry: ${entry.fileName}`);
  }

  const fileNameLength = buffer.readUInt16LE(offset + 26);
  const extraFieldLength = buffer.readUInt16LE(offset + 28);
  const dataOffset = offset + 30 + fileNameLength + extraFieldLength;
  const end = dataOffset + entry.compressedSize;
  if (end > buffer.length) {
    throw new ZipFormatError(`Truncated ZIP entry: ${entry.fileName}`);
  }

  return buffer.subarray(dataOffset, end);
}

/** Inflate raw DEFLATE data, failing once the output passes `remaining` bytes */
function inflateWithinBudget(data: Buffer, remaining: number, maxBytes: number): Buffer {
  try {
    // zlib requires a positive limit; a spent budget is caught by the caller's total check
    return inflateRawSync(data, { maxOutputLength: Math.max(1, remaining) });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new ZipFormatError(`Archive expands beyond ${maxBytes} bytes`);
    }
    throw error;
  }
}

/**
 * Extract every `.csv` entry from a ZIP buffer.
 * Directory entries and other files are ignored.
 */
export function extractCsvFilesFromZip(
  buffer: Buffer,
  options: ZipExtractOptions = {}
): ExtractedCsv[] {
  const maxBytes = options.maxUncompressedBytes ?? DEFAULT_MAX_UNCOMPRESSED_BYTES;
  const csvFiles: ExtractedCsv[] = [];
  let totalBytes = 0;

  for (const entry of readCentralDirectory(buffer)) {
    if (entry.fileName.endsWith("/")) continue;
    if (!entry.fileName.toLowerCase().endsWith(".csv")) continue;

    // macOS archivers add resource-fork twins under __MACOSX/
    if (entry.fileName.startsWith("__MACOSX/")) continue;

    // Declared sizes can understate the output, so real bytes are counted too
    if (totalBytes + entry.uncompressedSize > maxBytes) {
      throw new ZipFormatError(`Archive expands beyond ${maxBytes} bytes`);
    }

    const data = readEntryData(buffer, entry);
    let content: Buffer;

    if (entry.compressionMethod === METHOD_STORED) {
      content = data;
    } else if (entry.compressionMethod === METHOD_DEFLATE) {
      content = inflateWithinBudget(data, maxBytes - totalBytes, maxBytes);
    } else {
      console.warn(
        `Unsupported compression method ${entry.compressionMethod} for ${entry.fileName}, skipping`
      );
      continue;
    }

    totalBytes += content.length;
    if (totalBytes > maxBytes) {
      throw new ZipFormatError(`Archive expands beyond ${maxBytes} bytes`);
    }

    const text = content.toString("utf-8").replace(/^\uFEFF/, "");
    console.log(`Extracted ${entry.fileName}: ${text.length} bytes`);
    csvFiles.push({ fileName: entry.fileName, content: text });
  }

  return csvFiles;
}
