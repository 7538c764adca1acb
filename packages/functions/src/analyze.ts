/**
 * Analyze pipeline: uploaded export + settings -> basal recommendation.
 *
 * Glucose values, the prompt and the model output are health data and are
 * never logged; only counts, sizes and timings are.
 */

import {
  buildCompletionRequest,
  calculateGlucoseStats,
  createDefaultSchedule,
  extractCsvFilesFromZip,
  getDataRange,
  isGlucoseUnit,
  parseGlookoExport,
  parseRecommendation,
  recordsOfType,
  requireExportTables,
  summarizeInsulin,
  validatePumpSettings,
  type DiabetesRecord,
  type DiabetesRecordType,
  type GlucoseStats,
  type InsulinSummary,
  type RecommendationSections,
} from "@pump-advisor/diabetes";
import type { AppConfig } from "./config.js";
import { errorResponse, jsonResponse, type HttpResult } from "./http.js";
import { LlmError, withRetry, type CompletionClient, type RetryOptions } from "./llm/index.js";

export interface AnalyzeDeps {
  config: AppConfig;
  client: CompletionClient;
  retry?: RetryOptions;
}

export interface AnalyzeSummary {
  counts: Partial<Record<DiabetesRecordType, number>>;
  /** CGM statistics in mg/dL */
  glucose: GlucoseStats;
  insulin: InsulinSummary;
  /** ISO timestamps of the first and last record */
  dataStart: string | null;
  dataEnd: string | null;
  /** Files that failed to parse */
  parseErrors: number;
}

export interface AnalyzeResponse {
  recommendation: string;
  sections: RecommendationSections;
  model: string;
  summary: AnalyzeSummary;
}

interface UploadPayload {
  fileName: string;
  archive: string;
  settings: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readUpload(payload: unknown): UploadPayload | null {
  if (!isRecord(payload)) return null;
  const { fileName, archive, settings } = payload;
  if (typeof fileName !== "string" || !fileName.toLowerCase().endsWith(".zip")) return null;
  if (typeof archive !== "string" || archive.length === 0) return null;
  return { fileName, archive, settings };
}

/** Decoded size of a base64 string, without decoding it */
function base64DecodedLength(base64: string): number {
  const trimmed = base64.replace(/\s/g, "");
  const padding = trimmed.endsWith("==") ? 2 : trimmed.endsWith("=") ? 1 : 0;
  return Math.floor((trimmed.length * 3) / 4) - padding;
}

function summarize(
  records: DiabetesRecord[],
  counts: AnalyzeSummary["counts"],
  parseErrors: number,
  timezone: string
): AnalyzeSummary {
  const range = getDataRange(records);
  return {
    counts,
    glucose: calculateGlucoseStats(recordsOfType(records, "cgm")),
    insulin: summarizeInsulin(recordsOfType(records, "bolus"), recordsOfType(records, "basal"), timezone),
    dataStart: range ? new Date(range.start).toISOString() : null,
    dataEnd: range ? new Date(range.end).toISOString() : null,
    parseErrors,
  };
}

export async function processAnalyzeRequest(
  body: string | undefined,
  deps: AnalyzeDeps
): Promise<HttpResult> {
  const { config, client } = deps;

  if (!body || !body.trim()) {
    return errorResponse(400, "Empty request body");
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return errorResponse(400, "Invalid JSON");
  }

  const upload = readUpload(payload);
  if (!upload) {
    return errorResponse(400, "Invalid file");
  }

  if (base64DecodedLength(upload.archive) > config.maxUploadBytes) {
    console.warn(`Rejected upload over ${config.maxUploadBytes} bytes`);
    return errorResponse(413, "File too large");
  }

  const validation = validatePumpSettings(upload.settings);
  if (!validation.ok) {
    return errorResponse(400, "Invalid settings", validation.errors);
  }
  const settings = validation.settings;

  let parsed: ReturnType<typeof parseGlookoExport>;
  try {
    const zipBuffer = Buffer.from(upload.archive, "base64");
    const csvFiles = extractCsvFilesFromZip(zipBuffer, {
      maxUncompressedBytes: config.maxUploadBytes * 10,
    });
    parsed = parseGlookoExport(csvFiles, { timezone: config.exportTimezone });
    requireExportTables(parsed);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`Export rejected: ${message}`);
    return errorResponse(422, `Error processing files: ${message}`);
  }

  const request = buildCompletionRequest(
    { settings, records: parsed.records },
    { timezone: config.exportTimezone, maxRowsPerTable: config.maxRowsPerTable }
  );
  console.log(`Prompt built: ${request.messages[0].content.length} chars`);

  let completion: string;
  const startTime = Date.now();
  try {
    completion = await withRetry(() => client.complete(request), deps.retry);
  } catch (error) {
    if (error instanceof LlmError) {
      console.error(`Completion failed after ${Date.now() - startTime}ms: ${error.message}`);
      return errorResponse(502, "Recommendation service unavailable");
    }
    throw error;
  }
  console.log(`Completion from ${client.model} in ${Date.now() - startTime}ms`);

  const { text, sections } = parseRecommendation(completion);
  const response: AnalyzeResponse = {
    recommendation: text,
    sections,
    model: client.model,
    summary: summarize(parsed.records, parsed.counts, parsed.errors.length, config.exportTimezone),
  };
  return jsonResponse(200, response);
}

/**
 * Default 24-hour schedule for the requested unit
 */
export function getDefaultSettings(units: string | undefined): HttpResult {
  if (units === undefined || units === "") {
    return jsonResponse(200, createDefaultSchedule());
  }
  if (!isGlucoseUnit(units)) {
    return errorResponse(400, "Units must be one of mmol/L, mg/dL");
  }
  return jsonResponse(200, createDefaultSchedule(units));
}
