/**
 * Command implementations, kept apart from argument parsing for tests
 */

import { readFileSync } from "fs";
import {
  DEFAULT_EXPORT_TIMEZONE,
  DEFAULT_MAX_ROWS_PER_TABLE,
  assertValidTimezone,
  buildCompletionRequest,
  createDefaultSchedule,
  extractCsvFilesFromZip,
  isGlucoseUnit,
  parseGlookoExport,
  parseRecommendation,
  requireExportTables,
  validatePumpSettings,
  type CompletionRequest,
  type GlucoseUnit,
  type PumpSettings,
} from "@pump-advisor/diabetes";
import {
  createCompletionClient,
  loadConfig,
  withRetry,
  type CompletionClient,
} from "@pump-advisor/functions";

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

export interface AnalyzeOptions {
  settings?: string;
  units?: string;
  timezone?: string;
  dryRun?: boolean;
}

export function parseUnits(value: string | undefined): GlucoseUnit | undefined {
  if (value === undefined) return undefined;
  if (!isGlucoseUnit(value)) {
    throw new CliError(`Unknown units "${value}" (expected mmol/L or mg/dL)`);
  }
  return value;
}

/**
 * Settings from a JSON file, or the default schedule. `--units` overrides
 * the file's unit.
 */
export function loadSettings(path: string | undefined, units: GlucoseUnit | undefined): PumpSettings {
  if (!path) {
    return createDefaultSchedule(units);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new CliError(
      `Could not read settings from ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const input = units && typeof raw === "object" && raw !== null ? { ...raw, units } : raw;
  const result = validatePumpSettings(input);
  if (!result.ok) {
    throw new CliError(`Invalid settings in ${path}:\n  ${result.errors.join("\n  ")}`);
  }
  return result.settings;
}

function resolveTimezone(timezone: string | undefined, env: NodeJS.ProcessEnv): string {
  const resolved = timezone ?? env.EXPORT_TIMEZONE ?? DEFAULT_EXPORT_TIMEZONE;
  try {
    assertValidTimezone(resolved);
  } catch {
    throw new CliError(`Unknown timezone "${resolved}"`);
  }
  return resolved;
}

export function buildRequestFromArchive(
  zip: Buffer,
  settings: PumpSettings,
  timezone: string,
  maxRowsPerTable: number = DEFAULT_MAX_ROWS_PER_TABLE
): CompletionRequest {
  const parsed = parseGlookoExport(extractCsvFilesFromZip(zip), { timezone });
  for (const error of parsed.errors) {
    console.warn(error);
  }
  requireExportTables(parsed);
  return buildCompletionRequest({ settings, records: parsed.records }, { timezone, maxRowsPerTable });
}

export function formatDryRun(request: CompletionRequest): string {
  const user = request.messages.find((m) => m.role === "user");
  return ["=== System ===", request.system, "", "=== User ===", user?.content ?? ""].join("\n");
}

/**
 * Run the analysis and return what the command prints
 */
export async function runAnalyze(
  zipPath: string,
  options: AnalyzeOptions,
  env: NodeJS.ProcessEnv = process.env,
  createClient: (env: NodeJS.ProcessEnv) => CompletionClient = (e) =>
    createCompletionClient(loadConfig(e).llm)
): Promise<string> {
  const settings = loadSettings(options.settings, parseUnits(options.units));
  const timezone = resolveTimezone(options.timezone, env);

  let zip: Buffer;
  try {
    zip = readFileSync(zipPath);
  } catch (error) {
    throw new CliError(
      `Could not read ${zipPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const request = buildRequestFromArchive(zip, settings, timezone);
  if (options.dryRun) {
    return formatDryRun(request);
  }

  const client = createClient(env);
  console.error(`Asking ${client.model}...`);
  const completion = await withRetry(() => client.complete(request));
  return parseRecommendation(completion).text;
}

export function formatDefaults(units: string | undefined): string {
  return JSON.stringify(createDefaultSchedule(parseUnits(units)), null, 2);
}
