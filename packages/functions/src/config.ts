/**
 * Runtime configuration, read once from the environment
 */

import { DEFAULT_EXPORT_TIMEZONE, DEFAULT_MAX_ROWS_PER_TABLE, assertValidTimezone } from "@pump-advisor/diabetes";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type LlmProvider = "bedrock" | "openai";

export const LLM_PROVIDERS: readonly LlmProvider[] = ["bedrock", "openai"];

export const DEFAULT_OPENAI_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_OPENAI_MODEL = "llama-3.1-70b-versatile";

export interface LlmConfig {
  provider: LlmProvider;
  modelId: string;
  apiKey?: string;
  baseUrl: string;
  maxTokens: number;
  temperature: number;
  /** Bedrock region; the SDK falls back to its own resolution when unset */
  region?: string;
}

export interface AppConfig {
  llm: LlmConfig;
  exportTimezone: string;
  maxUploadBytes: number;
  maxRowsPerTable: number;
  corsOrigin: string;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw) || parseInt(raw, 10) <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function readTemperature(env: Env, fallback: number): number {
  const raw = readString(env, "LLM_TEMPERATURE");
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 2) {
    throw new ConfigError(`LLM_TEMPERATURE must be a number between 0 and 2, got "${raw}"`);
  }
  return value;
}

function isLlmProvider(value: string): value is LlmProvider {
  return value === "bedrock" || value === "openai";
}

/** Local model servers (Ollama, LM Studio) take no API key */
function isLocalUrl(url: string): boolean {
  try {
    const { hostname } = new URL(url);
    return hostname === "localhost" || hostname === "127.0.0.1" || hostname === "[::1]";
  } catch {
    throw new ConfigError(`LLM_BASE_URL is not a valid URL: "${url}"`);
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const provider = readString(env, "LLM_PROVIDER") ?? "bedrock";
  if (!isLlmProvider(provider)) {
    throw new ConfigError(
      `LLM_PROVIDER must be one of ${LLM_PROVIDERS.join(", ")}, got "${provider}"`
    );
  }

  const baseUrl = readString(env, "LLM_BASE_URL") ?? DEFAULT_OPENAI_BASE_URL;
  const apiKey = readString(env, "LLM_API_KEY");

  let modelId = readString(env, "MODEL_ID");
  if (provider === "bedrock") {
    if (!modelId) {
      throw new ConfigError("MODEL_ID environment variable must be set for the bedrock provider");
    }
  } else {
    modelId = modelId ?? DEFAULT_OPENAI_MODEL;
    if (!apiKey && !isLocalUrl(baseUrl)) {
      throw new ConfigError("LLM_API_KEY must be set for the openai provider");
    }
  }

  const exportTimezone = readString(env, "EXPORT_TIMEZONE") ?? DEFAULT_EXPORT_TIMEZONE;
  try {
    assertValidTimezone(exportTimezone);
  } catch {
    throw new ConfigError(`EXPORT_TIMEZONE is not a known timezone: "${exportTimezone}"`);
  }

  return {
    llm: {
      provider,
      modelId,
      apiKey,
      baseUrl,
      maxTokens: readPositiveInt(env, "LLM_MAX_TOKENS", 1024),
      temperature: readTemperature(env, 0.2),
      region: readString(env, "AWS_REGION"),
    },
    exportTimezone,
    maxUploadBytes: readPositiveInt(env, "MAX_UPLOAD_BYTES", 10 * 1024 * 1024),
    maxRowsPerTable: readPositiveInt(env, "MAX_ROWS_PER_TABLE", DEFAULT_MAX_ROWS_PER_TABLE),
    corsOrigin: readString(env, "CORS_ORIGIN") ?? "*",
  };
}
