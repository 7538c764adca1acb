import type { AnalyzeResponse } from "@pump-advisor/functions";
import type { GlucoseUnit } from "@pump-advisor/diabetes";

export type { AnalyzeResponse };

/**
 * Settings as edited in the form. Numbers stay strings until the server
 * validates them.
 */
export interface SettingsFormRow {
  timeRange: string;
  basalRate: string;
  correctionFactor: string;
  carbRatio: string;
  targetBg: string;
}

export interface SettingsForm {
  units: GlucoseUnit;
  timedSettings: SettingsFormRow[];
}

export class ApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ApiError";
    this.status = status;
  }
}

export function getApiUrl(): string {
  return (import.meta.env.VITE_API_URL || "/api").replace(/\/$/, "");
}

/**
 * Base64 contents of a file, without the data URL prefix
 */
export function readFileAsBase64(file: Blob): Promise<string> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => {
      const result = typeof reader.result === "string" ? reader.result : "";
      resolve(result.slice(result.indexOf(",") + 1));
    };
    reader.onerror = () => reject(reader.error ?? new Error("Could not read file"));
    reader.readAsDataURL(file);
  });
}

function isAnalyzeResponse(payload: unknown): payload is AnalyzeResponse {
  return (
    typeof payload === "object" &&
    payload !== null &&
    "recommendation" in payload &&
    typeof payload.recommendation === "string"
  );
}

function errorMessage(payload: unknown, status: number): string {
  if (typeof payload === "object" && payload !== null && "error" in payload) {
    const { error } = payload;
    if (typeof error === "string") return error;
  }
  return `Request failed (${status})`;
}

export async function analyzeExport(file: File, settings: SettingsForm): Promise<AnalyzeResponse> {
  const archive = await readFileAsBase64(file);

  const response = await fetch(`${getApiUrl()}/analyze`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ fileName: file.name, archive, settings }),
  });

  const payload: unknown = await response.json().catch(() => null);
  if (!response.ok) {
    throw new ApiError(errorMessage(payload, response.status), response.status);
  }
  if (!isAnalyzeResponse(payload)) {
    throw new ApiError("Unexpected response from server", response.status);
  }
  return payload;
}
