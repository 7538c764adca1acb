/**
 * Transport-neutral request/response shapes shared by the Lambda handler
 * and the local server
 */

export interface HttpRequest {
  method: string;
  path: string;
  query: Record<string, string | undefined>;
  body?: string;
}

export interface HttpResult {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export function jsonResponse(statusCode: number, payload: unknown): HttpResult {
  return {
    statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
  };
}

export function errorResponse(statusCode: number, error: string, details?: string[]): HttpResult {
  return jsonResponse(statusCode, details ? { error, details } : { error });
}

export function corsHeaders(origin: string): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": origin,
    "Access-Control-Allow-Methods": "GET,POST,OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
  };
}
