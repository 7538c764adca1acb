import { describe, it, expect, vi, afterEach } from "vitest";
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda";
import { handler } from "../handler";

function createEvent(method: string, rawPath: string): APIGatewayProxyEventV2 {
  return {
    rawPath,
    requestContext: { http: { method } },
  } as unknown as APIGatewayProxyEventV2;
}

async function invoke(event: APIGatewayProxyEventV2) {
  return (await handler(event, {} as never, () => {})) as APIGatewayProxyStructuredResultV2;
}

// Kept apart from handler.test.ts: the handler caches its runtime once config loads
describe("analyze handler without valid configuration", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("returns 500 with CORS headers so browsers can read the error", async () => {
    vi.stubEnv("LLM_PROVIDER", "cohere");
    vi.stubEnv("CORS_ORIGIN", "https://app.example.test");
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});

    const result = await invoke(createEvent("POST", "/analyze"));

    expect(result.statusCode).toBe(500);
    expect(JSON.parse(result.body ?? "")).toEqual({ error: "Internal error" });
    expect(result.headers).toEqual({
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "https://app.example.test",
      "Access-Control-Allow-Methods": "GET,POST,OPTIONS",
      "Access-Control-Allow-Headers": "Content-Type",
    });
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it("falls back to any origin when CORS_ORIGIN is unset", async () => {
    vi.stubEnv("LLM_PROVIDER", "cohere");
    vi.stubEnv("CORS_ORIGIN", "");
    vi.spyOn(console, "error").mockImplementation(() => {});

    const result = await invoke(createEvent("OPTIONS", "/analyze"));

    expect(result.statusCode).toBe(500);
    expect(result.headers?.["Access-Control-Allow-Origin"]).toBe("*");
  });
});
