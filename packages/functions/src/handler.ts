/**
 * Lambda entry point for the analyze API (HTTP API, payload v2)
 */

import type { APIGatewayProxyHandlerV2 } from "aws-lambda";
import { loadConfig, type AppConfig } from "./config.js";
import { corsHeaders, errorResponse } from "./http.js";
import { createCompletionClient, type CompletionClient } from "./llm/index.js";
import { routeRequest } from "./router.js";

let runtime: { config: AppConfig; client: CompletionClient } | null = null;

function getRuntime() {
  if (!runtime) {
    const config = loadConfig();
    runtime = { config, client: createCompletionClient(config.llm) };
  }
  return runtime;
}

export const handler: APIGatewayProxyHandlerV2 = async (event) => {
  let deps: ReturnType<typeof getRuntime>;
  try {
    deps = getRuntime();
  } catch (error) {
    console.error("Failed to load configuration:", error);
    // Config never loaded, so the origin comes straight from the environment
    const result = errorResponse(500, "Internal error");
    return {
      ...result,
      headers: { ...result.headers, ...corsHeaders(process.env.CORS_ORIGIN?.trim() || "*") },
    };
  }

  const body =
    event.body !== undefined && event.isBase64Encoded
      ? Buffer.from(event.body, "base64").toString("utf-8")
      : event.body;

  return routeRequest(
    {
      method: event.requestContext.http.method,
      path: event.rawPath,
      query: event.queryStringParameters ?? {},
      body,
    },
    deps
  );
};
