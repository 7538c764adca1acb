import { getDefaultSettings, processAnalyzeRequest, type AnalyzeDeps } from "./analyze.js";
import { corsHeaders, errorResponse, type HttpRequest, type HttpResult } from "./http.js";

/**
 * Dispatch a request to the analyze API. Unexpected errors become a 500.
 */
export async function routeRequest(request: HttpRequest, deps: AnalyzeDeps): Promise<HttpResult> {
  const cors = corsHeaders(deps.config.corsOrigin);
  const withCors = (result: HttpResult): HttpResult => ({
    ...result,
    headers: { ...result.headers, ...cors },
  });

  const method = request.method.toUpperCase();
  const path = request.path.replace(/\/+$/, "") || "/";

  if (method === "OPTIONS") {
    return withCors({ statusCode: 204, headers: {}, body: "" });
  }

  try {
    if (method === "POST" && path === "/analyze") {
      return withCors(await processAnalyzeRequest(request.body, deps));
    }
    if (method === "GET" && path === "/settings/default") {
      return withCors(getDefaultSettings(request.query.units));
    }
    return withCors(errorResponse(404, "Not found"));
  } catch (error) {
    console.error("Analyze API error:", error);
    return withCors(errorResponse(500, "Internal error"));
  }
}
