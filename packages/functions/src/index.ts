/**
 * @pump-advisor/functions
 *
 * Analyze API shared by the Lambda handler, the local server and the CLI
 */

export { ConfigError, loadConfig, LLM_PROVIDERS, DEFAULT_OPENAI_BASE_URL, DEFAULT_OPENAI_MODEL } from "./config.js";
export type { AppConfig, LlmConfig, LlmProvider } from "./config.js";
export { corsHeaders, errorResponse, jsonResponse, type HttpRequest, type HttpResult } from "./http.js";
export {
  processAnalyzeRequest,
  getDefaultSettings,
  type AnalyzeDeps,
  type AnalyzeResponse,
  type AnalyzeSummary,
} from "./analyze.js";
export { routeRequest } from "./router.js";
export { handler } from "./handler.js";
export * from "./llm/index.js";
