import type { LlmConfig } from "../config.js";
import { BedrockCompletionClient } from "./bedrock.js";
import { OpenAICompatibleClient } from "./openai-compatible.js";
import type { CompletionClient } from "./types.js";

export { LlmError, isRetryableStatus } from "./errors.js";
export type { CompletionClient } from "./types.js";
export { BedrockCompletionClient, extractText, type BedrockClientOptions } from "./bedrock.js";
export { OpenAICompatibleClient, type OpenAICompatibleOptions } from "./openai-compatible.js";
export {
  calculateBackoff,
  withRetry,
  type BackoffOptions,
  type BackoffState,
  type RetryOptions,
} from "./retry.js";

export function createCompletionClient(config: LlmConfig): CompletionClient {
  switch (config.provider) {
    case "bedrock":
      return new BedrockCompletionClient({
        modelId: config.modelId,
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        region: config.region,
      });
    case "openai":
      return new OpenAICompatibleClient({
        baseUrl: config.baseUrl,
        model: config.modelId,
        apiKey: config.apiKey,
        maxTokens: config.maxTokens,
        temperature: config.temperature,
      });
  }
}
