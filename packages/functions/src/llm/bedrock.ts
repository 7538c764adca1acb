/**
 * Claude on Bedrock via InvokeModel with an Anthropic messages body
 */

import { BedrockRuntimeClient, InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import type { CompletionRequest } from "@pump-advisor/diabetes";
import { LlmError } from "./errors.js";
import type { CompletionClient } from "./types.js";

/** SDK exception names worth another attempt */
const RETRYABLE_ERRORS = new Set([
  "ThrottlingException",
  "ServiceUnavailableException",
  "InternalServerException",
  "ModelNotReadyException",
  "ModelTimeoutException",
]);

export interface BedrockClientOptions {
  modelId: string;
  maxTokens: number;
  temperature: number;
  region?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Concatenated text blocks of an Anthropic messages response
 */
export function extractText(body: unknown): string {
  if (!isRecord(body) || !Array.isArray(body.content)) return "";
  return body.content
    .map((block: unknown) =>
      isRecord(block) && block.type === "text" && typeof block.text === "string" ? block.text : ""
    )
    .join("");
}

export class BedrockCompletionClient implements CompletionClient {
  readonly model: string;
  private readonly client: BedrockRuntimeClient;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(options: BedrockClientOptions) {
    this.model = options.modelId;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.client = new BedrockRuntimeClient(options.region ? { region: options.region } : {});
  }

  async complete(request: CompletionRequest): Promise<string> {
    let body: Uint8Array;
    try {
      const response = await this.client.send(
        new InvokeModelCommand({
          modelId: this.model,
          contentType: "application/json",
          accept: "application/json",
          body: JSON.stringify({
            anthropic_version: "bedrock-2023-05-31",
            max_tokens: this.maxTokens,
            temperature: this.temperature,
            system: request.system,
            messages: request.messages,
          }),
        })
      );
      body = response.body;
    } catch (error) {
      const name = error instanceof Error ? error.name : "UnknownError";
      throw new LlmError(`Bedrock InvokeModel failed: ${name}`, {
        retryable: RETRYABLE_ERRORS.has(name),
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(new TextDecoder().decode(body));
    } catch (error) {
      throw new LlmError("Bedrock returned a body that is not JSON", { cause: error });
    }

    const text = extractText(parsed);
    if (!text) {
      throw new LlmError("Model returned no text");
    }
    return text;
  }
}
