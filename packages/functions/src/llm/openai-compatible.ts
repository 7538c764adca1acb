/**
 * OpenAI-compatible chat completions (Groq, OpenAI, Ollama, LM Studio)
 */

import type { CompletionRequest } from "@pump-advisor/diabetes";
import { LlmError, isRetryableStatus } from "./errors.js";
import type { CompletionClient } from "./types.js";

export interface OpenAICompatibleOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  maxTokens: number;
  temperature: number;
}

interface ChatCompletionResponse {
  choices?: { message?: { content?: unknown } }[];
}

export class OpenAICompatibleClient implements CompletionClient {
  readonly model: string;
  private readonly options: OpenAICompatibleOptions;

  constructor(options: OpenAICompatibleOptions) {
    this.model = options.model;
    this.options = options;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const url = `${this.options.baseUrl.replace(/\/$/, "")}/chat/completions`;
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: "system", content: request.system }, ...request.messages],
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
          stream: false,
        }),
      });
    } catch (error) {
      throw new LlmError(
        `Completion request failed: ${error instanceof Error ? error.message : String(error)}`,
        { retryable: true, cause: error }
      );
    }

    if (!response.ok) {
      let errorText: string;
      try {
        errorText = await response.text();
      } catch (error) {
        errorText = `unreadable body (${error instanceof Error ? error.message : String(error)})`;
      }
      throw new LlmError(`Completion API error (${response.status}): ${errorText}`, {
        status: response.status,
        retryable: isRetryableStatus(response.status),
      });
    }

    let data: ChatCompletionResponse | null;
    try {
      data = await response.json();
    } catch (error) {
      throw new LlmError("Completion API returned a body that is not JSON", {
        status: response.status,
        cause: error,
      });
    }

    const content = data?.choices?.[0]?.message?.content;
    if (typeof content !== "string" || !content) {
      throw new LlmError("Model returned no text");
    }
    return content;
  }
}
