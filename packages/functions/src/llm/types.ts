import type { CompletionRequest } from "@pump-advisor/diabetes";

/**
 * A chat model that can complete a system + messages request
 */
export interface CompletionClient {
  /** Model identifier reported back to callers */
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}
