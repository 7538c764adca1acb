/**
 * A completion provider failed or returned nothing usable
 */
export class LlmError extends Error {
  /** HTTP status from the provider, when there was a response */
  readonly status?: number;
  /** Whether trying again may succeed (rate limits, provider outages) */
  readonly retryable: boolean;

  constructor(
    message: string,
    options: { status?: number; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "LlmError";
    this.status = options.status;
    this.retryable = options.retryable ?? false;
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}
