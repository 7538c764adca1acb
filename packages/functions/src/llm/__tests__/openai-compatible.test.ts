import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { CompletionRequest } from "@pump-advisor/diabetes";
import { OpenAICompatibleClient } from "../openai-compatible";
import { LlmError } from "../errors";

const REQUEST: CompletionRequest = {
  system: "You are a test.",
  messages: [
    { role: "user", content: "Hello" },
    { role: "assistant", content: "```markdown" },
  ],
};

describe("OpenAICompatibleClient", () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  const originalFetch = global.fetch;

  beforeEach(() => {
    fetchMock = vi.fn();
    global.fetch = fetchMock;
  });

  afterEach(() => {
    global.fetch = originalFetch;
    vi.clearAllMocks();
  });

  const client = new OpenAICompatibleClient({
    baseUrl: "https://llm.example.test/v1/",
    model: "test-model",
    apiKey: "test-secret",
    maxTokens: 256,
    temperature: 0.5,
  });

  it("posts system, user and prefill messages", async () => {
    fetchMock.mockResolvedValueOnce({
      ok: true,
      json: () => Promise.resolve({ choices: [{ message: { content: "Reduce basal" } }] }),
    });

    await expect(client.complete(REQUEST)).resolves.toBe("Reduce basal");

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.example.test/v1/chat/completions");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(init.body)).toEqual({
      model: "test-model",
      messages: [
        { role: "system", content: "You are a test." },
        { role: "user", content: "Hello" },
        { role: "assistant", content: "```markdown" },
      ],
      max_tokens: 256,
      temperature: 0.5,
      stream: false,
    });
  });

  it("omits Authorization without an API key", async () => {
    const local = new OpenAICompatibleClient({
      baseUrl: "http://localhost:11434/v1",
      model: "llama3",
      maxTokens: 256,
      temperature: 0.2,
    });
    fetchMock.mockResolvedValueOnce({
      ok: true,
      json: () => Promise.resolve({ choices: [{ message: { content: "ok" } }] }),
    });

    await local.complete(REQUEST);

    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:11434/v1/chat/completions");
    expect(fetchMock.mock.calls[0][1].headers).toEqual({ "Content-Type": "application/json" });
  });

  it("carries status and body of failed responses", async () => {
    fetchMock.mockResolvedValueOnce({
      ok: false,
      status: 429,
      text: () => Promise.resolve("slow down"),
    });

    const error = await client.complete(REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({
      message: "Completion API error (429): slow down",
      status: 429,
      retryable: true,
    });
  });

  it("does not retry client errors", async () => {
    fetchMock.mockResolvedValueOnce({
      ok: false,
      status: 401,
      text: () => Promise.resolve("bad key"),
    });

    await expect(client.complete(REQUEST)).rejects.toMatchObject({ status: 401, retryable: false });
  });

  it("treats network failures as retryable", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(client.complete(REQUEST)).rejects.toMatchObject({
      message: "Completion request failed: fetch failed",
      retryable: true,
    });
  });

  it("throws when the response has no content", async () => {
    fetchMock.mockResolvedValueOnce({
      ok: true,
      json: () => Promise.resolve({ choices: [] }),
    });

    await expect(client.complete(REQUEST)).rejects.toThrow("Model returned no text");
  });

  it("wraps a success response whose body is not JSON", async () => {
    const parseError = new SyntaxError("Unexpected token '<'");
    fetchMock.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: () => Promise.reject(parseError),
    });

    const error = await client.complete(REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({
      message: "Completion API returned a body that is not JSON",
      status: 200,
      retryable: false,
      cause: parseError,
    });
  });

  it("throws when the JSON body is null", async () => {
    fetchMock.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: () => Promise.resolve(null),
    });

    await expect(client.complete(REQUEST)).rejects.toThrow("Model returned no text");
  });

  it("keeps the status when an error body cannot be read", async () => {
    fetchMock.mockResolvedValueOnce({
      ok: false,
      status: 502,
      text: () => Promise.reject(new TypeError("terminated")),
    });

    const error = await client.complete(REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({
      message: "Completion API error (502): unreadable body (terminated)",
      status: 502,
      retryable: true,
    });
  });
});
