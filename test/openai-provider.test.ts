import { afterEach, describe, expect, it } from "vitest";
import { OpenAIProvider } from "../src/providers/openai-provider";
import { ModelNotFoundError, ProviderError, RateLimitError } from "../src/providers/provider.interface";
import { startStubApi, StubApi } from "./helpers";

let stub: StubApi | undefined;

afterEach(async () => {
  await stub?.close();
  stub = undefined;
});

describe("openai provider", () => {
  it("posts a chat completion and returns the first choice", async () => {
    stub = await startStubApi({
      "/chat/completions": [
        {
          status: 200,
          body: {
            id: "chatcmpl-1",
            model: "gpt-test",
            choices: [{ message: { role: "assistant", content: "Roughly 90 minutes." }, finish_reason: "stop" }],
            usage: { prompt_tokens: 30, completion_tokens: 6, total_tokens: 36 }
          }
        }
      ]
    });
    const provider = new OpenAIProvider({
      apiKey: "test-openai-key",
      baseUrl: stub.baseUrl,
      model: "gpt-test",
      organization: "org-test"
    });

    const response = await provider.chat({
      messages: [{ role: "user", content: "estimate this" }],
      max_tokens: 500
    });

    expect(response).toEqual({
      id: "chatcmpl-1",
      model: "gpt-test",
      content: "Roughly 90 minutes.",
      finish_reason: "stop",
      usage: { prompt_tokens: 30, completion_tokens: 6, total_tokens: 36 }
    });

    const [request] = stub.requests;
    expect(request.url).toBe("/chat/completions");
    expect(request.headers.authorization).toBe("Bearer test-openai-key");
    expect(request.headers["openai-organization"]).toBe("org-test");
    expect(request.body).toEqual({
      model: "gpt-test",
      messages: [{ role: "user", content: "estimate this" }],
      max_tokens: 500
    });
  });

  it("returns empty content when the response has no choices", async () => {
    stub = await startStubApi({
      "/chat/completions": [{ status: 200, body: { id: "chatcmpl-2", model: "gpt-4", choices: [] } }]
    });
    const provider = new OpenAIProvider({ apiKey: "test-openai-key", baseUrl: stub.baseUrl });

    const response = await provider.chat({ messages: [{ role: "user", content: "x" }] });

    expect(response.content).toBe("");
    expect(response.finish_reason).toBeNull();
    expect(response.usage).toEqual({ prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 });
    expect(stub.requests[0].headers["openai-organization"]).toBeUndefined();
  });

  it("maps 404 to a model-not-found error", async () => {
    stub = await startStubApi({
      "/chat/completions": [{ status: 404, body: { error: { message: "The model `gpt-missing` does not exist" } } }]
    });
    const provider = new OpenAIProvider({ apiKey: "test-openai-key", baseUrl: stub.baseUrl, model: "gpt-missing" });

    const error = await provider.chat({ messages: [{ role: "user", content: "x" }] }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelNotFoundError);
    expect(error).toMatchObject({ message: "Model gpt-missing not found for openai", statusCode: 404 });
  });

  it("reads the wait time from a rate limit message", async () => {
    stub = await startStubApi({
      "/chat/completions": [
        { status: 429, body: { error: { message: "Rate limit reached. Please try again in 1.5s." } } }
      ]
    });
    const provider = new OpenAIProvider({ apiKey: "test-openai-key", baseUrl: stub.baseUrl, maxRetries: 0 });

    const error = await provider.chat({ messages: [{ role: "user", content: "x" }] }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfterMs: 1500 });
  });

  it("marks server errors as retryable", async () => {
    stub = await startStubApi({
      "/chat/completions": [{ status: 503, body: "upstream unavailable" }]
    });
    const provider = new OpenAIProvider({ apiKey: "test-openai-key", baseUrl: stub.baseUrl, maxRetries: 0 });

    const error = await provider.chat({ messages: [{ role: "user", content: "x" }] }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: "OpenAI API error (503): upstream unavailable",
      statusCode: 503,
      retryable: true
    });
  });

  it("builds from environment variables", () => {
    expect(() => OpenAIProvider.fromEnv({})).toThrow("OPENAI_API_KEY environment variable is required");
    const provider = OpenAIProvider.fromEnv({ OPENAI_API_KEY: "test-openai-key" });
    expect(provider.defaultModel).toBe("gpt-4");
  });
});
