import { describe, expect, it } from "vitest";
import { AnthropicProvider } from "../src/providers/anthropic-provider";
import { OpenAIProvider } from "../src/providers/openai-provider";
import { createProviders } from "../src/providers/provider-factory";
import { resolveSettings } from "../src/shared/config";

describe("createProviders", () => {
  it("builds only the primary provider without an OpenAI key", () => {
    const settings = resolveSettings({
      target: "HEAD",
      overrides: { model: "claude-custom" },
      env: { ANTHROPIC_API_KEY: "test-anthropic-key" },
      cwd: "/repo"
    });

    const pair = createProviders(settings);

    expect(pair.primary).toBeInstanceOf(AnthropicProvider);
    expect(pair.primary.defaultModel).toBe("claude-custom");
    expect(pair.fallback).toBeUndefined();
  });

  it("adds the OpenAI fallback when its key is present", () => {
    const settings = resolveSettings({
      target: "HEAD",
      overrides: {},
      env: { ANTHROPIC_API_KEY: "test-anthropic-key", OPENAI_API_KEY: "test-openai-key" },
      cwd: "/repo"
    });

    const pair = createProviders(settings);

    expect(pair.fallback).toBeInstanceOf(OpenAIProvider);
    expect(pair.fallback?.defaultModel).toBe("gpt-4");
  });

  it("refuses to build without an Anthropic key", () => {
    const settings = resolveSettings({ target: "HEAD", overrides: {}, env: {}, cwd: "/repo" });
    expect(() => createProviders(settings)).toThrow("Anthropic API key is required");
  });
});
