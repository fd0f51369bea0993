import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, loadConfig, requireEnv } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      SEARCH_PROVIDER: "Tavily",
      MAX_ITERATIONS: "5",
      MAX_RETRIES: "2",
      DELAY_BETWEEN_REQUESTS_MS: "0",
      DEEP_RESEARCH_MODEL: "claude-3-5-haiku-latest",
    });

    expect(config.searchProvider).toBe("tavily");
    expect(config.maxIterations).toBe(5);
    expect(config.maxRetries).toBe(2);
    expect(config.delayMs).toBe(0);
    expect(config.queryModel).toBe("claude-sonnet-4-20250514");
    expect(config.researchModel).toBe("claude-3-5-haiku-latest");
  });

  it("switches default models with the provider", () => {
    const config = loadConfig({ LLM_PROVIDER: "gemini" });

    expect(config.llmProvider).toBe("gemini");
    expect(config.queryModel).toBe("gemini-2.0-flash");
    expect(config.researchModel).toBe("gemini-2.0-flash");
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ MAX_ITERATIONS: "0" })).toThrow('MAX_ITERATIONS must be an integer >= 1 (got "0")');
    expect(() => loadConfig({ MAX_RETRIES: "2.5" })).toThrow("MAX_RETRIES must be an integer >= 1");
    expect(() => loadConfig({ DELAY_BETWEEN_REQUESTS_MS: "-1" })).toThrow("DELAY_BETWEEN_REQUESTS_MS must be an integer >= 0");
  });

  it("rejects unknown providers", () => {
    expect(() => loadConfig({ LLM_PROVIDER: "openai" })).toThrow(
      'LLM_PROVIDER must be one of anthropic, gemini (got "openai")'
    );
  });
});

describe("requireEnv", () => {
  it("returns a set value", () => {
    expect(requireEnv("SERPER_API_KEY", { SERPER_API_KEY: "test-secret" })).toBe("test-secret");
  });

  it("throws for a missing or blank value", () => {
    expect(() => requireEnv("SERPER_API_KEY", {})).toThrow("SERPER_API_KEY not set. Add it to .env");
    expect(() => requireEnv("SERPER_API_KEY", { SERPER_API_KEY: "  " })).toThrow("SERPER_API_KEY not set");
  });
});
