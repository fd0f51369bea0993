/**
 * LLM collaborator
 *
 * The research loop only ever needs "prompt in, text out". Two backends:
 * 1. Anthropic Messages API (default)
 * 2. Gemini via @google/generative-ai, selected with LLM_PROVIDER=gemini
 *
 * Responses are opaque text. Nothing here retries; a failed call surfaces
 * to the caller as-is.
 */

import Anthropic from "@anthropic-ai/sdk";
import { GoogleGenerativeAI } from "@google/generative-ai";
import { requireEnv, type ResearchConfig } from "./config.js";

export interface CompletionOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface LlmClient {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export class AnthropicLlm implements LlmClient {
  private client: Anthropic;

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey });
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const response = await this.client.messages.create({
      model: options.model,
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      messages: [{ role: "user", content: prompt }],
    });

    return response.content
      .filter((b): b is Anthropic.TextBlock => b.type === "text")
      .map((b) => b.text)
      .join("\n");
  }
}

export class GeminiLlm implements LlmClient {
  private client: GoogleGenerativeAI;

  constructor(apiKey: string) {
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: options.model,
      generationConfig: {
        temperature: options.temperature,
        maxOutputTokens: options.maxTokens,
      },
    });

    const result = await model.generateContent(prompt);
    return result.response.text();
  }
}

export function createLlmClient(config: ResearchConfig): LlmClient {
  switch (config.llmProvider) {
    case "anthropic":
      return new AnthropicLlm(requireEnv("ANTHROPIC_API_KEY"));
    case "gemini":
      return new GeminiLlm(requireEnv("GEMINI_API_KEY"));
  }
}
