/**
 * Web Search
 *
 * Two engines, picked with SEARCH_PROVIDER:
 * 1. Serper.dev — Google results; snippet becomes the source content
 * 2. Tavily — search API that returns extracted page content per result
 *
 * Providers return loosely-typed records; toSource() turns them into Source
 * values with defaulted fields.
 */

import { requireEnv, type ResearchConfig } from "./config.js";
import { SearchFailedError, errorMessage } from "./errors.js";
import type { RawSearchResult, Source } from "./types.js";

export interface SearchProvider {
  readonly name: string;
  search(query: string): Promise<RawSearchResult[]>;
}

function isRecord(value: unknown): value is RawSearchResult {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resultList(data: unknown, key: string): RawSearchResult[] {
  if (!isRecord(data)) return [];
  const list = data[key];
  return Array.isArray(list) ? list.filter(isRecord) : [];
}

function text(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value : fallback;
}

export function toSource(raw: RawSearchResult): Source {
  return {
    title: text(raw.title, "Untitled"),
    url: text(raw.url, ""),
    content: text(raw.content, ""),
  };
}

// ============================================================
//  SERPER — Google results with URLs + snippets
// ============================================================

export class SerperSearch implements SearchProvider {
  readonly name = "Serper";

  constructor(
    private apiKey: string,
    private numResults: number = 8
  ) {}

  async search(query: string): Promise<RawSearchResult[]> {
    const response = await fetch("https://google.serper.dev/search", {
      method: "POST",
      headers: {
        "X-API-KEY": this.apiKey,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({ q: query, num: this.numResults }),
    });

    if (!response.ok) throw new Error(`Serper API error: ${response.status}`);

    const data: unknown = await response.json();
    return resultList(data, "organic")
      .slice(0, this.numResults)
      .map((r) => ({ title: r.title, url: r.link, content: r.snippet }));
  }
}

// ============================================================
//  TAVILY — results with extracted page content
// ============================================================

export class TavilySearch implements SearchProvider {
  readonly name = "Tavily";

  constructor(
    private apiKey: string,
    private numResults: number = 8
  ) {}

  async search(query: string): Promise<RawSearchResult[]> {
    const response = await fetch("https://api.tavily.com/search", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        api_key: this.apiKey,
        query,
        max_results: this.numResults,
        search_depth: "advanced",
      }),
    });

    if (!response.ok) throw new Error(`Tavily API error: ${response.status}`);

    const data: unknown = await response.json();
    return resultList(data, "results");
  }
}

export function createSearchProvider(config: ResearchConfig): SearchProvider {
  switch (config.searchProvider) {
    case "serper":
      return new SerperSearch(requireEnv("SERPER_API_KEY"), config.resultsPerSearch);
    case "tavily":
      return new TavilySearch(requireEnv("TAVILY_API_KEY"), config.resultsPerSearch);
  }
}

// ============================================================
//  RETRY — fixed count, fixed delay, every error treated the same
// ============================================================

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms));

export interface RetryOptions {
  maxRetries: number;
  delayMs: number;
  sleep?: Sleep;
}

export async function searchWithRetry(
  provider: SearchProvider,
  query: string,
  options: RetryOptions
): Promise<Source[]> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxRetries; attempt++) {
    try {
      const results = await provider.search(query);
      return results.map(toSource);
    } catch (error) {
      lastError = error;
      console.log(
        `  ⚠️ [${provider.name}] attempt ${attempt}/${options.maxRetries} failed: ${errorMessage(error)}`
      );
      if (attempt < options.maxRetries) await wait(options.delayMs);
    }
  }

  throw new SearchFailedError(
    `Search failed after ${options.maxRetries} attempts: ${errorMessage(lastError)}`,
    options.maxRetries,
    lastError
  );
}
