import { vi, type Mock } from "vitest";
import { DEFAULT_CONFIG, type ResearchConfig } from "./config.js";
import type { ResearchContext } from "./agent.js";
import type { CompletionOptions, LlmClient } from "./llm.js";
import type { SearchProvider, Sleep } from "./search.js";
import type { RawSearchResult } from "./types.js";

export const testConfig: ResearchConfig = {
  ...DEFAULT_CONFIG,
  queryModel: "query-model",
  researchModel: "research-model",
  delayMs: 10,
};

export interface RecordedCall {
  kind: "initial" | "refine" | "summary" | "gaps";
  prompt: string;
  options: CompletionOptions;
}

/**
 * Scripted LLM: recognizes each prompt type and answers with canned text.
 * `gapsText` sets the gap answer; `failSummaryOnCall` makes the Nth summary
 * call throw.
 */
export class FakeLlm implements LlmClient {
  calls: RecordedCall[] = [];
  gapsText = "- Gap one\n- Gap two";
  private refineCount = 0;
  private summaryCount = 0;
  failSummaryOnCall?: number;

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const kind = this.classify(prompt);
    this.calls.push({ kind, prompt, options });

    switch (kind) {
      case "initial":
        return "  initial query  ";
      case "refine":
        this.refineCount++;
        return `refined query ${this.refineCount}`;
      case "summary":
        this.summaryCount++;
        if (this.summaryCount === this.failSummaryOnCall) {
          throw new Error("LLM unavailable");
        }
        return `summary ${this.summaryCount}`;
      case "gaps":
        return this.gapsText;
    }
  }

  callsOf(kind: RecordedCall["kind"]): RecordedCall[] {
    return this.calls.filter((c) => c.kind === kind);
  }

  private classify(prompt: string): RecordedCall["kind"] {
    if (prompt.startsWith("Create a comprehensive web search query")) return "initial";
    if (prompt.includes("create a refined web search query")) return "refine";
    if (prompt.startsWith("Synthesize a comprehensive summary")) return "summary";
    return "gaps";
  }
}

type SearchStep = RawSearchResult[] | Error;

/** Replays one step per search() call; the last step repeats. */
export class FakeSearch implements SearchProvider {
  readonly name = "Fake";
  queries: string[] = [];

  constructor(private steps: SearchStep[]) {}

  async search(query: string): Promise<RawSearchResult[]> {
    const step = this.steps[Math.min(this.queries.length, this.steps.length - 1)];
    this.queries.push(query);
    if (step instanceof Error) throw step;
    return step ?? [];
  }
}

export function results(prefix: string, count: number): RawSearchResult[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `${prefix.toUpperCase()}${i + 1}`,
    url: `https://${prefix}.example/${i + 1}`,
    content: `content ${prefix}${i + 1}`,
  }));
}

export function makeContext(
  llm: LlmClient,
  search: SearchProvider,
  config: Partial<ResearchConfig> = {}
): ResearchContext & { sleep: Mock<Sleep> } {
  return {
    config: { ...testConfig, ...config },
    llm,
    search,
    sleep: vi.fn<Sleep>(async () => {}),
  };
}
