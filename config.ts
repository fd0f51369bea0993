/**
 * Research configuration
 *
 * Everything tunable about a run lives in one ResearchConfig object that is
 * handed to the controller. Entry points build it from the environment
 * (after dotenv has loaded .env); tests build it by hand.
 */

export type LlmProvider = "anthropic" | "gemini";
export type SearchProviderName = "serper" | "tavily";

export interface ResearchConfig {
  llmProvider: LlmProvider;
  /** Model for query generation */
  queryModel: string;
  /** Model for summarization and gap analysis */
  researchModel: string;
  searchProvider: SearchProviderName;
  resultsPerSearch: number;
  maxQueryLength: number;
  /** Search attempts per query */
  maxRetries: number;
  /** Pause between search attempts and between iterations */
  delayMs: number;
  maxIterations: number;
  /** Per-source content budget inside summarization prompts */
  sourceContentChars: number;
}

export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  anthropic: "claude-sonnet-4-20250514",
  gemini: "gemini-2.0-flash",
};

export const DEFAULT_CONFIG: ResearchConfig = {
  llmProvider: "anthropic",
  queryModel: DEFAULT_MODELS.anthropic,
  researchModel: DEFAULT_MODELS.anthropic,
  searchProvider: "serper",
  resultsPerSearch: 8,
  maxQueryLength: 400,
  maxRetries: 3,
  delayMs: 2000,
  maxIterations: 3,
  sourceContentChars: 2000,
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function readChoice<T extends string>(
  env: Env,
  name: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  const match = choices.find((c) => c === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${choices.join(", ")} (got "${raw}")`);
  }
  return match;
}

export function loadConfig(env: Env = process.env): ResearchConfig {
  const llmProvider = readChoice(env, "LLM_PROVIDER", ["anthropic", "gemini"] as const, DEFAULT_CONFIG.llmProvider);
  const defaultModel = DEFAULT_MODELS[llmProvider];

  return {
    llmProvider,
    queryModel: env.QUERY_GENERATION_MODEL?.trim() || defaultModel,
    researchModel: env.DEEP_RESEARCH_MODEL?.trim() || defaultModel,
    searchProvider: readChoice(env, "SEARCH_PROVIDER", ["serper", "tavily"] as const, DEFAULT_CONFIG.searchProvider),
    resultsPerSearch: readInt(env, "RESULTS_PER_SEARCH", DEFAULT_CONFIG.resultsPerSearch, 1),
    maxQueryLength: readInt(env, "MAX_QUERY_LENGTH", DEFAULT_CONFIG.maxQueryLength, 1),
    maxRetries: readInt(env, "MAX_RETRIES", DEFAULT_CONFIG.maxRetries, 1),
    delayMs: readInt(env, "DELAY_BETWEEN_REQUESTS_MS", DEFAULT_CONFIG.delayMs, 0),
    maxIterations: readInt(env, "MAX_ITERATIONS", DEFAULT_CONFIG.maxIterations, 1),
    sourceContentChars: readInt(env, "SOURCE_CONTENT_CHARS", DEFAULT_CONFIG.sourceContentChars, 1),
  };
}

export function requireEnv(name: string, env: Env = process.env): string {
  const value = env[name]?.trim();
  if (!value) throw new Error(`${name} not set. Add it to .env`);
  return value;
}
