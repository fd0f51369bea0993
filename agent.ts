/**
 * Iterative Market Research Agent
 *
 *   initial query ──→ search (retry) ──→ merge sources ──→ summarize
 *         ▲                                                   │
 *         └──── refinement query ◀──── knowledge gaps ◀───────┘
 *
 * Runs up to maxIterations passes, then one final summarization over every
 * source collected. A run owns all of its state; collaborators come in
 * through ResearchContext.
 */

import type { ResearchConfig } from "./config.js";
import { NoSourcesError, errorMessage } from "./errors.js";
import type { LlmClient } from "./llm.js";
import {
  buildGapPrompt,
  buildInitialQueryPrompt,
  buildRefinementQueryPrompt,
  buildSummaryPrompt,
  parseKnowledgeGaps,
} from "./prompt.js";
import { searchWithRetry, sleep, type SearchProvider, type Sleep } from "./search.js";
import { mergeSources } from "./sources.js";
import type {
  IterationRecord,
  ProgressCallback,
  ResearchRequest,
  ResearchResult,
  Source,
} from "./types.js";

export interface ResearchContext {
  config: ResearchConfig;
  llm: LlmClient;
  search: SearchProvider;
  sleep?: Sleep;
  onProgress?: ProgressCallback;
}

function report(ctx: ResearchContext, status: string): void {
  console.log(status);
  ctx.onProgress?.(status);
}

// ============================================================
//  QUERY GENERATION
// ============================================================

export async function generateInitialQuery(
  ctx: ResearchContext,
  request: ResearchRequest
): Promise<string> {
  const response = await ctx.llm.complete(
    buildInitialQueryPrompt(request, ctx.config.maxQueryLength),
    { model: ctx.config.queryModel, temperature: 0.4, maxTokens: 200 }
  );
  return response.trim();
}

export async function generateRefinementQuery(
  ctx: ResearchContext,
  domain: string,
  previousSummary: string,
  knowledgeGaps: string[]
): Promise<string> {
  const response = await ctx.llm.complete(
    buildRefinementQueryPrompt(domain, previousSummary, knowledgeGaps, ctx.config.maxQueryLength),
    // slightly more creative for gap filling
    { model: ctx.config.queryModel, temperature: 0.5, maxTokens: 200 }
  );
  return response.trim();
}

// ============================================================
//  SUMMARIZATION + GAP ANALYSIS
// ============================================================

export async function summarizeSources(
  ctx: ResearchContext,
  sources: Source[],
  domain: string,
  metrics?: string[]
): Promise<string> {
  const response = await ctx.llm.complete(
    buildSummaryPrompt(sources, domain, metrics, ctx.config.sourceContentChars),
    { model: ctx.config.researchModel, temperature: 0.3, maxTokens: 2000 }
  );
  return response.trim();
}

export async function identifyKnowledgeGaps(
  ctx: ResearchContext,
  domain: string,
  summary: string
): Promise<string[]> {
  const response = await ctx.llm.complete(buildGapPrompt(domain, summary), {
    model: ctx.config.researchModel,
    temperature: 0.3,
    maxTokens: 200,
  });
  return parseKnowledgeGaps(response);
}

// ============================================================
//  MAIN LOOP
// ============================================================

export async function runMarketResearch(
  request: ResearchRequest,
  ctx: ResearchContext
): Promise<ResearchResult> {
  const { config } = ctx;
  const wait = ctx.sleep ?? sleep;
  const iterations: IterationRecord[] = [];
  let allSources: Source[] = [];

  report(ctx, `\n🧠 Market research starting: ${request.domain}`);
  if (request.companyName) report(ctx, `🏢 Company: ${request.companyName}`);

  let query = await generateInitialQuery(ctx, request);

  for (let k = 1; k <= config.maxIterations; k++) {
    const isFirst = k === 1;
    const isLast = k === config.maxIterations;
    const iterationQuery = query;

    report(ctx, `\n🔍 [iter ${k}/${config.maxIterations}] "${iterationQuery}"`);

    let found: Source[];
    try {
      found = await searchWithRetry(ctx.search, iterationQuery, {
        maxRetries: config.maxRetries,
        delayMs: config.delayMs,
        sleep: wait,
      });
    } catch (error) {
      if (isFirst) throw error;
      console.error(`  ⚠️ Search failed on iteration ${k}, finalizing early: ${errorMessage(error)}`);
      break;
    }

    if (found.length === 0) {
      if (isFirst) throw new NoSourcesError();
      report(ctx, `  ⏹ No new sources on iteration ${k}, finalizing early`);
      break;
    }

    allSources = mergeSources(allSources, found);
    report(ctx, `  📚 ${found.length} sources (${allSources.length} unique so far)`);

    try {
      const summary = await summarizeSources(ctx, found, request.domain, request.metrics);

      let knowledgeGaps: string[] = [];
      if (!isLast) {
        knowledgeGaps = await identifyKnowledgeGaps(ctx, request.domain, summary);
        report(ctx, `  🕳️ ${knowledgeGaps.length} knowledge gaps identified`);
        // no gaps: next iteration reuses this query
        if (knowledgeGaps.length > 0) {
          query = await generateRefinementQuery(ctx, request.domain, summary, knowledgeGaps);
        }
      }

      iterations.push({
        iteration: k,
        query: iterationQuery,
        sourcesFound: found.length,
        summary,
        knowledgeGaps,
      });
    } catch (error) {
      if (isFirst) throw error;
      console.error(`  ⚠️ Iteration ${k} failed, finalizing early: ${errorMessage(error)}`);
      break;
    }

    if (!isLast) await wait(config.delayMs);
  }

  report(ctx, `\n📝 Final synthesis over ${allSources.length} sources...`);
  const finalAnalysis = await summarizeSources(ctx, allSources, request.domain, request.metrics);
  report(ctx, `✅ Research complete: ${iterations.length} iterations, ${allSources.length} sources`);

  return { finalAnalysis, iterations, allSources };
}
