/**
 * Wire schemas for POST /research, shared by the server and the API client.
 */

import { z } from "zod";

export const ResearchRequestSchema = z.object({
  domain: z.string().trim().min(1).describe("Industry domain to research (e.g., 'EV charging')"),
  company_name: z.string().nullish().describe("Specific company to focus on"),
  metrics: z.array(z.string()).nullish().describe("Metrics to analyze (e.g., ['market share'])"),
  custom_operator: z.string().nullish().describe("Analysis method (e.g., 'SWOT analysis')"),
});

const SourceSchema = z.object({
  title: z.string(),
  url: z.string(),
  content: z.string(),
});

const IterationSchema = z.object({
  iteration: z.number().int(),
  query: z.string(),
  sources_found: z.number().int(),
  summary: z.string(),
  knowledge_gaps: z.array(z.string()),
});

export const ResearchResponseSchema = z.object({
  final_analysis: z.string().describe("Synthesized market report"),
  iterations: z.array(IterationSchema).describe("Per-iteration research trail"),
  all_sources: z.array(SourceSchema).describe("Deduplicated sources across iterations"),
});
