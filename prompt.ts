import type { ResearchRequest, Source } from "./types.js";

export function buildInitialQueryPrompt(
  request: ResearchRequest,
  maxQueryLength: number
): string {
  const context = [
    request.companyName ? `Focusing on company: ${request.companyName}` : "",
    request.metrics?.length ? `Analyzing metrics: ${request.metrics.join(", ")}` : "",
    request.customOperator ? `Using analysis method: ${request.customOperator}` : "",
  ]
    .filter(Boolean)
    .join("\n");

  return `Create a comprehensive web search query for market research about: ${request.domain}
${context}

The query should:
- Be specific enough to get relevant results
- Include important industry keywords
- Cover both broad trends and specific details
- Be under ${maxQueryLength} characters

Return only the query text.`;
}

export function buildRefinementQueryPrompt(
  domain: string,
  previousSummary: string,
  knowledgeGaps: string[],
  maxQueryLength: number
): string {
  return `Based on the following research summary and identified knowledge gaps about ${domain},
create a refined web search query that specifically addresses these gaps.

## PREVIOUS SUMMARY
${previousSummary}

## KNOWLEDGE GAPS
${knowledgeGaps.join(", ")}

The new query should:
- Target the missing information specifically
- Use precise terminology
- Be under ${maxQueryLength} characters

Return only the query text.`;
}

export function buildSourceDigest(sources: Source[], contentChars: number): string {
  return sources
    .map(
      (s, i) =>
        `Source ${i + 1}: ${s.title}\n` +
        `URL: ${s.url || "No URL"}\n` +
        `Content: ${s.content.slice(0, contentChars) || "No content"}...`
    )
    .join("\n\n");
}

export function buildSummaryPrompt(
  sources: Source[],
  domain: string,
  metrics: string[] | undefined,
  contentChars: number
): string {
  const metricsContext = metrics?.length ? ` focusing on ${metrics.join(", ")}` : "";

  return `Synthesize a comprehensive summary from these search results about ${domain}${metricsContext}:

${buildSourceDigest(sources, contentChars)}

Include:
1. Key findings and statistics
2. Trends and patterns
3. Conflicting information
4. Notable missing information

Organize the summary clearly with headings.`;
}

export function buildGapPrompt(domain: string, summary: string): string {
  return `Analyze this market research summary about ${domain} and identify the 3 most important
knowledge gaps or unanswered questions that would improve the research quality.

Focus on:
- Missing data points
- Unclear trends
- Lack of specific examples
- Areas needing more depth

## SUMMARY
${summary}

Return only a bulleted list of the key gaps, nothing else.`;
}

/**
 * One gap per non-blank line, with a single leading bullet marker (`-`, `*`
 * or `•`) stripped. Markdown emphasis inside the gap is left alone. The LLM
 * may return more or fewer than 3; whatever comes back is passed through.
 */
export function parseKnowledgeGaps(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim().replace(/^[-*•]\s+/, "").trim())
    .filter((line) => line.length > 0);
}
